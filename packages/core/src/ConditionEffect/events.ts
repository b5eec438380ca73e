export const ConditionEffectEvents = {
	ActionApplied: 'action:applied',
	ActionFailed: 'action:failed',
	ConditionDiagnostic: 'condition:diagnostic',
	ShopOpened: 'shop:opened',
	ScriptedEvent: 'scripted:event',
	PartyRecruited: 'party:recruited',
	InnRecruited: 'inn:recruited'
} as const
