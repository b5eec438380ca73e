export const DialogueEvents = {
	Started: 'dialogue:started',
	NodeEntered: 'dialogue:node-entered',
	ChoiceSelected: 'dialogue:choice-selected',
	Ended: 'dialogue:ended'
} as const
