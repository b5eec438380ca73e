import type { CharacterId, ItemId, NpcId, QuestId } from '../ids'

export interface HasQuestCondition {
	type: 'HasQuest'
	questId: QuestId
}

export interface CompletedQuestCondition {
	type: 'CompletedQuest'
	questId: QuestId
}

export interface QuestStageCondition {
	type: 'QuestStage'
	questId: QuestId
	stageNumber: number
}

export interface HasItemCondition {
	type: 'HasItem'
	itemId: ItemId
	quantity: number
}

export interface HasGoldCondition {
	type: 'HasGold'
	amount: number
}

export interface MinLevelCondition {
	type: 'MinLevel'
	level: number
}

export interface FlagSetCondition {
	type: 'FlagSet'
	flagName: string
	value: boolean
}

export interface ReputationThresholdCondition {
	type: 'ReputationThreshold'
	faction: string
	threshold: number
}

export interface AndCondition {
	type: 'And'
	conditions: DialogueCondition[]
}

export interface OrCondition {
	type: 'Or'
	conditions: DialogueCondition[]
}

export interface NotCondition {
	type: 'Not'
	condition: DialogueCondition
}

export type DialogueCondition =
	| HasQuestCondition
	| CompletedQuestCondition
	| QuestStageCondition
	| HasItemCondition
	| HasGoldCondition
	| MinLevelCondition
	| FlagSetCondition
	| ReputationThresholdCondition
	| AndCondition
	| OrCondition
	| NotCondition

export type ConditionType = DialogueCondition['type']

export const CONDITION_TYPES: readonly ConditionType[] = [
	'HasQuest',
	'CompletedQuest',
	'QuestStage',
	'HasItem',
	'HasGold',
	'MinLevel',
	'FlagSet',
	'ReputationThreshold',
	'And',
	'Or',
	'Not'
]

export interface ConditionDiagnostic {
	conditionType: string
	message: string
}

export type ConditionDiagnosticSink = (diagnostic: ConditionDiagnostic) => void

export interface ItemStack {
	itemId: ItemId
	quantity: number
}

export interface StartQuestAction {
	type: 'StartQuest'
	questId: QuestId
}

export interface CompleteQuestStageAction {
	type: 'CompleteQuestStage'
	questId: QuestId
	stageNumber: number
}

export interface GiveItemsAction {
	type: 'GiveItems'
	items: ItemStack[]
}

export interface TakeItemsAction {
	type: 'TakeItems'
	items: ItemStack[]
}

export interface GiveGoldAction {
	type: 'GiveGold'
	amount: number
}

export interface TakeGoldAction {
	type: 'TakeGold'
	amount: number
}

export interface SetFlagAction {
	type: 'SetFlag'
	flagName: string
	value: boolean
}

export interface ChangeReputationAction {
	type: 'ChangeReputation'
	faction: string
	change: number
}

export interface TriggerEventAction {
	type: 'TriggerEvent'
	eventName: string
}

export interface GrantExperienceAction {
	type: 'GrantExperience'
	amount: number
}

export interface RecruitToPartyAction {
	type: 'RecruitToParty'
	characterId: CharacterId
}

export interface RecruitToInnAction {
	type: 'RecruitToInn'
	characterId: CharacterId
	innkeeperId: NpcId
}

export interface OpenShopAction {
	type: 'OpenShop'
	npcId: NpcId
}

export type DialogueAction =
	| StartQuestAction
	| CompleteQuestStageAction
	| GiveItemsAction
	| TakeItemsAction
	| GiveGoldAction
	| TakeGoldAction
	| SetFlagAction
	| ChangeReputationAction
	| TriggerEventAction
	| GrantExperienceAction
	| RecruitToPartyAction
	| RecruitToInnAction
	| OpenShopAction

export type ActionType = DialogueAction['type']

export const ACTION_TYPES: readonly ActionType[] = [
	'StartQuest',
	'CompleteQuestStage',
	'GiveItems',
	'TakeItems',
	'GiveGold',
	'TakeGold',
	'SetFlag',
	'ChangeReputation',
	'TriggerEvent',
	'GrantExperience',
	'RecruitToParty',
	'RecruitToInn',
	'OpenShop'
]
