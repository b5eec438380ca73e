import type { ItemStack } from '../ConditionEffect/types'
import type { ItemId, MapId, MonsterId, NpcId, QuestId } from '../ids'
import type { Position } from '../types'

export interface KillMonstersObjective {
	type: 'KillMonsters'
	monsterId: MonsterId
	quantity: number
}

export interface CollectItemsObjective {
	type: 'CollectItems'
	itemId: ItemId
	quantity: number
}

export interface ReachLocationObjective {
	type: 'ReachLocation'
	mapId: MapId
	position: Position
	radius: number
}

export interface TalkToNpcObjective {
	type: 'TalkToNpc'
	npcId: NpcId
	mapId: MapId
}

export interface DeliverItemObjective {
	type: 'DeliverItem'
	itemId: ItemId
	npcId: NpcId
	quantity: number
}

export interface EscortNpcObjective {
	type: 'EscortNpc'
	npcId: NpcId
	mapId: MapId
	position: Position
}

export interface CustomFlagObjective {
	type: 'CustomFlag'
	flagName: string
	requiredValue: boolean
}

export type QuestObjective =
	| KillMonstersObjective
	| CollectItemsObjective
	| ReachLocationObjective
	| TalkToNpcObjective
	| DeliverItemObjective
	| EscortNpcObjective
	| CustomFlagObjective

export type QuestReward =
	| { type: 'Experience', amount: number }
	| { type: 'Gold', amount: number }
	| { type: 'Items', items: ItemStack[] }
	| { type: 'UnlockQuest', questId: QuestId }
	| { type: 'SetFlag', flagName: string, value: boolean }
	| { type: 'Reputation', faction: string, change: number }

export interface QuestStage {
	stageNumber: number
	name: string
	description: string
	objectives: QuestObjective[]
	requireAllObjectives: boolean
}

export interface QuestTree {
	id: QuestId
	name: string
	description: string
	stages: QuestStage[]
	rewards: QuestReward[]
	minLevel?: number
	maxLevel?: number
	requiredQuests: QuestId[]
	repeatable: boolean
	isMainQuest: boolean
	questGiverNpc?: NpcId
	questGiverMap?: MapId
	questGiverPosition?: Position
}

export interface QuestProgress {
	questId: QuestId
	/** 1-based index of the active stage */
	currentStage: number
	/** objective index -> progress count for the active stage */
	objectiveProgress: Record<number, number>
	completed: boolean
}

export type QuestStatus = 'NotStarted' | 'Active' | 'Completed'

export type QuestProgressEvent =
	| { type: 'MonsterKilled', monsterId: MonsterId, count: number }
	| { type: 'ItemCollected', itemId: ItemId, count: number }
	| { type: 'LocationReached', mapId: MapId, position: Position }
	| { type: 'NpcTalkedTo', npcId: NpcId, mapId?: MapId }
	| { type: 'ItemDelivered', itemId: ItemId, npcId: NpcId, count: number }
	| { type: 'NpcEscorted', npcId: NpcId, mapId: MapId, position: Position }
	| { type: 'FlagChanged', flagName: string, value: boolean }

export type QuestStartResult = 'started' | 'restarted' | 'alreadyActive' | 'alreadyCompleted'

export type QuestStartBlocker = 'unknownQuest' | 'levelTooLow' | 'levelTooHigh' | 'missingPrerequisite' | 'alreadyActive' | 'alreadyCompleted'

export interface QuestStartRefusal {
	ok: false
	reason: QuestStartBlocker
	message: string
}

export type QuestStartCheck = { ok: true } | QuestStartRefusal

export type QuestStartOutcome = { ok: true, result: QuestStartResult } | QuestStartRefusal

export type StageCompletionResult = 'advanced' | 'completed' | 'alreadyComplete' | 'notActive' | 'outOfOrder'

export interface QuestUpdate {
	questId: QuestId
	completedStages: number[]
	questCompleted: boolean
}
