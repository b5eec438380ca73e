import type { GameStateView } from '../GameState/types'
import type { CharacterId, DialogueId, ItemId, MapId, MonsterId, NodeId, NpcId, QuestId } from '../ids'

export type Severity = 'Error' | 'Warning'

export type FindingCode =
	| 'DuplicateDialogueId'
	| 'MissingRootNode'
	| 'NodeIdMismatch'
	| 'DanglingTarget'
	| 'ChoiceWithoutTarget'
	| 'EmptyNodeText'
	| 'UnreachableNode'
	| 'DeadEndNode'
	| 'ConditionallyUnreachable'
	| 'UnknownAssociatedQuest'
	| 'UnknownQuestReference'
	| 'UnknownStageReference'
	| 'UnknownConditionType'
	| 'UnknownActionType'
	| 'UnknownObjectiveType'
	| 'UnknownRewardType'
	| 'InvalidParameter'
	| 'UnresolvedReference'
	| 'DuplicateQuestId'
	| 'StageNumbering'
	| 'EmptyRequiredStage'
	| 'EmptyOptionalStage'
	| 'NoStages'
	| 'LevelBounds'
	| 'UnknownRequiredQuest'
	| 'RequiredQuestCycle'

export interface FindingLocation {
	dialogueId?: DialogueId
	nodeId?: NodeId
	choiceIndex?: number
	questId?: QuestId
	stageNumber?: number
	objectiveIndex?: number
	rewardIndex?: number
}

export interface ValidationFinding {
	severity: Severity
	code: FindingCode
	message: string
	location: FindingLocation
}

/**
 * Known ids of things that live outside dialogues and quests. A missing set
 * means ids of that kind are not checked.
 */
export interface ContentReferences {
	items?: ReadonlySet<ItemId>
	monsters?: ReadonlySet<MonsterId>
	npcs?: ReadonlySet<NpcId>
	maps?: ReadonlySet<MapId>
	characters?: ReadonlySet<CharacterId>
}

export interface ValidateOptions {
	references?: ContentReferences
	/** State the campaign starts from, used to flag nodes gated shut at the start */
	initialState?: GameStateView
}

export interface ValidationSummary {
	errors: number
	warnings: number
}
