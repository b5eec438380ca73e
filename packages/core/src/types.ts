import type { DialogueTree } from './Dialogue/types'
import type { QuestTree } from './Quest/types'
import type { ContentReferences } from './Validation/types'

export interface Position {
	x: number
	y: number
}

export interface NarrativeContent {
	dialogues: DialogueTree[]
	quests: QuestTree[]
	references?: ContentReferences
}

// Re-export types from modules
export * from './ids'
export * from './Dialogue/types'
export * from './Quest/types'
export * from './ConditionEffect/types'
export * from './GameState/types'
export * from './Validation/types'
