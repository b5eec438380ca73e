import type { DialogueAction, DialogueCondition } from '../ConditionEffect/types'
import type { DialogueId, NodeId, QuestId, SessionId } from '../ids'

export interface DialogueChoice {
	text: string
	targetNode?: NodeId
	conditions: DialogueCondition[]
	actions: DialogueAction[]
	endsDialogue: boolean
}

export interface DialogueNode {
	id: NodeId
	text: string
	speakerOverride?: string
	choices: DialogueChoice[]
	conditions: DialogueCondition[]
	actions: DialogueAction[]
	isTerminal: boolean
}

export interface DialogueTree {
	id: DialogueId
	name: string
	rootNode: NodeId
	nodes: Record<NodeId, DialogueNode>
	speakerName?: string
	repeatable: boolean
	associatedQuest?: QuestId
}

export type DialogueEndReason = 'terminal-node' | 'choice-ended' | 'cancelled'

export type DialogueSessionState =
	| { status: 'Active', nodeId: NodeId }
	| { status: 'StuckActive', nodeId: NodeId }
	| { status: 'Ended', reason: DialogueEndReason }

export interface DialogueSessionSnapshot {
	sessionId: SessionId
	dialogueId: DialogueId
	nodeId: NodeId | null
	endReason: DialogueEndReason | null
	/** Nodes entered so far, oldest first; empty once the session has ended */
	history: NodeId[]
}

export interface DialogueStartOptions {
	npcId?: number
	mapId?: number
}
