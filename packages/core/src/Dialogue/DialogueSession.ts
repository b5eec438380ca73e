import { v4 as uuidv4 } from 'uuid'
import type { ActionBatchResult, ActionDispatcher } from '../ConditionEffect'
import { evaluateConditions } from '../ConditionEffect/conditions'
import { ConditionEffectEvents } from '../ConditionEffect/events'
import type { ConditionDiagnostic } from '../ConditionEffect/types'
import { SessionError } from '../errors'
import type { ActionError } from '../errors'
import type { EventManager } from '../events'
import type { GameStateHandle } from '../GameState/types'
import type { ActorId, DialogueId, NodeId, SessionId } from '../ids'
import type { Logger } from '../Logs'
import { DialogueEvents } from './events'
import type { DialogueStore } from './DialogueStore'
import type {
	DialogueChoice,
	DialogueEndReason,
	DialogueNode,
	DialogueSessionSnapshot,
	DialogueSessionState,
	DialogueTree
} from './types'

export interface DialogueSessionContext {
	store: DialogueStore
	dispatcher: ActionDispatcher
	event: EventManager
	logger: Logger
}

/**
 * One conversation in progress. Owns the cursor into a tree; everything else
 * lives in the store or on the game-state handle.
 */
export class DialogueSession {
	private nodeId: NodeId | null
	private endReason: DialogueEndReason | null
	private errors: ActionError[] = []
	private seenDiagnostics = new Map<string, ConditionDiagnostic>()
	private missingTargets = new Set<NodeId>()
	private trail: NodeId[]

	private constructor(
		private context: DialogueSessionContext,
		public readonly tree: DialogueTree,
		private gameState: GameStateHandle,
		public readonly id: SessionId,
		nodeId: NodeId | null,
		endReason: DialogueEndReason | null,
		trail: NodeId[],
		public readonly actorId?: ActorId
	) {
		this.nodeId = nodeId
		this.endReason = endReason
		this.trail = trail
	}

	/**
	 * Opens a session at the tree's root and applies the root's entry actions.
	 * The root's own conditions are not checked.
	 */
	public static start(
		context: DialogueSessionContext,
		treeId: DialogueId,
		state: GameStateHandle,
		actorId?: ActorId
	): DialogueSession {
		const tree = context.store.getTree(treeId)
		const root = context.store.getNode(treeId, tree?.rootNode ?? -1)
		if (!tree || !root) {
			throw new SessionError('NoSuchTree', `Dialogue ${treeId} does not exist`, { dialogueId: treeId, actorId })
		}
		if (!tree.repeatable && state.hasCompletedDialogue(treeId)) {
			throw new SessionError('NotRepeatable', `Dialogue ${treeId} was already completed and is not repeatable`, {
				dialogueId: treeId,
				actorId
			})
		}

		const session = new DialogueSession(context, tree, state, uuidv4(), null, null, [], actorId)
		context.event.emit(DialogueEvents.Started, {
			sessionId: session.id,
			dialogueId: tree.id,
			nodeId: root.id,
			actorId
		})
		context.logger.debug(`Session ${session.id} started dialogue ${tree.id}`)
		session.enter(root)
		return session
	}

	/**
	 * Resumes a session from a snapshot. Entry actions of the current node are
	 * not applied again.
	 */
	public static restore(
		context: DialogueSessionContext,
		snapshot: DialogueSessionSnapshot,
		state: GameStateHandle,
		actorId?: ActorId
	): DialogueSession {
		const tree = context.store.getTree(snapshot.dialogueId)
		if (!tree) {
			throw new SessionError('NoSuchTree', `Dialogue ${snapshot.dialogueId} does not exist`, {
				dialogueId: snapshot.dialogueId,
				actorId
			})
		}

		if (snapshot.endReason !== null) {
			return new DialogueSession(context, tree, state, snapshot.sessionId, null, snapshot.endReason, [], actorId)
		}

		if (snapshot.nodeId === null || !context.store.getNode(tree.id, snapshot.nodeId)) {
			throw new SessionError('NoSuchNode', `Dialogue ${tree.id} has no node ${snapshot.nodeId}`, {
				dialogueId: tree.id,
				nodeId: snapshot.nodeId ?? undefined,
				actorId
			})
		}

		return new DialogueSession(context, tree, state, snapshot.sessionId, snapshot.nodeId, null, [...snapshot.history], actorId)
	}

	public get state(): DialogueSessionState {
		if (this.endReason !== null || this.nodeId === null) {
			return { status: 'Ended', reason: this.endReason ?? 'cancelled' }
		}
		const node = this.currentNode
		if (node && node.choices.length > 0 && this.visibleChoices().length === 0) {
			return { status: 'StuckActive', nodeId: this.nodeId }
		}
		return { status: 'Active', nodeId: this.nodeId }
	}

	public get isEnded(): boolean {
		return this.endReason !== null
	}

	public get currentNode(): DialogueNode | undefined {
		if (this.nodeId === null) return undefined
		return this.context.store.getNode(this.tree.id, this.nodeId)
	}

	/** Speaker of the current node, falling back to the tree's speaker */
	public get speaker(): string | undefined {
		return this.currentNode?.speakerOverride ?? this.tree.speakerName
	}

	/** Nodes entered in order, loops included. Cleared when the session ends. */
	public get history(): readonly NodeId[] {
		return this.trail
	}

	/** Every action failure seen since the session started */
	public get actionErrors(): readonly ActionError[] {
		return this.errors
	}

	/** Distinct condition diagnostics seen since the session started */
	public get diagnostics(): readonly ConditionDiagnostic[] {
		return Array.from(this.seenDiagnostics.values())
	}

	/**
	 * Indices into the current node's choices that can be selected now, in
	 * declaration order.
	 */
	public visibleChoices(): number[] {
		const node = this.currentNode
		if (!node || this.endReason !== null) return []

		const visible: number[] = []
		node.choices.forEach((choice, index) => {
			if (this.isChoiceVisible(choice)) {
				visible.push(index)
			}
		})
		return visible
	}

	/**
	 * Applies the choice's actions then moves to its target, or ends the session.
	 * A rejected selection changes nothing.
	 */
	public select(choiceIndex: number): DialogueSessionState {
		const node = this.currentNode
		if (!node || this.endReason !== null) {
			throw new SessionError('SessionEnded', `Session ${this.id} has ended`, this.details(choiceIndex))
		}

		const choice = Number.isInteger(choiceIndex) ? node.choices[choiceIndex] : undefined
		if (!choice) {
			throw new SessionError(
				'InvalidChoiceIndex',
				`Node ${node.id} of dialogue ${this.tree.id} has no choice ${choiceIndex}`,
				this.details(choiceIndex)
			)
		}
		if (!this.isChoiceVisible(choice)) {
			throw new SessionError(
				'ChoiceNotVisible',
				`Choice ${choiceIndex} of node ${node.id} is not available`,
				this.details(choiceIndex)
			)
		}

		this.context.event.emit(DialogueEvents.ChoiceSelected, {
			sessionId: this.id,
			dialogueId: this.tree.id,
			nodeId: node.id,
			choiceIndex
		})
		this.collect(this.context.dispatcher.applyAll(choice.actions, this.gameState))

		const target = choice.targetNode === undefined ? undefined : this.context.store.getNode(this.tree.id, choice.targetNode)
		if (choice.endsDialogue || !target) {
			this.end('choice-ended')
		} else {
			this.enter(target)
		}

		return this.state
	}

	/**
	 * Ends the session without applying anything. Cancelling an ended session
	 * is a no-op.
	 */
	public cancel(): DialogueSessionState {
		if (this.endReason === null) {
			this.end('cancelled')
		}
		return this.state
	}

	public snapshot(): DialogueSessionSnapshot {
		return {
			sessionId: this.id,
			dialogueId: this.tree.id,
			nodeId: this.endReason === null ? this.nodeId : null,
			endReason: this.endReason,
			history: [...this.trail]
		}
	}

	private isChoiceVisible(choice: DialogueChoice): boolean {
		const report = (diagnostic: ConditionDiagnostic) => this.recordDiagnostic(diagnostic)

		if (!evaluateConditions(choice.conditions, this.gameState, report)) {
			return false
		}
		if (choice.endsDialogue || choice.targetNode === undefined) {
			return true
		}

		const target = this.context.store.getNode(this.tree.id, choice.targetNode)
		if (!target) {
			if (!this.missingTargets.has(choice.targetNode)) {
				this.missingTargets.add(choice.targetNode)
				this.context.logger.warn(`Dialogue ${this.tree.id} choice targets missing node ${choice.targetNode}`)
			}
			return false
		}
		return evaluateConditions(target.conditions, this.gameState, report)
	}

	private enter(node: DialogueNode) {
		this.nodeId = node.id
		this.trail.push(node.id)
		this.context.event.emit(DialogueEvents.NodeEntered, {
			sessionId: this.id,
			dialogueId: this.tree.id,
			nodeId: node.id,
			speaker: node.speakerOverride ?? this.tree.speakerName,
			text: node.text
		})

		this.collect(this.context.dispatcher.applyAll(node.actions, this.gameState))

		if (node.isTerminal) {
			this.end('terminal-node')
		}
	}

	private end(reason: DialogueEndReason) {
		this.endReason = reason
		this.nodeId = null
		this.trail = []
		if (reason !== 'cancelled') {
			this.gameState.markDialogueCompleted(this.tree.id)
		}
		this.context.event.emit(DialogueEvents.Ended, {
			sessionId: this.id,
			dialogueId: this.tree.id,
			reason
		})
		this.context.logger.debug(`Session ${this.id} ended (${reason})`)
	}

	private collect(result: ActionBatchResult) {
		this.errors.push(...result.errors)
	}

	private recordDiagnostic(diagnostic: ConditionDiagnostic) {
		const key = `${diagnostic.conditionType}:${diagnostic.message}`
		if (this.seenDiagnostics.has(key)) return
		this.seenDiagnostics.set(key, diagnostic)
		this.context.logger.warn(diagnostic.message)
		this.context.event.emit(ConditionEffectEvents.ConditionDiagnostic, diagnostic)
	}

	private details(choiceIndex?: number) {
		return {
			dialogueId: this.tree.id,
			nodeId: this.nodeId ?? undefined,
			choiceIndex,
			actorId: this.actorId
		}
	}
}
