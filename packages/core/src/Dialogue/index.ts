import type { ActionDispatcher } from '../ConditionEffect'
import { SessionError } from '../errors'
import type { EventManager } from '../events'
import type { GameStateHandle } from '../GameState/types'
import type { ActorId, DialogueId, NodeId } from '../ids'
import type { Logger } from '../Logs'
import { BaseManager } from '../Managers/BaseManager'
import type { QuestManager } from '../Quest'
import { DialogueSession } from './DialogueSession'
import type { DialogueSessionContext } from './DialogueSession'
import { DialogueStore } from './DialogueStore'
import type { DialogueSessionSnapshot, DialogueSessionState, DialogueStartOptions } from './types'

export { DialogueEvents } from './events'
export { DialogueSession } from './DialogueSession'
export type { DialogueSessionContext } from './DialogueSession'
export { DialogueStore, treeStructureIssues } from './DialogueStore'

export interface DialogueDeps {
	quest: QuestManager
	dispatcher: ActionDispatcher
}

export interface DialogueManagerSnapshot {
	sessions: Array<[ActorId, DialogueSessionSnapshot]>
}

/**
 * Keeps at most one live session per actor. Ended sessions are released.
 */
export class DialogueManager extends BaseManager<DialogueDeps> {
	private sessions = new Map<ActorId, DialogueSession>()
	private context: DialogueSessionContext

	constructor(
		managers: DialogueDeps,
		private store: DialogueStore,
		event: EventManager,
		private logger: Logger
	) {
		super(managers)
		this.context = {
			store,
			dispatcher: managers.dispatcher,
			event,
			logger
		}
	}

	public getStore(): DialogueStore {
		return this.store
	}

	/**
	 * Starting while the actor already talks is an error; cancel first. Talking
	 * to an npc counts towards TalkToNpc objectives once the session is open.
	 */
	public startSession(
		actorId: ActorId,
		treeId: DialogueId,
		state: GameStateHandle,
		options: DialogueStartOptions = {}
	): DialogueSession {
		const existing = this.sessions.get(actorId)
		if (existing && !existing.isEnded) {
			throw new SessionError('SessionAlreadyActive', `Actor ${actorId} is already in dialogue ${existing.tree.id}`, {
				dialogueId: existing.tree.id,
				actorId
			})
		}

		const session = DialogueSession.start(this.context, treeId, state, actorId)
		if (!session.isEnded) {
			this.sessions.set(actorId, session)
		}

		if (options.npcId !== undefined) {
			this.managers.quest.processEvent({ type: 'NpcTalkedTo', npcId: options.npcId, mapId: options.mapId }, state)
		}

		return session
	}

	public getSession(actorId: ActorId): DialogueSession | undefined {
		return this.sessions.get(actorId)
	}

	public visibleChoices(actorId: ActorId): number[] {
		return this.requireSession(actorId).visibleChoices()
	}

	public select(actorId: ActorId, choiceIndex: number): DialogueSessionState {
		const session = this.requireSession(actorId)
		const state = session.select(choiceIndex)
		this.release(actorId, session)
		return state
	}

	public cancel(actorId: ActorId): DialogueSessionState {
		const session = this.requireSession(actorId)
		const state = session.cancel()
		this.release(actorId, session)
		return state
	}

	/**
	 * Check if an actor is in a specific dialogue, optionally at a specific node
	 */
	public hasActiveDialogue(actorId: ActorId, dialogueId: DialogueId, nodeId?: NodeId): boolean {
		const session = this.sessions.get(actorId)
		if (!session || session.tree.id !== dialogueId) {
			return false
		}
		if (nodeId === undefined) {
			return true
		}
		return session.currentNode?.id === nodeId
	}

	public get activeCount(): number {
		return this.sessions.size
	}

	/* SERIALISATION */
	public serialize(): DialogueManagerSnapshot {
		return {
			sessions: Array.from(this.sessions.entries(), ([actorId, session]): [ActorId, DialogueSessionSnapshot] => [actorId, session.snapshot()])
		}
	}

	/**
	 * Sessions keep a handle to the actor's game state, so the caller supplies it.
	 */
	public deserialize(snapshot: DialogueManagerSnapshot, stateFor: (actorId: ActorId) => GameStateHandle): void {
		this.reset()
		for (const [actorId, sessionSnapshot] of snapshot.sessions) {
			const session = DialogueSession.restore(this.context, sessionSnapshot, stateFor(actorId), actorId)
			if (!session.isEnded) {
				this.sessions.set(actorId, session)
			}
		}
	}

	public reset(): void {
		this.sessions.clear()
	}

	private requireSession(actorId: ActorId): DialogueSession {
		const session = this.sessions.get(actorId)
		if (!session) {
			throw new SessionError('NoActiveSession', `Actor ${actorId} is not in a dialogue`, { actorId })
		}
		return session
	}

	private release(actorId: ActorId, session: DialogueSession) {
		if (session.isEnded && this.sessions.get(actorId) === session) {
			this.sessions.delete(actorId)
			this.logger.debug(`Released session ${session.id} of actor ${actorId}`)
		}
	}
}
