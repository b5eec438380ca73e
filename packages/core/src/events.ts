import { DialogueEvents } from './Dialogue/events'
import { QuestEvents } from './Quest/events'
import { ConditionEffectEvents } from './ConditionEffect/events'
import type { ActionErrorCode } from './errors'
import type { ActionType, ConditionDiagnostic, DialogueAction } from './ConditionEffect/types'
import type { DialogueEndReason } from './Dialogue/types'
import type { ActorId, CharacterId, DialogueId, NodeId, NpcId, QuestId, SessionId } from './ids'

export interface DialogueStartedData {
	sessionId: SessionId
	dialogueId: DialogueId
	nodeId: NodeId
	actorId?: ActorId
}

export interface DialogueNodeEnteredData {
	sessionId: SessionId
	dialogueId: DialogueId
	nodeId: NodeId
	speaker?: string
	text: string
}

export interface DialogueChoiceSelectedData {
	sessionId: SessionId
	dialogueId: DialogueId
	nodeId: NodeId
	choiceIndex: number
}

export interface DialogueEndedData {
	sessionId: SessionId
	dialogueId: DialogueId
	reason: DialogueEndReason
}

export interface ActionAppliedData {
	action: DialogueAction
	changed: boolean
}

export interface ActionFailedData {
	actionType: ActionType | 'unknown'
	code: ActionErrorCode
	message: string
}

export interface NarrativeEventMap {
	[DialogueEvents.Started]: DialogueStartedData
	[DialogueEvents.NodeEntered]: DialogueNodeEnteredData
	[DialogueEvents.ChoiceSelected]: DialogueChoiceSelectedData
	[DialogueEvents.Ended]: DialogueEndedData
	[QuestEvents.Started]: { questId: QuestId, restarted: boolean }
	[QuestEvents.ObjectiveProgress]: { questId: QuestId, stageNumber: number, objectiveIndex: number, progress: number, goal: number }
	[QuestEvents.StageCompleted]: { questId: QuestId, stageNumber: number }
	[QuestEvents.Completed]: { questId: QuestId }
	[ConditionEffectEvents.ActionApplied]: ActionAppliedData
	[ConditionEffectEvents.ActionFailed]: ActionFailedData
	[ConditionEffectEvents.ConditionDiagnostic]: ConditionDiagnostic
	[ConditionEffectEvents.ShopOpened]: { npcId: NpcId }
	[ConditionEffectEvents.ScriptedEvent]: { eventName: string }
	[ConditionEffectEvents.PartyRecruited]: { characterId: CharacterId }
	[ConditionEffectEvents.InnRecruited]: { characterId: CharacterId, innkeeperId: NpcId }
}

export type NarrativeEventName = keyof NarrativeEventMap

export type EventCallback<T> = (data: T) => void

export interface EventManager {
	on<K extends NarrativeEventName>(event: K, callback: EventCallback<NarrativeEventMap[K]>): void
	off<K extends NarrativeEventName>(event: K, callback: EventCallback<NarrativeEventMap[K]>): void
	emit<K extends NarrativeEventName>(event: K, data: NarrativeEventMap[K]): void
}

type ListenerTable = {
	[K in NarrativeEventName]?: Array<EventCallback<NarrativeEventMap[K]>>
}

/**
 * Synchronous in-process event bus. Listeners run in registration order;
 * a throwing listener is logged and does not stop the others.
 */
export class LocalEventManager implements EventManager {
	private listeners: ListenerTable = {}

	constructor(private onListenerError: (event: NarrativeEventName, error: unknown) => void = (event, error) => {
		console.error(`Error in handler for ${event}:`, error)
	}) {}

	on<K extends NarrativeEventName>(event: K, callback: EventCallback<NarrativeEventMap[K]>): void {
		const listeners: NonNullable<ListenerTable[K]> = this.listeners[event] ?? []
		listeners.push(callback)
		this.listeners[event] = listeners
	}

	off<K extends NarrativeEventName>(event: K, callback: EventCallback<NarrativeEventMap[K]>): void {
		const listeners: Array<EventCallback<NarrativeEventMap[K]>> | undefined = this.listeners[event]
		if (!listeners) return
		this.listeners[event] = listeners.filter(listener => listener !== callback)
	}

	emit<K extends NarrativeEventName>(event: K, data: NarrativeEventMap[K]): void {
		const listeners: Array<EventCallback<NarrativeEventMap[K]>> = this.listeners[event] ?? []
		for (const listener of [...listeners]) {
			try {
				listener(data)
			} catch (error) {
				this.onListenerError(event, error)
			}
		}
	}
}

export const Event = {
	Dialogue: DialogueEvents,
	Quest: QuestEvents,
	ConditionEffect: ConditionEffectEvents
} as const

export default Event
