import type { DialogueAction } from './ConditionEffect/types'
import type { DialogueId, NodeId } from './ids'

/**
 * Raised when a store is built from inconsistent records. Fatal to that store:
 * `issues` lists every problem found, not only the first.
 */
export class LoadError extends Error {
	public readonly code = 'LoadError'

	constructor(
		public readonly store: 'dialogue' | 'quest',
		public readonly issues: string[]
	) {
		super(`Cannot load ${store} store: ${issues.join('; ')}`)
		this.name = 'LoadError'
	}
}

export type SessionErrorCode =
	| 'NoSuchTree'
	| 'NoSuchNode'
	| 'InvalidChoiceIndex'
	| 'ChoiceNotVisible'
	| 'SessionEnded'
	| 'SessionAlreadyActive'
	| 'NoActiveSession'
	| 'NotRepeatable'

export interface SessionErrorDetails {
	dialogueId?: DialogueId
	nodeId?: NodeId
	choiceIndex?: number
	actorId?: string
}

/**
 * Caller misuse of a dialogue session. The session is left exactly as it was.
 */
export class SessionError extends Error {
	constructor(
		public readonly code: SessionErrorCode,
		message: string,
		public readonly details: SessionErrorDetails = {}
	) {
		super(message)
		this.name = 'SessionError'
	}
}

export type ActionErrorCode =
	| 'InvalidTarget'
	| 'InvalidParameter'
	| 'RequirementsNotMet'
	| 'InsufficientResources'
	| 'InvalidState'
	| 'UnknownAction'

/**
 * A single action that could not be applied. Returned, never thrown, by the dispatcher.
 */
export class ActionError extends Error {
	constructor(
		public readonly code: ActionErrorCode,
		message: string,
		public readonly action: DialogueAction
	) {
		super(message)
		this.name = 'ActionError'
	}
}

export function isSessionError(error: unknown, code?: SessionErrorCode): error is SessionError {
	return error instanceof SessionError && (code === undefined || error.code === code)
}
