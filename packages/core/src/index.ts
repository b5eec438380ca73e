import { ActionDispatcher } from './ConditionEffect'
import { resolveConfig } from './config'
import type { NarrativeConfig } from './config'
import { DialogueManager } from './Dialogue'
import { DialogueStore } from './Dialogue/DialogueStore'
import type { EventManager } from './events'
import { LogsManager } from './Logs'
import { QuestManager } from './Quest'
import { QuestStore } from './Quest/QuestStore'
import type { NarrativeContent } from './types'
import { validate } from './Validation'
import type { ContentReferences, ValidateOptions, ValidationFinding } from './Validation/types'

// Export types and events
export * from './types'
export * from './events'
export * from './errors'
export * from './config'
export { LogsManager, LogLevel, parseLogLevel, silentLogger } from './Logs'
export type { Logger, LogRecord, LogRecordLevel, LogSink } from './Logs'
export { GameState } from './GameState'
export type { GameStateInit } from './GameState'
export { ActionDispatcher, ConditionEffectEvents, evaluateCondition, evaluateConditions } from './ConditionEffect'
export type { ActionBatchResult, ActionDispatcherDeps, ActionResult } from './ConditionEffect'
export { DialogueEvents, DialogueManager, DialogueSession, DialogueStore, treeStructureIssues } from './Dialogue'
export type { DialogueDeps, DialogueManagerSnapshot, DialogueSessionContext } from './Dialogue'
export { QuestEvents, QuestManager, QuestStore, isStageSatisfied, objectiveGoal } from './Quest'
export { isAmbiguousStage, stageNumberingIssues } from './Quest/QuestStore'
export { hasErrors, summarize, validate } from './Validation'
export type { DialogueSource, QuestSource } from './Validation'

/**
 * Wires the narrative managers over one campaign's content. Stores are loaded
 * here, so malformed content fails construction with a LoadError.
 */
export class NarrativeEngine {
	public readonly logs: LogsManager
	public readonly dialogueStore: DialogueStore
	public readonly questStore: QuestStore
	public readonly quests: QuestManager
	public readonly dispatcher: ActionDispatcher
	public readonly dialogues: DialogueManager
	private readonly references: ContentReferences

	constructor(
		private event: EventManager,
		content: NarrativeContent,
		config: Partial<NarrativeConfig> = {}
	) {
		const resolved = resolveConfig(config)

		// Initialize LogsManager first
		this.logs = new LogsManager(resolved.logLevel)
		for (const [managerName, level] of Object.entries(resolved.managerLevels)) {
			this.logs.setManagerLevel(managerName, level)
		}

		this.references = content.references ?? {}
		this.dialogueStore = DialogueStore.load(content.dialogues)
		this.questStore = QuestStore.load(content.quests)

		// Initialize managers in dependency order
		this.quests = new QuestManager(this.questStore, event, this.logs.getLogger('QuestManager'))
		this.dispatcher = new ActionDispatcher(
			{ quest: this.quests, references: this.references },
			event,
			this.logs.getLogger('ActionDispatcher')
		)
		this.dialogues = new DialogueManager(
			{ quest: this.quests, dispatcher: this.dispatcher },
			this.dialogueStore,
			event,
			this.logs.getLogger('DialogueManager')
		)

		this.logs.getLogger('NarrativeEngine').info(
			`Loaded ${this.dialogueStore.size} dialogues and ${this.questStore.size} quests`
		)
	}

	public get events(): EventManager {
		return this.event
	}

	/**
	 * Runs the static checks over the loaded content, against the content's own
	 * reference sets unless others are given.
	 */
	public validate(options: ValidateOptions = {}): ValidationFinding[] {
		return validate(this.dialogueStore, this.questStore, {
			...options,
			references: options.references ?? this.references
		})
	}
}
