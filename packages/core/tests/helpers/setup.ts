import { GameState, LogLevel, NarrativeEngine, silentLogger } from '../../src/index'
import type { DialogueSessionContext, GameStateInit, NarrativeContent } from '../../src/index'
import { MockEventManager } from './MockEventManager'

export function createTestEngine(content: Partial<NarrativeContent> = {}, init: GameStateInit = {}): {
	engine: NarrativeEngine
	eventManager: MockEventManager
	state: GameState
	context: DialogueSessionContext
} {
	const eventManager = new MockEventManager()

	const engine = new NarrativeEngine(
		eventManager,
		{ dialogues: [], quests: [], ...content },
		{ logLevel: LogLevel.None }
	)

	const context: DialogueSessionContext = {
		store: engine.dialogueStore,
		dispatcher: engine.dispatcher,
		event: eventManager,
		logger: silentLogger
	}

	return { engine, eventManager, state: new GameState(init), context }
}
