import { describe, expect, it } from 'vitest'
import { LoadError, LocalEventManager, LogLevel, NarrativeEngine, resolveConfig } from '../../src/index'
import { branchingTree, makeChoice, makeNode, makeQuest, makeStage, makeTree, wolfQuest } from '../fixtures'
import { createTestEngine } from '../helpers/setup'

describe('NarrativeEngine', () => {
	it('loads the stores and wires the managers', () => {
		const { engine, eventManager } = createTestEngine({ dialogues: [branchingTree()], quests: [wolfQuest()] })

		expect(engine.dialogueStore.size).toBe(1)
		expect(engine.questStore.size).toBe(1)
		expect(engine.dialogues.getStore()).toBe(engine.dialogueStore)
		expect(engine.quests.getStore()).toBe(engine.questStore)
		expect(engine.events).toBe(eventManager)
	})

	it('fails construction on content a store refuses', () => {
		const quest = makeQuest(7, [makeStage(2, [{ type: 'KillMonsters', monsterId: 1, quantity: 1 }])])

		expect(() => createTestEngine({ quests: [quest] })).toThrow(LoadError)
	})

	it('applies the configured log levels', () => {
		const engine = new NarrativeEngine(new LocalEventManager(), { dialogues: [], quests: [] }, {
			logLevel: LogLevel.None,
			managerLevels: { QuestManager: LogLevel.Debug }
		})

		expect(engine.logs.getManagerConfig('QuestManager')).toEqual({ enabled: true, level: LogLevel.Debug })
		expect(engine.logs.getManagerConfig('DialogueManager')).toEqual({ enabled: true, level: LogLevel.None })
	})

	it('validates against the content references unless told otherwise', () => {
		const tree = makeTree(1, [
			makeNode(1, { choices: [makeChoice({ endsDialogue: true, actions: [{ type: 'OpenShop', npcId: 999 }] })] })
		])
		const { engine } = createTestEngine({ dialogues: [tree], references: { npcs: new Set([202]) } })

		expect(engine.validate().map(finding => finding.message)).toEqual([
			'Dialogue 1 node 1 choice 0 OpenShop action references unknown npc 999'
		])
		expect(engine.validate({ references: {} })).toEqual([])
	})
})

describe('resolveConfig', () => {
	it('fills in defaults', () => {
		expect(resolveConfig()).toEqual({ logLevel: LogLevel.Warn, managerLevels: {} })
		expect(resolveConfig({ managerLevels: { DialogueManager: LogLevel.Debug } })).toEqual({
			logLevel: LogLevel.Warn,
			managerLevels: { DialogueManager: LogLevel.Debug }
		})
	})
})
