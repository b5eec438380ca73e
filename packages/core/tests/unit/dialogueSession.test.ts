import { describe, expect, it, vi } from 'vitest'
import { ConditionEffectEvents, DialogueEvents, DialogueSession, GameState } from '../../src/index'
import type { DialogueCondition, DialogueTree, GameStateInit } from '../../src/index'
import { branchingTree, makeChoice, makeNode, makeTree, wolfQuest } from '../fixtures'
import { catchSessionError } from '../helpers/errors'
import { createTestEngine } from '../helpers/setup'

function setup(dialogues: DialogueTree[], init: GameStateInit = {}) {
	return createTestEngine({ dialogues, quests: [wolfQuest()] }, init)
}

const goldGatedTree = () => makeTree(101, [
	makeNode(1, {
		choices: [
			makeChoice({ text: 'Pay', targetNode: 2, conditions: [{ type: 'HasGold', amount: 50 }] }),
			makeChoice({ text: 'Leave', endsDialogue: true })
		]
	}),
	makeNode(2, { isTerminal: true })
])

describe('DialogueSession', () => {
	describe('walking a tree', () => {
		it('ends after entering a terminal node', () => {
			const { context, state } = setup([branchingTree()])
			const session = DialogueSession.start(context, 100, state)

			expect(session.state).toEqual({ status: 'Active', nodeId: 1 })
			expect(session.visibleChoices()).toEqual([0, 1])
			expect(session.select(0)).toEqual({ status: 'Ended', reason: 'terminal-node' })
			expect(session.isEnded).toBe(true)
			expect(session.currentNode).toBeUndefined()
		})

		it('ends directly through a choice that ends the dialogue', () => {
			const { context, state } = setup([branchingTree()])
			const session = DialogueSession.start(context, 100, state)

			expect(session.select(1)).toEqual({ status: 'Ended', reason: 'choice-ended' })
			expect(session.visibleChoices()).toEqual([])
			expect(catchSessionError(() => session.select(0)).code).toBe('SessionEnded')
		})

		it('follows loops back to earlier nodes', () => {
			const tree = makeTree(107, [
				makeNode(1, { choices: [makeChoice({ targetNode: 2 })] }),
				makeNode(2, { choices: [makeChoice({ text: 'Again', targetNode: 1 }), makeChoice({ text: 'Bye', endsDialogue: true })] })
			])
			const { context, state } = setup([tree])
			const session = DialogueSession.start(context, 107, state)

			session.select(0)
			expect(session.select(0)).toEqual({ status: 'Active', nodeId: 1 })
			session.select(0)
			expect(session.state).toEqual({ status: 'Active', nodeId: 2 })
			expect(session.history).toEqual([1, 2, 1, 2])

			const restored = DialogueSession.restore(context, session.snapshot(), state)
			expect(restored.history).toEqual([1, 2, 1, 2])
			expect(restored.select(1)).toEqual({ status: 'Ended', reason: 'choice-ended' })
			expect(restored.history).toEqual([])
		})

		it('rejects unknown trees', () => {
			const { context, state } = setup([branchingTree()])
			const error = catchSessionError(() => DialogueSession.start(context, 999, state))

			expect(error.code).toBe('NoSuchTree')
			expect(error.message).toBe('Dialogue 999 does not exist')
		})

		it('rejects choice indices the node does not have', () => {
			const { context, state } = setup([branchingTree()])
			const session = DialogueSession.start(context, 100, state)

			expect(catchSessionError(() => session.select(5)).code).toBe('InvalidChoiceIndex')
			expect(catchSessionError(() => session.select(0.5)).code).toBe('InvalidChoiceIndex')
			expect(catchSessionError(() => session.select(-1)).code).toBe('InvalidChoiceIndex')
			expect(session.state).toEqual({ status: 'Active', nodeId: 1 })
		})
	})

	describe('gated choices', () => {
		it('hides a choice whose condition fails and refuses to select it', () => {
			const { context, state } = setup([goldGatedTree()])
			const session = DialogueSession.start(context, 101, state)

			expect(session.visibleChoices()).toEqual([1])
			const error = catchSessionError(() => session.select(0))
			expect(error.code).toBe('ChoiceNotVisible')
			expect(error.details).toEqual({ dialogueId: 101, nodeId: 1, choiceIndex: 0, actorId: undefined })
			expect(session.state).toEqual({ status: 'Active', nodeId: 1 })
		})

		it('shows the choice once the condition holds', () => {
			const { context, state } = setup([goldGatedTree()], { gold: 50 })
			const session = DialogueSession.start(context, 101, state)

			expect(session.visibleChoices()).toEqual([0, 1])
		})

		it('hides a choice whose target node is gated shut', () => {
			const tree = makeTree(108, [
				makeNode(1, { choices: [makeChoice({ targetNode: 2 }), makeChoice({ endsDialogue: true })] }),
				makeNode(2, { isTerminal: true, conditions: [{ type: 'FlagSet', flagName: 'secret', value: true }] })
			])
			const { context, state } = setup([tree])

			expect(DialogueSession.start(context, 108, state).visibleChoices()).toEqual([1])
			state.setFlag('secret', true)
			expect(DialogueSession.start(context, 108, state).visibleChoices()).toEqual([0, 1])
		})

		it('reports a node with choices but none visible as stuck', () => {
			const tree = makeTree(109, [
				makeNode(1, { choices: [makeChoice({ targetNode: 2, conditions: [{ type: 'MinLevel', level: 10 }] })] }),
				makeNode(2, { isTerminal: true })
			])
			const { context, state } = setup([tree])
			const session = DialogueSession.start(context, 109, state)

			expect(session.state).toEqual({ status: 'StuckActive', nodeId: 1 })
			expect(session.cancel()).toEqual({ status: 'Ended', reason: 'cancelled' })
		})

		it('records each condition diagnostic once', () => {
			const bogus: DialogueCondition = JSON.parse('{"type":"IsRaining"}')
			const tree = makeTree(106, [
				makeNode(1, { choices: [makeChoice({ targetNode: 2, conditions: [bogus] }), makeChoice({ endsDialogue: true })] }),
				makeNode(2, { isTerminal: true })
			])
			const { context, state, eventManager } = setup([tree])
			const session = DialogueSession.start(context, 106, state)

			expect(session.visibleChoices()).toEqual([1])
			expect(session.visibleChoices()).toEqual([1])
			expect(session.diagnostics).toEqual([
				{ conditionType: 'IsRaining', message: 'Unknown condition type "IsRaining" evaluated as false' }
			])
			expect(eventManager.getEventsByType(ConditionEffectEvents.ConditionDiagnostic)).toHaveLength(1)
		})

		it('warns once about a choice that targets a missing node', () => {
			const tree = makeTree(108, [
				makeNode(1, { choices: [makeChoice({ targetNode: 9 }), makeChoice({ endsDialogue: true })] })
			])
			const { context, state } = setup([tree])
			const warn = vi.fn()
			const session = DialogueSession.start({ ...context, logger: { ...context.logger, warn } }, 108, state)

			expect(session.visibleChoices()).toEqual([1])
			expect(session.state).toEqual({ status: 'Active', nodeId: 1 })
			expect(session.visibleChoices()).toEqual([1])
			expect(warn).toHaveBeenCalledTimes(1)
			expect(warn).toHaveBeenCalledWith('Dialogue 108 choice targets missing node 9')
		})
	})

	describe('actions', () => {
		it('applies choice actions before entering the target and its actions', () => {
			const tree = makeTree(110, [
				makeNode(1, {
					choices: [makeChoice({ targetNode: 2, actions: [{ type: 'SetFlag', flagName: 'asked', value: true }] })]
				}),
				makeNode(2, { isTerminal: true, actions: [{ type: 'GiveGold', amount: 5 }] })
			])
			const { context, state, eventManager } = setup([tree])
			const session = DialogueSession.start(context, 110, state)
			eventManager.clearEventHistory()

			session.select(0)

			expect(eventManager.getEmittedEvents()).toEqual([
				'dialogue:choice-selected',
				'action:applied',
				'dialogue:node-entered',
				'action:applied',
				'dialogue:ended'
			])
			expect(state.getFlag('asked')).toBe(true)
			expect(state.getGold()).toBe(5)
		})

		it('keeps going when an action fails', () => {
			const tree = makeTree(111, [
				makeNode(1, {
					choices: [makeChoice({
						targetNode: 2,
						actions: [{ type: 'StartQuest', questId: 99 }, { type: 'GiveGold', amount: 3 }]
					})]
				}),
				makeNode(2, { isTerminal: true })
			])
			const { context, state } = setup([tree])
			const session = DialogueSession.start(context, 111, state)

			expect(session.select(0)).toEqual({ status: 'Ended', reason: 'terminal-node' })
			expect(session.actionErrors.map(error => error.message)).toEqual(['Quest 99 does not exist'])
			expect(state.getGold()).toBe(3)
		})

		it('leaves an active quest alone when a repeatable dialogue starts it again', () => {
			const tree = makeTree(102, [
				makeNode(1, { isTerminal: true, actions: [{ type: 'StartQuest', questId: 10 }] })
			])
			const { context, state } = setup([tree])

			DialogueSession.start(context, 102, state)
			const second = DialogueSession.start(context, 102, state)

			expect(second.actionErrors).toEqual([])
			expect(state.getQuestStatus(10)).toBe('Active')
			expect(state.getQuestProgress(10)).toEqual({ questId: 10, currentStage: 1, objectiveProgress: {}, completed: false })
		})
	})

	it('names the tree speaker unless the node overrides it', () => {
		const tree = makeTree(112, [
			makeNode(1, { choices: [makeChoice({ targetNode: 2 })] }),
			makeNode(2, { isTerminal: true, speakerOverride: 'Ayla', text: 'Hello there' })
		], { speakerName: 'Maren' })
		const { context, state, eventManager } = setup([tree])
		const session = DialogueSession.start(context, 112, state)

		expect(session.speaker).toBe('Maren')
		session.select(0)
		expect(eventManager.getEventsByType(DialogueEvents.NodeEntered).map(entry => [entry.speaker, entry.text])).toEqual([
			['Maren', 'Node 1'],
			['Ayla', 'Hello there']
		])
	})

	it('keeps sessions on the same tree independent', () => {
		const { context } = setup([branchingTree()])
		const first = DialogueSession.start(context, 100, new GameState())
		const second = DialogueSession.start(context, 100, new GameState())

		first.select(1)

		expect(first.isEnded).toBe(true)
		expect(second.state).toEqual({ status: 'Active', nodeId: 1 })
		expect(first.id).not.toBe(second.id)
	})

	describe('repeatability', () => {
		it('refuses to reopen a completed dialogue that is not repeatable', () => {
			const tree = makeTree(103, [makeNode(1, { isTerminal: true })], { repeatable: false })
			const { context, state } = setup([tree])

			DialogueSession.start(context, 103, state)

			expect(state.hasCompletedDialogue(103)).toBe(true)
			expect(catchSessionError(() => DialogueSession.start(context, 103, state)).code).toBe('NotRepeatable')
		})

		it('does not count a cancelled dialogue as completed', () => {
			const tree = makeTree(104, [makeNode(1, { choices: [makeChoice({ endsDialogue: true })] })], { repeatable: false })
			const { context, state } = setup([tree])

			DialogueSession.start(context, 104, state).cancel()

			expect(state.hasCompletedDialogue(104)).toBe(false)
			expect(() => DialogueSession.start(context, 104, state)).not.toThrow()
		})
	})

	describe('snapshots', () => {
		const entryGoldTree = () => makeTree(105, [
			makeNode(1, { actions: [{ type: 'GiveGold', amount: 5 }], choices: [makeChoice({ targetNode: 2 })] }),
			makeNode(2, { isTerminal: true })
		])

		it('resumes at the same node without re-applying entry actions', () => {
			const { context, state } = setup([entryGoldTree()])
			const session = DialogueSession.start(context, 105, state)
			const snapshot = session.snapshot()

			expect(snapshot).toEqual({ sessionId: session.id, dialogueId: 105, nodeId: 1, endReason: null, history: [1] })

			const restored = DialogueSession.restore(context, snapshot, state)
			expect(restored.id).toBe(session.id)
			expect(restored.state).toEqual({ status: 'Active', nodeId: 1 })
			expect(state.getGold()).toBe(5)
			expect(restored.select(0)).toEqual({ status: 'Ended', reason: 'terminal-node' })
		})

		it('restores ended sessions as ended', () => {
			const { context, state } = setup([entryGoldTree()])
			const session = DialogueSession.start(context, 105, state)
			session.cancel()

			const restored = DialogueSession.restore(context, session.snapshot(), state)
			expect(restored.state).toEqual({ status: 'Ended', reason: 'cancelled' })
		})

		it('refuses snapshots that point at missing trees or nodes', () => {
			const { context, state } = setup([entryGoldTree()])

			expect(catchSessionError(() => DialogueSession.restore(context, {
				sessionId: 's-1', dialogueId: 999, nodeId: 1, endReason: null, history: [1]
			}, state)).code).toBe('NoSuchTree')
			expect(catchSessionError(() => DialogueSession.restore(context, {
				sessionId: 's-1', dialogueId: 105, nodeId: 9, endReason: null, history: [9]
			}, state)).message).toBe('Dialogue 105 has no node 9')
		})
	})
})
