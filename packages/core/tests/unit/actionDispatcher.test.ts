import { beforeEach, describe, expect, it } from 'vitest'
import { ConditionEffectEvents } from '../../src/index'
import type { ActionDispatcher, ActionError, ActionResult, DialogueAction, GameState } from '../../src/index'
import { makeQuest, makeStage, wolfQuest } from '../fixtures'
import type { MockEventManager } from '../helpers/MockEventManager'
import { createTestEngine } from '../helpers/setup'

function failure(result: ActionResult): ActionError {
	if (result.ok) {
		throw new Error('Expected the action to fail')
	}
	return result.error
}

describe('ActionDispatcher', () => {
	let dispatcher: ActionDispatcher
	let eventManager: MockEventManager
	let state: GameState

	beforeEach(() => {
		const setup = createTestEngine({
			quests: [
				wolfQuest(),
				makeQuest(12, [makeStage(1, [{ type: 'CollectItems', itemId: 301, quantity: 2 }])], { minLevel: 5 }),
				makeQuest(13, [makeStage(1, [{ type: 'CollectItems', itemId: 301, quantity: 2 }])])
			],
			references: {
				items: new Set([301]),
				npcs: new Set([202]),
				characters: new Set(['ayla'])
			}
		})
		dispatcher = setup.engine.dispatcher
		eventManager = setup.eventManager
		state = setup.state
	})

	describe('StartQuest', () => {
		it('starts a quest once and is a no-op afterwards', () => {
			expect(dispatcher.apply({ type: 'StartQuest', questId: 10 }, state)).toEqual({ ok: true, changed: true })
			expect(dispatcher.apply({ type: 'StartQuest', questId: 10 }, state)).toEqual({ ok: true, changed: false })
			expect(state.getQuestStatus(10)).toBe('Active')
		})

		it('fails on an unknown quest', () => {
			const error = failure(dispatcher.apply({ type: 'StartQuest', questId: 99 }, state))

			expect(error.code).toBe('InvalidTarget')
			expect(error.message).toBe('Quest 99 does not exist')
			expect(eventManager.getEventsByType(ConditionEffectEvents.ActionFailed)).toEqual([
				{ actionType: 'StartQuest', code: 'InvalidTarget', message: 'Quest 99 does not exist' }
			])
		})

		it('fails when the quest requirements are not met', () => {
			const error = failure(dispatcher.apply({ type: 'StartQuest', questId: 12 }, state))

			expect(error.code).toBe('RequirementsNotMet')
			expect(error.message).toBe('Quest 12 requires level 5')
			expect(state.getQuestStatus(12)).toBe('NotStarted')
		})
	})

	describe('CompleteQuestStage', () => {
		it('advances the active stage', () => {
			dispatcher.apply({ type: 'StartQuest', questId: 10 }, state)

			expect(dispatcher.apply({ type: 'CompleteQuestStage', questId: 10, stageNumber: 1 }, state)).toEqual({ ok: true, changed: true })
			expect(dispatcher.apply({ type: 'CompleteQuestStage', questId: 10, stageNumber: 1 }, state)).toEqual({ ok: true, changed: false })
			expect(state.getQuestProgress(10)?.currentStage).toBe(2)
		})

		it('rejects stages the quest does not have', () => {
			const error = failure(dispatcher.apply({ type: 'CompleteQuestStage', questId: 10, stageNumber: 5 }, state))

			expect(error.code).toBe('InvalidParameter')
			expect(error.message).toBe('Quest 10 has no stage 5')
		})

		it('rejects quests that are not active and stages out of order', () => {
			expect(failure(dispatcher.apply({ type: 'CompleteQuestStage', questId: 10, stageNumber: 1 }, state)).message)
				.toBe('Quest 10 is not active')

			dispatcher.apply({ type: 'StartQuest', questId: 10 }, state)
			const error = failure(dispatcher.apply({ type: 'CompleteQuestStage', questId: 10, stageNumber: 2 }, state))
			expect(error.code).toBe('InvalidState')
			expect(error.message).toBe('Quest 10 stage 2 is not the active stage')
		})
	})

	describe('items', () => {
		it('gives known items and feeds collection objectives', () => {
			dispatcher.apply({ type: 'StartQuest', questId: 13 }, state)

			expect(dispatcher.apply({ type: 'GiveItems', items: [{ itemId: 301, quantity: 2 }] }, state)).toEqual({ ok: true, changed: true })
			expect(state.getItemCount(301)).toBe(2)
			expect(state.getQuestStatus(13)).toBe('Completed')
		})

		it('refuses unknown items and bad quantities without giving anything', () => {
			const unknown = failure(dispatcher.apply({ type: 'GiveItems', items: [{ itemId: 301, quantity: 1 }, { itemId: 999, quantity: 1 }] }, state))
			expect(unknown.code).toBe('InvalidTarget')
			expect(unknown.message).toBe('Item 999 does not exist')

			const zero = failure(dispatcher.apply({ type: 'GiveItems', items: [{ itemId: 301, quantity: 0 }] }, state))
			expect(zero.code).toBe('InvalidParameter')
			expect(zero.message).toBe('Item 301 quantity 0 is not a positive whole number')

			expect(state.getItemCount(301)).toBe(0)
		})

		it('takes items only when every stack is covered', () => {
			state.addItems(301, 2)

			const error = failure(dispatcher.apply({ type: 'TakeItems', items: [{ itemId: 301, quantity: 1 }, { itemId: 301, quantity: 2 }] }, state))
			expect(error.code).toBe('InsufficientResources')
			expect(error.message).toBe('Need 3 of item 301, have 2')
			expect(state.getItemCount(301)).toBe(2)

			expect(dispatcher.apply({ type: 'TakeItems', items: [{ itemId: 301, quantity: 2 }] }, state)).toEqual({ ok: true, changed: true })
			expect(state.getItemCount(301)).toBe(0)
		})
	})

	describe('gold, experience and reputation', () => {
		it('moves gold and refuses to overdraw', () => {
			dispatcher.apply({ type: 'GiveGold', amount: 20 }, state)

			const error = failure(dispatcher.apply({ type: 'TakeGold', amount: 30 }, state))
			expect(error.code).toBe('InsufficientResources')
			expect(error.message).toBe('Need 30 gold, have 20')

			expect(dispatcher.apply({ type: 'TakeGold', amount: 15 }, state)).toEqual({ ok: true, changed: true })
			expect(state.getGold()).toBe(5)
		})

		it('rejects fractional gold', () => {
			expect(failure(dispatcher.apply({ type: 'GiveGold', amount: 1.5 }, state)).code).toBe('InvalidParameter')
			expect(state.getGold()).toBe(0)
		})

		it('grants experience and changes reputation', () => {
			dispatcher.apply({ type: 'GrantExperience', amount: 40 }, state)
			dispatcher.apply({ type: 'ChangeReputation', faction: 'village', change: -2 }, state)

			expect(state.getExperience()).toBe(40)
			expect(state.getReputation('village')).toBe(-2)
			expect(dispatcher.apply({ type: 'ChangeReputation', faction: 'village', change: 0 }, state)).toEqual({ ok: true, changed: false })
		})
	})

	describe('SetFlag', () => {
		it('reports no change when the flag already has the value', () => {
			expect(dispatcher.apply({ type: 'SetFlag', flagName: 'met_elder', value: true }, state)).toEqual({ ok: true, changed: true })
			expect(dispatcher.apply({ type: 'SetFlag', flagName: 'met_elder', value: true }, state)).toEqual({ ok: true, changed: false })
			expect(state.getFlag('met_elder')).toBe(true)
		})

		it('rejects an empty flag name', () => {
			expect(failure(dispatcher.apply({ type: 'SetFlag', flagName: '', value: true }, state)).message).toBe('Flag name is empty')
		})
	})

	describe('outward actions', () => {
		it('opens a known shop', () => {
			expect(dispatcher.apply({ type: 'OpenShop', npcId: 202 }, state)).toEqual({ ok: true, changed: false })
			expect(eventManager.getEventsByType(ConditionEffectEvents.ShopOpened)).toEqual([{ npcId: 202 }])

			expect(failure(dispatcher.apply({ type: 'OpenShop', npcId: 999 }, state)).message).toBe('Shopkeeper 999 does not exist')
		})

		it('raises scripted events', () => {
			dispatcher.apply({ type: 'TriggerEvent', eventName: 'bells' }, state)

			expect(eventManager.getEventsByType(ConditionEffectEvents.ScriptedEvent)).toEqual([{ eventName: 'bells' }])
		})

		it('recruits known characters to the party and moves them to an inn', () => {
			expect(dispatcher.apply({ type: 'RecruitToParty', characterId: 'ayla' }, state)).toEqual({ ok: true, changed: true })
			expect(dispatcher.apply({ type: 'RecruitToParty', characterId: 'ayla' }, state)).toEqual({ ok: true, changed: false })
			expect(state.isInParty('ayla')).toBe(true)

			expect(dispatcher.apply({ type: 'RecruitToInn', characterId: 'ayla', innkeeperId: 202 }, state)).toEqual({ ok: true, changed: true })
			expect(state.isInParty('ayla')).toBe(false)
			expect(state.getInnResident('ayla')).toBe(202)
			expect(eventManager.getEventsByType(ConditionEffectEvents.InnRecruited)).toEqual([{ characterId: 'ayla', innkeeperId: 202 }])

			expect(failure(dispatcher.apply({ type: 'RecruitToParty', characterId: 'zed' }, state)).message).toBe('Character zed does not exist')
			expect(failure(dispatcher.apply({ type: 'RecruitToInn', characterId: 'ayla', innkeeperId: 7 }, state)).message).toBe('Innkeeper 7 does not exist')
		})
	})

	it('fails unknown action types', () => {
		const bogus: DialogueAction = JSON.parse('{"type":"Teleport"}')
		const error = failure(dispatcher.apply(bogus, state))

		expect(error.code).toBe('UnknownAction')
		expect(error.message).toBe('Unknown action type "Teleport"')
		expect(eventManager.getEventsByType(ConditionEffectEvents.ActionFailed)).toEqual([
			{ actionType: 'unknown', code: 'UnknownAction', message: 'Unknown action type "Teleport"' }
		])
	})

	it('keeps applying a list after one action fails', () => {
		const result = dispatcher.applyAll([
			{ type: 'GiveGold', amount: 10 },
			{ type: 'TakeGold', amount: 100 },
			{ type: 'GrantExperience', amount: 5 }
		], state)

		expect(result.applied).toBe(2)
		expect(result.failed).toBe(1)
		expect(result.errors.map(error => error.code)).toEqual(['InsufficientResources'])
		expect(state.getGold()).toBe(10)
		expect(state.getExperience()).toBe(5)
		expect(eventManager.getEmittedEvents()).toEqual(['action:applied', 'action:failed', 'action:applied'])
	})
})
