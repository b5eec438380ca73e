import { describe, expect, it } from 'vitest'
import { Event, LocalEventManager } from '../../src/index'
import type { NarrativeEventName } from '../../src/index'

describe('LocalEventManager', () => {
	it('delivers to listeners in registration order', () => {
		const event = new LocalEventManager()
		const seen: string[] = []

		event.on(Event.Quest.Completed, ({ questId }) => seen.push(`first ${questId}`))
		event.on(Event.Quest.Completed, ({ questId }) => seen.push(`second ${questId}`))
		event.emit(Event.Quest.Completed, { questId: 3 })

		expect(seen).toEqual(['first 3', 'second 3'])
	})

	it('stops delivering to removed listeners', () => {
		const event = new LocalEventManager()
		const seen: number[] = []
		const listener = ({ questId }: { questId: number }) => seen.push(questId)

		event.on(Event.Quest.Completed, listener)
		event.emit(Event.Quest.Completed, { questId: 1 })
		event.off(Event.Quest.Completed, listener)
		event.emit(Event.Quest.Completed, { questId: 2 })

		expect(seen).toEqual([1])
	})

	it('keeps going past a listener that throws', () => {
		const failures: Array<[NarrativeEventName, unknown]> = []
		const event = new LocalEventManager((name, error) => failures.push([name, error]))
		const seen: string[] = []
		const boom = new Error('boom')

		event.on(Event.ConditionEffect.ShopOpened, () => {
			throw boom
		})
		event.on(Event.ConditionEffect.ShopOpened, ({ npcId }) => seen.push(`shop ${npcId}`))
		event.emit(Event.ConditionEffect.ShopOpened, { npcId: 202 })

		expect(seen).toEqual(['shop 202'])
		expect(failures).toEqual([['shop:opened', boom]])
	})
})
