import { ActionError } from '../errors'
import type { ActionErrorCode } from '../errors'
import type { EventManager } from '../events'
import type { GameStateHandle } from '../GameState/types'
import type { Logger } from '../Logs'
import { BaseManager } from '../Managers/BaseManager'
import type { QuestManager } from '../Quest'
import { describeVariant } from '../utils'
import type { ContentReferences } from '../Validation/types'
import { ConditionEffectEvents } from './events'
import { ACTION_TYPES } from './types'
import type { DialogueAction, ItemStack } from './types'

export { evaluateCondition, evaluateConditions } from './conditions'
export { ConditionEffectEvents } from './events'

export type ActionResult =
	| { ok: true, changed: boolean }
	| { ok: false, error: ActionError }

export interface ActionBatchResult {
	applied: number
	failed: number
	errors: ActionError[]
}

export interface ActionDispatcherDeps {
	quest: QuestManager
	references?: ContentReferences
}

const isWholeAmount = (value: unknown): value is number =>
	typeof value === 'number' && Number.isInteger(value) && value >= 0

const isPositiveAmount = (value: unknown): value is number =>
	isWholeAmount(value) && value > 0

/**
 * Applies dialogue actions to a game-state handle. Failures are returned and
 * emitted as events, never thrown.
 */
export class ActionDispatcher extends BaseManager<ActionDispatcherDeps> {
	constructor(
		managers: ActionDispatcherDeps,
		private event: EventManager,
		private logger: Logger
	) {
		super(managers)
	}

	/**
	 * Runs every action in order. A failed action does not stop the ones after it
	 * and does not undo the ones before it.
	 */
	public applyAll(actions: readonly DialogueAction[], state: GameStateHandle): ActionBatchResult {
		const result: ActionBatchResult = { applied: 0, failed: 0, errors: [] }
		for (const action of actions) {
			const outcome = this.apply(action, state)
			if (outcome.ok) {
				result.applied++
			} else {
				result.failed++
				result.errors.push(outcome.error)
			}
		}
		return result
	}

	public apply(action: DialogueAction, state: GameStateHandle): ActionResult {
		const outcome = this.dispatch(action, state)

		if (outcome.ok) {
			this.event.emit(ConditionEffectEvents.ActionApplied, { action, changed: outcome.changed })
		} else {
			this.logger.warn(`Action failed (${outcome.error.code}): ${outcome.error.message}`)
			this.event.emit(ConditionEffectEvents.ActionFailed, {
				actionType: ACTION_TYPES.find(type => type === describeVariant(action)) ?? 'unknown',
				code: outcome.error.code,
				message: outcome.error.message
			})
		}

		return outcome
	}

	private dispatch(action: DialogueAction, state: GameStateHandle): ActionResult {
		const fail = (code: ActionErrorCode, message: string): ActionResult =>
			({ ok: false, error: new ActionError(code, message, action) })

		switch (action.type) {
			case 'StartQuest': {
				if (!this.managers.quest.getStore().hasQuest(action.questId)) {
					return fail('InvalidTarget', `Quest ${action.questId} does not exist`)
				}
				const outcome = this.managers.quest.startQuest(action.questId, state)
				if (!outcome.ok) {
					return fail('RequirementsNotMet', outcome.message)
				}
				return { ok: true, changed: outcome.result === 'started' || outcome.result === 'restarted' }
			}

			case 'CompleteQuestStage': {
				const quest = this.managers.quest.getStore().getQuest(action.questId)
				if (!quest) {
					return fail('InvalidTarget', `Quest ${action.questId} does not exist`)
				}
				if (!Number.isInteger(action.stageNumber) || action.stageNumber < 1 || action.stageNumber > quest.stages.length) {
					return fail('InvalidParameter', `Quest ${action.questId} has no stage ${action.stageNumber}`)
				}
				const result = this.managers.quest.completeStage(action.questId, action.stageNumber, state)
				if (result === 'notActive') {
					return fail('InvalidState', `Quest ${action.questId} is not active`)
				}
				if (result === 'outOfOrder') {
					return fail('InvalidState', `Quest ${action.questId} stage ${action.stageNumber} is not the active stage`)
				}
				return { ok: true, changed: result !== 'alreadyComplete' }
			}

			case 'GiveItems': {
				const problem = this.checkStacks(action.items)
				if (problem) return fail(problem.code, problem.message)
				for (const { itemId, quantity } of action.items) {
					state.addItems(itemId, quantity)
				}
				for (const { itemId, quantity } of action.items) {
					this.managers.quest.processEvent({ type: 'ItemCollected', itemId, count: quantity }, state)
				}
				return { ok: true, changed: action.items.length > 0 }
			}

			case 'TakeItems': {
				const problem = this.checkStacks(action.items)
				if (problem) return fail(problem.code, problem.message)
				const needed = new Map<number, number>()
				for (const { itemId, quantity } of action.items) {
					needed.set(itemId, (needed.get(itemId) ?? 0) + quantity)
				}
				for (const [itemId, quantity] of needed) {
					if (state.getItemCount(itemId) < quantity) {
						return fail('InsufficientResources', `Need ${quantity} of item ${itemId}, have ${state.getItemCount(itemId)}`)
					}
				}
				for (const [itemId, quantity] of needed) {
					state.removeItems(itemId, quantity)
				}
				return { ok: true, changed: needed.size > 0 }
			}

			case 'GiveGold':
				if (!isWholeAmount(action.amount)) {
					return fail('InvalidParameter', `Gold amount ${action.amount} is not a whole non-negative number`)
				}
				state.addGold(action.amount)
				return { ok: true, changed: action.amount > 0 }

			case 'TakeGold':
				if (!isWholeAmount(action.amount)) {
					return fail('InvalidParameter', `Gold amount ${action.amount} is not a whole non-negative number`)
				}
				if (!state.removeGold(action.amount)) {
					return fail('InsufficientResources', `Need ${action.amount} gold, have ${state.getGold()}`)
				}
				return { ok: true, changed: action.amount > 0 }

			case 'SetFlag': {
				if (!action.flagName) {
					return fail('InvalidParameter', 'Flag name is empty')
				}
				if (state.getFlag(action.flagName) === action.value) {
					return { ok: true, changed: false }
				}
				state.setFlag(action.flagName, action.value)
				this.managers.quest.processEvent({ type: 'FlagChanged', flagName: action.flagName, value: action.value }, state)
				return { ok: true, changed: true }
			}

			case 'ChangeReputation':
				if (!action.faction || !Number.isFinite(action.change)) {
					return fail('InvalidParameter', `Reputation change ${action.change} for "${action.faction}" is invalid`)
				}
				state.changeReputation(action.faction, action.change)
				return { ok: true, changed: action.change !== 0 }

			case 'TriggerEvent':
				if (!action.eventName) {
					return fail('InvalidParameter', 'Event name is empty')
				}
				this.event.emit(ConditionEffectEvents.ScriptedEvent, { eventName: action.eventName })
				return { ok: true, changed: false }

			case 'GrantExperience':
				if (!isWholeAmount(action.amount)) {
					return fail('InvalidParameter', `Experience amount ${action.amount} is not a whole non-negative number`)
				}
				state.addExperience(action.amount)
				return { ok: true, changed: action.amount > 0 }

			case 'RecruitToParty': {
				const characters = this.managers.references?.characters
				if (characters && !characters.has(action.characterId)) {
					return fail('InvalidTarget', `Character ${action.characterId} does not exist`)
				}
				if (state.isInParty(action.characterId)) {
					return { ok: true, changed: false }
				}
				state.recruitToParty(action.characterId)
				this.event.emit(ConditionEffectEvents.PartyRecruited, { characterId: action.characterId })
				return { ok: true, changed: true }
			}

			case 'RecruitToInn': {
				const characters = this.managers.references?.characters
				if (characters && !characters.has(action.characterId)) {
					return fail('InvalidTarget', `Character ${action.characterId} does not exist`)
				}
				const npcs = this.managers.references?.npcs
				if (npcs && !npcs.has(action.innkeeperId)) {
					return fail('InvalidTarget', `Innkeeper ${action.innkeeperId} does not exist`)
				}
				if (state.getInnResident(action.characterId) === action.innkeeperId) {
					return { ok: true, changed: false }
				}
				state.recruitToInn(action.characterId, action.innkeeperId)
				this.event.emit(ConditionEffectEvents.InnRecruited, {
					characterId: action.characterId,
					innkeeperId: action.innkeeperId
				})
				return { ok: true, changed: true }
			}

			case 'OpenShop': {
				const npcs = this.managers.references?.npcs
				if (npcs && !npcs.has(action.npcId)) {
					return fail('InvalidTarget', `Shopkeeper ${action.npcId} does not exist`)
				}
				this.event.emit(ConditionEffectEvents.ShopOpened, { npcId: action.npcId })
				return { ok: true, changed: false }
			}

			default:
				return fail('UnknownAction', `Unknown action type "${describeVariant(action)}"`)
		}
	}

	private checkStacks(items: readonly ItemStack[]): { code: ActionErrorCode, message: string } | undefined {
		if (!Array.isArray(items)) {
			return { code: 'InvalidParameter', message: 'Item list is missing' }
		}
		const known = this.managers.references?.items
		for (const { itemId, quantity } of items) {
			if (!isPositiveAmount(quantity)) {
				return { code: 'InvalidParameter', message: `Item ${itemId} quantity ${quantity} is not a positive whole number` }
			}
			if (known && !known.has(itemId)) {
				return { code: 'InvalidTarget', message: `Item ${itemId} does not exist` }
			}
		}
		return undefined
	}
}
