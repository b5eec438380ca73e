import type { GameStateView } from '../GameState/types'
import { describeVariant } from '../utils'
import type { ConditionDiagnosticSink, DialogueCondition } from './types'

function isCount(value: unknown): value is number {
	return typeof value === 'number' && Number.isFinite(value)
}

function malformed(report: ConditionDiagnosticSink | undefined, conditionType: string, detail: string): false {
	report?.({ conditionType, message: `Malformed ${conditionType} condition: ${detail}` })
	return false
}

/**
 * Evaluates one condition against a read-only view of the game state.
 * Never throws: unknown or malformed conditions evaluate to false and are
 * passed to `report`.
 */
export function evaluateCondition(
	condition: DialogueCondition,
	state: GameStateView,
	report?: ConditionDiagnosticSink
): boolean {
	switch (condition.type) {
		case 'HasQuest':
			return state.getQuestStatus(condition.questId) === 'Active'

		case 'CompletedQuest':
			return state.getQuestStatus(condition.questId) === 'Completed'

		case 'QuestStage': {
			if (!isCount(condition.stageNumber)) {
				return malformed(report, condition.type, 'stageNumber must be a number')
			}
			const progress = state.getQuestProgress(condition.questId)
			return progress !== undefined && !progress.completed && progress.currentStage === condition.stageNumber
		}

		case 'HasItem':
			if (!isCount(condition.quantity)) {
				return malformed(report, condition.type, 'quantity must be a number')
			}
			return state.getItemCount(condition.itemId) >= condition.quantity

		case 'HasGold':
			if (!isCount(condition.amount)) {
				return malformed(report, condition.type, 'amount must be a number')
			}
			return state.getGold() >= condition.amount

		case 'MinLevel':
			if (!isCount(condition.level)) {
				return malformed(report, condition.type, 'level must be a number')
			}
			return state.getLevel() >= condition.level

		case 'FlagSet':
			return (state.getFlag(condition.flagName) ?? false) === condition.value

		case 'ReputationThreshold':
			if (!isCount(condition.threshold)) {
				return malformed(report, condition.type, 'threshold must be a number')
			}
			return state.getReputation(condition.faction) >= condition.threshold

		case 'And':
			if (!Array.isArray(condition.conditions)) {
				return malformed(report, condition.type, 'conditions must be a list')
			}
			return condition.conditions.every(inner => evaluateCondition(inner, state, report))

		case 'Or':
			if (!Array.isArray(condition.conditions)) {
				return malformed(report, condition.type, 'conditions must be a list')
			}
			return condition.conditions.some(inner => evaluateCondition(inner, state, report))

		case 'Not':
			if (typeof condition.condition !== 'object' || condition.condition === null) {
				return malformed(report, condition.type, 'condition is missing')
			}
			return !evaluateCondition(condition.condition, state, report)

		default: {
			const type = describeVariant(condition)
			report?.({ conditionType: type, message: `Unknown condition type "${type}" evaluated as false` })
			return false
		}
	}
}

/**
 * All conditions must hold. An empty list is vacuously true.
 */
export function evaluateConditions(
	conditions: readonly DialogueCondition[],
	state: GameStateView,
	report?: ConditionDiagnosticSink
): boolean {
	return conditions.every(condition => evaluateCondition(condition, state, report))
}
