import { evaluateConditions } from '../ConditionEffect/conditions'
import type { DialogueAction, DialogueCondition, ItemStack } from '../ConditionEffect/types'
import type { GameStateView } from '../GameState/types'
import type { QuestId } from '../ids'
import type { QuestTree } from '../Quest/types'
import { describeVariant } from '../utils'
import type { Findings } from './Findings'
import type { ContentReferences, FindingLocation } from './types'

export interface CheckContext {
	findings: Findings
	/** First quest seen for each id */
	quests: ReadonlyMap<QuestId, QuestTree>
	references: ContentReferences
	initialState?: GameStateView
}

export type ReferenceKind = keyof ContentReferences

const KIND_LABELS: Record<ReferenceKind, string> = {
	items: 'item',
	monsters: 'monster',
	npcs: 'npc',
	maps: 'map',
	characters: 'character'
}

export function checkReference(
	context: CheckContext,
	kind: ReferenceKind,
	id: number | string,
	location: FindingLocation,
	where: string
) {
	const known: ReadonlySet<number | string> | undefined = context.references[kind]
	if (known && !known.has(id)) {
		context.findings.error('UnresolvedReference', `${where} references unknown ${KIND_LABELS[kind]} ${id}`, location)
	}
}

export function checkQuestReference(context: CheckContext, questId: QuestId, location: FindingLocation, where: string): QuestTree | undefined {
	const quest = context.quests.get(questId)
	if (!quest) {
		context.findings.error('UnknownQuestReference', `${where} references unknown quest ${questId}`, location)
	}
	return quest
}

function checkStageReference(
	context: CheckContext,
	questId: QuestId,
	stageNumber: number,
	location: FindingLocation,
	where: string
) {
	const quest = checkQuestReference(context, questId, location, where)
	if (quest && !quest.stages.some(stage => stage.stageNumber === stageNumber)) {
		context.findings.error('UnknownStageReference', `${where} references missing stage ${stageNumber} of quest ${questId}`, location)
	}
}

function checkAmount(context: CheckContext, value: number, minimum: number, location: FindingLocation, what: string) {
	if (!Number.isFinite(value)) {
		context.findings.error('InvalidParameter', `${what} must be a number`, location)
	} else if (value < minimum) {
		context.findings.error('InvalidParameter', `${what} must be at least ${minimum}, got ${value}`, location)
	}
}

function checkStacks(context: CheckContext, items: readonly ItemStack[], location: FindingLocation, where: string) {
	for (const { itemId, quantity } of items) {
		checkAmount(context, quantity, 1, location, `${where} quantity of item ${itemId}`)
		checkReference(context, 'items', itemId, location, where)
	}
}

export function checkConditions(
	context: CheckContext,
	conditions: readonly DialogueCondition[],
	location: FindingLocation,
	where: string
) {
	for (const condition of conditions) {
		checkCondition(context, condition, location, where)
	}
}

function checkCondition(context: CheckContext, condition: DialogueCondition, location: FindingLocation, where: string) {
	switch (condition.type) {
		case 'HasQuest':
		case 'CompletedQuest':
			checkQuestReference(context, condition.questId, location, `${where} ${condition.type} condition`)
			break
		case 'QuestStage':
			checkStageReference(context, condition.questId, condition.stageNumber, location, `${where} QuestStage condition`)
			break
		case 'HasItem':
			checkAmount(context, condition.quantity, 0, location, `${where} HasItem quantity`)
			checkReference(context, 'items', condition.itemId, location, `${where} HasItem condition`)
			break
		case 'HasGold':
			checkAmount(context, condition.amount, 0, location, `${where} HasGold amount`)
			break
		case 'MinLevel':
			checkAmount(context, condition.level, 0, location, `${where} MinLevel level`)
			break
		case 'FlagSet':
			if (!condition.flagName) {
				context.findings.error('InvalidParameter', `${where} FlagSet condition has an empty flag name`, location)
			}
			break
		case 'ReputationThreshold':
			checkAmount(context, condition.threshold, Number.NEGATIVE_INFINITY, location, `${where} reputation threshold`)
			break
		case 'And':
		case 'Or':
			checkConditions(context, condition.conditions, location, where)
			break
		case 'Not':
			checkCondition(context, condition.condition, location, where)
			break
		default:
			context.findings.error('UnknownConditionType', `${where} uses unknown condition type "${describeVariant(condition)}"`, location)
	}
}

export function checkActions(
	context: CheckContext,
	actions: readonly DialogueAction[],
	location: FindingLocation,
	where: string
) {
	for (const action of actions) {
		checkAction(context, action, location, where)
	}
}

function checkAction(context: CheckContext, action: DialogueAction, location: FindingLocation, owner: string) {
	const where = `${owner} ${describeVariant(action)} action`
	switch (action.type) {
		case 'StartQuest':
			checkQuestReference(context, action.questId, location, where)
			break
		case 'CompleteQuestStage':
			checkStageReference(context, action.questId, action.stageNumber, location, where)
			break
		case 'GiveItems':
		case 'TakeItems':
			checkStacks(context, action.items, location, where)
			break
		case 'GiveGold':
		case 'TakeGold':
		case 'GrantExperience':
			checkAmount(context, action.amount, 0, location, `${where} amount`)
			break
		case 'SetFlag':
			if (!action.flagName) {
				context.findings.error('InvalidParameter', `${where} has an empty flag name`, location)
			}
			break
		case 'ChangeReputation':
			if (!action.faction) {
				context.findings.error('InvalidParameter', `${where} has an empty faction`, location)
			}
			break
		case 'TriggerEvent':
			if (!action.eventName) {
				context.findings.error('InvalidParameter', `${where} has an empty event name`, location)
			}
			break
		case 'RecruitToParty':
			checkReference(context, 'characters', action.characterId, location, where)
			break
		case 'RecruitToInn':
			checkReference(context, 'characters', action.characterId, location, where)
			checkReference(context, 'npcs', action.innkeeperId, location, where)
			break
		case 'OpenShop':
			checkReference(context, 'npcs', action.npcId, location, where)
			break
		default:
			context.findings.error('UnknownActionType', `${owner} uses unknown action type "${describeVariant(action)}"`, location)
	}
}

/**
 * Truth value a condition has in every game state, or undefined when it
 * depends on the state. Quests that do not exist are never started.
 */
export function staticTruth(context: CheckContext, condition: DialogueCondition): boolean | undefined {
	switch (condition.type) {
		case 'HasQuest':
		case 'CompletedQuest':
			return context.quests.has(condition.questId) ? undefined : false
		case 'QuestStage': {
			const quest = context.quests.get(condition.questId)
			if (!quest) return false
			return quest.stages.some(stage => stage.stageNumber === condition.stageNumber) ? undefined : false
		}
		case 'HasItem':
			return condition.quantity <= 0 ? true : undefined
		case 'HasGold':
			return condition.amount <= 0 ? true : undefined
		case 'MinLevel':
		case 'FlagSet':
		case 'ReputationThreshold':
			return undefined
		case 'And':
			return staticAll(context, condition.conditions)
		case 'Or': {
			const values = condition.conditions.map(inner => staticTruth(context, inner))
			if (values.some(value => value === true)) return true
			if (values.every(value => value === false)) return false
			return undefined
		}
		case 'Not': {
			const value = staticTruth(context, condition.condition)
			return value === undefined ? undefined : !value
		}
		default:
			return false
	}
}

/**
 * Conjunction of `conditions`. Also catches a flag required to be both set
 * and unset in the same list.
 */
export function staticAll(context: CheckContext, conditions: readonly DialogueCondition[]): boolean | undefined {
	const flags = new Map<string, boolean>()
	let unknown = false

	for (const condition of conditions) {
		if (condition.type === 'FlagSet') {
			const required = flags.get(condition.flagName)
			if (required !== undefined && required !== condition.value) return false
			flags.set(condition.flagName, condition.value)
		}
		const value = staticTruth(context, condition)
		if (value === false) return false
		if (value === undefined) unknown = true
	}

	return unknown ? undefined : true
}

/**
 * Whether a gate can never be passed, or is shut in the campaign's starting state.
 */
export function isGateClosed(context: CheckContext, conditions: readonly DialogueCondition[]): boolean {
	if (staticAll(context, conditions) === false) {
		return true
	}
	if (context.initialState) {
		return !evaluateConditions(conditions, context.initialState)
	}
	return false
}
