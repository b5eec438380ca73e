import type { QuestId } from '../ids'
import { stageNumberingIssues } from '../Quest/QuestStore'
import type { QuestObjective, QuestReward, QuestTree } from '../Quest/types'
import { describeVariant } from '../utils'
import { checkQuestReference, checkReference } from './references'
import type { CheckContext } from './references'
import type { FindingLocation } from './types'

export function checkQuests(context: CheckContext, quests: readonly QuestTree[]) {
	const seenIds = new Set<QuestId>()

	for (const quest of quests) {
		if (seenIds.has(quest.id)) {
			context.findings.error('DuplicateQuestId', `Quest id ${quest.id} is used more than once`, { questId: quest.id })
			continue
		}
		seenIds.add(quest.id)
		checkQuest(context, quest)
	}

	checkRequirementCycles(context)
}

function checkQuest(context: CheckContext, quest: QuestTree) {
	const { findings } = context
	const questId = quest.id

	if (quest.stages.length === 0) {
		findings.warning('NoStages', `Quest ${questId} has no stages and completes as soon as it starts`, { questId })
	}

	for (const issue of stageNumberingIssues(quest)) {
		findings.error('StageNumbering', `Stage numbers must run 1..N in order: ${issue}`, { questId })
	}

	if (quest.minLevel !== undefined && quest.maxLevel !== undefined && quest.minLevel > quest.maxLevel) {
		findings.error('LevelBounds', `Quest ${questId} minimum level ${quest.minLevel} exceeds maximum level ${quest.maxLevel}`, { questId })
	}

	for (const required of quest.requiredQuests) {
		if (!context.quests.has(required)) {
			findings.error('UnknownRequiredQuest', `Quest ${questId} requires unknown quest ${required}`, { questId })
		}
	}

	if (quest.questGiverNpc !== undefined) {
		checkReference(context, 'npcs', quest.questGiverNpc, { questId }, `Quest ${questId} giver`)
	}
	if (quest.questGiverMap !== undefined) {
		checkReference(context, 'maps', quest.questGiverMap, { questId }, `Quest ${questId} giver`)
	}

	for (const stage of quest.stages) {
		const location = { questId, stageNumber: stage.stageNumber }
		const where = `Quest ${questId} stage ${stage.stageNumber}`

		if (stage.objectives.length === 0) {
			if (stage.requireAllObjectives) {
				findings.error('EmptyRequiredStage', `${where} requires all objectives but has none`, location)
			} else {
				findings.warning('EmptyOptionalStage', `${where} has no objectives and only completes through an action`, location)
			}
		}

		stage.objectives.forEach((objective, objectiveIndex) => {
			checkObjective(context, objective, { ...location, objectiveIndex }, `${where} objective ${objectiveIndex}`)
		})
	}

	quest.rewards.forEach((reward, rewardIndex) => {
		checkReward(context, reward, { questId, rewardIndex }, `Quest ${questId} reward ${rewardIndex}`)
	})
}

function checkCount(context: CheckContext, value: number, location: FindingLocation, what: string) {
	if (!Number.isInteger(value) || value < 1) {
		context.findings.error('InvalidParameter', `${what} must be a whole number of at least 1, got ${value}`, location)
	}
}

function checkObjective(context: CheckContext, objective: QuestObjective, location: FindingLocation, where: string) {
	switch (objective.type) {
		case 'KillMonsters':
			checkCount(context, objective.quantity, location, `${where} quantity`)
			checkReference(context, 'monsters', objective.monsterId, location, where)
			break
		case 'CollectItems':
			checkCount(context, objective.quantity, location, `${where} quantity`)
			checkReference(context, 'items', objective.itemId, location, where)
			break
		case 'ReachLocation':
			if (!Number.isFinite(objective.radius) || objective.radius < 0) {
				context.findings.error('InvalidParameter', `${where} radius must not be negative, got ${objective.radius}`, location)
			}
			checkReference(context, 'maps', objective.mapId, location, where)
			break
		case 'TalkToNpc':
			checkReference(context, 'npcs', objective.npcId, location, where)
			checkReference(context, 'maps', objective.mapId, location, where)
			break
		case 'DeliverItem':
			checkCount(context, objective.quantity, location, `${where} quantity`)
			checkReference(context, 'items', objective.itemId, location, where)
			checkReference(context, 'npcs', objective.npcId, location, where)
			break
		case 'EscortNpc':
			checkReference(context, 'npcs', objective.npcId, location, where)
			checkReference(context, 'maps', objective.mapId, location, where)
			break
		case 'CustomFlag':
			if (!objective.flagName) {
				context.findings.error('InvalidParameter', `${where} has an empty flag name`, location)
			}
			break
		default:
			context.findings.error('UnknownObjectiveType', `${where} has unknown type "${describeVariant(objective)}"`, location)
	}
}

function checkReward(context: CheckContext, reward: QuestReward, location: FindingLocation, where: string) {
	switch (reward.type) {
		case 'Experience':
		case 'Gold':
			if (!Number.isFinite(reward.amount) || reward.amount < 0) {
				context.findings.error('InvalidParameter', `${where} amount must not be negative, got ${reward.amount}`, location)
			}
			break
		case 'Items':
			for (const { itemId, quantity } of reward.items) {
				checkCount(context, quantity, location, `${where} quantity of item ${itemId}`)
				checkReference(context, 'items', itemId, location, where)
			}
			break
		case 'UnlockQuest':
			checkQuestReference(context, reward.questId, location, where)
			break
		case 'SetFlag':
			if (!reward.flagName) {
				context.findings.error('InvalidParameter', `${where} has an empty flag name`, location)
			}
			break
		case 'Reputation':
			if (!reward.faction) {
				context.findings.error('InvalidParameter', `${where} has an empty faction`, location)
			}
			break
		default:
			context.findings.error('UnknownRewardType', `${where} has unknown type "${describeVariant(reward)}"`, location)
	}
}

/**
 * Reports each cycle in the required-quests graph once, at the quest where the
 * walk first closed it.
 */
function checkRequirementCycles(context: CheckContext) {
	const done = new Set<QuestId>()
	const onPath: QuestId[] = []

	const visit = (questId: QuestId) => {
		if (done.has(questId)) return
		const cycleStart = onPath.indexOf(questId)
		if (cycleStart !== -1) {
			const cycle = [...onPath.slice(cycleStart), questId]
			context.findings.error(
				'RequiredQuestCycle',
				`Quest requirements form a cycle: ${cycle.join(' -> ')}`,
				{ questId }
			)
			return
		}

		const quest = context.quests.get(questId)
		if (!quest) return

		onPath.push(questId)
		for (const required of quest.requiredQuests) {
			visit(required)
		}
		onPath.pop()
		done.add(questId)
	}

	for (const questId of context.quests.keys()) {
		visit(questId)
	}
}
