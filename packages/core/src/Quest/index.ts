import type { EventManager } from '../events'
import type { GameStateHandle, GameStateView } from '../GameState/types'
import type { QuestId } from '../ids'
import type { Logger } from '../Logs'
import { calculateDistance } from '../utils'
import { QuestEvents } from './events'
import { QuestStore } from './QuestStore'
import type {
	QuestObjective,
	QuestProgress,
	QuestProgressEvent,
	QuestReward,
	QuestStage,
	QuestStartCheck,
	QuestStartOutcome,
	QuestTree,
	QuestUpdate,
	StageCompletionResult
} from './types'

export { QuestEvents } from './events'
export { QuestStore } from './QuestStore'

/**
 * Count an objective needs to reach before it is satisfied.
 */
export function objectiveGoal(objective: QuestObjective): number {
	switch (objective.type) {
		case 'KillMonsters':
		case 'CollectItems':
		case 'DeliverItem':
			return objective.quantity
		case 'ReachLocation':
		case 'TalkToNpc':
		case 'EscortNpc':
		case 'CustomFlag':
			return 1
	}
}

/**
 * New progress value for `objective` after `event`, or undefined when the event
 * does not concern it.
 */
function progressAfter(objective: QuestObjective, event: QuestProgressEvent, current: number): number | undefined {
	const goal = objectiveGoal(objective)

	switch (objective.type) {
		case 'KillMonsters':
			if (event.type !== 'MonsterKilled' || event.monsterId !== objective.monsterId) return
			return Math.min(current + event.count, goal)

		case 'CollectItems':
			if (event.type !== 'ItemCollected' || event.itemId !== objective.itemId) return
			return Math.min(current + event.count, goal)

		case 'ReachLocation':
			if (event.type !== 'LocationReached' || event.mapId !== objective.mapId) return
			return calculateDistance(event.position, objective.position) <= objective.radius ? 1 : undefined

		case 'TalkToNpc':
			if (event.type !== 'NpcTalkedTo' || event.npcId !== objective.npcId) return
			if (event.mapId !== undefined && event.mapId !== objective.mapId) return
			return 1

		case 'DeliverItem':
			if (event.type !== 'ItemDelivered' || event.itemId !== objective.itemId || event.npcId !== objective.npcId) return
			return Math.min(current + event.count, goal)

		case 'EscortNpc':
			if (event.type !== 'NpcEscorted' || event.npcId !== objective.npcId || event.mapId !== objective.mapId) return
			return event.position.x === objective.position.x && event.position.y === objective.position.y ? 1 : undefined

		case 'CustomFlag':
			if (event.type !== 'FlagChanged' || event.flagName !== objective.flagName) return
			return event.value === objective.requiredValue ? 1 : 0
	}
}

export function isStageSatisfied(stage: QuestStage, progress: QuestProgress): boolean {
	if (stage.objectives.length === 0) {
		return false
	}
	const done = (objective: QuestObjective, index: number) =>
		(progress.objectiveProgress[index] ?? 0) >= objectiveGoal(objective)

	return stage.requireAllObjectives
		? stage.objectives.every(done)
		: stage.objectives.some(done)
}

/**
 * Tracks quest progress on a game-state handle: starting quests, feeding
 * gameplay events into objectives, advancing stages and granting rewards.
 */
export class QuestManager {
	private completing = new Set<QuestId>()

	constructor(
		private store: QuestStore,
		private event: EventManager,
		private logger: Logger
	) {}

	public getStore(): QuestStore {
		return this.store
	}

	public canStart(questId: QuestId, state: GameStateView): QuestStartCheck {
		const quest = this.store.getQuest(questId)
		if (!quest) {
			return { ok: false, reason: 'unknownQuest', message: `Quest ${questId} does not exist` }
		}

		const status = state.getQuestStatus(questId)
		if (status === 'Active') {
			return { ok: false, reason: 'alreadyActive', message: `Quest ${questId} is already active` }
		}
		if (status === 'Completed' && !quest.repeatable) {
			return { ok: false, reason: 'alreadyCompleted', message: `Quest ${questId} is complete and not repeatable` }
		}

		const level = state.getLevel()
		if (quest.minLevel !== undefined && level < quest.minLevel) {
			return { ok: false, reason: 'levelTooLow', message: `Quest ${questId} requires level ${quest.minLevel}` }
		}
		if (quest.maxLevel !== undefined && level > quest.maxLevel) {
			return { ok: false, reason: 'levelTooHigh', message: `Quest ${questId} allows at most level ${quest.maxLevel}` }
		}

		const missing = quest.requiredQuests.filter(required => state.getQuestStatus(required) !== 'Completed')
		if (missing.length > 0) {
			return { ok: false, reason: 'missingPrerequisite', message: `Quest ${questId} requires quests ${missing.join(', ')}` }
		}

		return { ok: true }
	}

	/**
	 * Starting an active quest, or a completed quest that is not repeatable,
	 * succeeds without changing anything.
	 */
	public startQuest(questId: QuestId, state: GameStateHandle): QuestStartOutcome {
		const check = this.canStart(questId, state)
		if (!check.ok) {
			if (check.reason === 'alreadyActive' || check.reason === 'alreadyCompleted') {
				return { ok: true, result: check.reason }
			}
			this.logger.debug(check.message)
			return check
		}

		const quest = this.requireQuest(questId)
		const restarted = state.getQuestStatus(questId) === 'Completed'
		const progress: QuestProgress = {
			questId,
			currentStage: 1,
			objectiveProgress: {},
			completed: false
		}

		this.syncFlagObjectives(quest, progress, state)
		state.putQuestProgress(progress)
		this.event.emit(QuestEvents.Started, { questId, restarted })
		this.logger.debug(`Quest ${questId} ${restarted ? 'restarted' : 'started'}`)

		this.settle(quest, progress, state)

		return { ok: true, result: restarted ? 'restarted' : 'started' }
	}

	/**
	 * Feeds one gameplay event into the current stage of every active quest.
	 */
	public processEvent(event: QuestProgressEvent, state: GameStateHandle): QuestUpdate[] {
		const updates: QuestUpdate[] = []
		// Quests unlocked while this event settles only see later events
		const active = this.store.listQuests().filter(quest => state.getQuestStatus(quest.id) === 'Active')

		for (const quest of active) {
			const stored = state.getQuestProgress(quest.id)
			if (!stored) continue
			const progress: QuestProgress = { ...stored, objectiveProgress: { ...stored.objectiveProgress } }

			const stage = quest.stages[progress.currentStage - 1]
			if (!stage) continue

			let touched = false
			stage.objectives.forEach((objective, index) => {
				const current = progress.objectiveProgress[index] ?? 0
				const next = progressAfter(objective, event, current)
				if (next === undefined || next === current) return

				progress.objectiveProgress[index] = next
				touched = true
				this.event.emit(QuestEvents.ObjectiveProgress, {
					questId: quest.id,
					stageNumber: stage.stageNumber,
					objectiveIndex: index,
					progress: next,
					goal: objectiveGoal(objective)
				})
			})

			if (!touched) continue

			state.putQuestProgress(progress)
			const update = this.settle(quest, progress, state)
			updates.push(update)
		}

		return updates
	}

	/**
	 * Force-completes the active stage. Stages that are already behind the
	 * quest are a no-op; skipping ahead is refused.
	 */
	public completeStage(questId: QuestId, stageNumber: number, state: GameStateHandle): StageCompletionResult {
		const quest = this.store.getQuest(questId)
		const status = state.getQuestStatus(questId)

		if (status === 'Completed' && !quest?.repeatable) {
			return 'alreadyComplete'
		}

		const stored = state.getQuestProgress(questId)
		if (!quest || status !== 'Active' || !stored) {
			return status === 'Completed' ? 'alreadyComplete' : 'notActive'
		}

		if (stageNumber < stored.currentStage) return 'alreadyComplete'
		if (stageNumber > stored.currentStage) return 'outOfOrder'

		const progress: QuestProgress = { ...stored, objectiveProgress: { ...stored.objectiveProgress } }
		const update = this.advance(quest, progress, state)
		if (update.questCompleted) return 'completed'
		return this.settle(quest, progress, state).questCompleted ? 'completed' : 'advanced'
	}

	/**
	 * Advances through every stage whose objectives are already satisfied.
	 */
	private settle(quest: QuestTree, progress: QuestProgress, state: GameStateHandle): QuestUpdate {
		const update: QuestUpdate = { questId: quest.id, completedStages: [], questCompleted: false }

		if (quest.stages.length === 0) {
			this.completeQuest(quest, progress, state)
			update.questCompleted = true
			return update
		}

		let stage = quest.stages[progress.currentStage - 1]
		while (stage && isStageSatisfied(stage, progress)) {
			const step = this.advance(quest, progress, state)
			update.completedStages.push(...step.completedStages)
			if (step.questCompleted) {
				update.questCompleted = true
				break
			}
			stage = quest.stages[progress.currentStage - 1]
		}

		return update
	}

	private advance(quest: QuestTree, progress: QuestProgress, state: GameStateHandle): QuestUpdate {
		const stageNumber = progress.currentStage
		this.event.emit(QuestEvents.StageCompleted, { questId: quest.id, stageNumber })

		if (stageNumber >= quest.stages.length) {
			this.completeQuest(quest, progress, state)
			return { questId: quest.id, completedStages: [stageNumber], questCompleted: true }
		}

		progress.currentStage = stageNumber + 1
		progress.objectiveProgress = {}
		this.syncFlagObjectives(quest, progress, state)
		state.putQuestProgress(progress)

		return { questId: quest.id, completedStages: [stageNumber], questCompleted: false }
	}

	private completeQuest(quest: QuestTree, progress: QuestProgress, state: GameStateHandle) {
		progress.completed = true
		state.markQuestCompleted(quest.id)
		this.completing.add(quest.id)
		try {
			for (const reward of quest.rewards) {
				this.grantReward(quest, reward, state)
			}
		} finally {
			this.completing.delete(quest.id)
		}
		this.event.emit(QuestEvents.Completed, { questId: quest.id })
		this.logger.debug(`Quest ${quest.id} completed`)
	}

	private grantReward(quest: QuestTree, reward: QuestReward, state: GameStateHandle) {
		switch (reward.type) {
			case 'Experience':
				state.addExperience(reward.amount)
				break
			case 'Gold':
				state.addGold(reward.amount)
				break
			case 'Items':
				for (const { itemId, quantity } of reward.items) {
					state.addItems(itemId, quantity)
				}
				break
			case 'SetFlag':
				state.setFlag(reward.flagName, reward.value)
				break
			case 'Reputation':
				state.changeReputation(reward.faction, reward.change)
				break
			case 'UnlockQuest': {
				if (this.completing.has(reward.questId)) {
					this.logger.warn(`Quest ${quest.id} unlocks quest ${reward.questId} which is still completing; skipped`)
					break
				}
				const outcome = this.startQuest(reward.questId, state)
				if (!outcome.ok) {
					this.logger.warn(`Quest ${quest.id} could not unlock quest ${reward.questId}: ${outcome.message}`)
				}
				break
			}
		}
	}

	/**
	 * Flag objectives reflect the flag's current value as soon as their stage begins.
	 */
	private syncFlagObjectives(quest: QuestTree, progress: QuestProgress, state: GameStateView) {
		const stage = quest.stages[progress.currentStage - 1]
		if (!stage) return
		stage.objectives.forEach((objective, index) => {
			if (objective.type !== 'CustomFlag') return
			const value = state.getFlag(objective.flagName) ?? false
			progress.objectiveProgress[index] = value === objective.requiredValue ? 1 : 0
		})
	}

	private requireQuest(questId: QuestId): QuestTree {
		const quest = this.store.getQuest(questId)
		if (!quest) {
			throw new Error(`Quest ${questId} not loaded`)
		}
		return quest
	}
}
