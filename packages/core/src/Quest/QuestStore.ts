import { LoadError } from '../errors'
import type { QuestId } from '../ids'
import { cloneRecord, deepFreeze } from '../utils'
import type { QuestStage, QuestTree } from './types'

export function stageNumberingIssues(quest: QuestTree): string[] {
	const issues: string[] = []
	quest.stages.forEach((stage, index) => {
		if (stage.stageNumber !== index + 1) {
			issues.push(`quest ${quest.id} has stage number ${stage.stageNumber} at position ${index + 1}`)
		}
	})
	return issues
}

export function isAmbiguousStage(stage: QuestStage): boolean {
	return stage.requireAllObjectives && stage.objectives.length === 0
}

/**
 * Immutable, validated set of quests. Built once at campaign load.
 */
export class QuestStore {
	private readonly quests: ReadonlyMap<QuestId, QuestTree>

	private constructor(quests: ReadonlyMap<QuestId, QuestTree>) {
		this.quests = quests
	}

	/**
	 * Rejects duplicate ids, stage numbers that are not 1..N in order, and stages
	 * that require all of zero objectives.
	 */
	public static load(quests: readonly QuestTree[]): QuestStore {
		const issues: string[] = []
		const byId = new Map<QuestId, QuestTree>()

		for (const quest of quests) {
			if (byId.has(quest.id)) {
				issues.push(`duplicate quest id ${quest.id}`)
				continue
			}
			issues.push(...stageNumberingIssues(quest))
			for (const stage of quest.stages) {
				if (isAmbiguousStage(stage)) {
					issues.push(`quest ${quest.id} stage ${stage.stageNumber} requires all objectives but has none`)
				}
			}
			byId.set(quest.id, deepFreeze(cloneRecord(quest)))
		}

		if (issues.length > 0) {
			throw new LoadError('quest', issues)
		}

		return new QuestStore(byId)
	}

	public getQuest(id: QuestId): QuestTree | undefined {
		return this.quests.get(id)
	}

	public hasQuest(id: QuestId): boolean {
		return this.quests.has(id)
	}

	public getStage(id: QuestId, stageNumber: number): QuestStage | undefined {
		return this.quests.get(id)?.stages[stageNumber - 1]
	}

	public listQuests(): QuestTree[] {
		return Array.from(this.quests.values())
	}

	public get size(): number {
		return this.quests.size
	}

	public serialize(): QuestTree[] {
		return this.listQuests().map(quest => cloneRecord(quest))
	}
}
