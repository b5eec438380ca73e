import type { CharacterId, DialogueId, ItemId, NpcId, QuestId } from '../ids'
import type { QuestProgress, QuestStatus } from '../Quest/types'
import type { GameStateHandle, GameStateSnapshot } from './types'

export * from './types'

export interface GameStateInit {
	level?: number
	experience?: number
	gold?: number
	flags?: Record<string, boolean>
	inventory?: Array<[ItemId, number]>
	reputation?: Record<string, number>
	party?: CharacterId[]
}

function cloneProgress(progress: QuestProgress): QuestProgress {
	return { ...progress, objectiveProgress: { ...progress.objectiveProgress } }
}

/**
 * In-memory game state. Hosts with their own persistence implement
 * `GameStateHandle` directly instead.
 */
export class GameState implements GameStateHandle {
	private flags = new Map<string, boolean>()
	private inventory = new Map<ItemId, number>()
	private reputation = new Map<string, number>()
	private quests = new Map<QuestId, QuestProgress>()
	private completedQuests = new Set<QuestId>()
	private party = new Set<CharacterId>()
	private innResidents = new Map<CharacterId, NpcId>()
	private completedDialogues = new Set<DialogueId>()
	private gold = 0
	private level = 1
	private experience = 0

	constructor(init: GameStateInit = {}) {
		this.level = init.level ?? 1
		this.experience = init.experience ?? 0
		this.gold = init.gold ?? 0
		for (const [name, value] of Object.entries(init.flags ?? {})) {
			this.flags.set(name, value)
		}
		for (const [itemId, quantity] of init.inventory ?? []) {
			this.addItems(itemId, quantity)
		}
		for (const [faction, value] of Object.entries(init.reputation ?? {})) {
			this.reputation.set(faction, value)
		}
		for (const characterId of init.party ?? []) {
			this.party.add(characterId)
		}
	}

	/* VIEW */
	public getFlag(name: string): boolean | undefined {
		return this.flags.get(name)
	}

	public getQuestStatus(questId: QuestId): QuestStatus {
		const progress = this.quests.get(questId)
		if (progress && !progress.completed) return 'Active'
		if (this.completedQuests.has(questId)) return 'Completed'
		return 'NotStarted'
	}

	public getQuestProgress(questId: QuestId): Readonly<QuestProgress> | undefined {
		const progress = this.quests.get(questId)
		return progress ? cloneProgress(progress) : undefined
	}

	public isQuestStageComplete(questId: QuestId, stageNumber: number): boolean {
		const progress = this.quests.get(questId)
		if (progress && !progress.completed) {
			return stageNumber >= 1 && stageNumber < progress.currentStage
		}
		return this.completedQuests.has(questId) && stageNumber >= 1
	}

	public getItemCount(itemId: ItemId): number {
		return this.inventory.get(itemId) ?? 0
	}

	public getGold(): number {
		return this.gold
	}

	public getLevel(): number {
		return this.level
	}

	public getExperience(): number {
		return this.experience
	}

	public getReputation(faction: string): number {
		return this.reputation.get(faction) ?? 0
	}

	public isInParty(characterId: CharacterId): boolean {
		return this.party.has(characterId)
	}

	public getInnResident(characterId: CharacterId): NpcId | undefined {
		return this.innResidents.get(characterId)
	}

	public hasCompletedDialogue(dialogueId: DialogueId): boolean {
		return this.completedDialogues.has(dialogueId)
	}

	/* HANDLE */
	public setFlag(name: string, value: boolean): void {
		this.flags.set(name, value)
	}

	public addItems(itemId: ItemId, quantity: number): void {
		this.inventory.set(itemId, this.getItemCount(itemId) + quantity)
	}

	public removeItems(itemId: ItemId, quantity: number): boolean {
		const held = this.getItemCount(itemId)
		if (held < quantity) return false
		if (held === quantity) {
			this.inventory.delete(itemId)
		} else {
			this.inventory.set(itemId, held - quantity)
		}
		return true
	}

	public addGold(amount: number): void {
		this.gold += amount
	}

	public removeGold(amount: number): boolean {
		if (this.gold < amount) return false
		this.gold -= amount
		return true
	}

	public addExperience(amount: number): void {
		this.experience += amount
	}

	public setLevel(level: number): void {
		this.level = level
	}

	public changeReputation(faction: string, delta: number): void {
		this.reputation.set(faction, this.getReputation(faction) + delta)
	}

	public putQuestProgress(progress: QuestProgress): void {
		this.quests.set(progress.questId, cloneProgress(progress))
	}

	public markQuestCompleted(questId: QuestId): void {
		this.quests.delete(questId)
		this.completedQuests.add(questId)
	}

	public recruitToParty(characterId: CharacterId): void {
		this.innResidents.delete(characterId)
		this.party.add(characterId)
	}

	public recruitToInn(characterId: CharacterId, innkeeperId: NpcId): void {
		this.party.delete(characterId)
		this.innResidents.set(characterId, innkeeperId)
	}

	public markDialogueCompleted(dialogueId: DialogueId): void {
		this.completedDialogues.add(dialogueId)
	}

	/* SERIALISATION */
	public serialize(): GameStateSnapshot {
		return {
			flags: Array.from(this.flags.entries()),
			inventory: Array.from(this.inventory.entries()),
			gold: this.gold,
			level: this.level,
			experience: this.experience,
			reputation: Array.from(this.reputation.entries()),
			quests: Array.from(this.quests.values()).map(cloneProgress),
			completedQuests: Array.from(this.completedQuests),
			party: Array.from(this.party),
			innResidents: Array.from(this.innResidents.entries()),
			completedDialogues: Array.from(this.completedDialogues)
		}
	}

	public deserialize(state: GameStateSnapshot): void {
		this.reset()
		this.flags = new Map(state.flags)
		this.inventory = new Map(state.inventory)
		this.gold = state.gold
		this.level = state.level
		this.experience = state.experience
		this.reputation = new Map(state.reputation)
		for (const progress of state.quests) {
			this.quests.set(progress.questId, cloneProgress(progress))
		}
		this.completedQuests = new Set(state.completedQuests)
		this.party = new Set(state.party)
		this.innResidents = new Map(state.innResidents)
		this.completedDialogues = new Set(state.completedDialogues)
	}

	public reset(): void {
		this.flags.clear()
		this.inventory.clear()
		this.reputation.clear()
		this.quests.clear()
		this.completedQuests.clear()
		this.party.clear()
		this.innResidents.clear()
		this.completedDialogues.clear()
		this.gold = 0
		this.level = 1
		this.experience = 0
	}
}
