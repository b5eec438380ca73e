import type { CharacterId, DialogueId, ItemId, NpcId, QuestId } from '../ids'
import type { QuestProgress, QuestStatus } from '../Quest/types'

/**
 * Read-only capability over the surrounding game's persistent state.
 * Conditions are evaluated against this and nothing else.
 */
export interface GameStateView {
	/** Unset flags read as `undefined`; conditions treat that as `false` */
	getFlag(name: string): boolean | undefined
	getQuestStatus(questId: QuestId): QuestStatus
	getQuestProgress(questId: QuestId): Readonly<QuestProgress> | undefined
	isQuestStageComplete(questId: QuestId, stageNumber: number): boolean
	getItemCount(itemId: ItemId): number
	getGold(): number
	getLevel(): number
	getExperience(): number
	getReputation(faction: string): number
	isInParty(characterId: CharacterId): boolean
	getInnResident(characterId: CharacterId): NpcId | undefined
	hasCompletedDialogue(dialogueId: DialogueId): boolean
}

/**
 * Mutable capability. Only the action dispatcher and the quest tracker write through it.
 */
export interface GameStateHandle extends GameStateView {
	setFlag(name: string, value: boolean): void
	addItems(itemId: ItemId, quantity: number): void
	/** Returns false and changes nothing when fewer than `quantity` are held */
	removeItems(itemId: ItemId, quantity: number): boolean
	addGold(amount: number): void
	removeGold(amount: number): boolean
	addExperience(amount: number): void
	changeReputation(faction: string, delta: number): void
	putQuestProgress(progress: QuestProgress): void
	markQuestCompleted(questId: QuestId): void
	recruitToParty(characterId: CharacterId): void
	recruitToInn(characterId: CharacterId, innkeeperId: NpcId): void
	markDialogueCompleted(dialogueId: DialogueId): void
}

export interface GameStateSnapshot {
	flags: Array<[string, boolean]>
	inventory: Array<[ItemId, number]>
	gold: number
	level: number
	experience: number
	reputation: Array<[string, number]>
	quests: QuestProgress[]
	completedQuests: QuestId[]
	party: CharacterId[]
	innResidents: Array<[CharacterId, NpcId]>
	completedDialogues: DialogueId[]
}
