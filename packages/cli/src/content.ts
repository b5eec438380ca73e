import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import type { ContentReferences, DialogueCondition, DialogueTree, QuestTree } from '@lorebook/core'

const Id = z.number().int()
const Count = z.number()
const PositionSchema = z.object({ x: z.number(), y: z.number() })
const ItemStackSchema = z.object({ itemId: Id, quantity: Count })

const ConditionSchema: z.ZodType<DialogueCondition, z.ZodTypeDef, unknown> = z.lazy(() =>
	z.discriminatedUnion('type', [
		z.object({ type: z.literal('HasQuest'), questId: Id }),
		z.object({ type: z.literal('CompletedQuest'), questId: Id }),
		z.object({ type: z.literal('QuestStage'), questId: Id, stageNumber: z.number().int() }),
		z.object({ type: z.literal('HasItem'), itemId: Id, quantity: Count }),
		z.object({ type: z.literal('HasGold'), amount: Count }),
		z.object({ type: z.literal('MinLevel'), level: Count }),
		z.object({ type: z.literal('FlagSet'), flagName: z.string(), value: z.boolean().default(true) }),
		z.object({ type: z.literal('ReputationThreshold'), faction: z.string(), threshold: Count }),
		z.object({ type: z.literal('And'), conditions: z.array(ConditionSchema) }),
		z.object({ type: z.literal('Or'), conditions: z.array(ConditionSchema) }),
		z.object({ type: z.literal('Not'), condition: ConditionSchema })
	])
)

const ActionSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('StartQuest'), questId: Id }),
	z.object({ type: z.literal('CompleteQuestStage'), questId: Id, stageNumber: z.number().int() }),
	z.object({ type: z.literal('GiveItems'), items: z.array(ItemStackSchema) }),
	z.object({ type: z.literal('TakeItems'), items: z.array(ItemStackSchema) }),
	z.object({ type: z.literal('GiveGold'), amount: Count }),
	z.object({ type: z.literal('TakeGold'), amount: Count }),
	z.object({ type: z.literal('SetFlag'), flagName: z.string(), value: z.boolean().default(true) }),
	z.object({ type: z.literal('ChangeReputation'), faction: z.string(), change: z.number() }),
	z.object({ type: z.literal('TriggerEvent'), eventName: z.string() }),
	z.object({ type: z.literal('GrantExperience'), amount: Count }),
	z.object({ type: z.literal('RecruitToParty'), characterId: z.string() }),
	z.object({ type: z.literal('RecruitToInn'), characterId: z.string(), innkeeperId: Id }),
	z.object({ type: z.literal('OpenShop'), npcId: Id })
])

const ChoiceSchema = z.object({
	text: z.string(),
	targetNode: Id.optional(),
	conditions: z.array(ConditionSchema).default([]),
	actions: z.array(ActionSchema).default([]),
	endsDialogue: z.boolean().default(false)
})

const NodeSchema = z.object({
	id: Id,
	text: z.string(),
	speakerOverride: z.string().optional(),
	choices: z.array(ChoiceSchema).default([]),
	conditions: z.array(ConditionSchema).default([]),
	actions: z.array(ActionSchema).default([]),
	isTerminal: z.boolean().default(false)
})

const DialogueTreeSchema = z.object({
	id: Id,
	name: z.string(),
	rootNode: Id,
	nodes: z.record(z.string().regex(/^-?\d+$/, 'node keys must be integers'), NodeSchema),
	speakerName: z.string().optional(),
	repeatable: z.boolean().default(true),
	associatedQuest: Id.optional()
})

const ObjectiveSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('KillMonsters'), monsterId: Id, quantity: Count }),
	z.object({ type: z.literal('CollectItems'), itemId: Id, quantity: Count }),
	z.object({ type: z.literal('ReachLocation'), mapId: Id, position: PositionSchema, radius: z.number() }),
	z.object({ type: z.literal('TalkToNpc'), npcId: Id, mapId: Id }),
	z.object({ type: z.literal('DeliverItem'), itemId: Id, npcId: Id, quantity: Count }),
	z.object({ type: z.literal('EscortNpc'), npcId: Id, mapId: Id, position: PositionSchema }),
	z.object({ type: z.literal('CustomFlag'), flagName: z.string(), requiredValue: z.boolean().default(true) })
])

const RewardSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('Experience'), amount: Count }),
	z.object({ type: z.literal('Gold'), amount: Count }),
	z.object({ type: z.literal('Items'), items: z.array(ItemStackSchema) }),
	z.object({ type: z.literal('UnlockQuest'), questId: Id }),
	z.object({ type: z.literal('SetFlag'), flagName: z.string(), value: z.boolean().default(true) }),
	z.object({ type: z.literal('Reputation'), faction: z.string(), change: z.number() })
])

const QuestStageSchema = z.object({
	stageNumber: z.number().int(),
	name: z.string(),
	description: z.string().default(''),
	objectives: z.array(ObjectiveSchema).default([]),
	requireAllObjectives: z.boolean().default(true)
})

const QuestTreeSchema = z.object({
	id: Id,
	name: z.string(),
	description: z.string().default(''),
	stages: z.array(QuestStageSchema).default([]),
	rewards: z.array(RewardSchema).default([]),
	minLevel: z.number().int().optional(),
	maxLevel: z.number().int().optional(),
	requiredQuests: z.array(Id).default([]),
	repeatable: z.boolean().default(false),
	isMainQuest: z.boolean().default(false),
	questGiverNpc: Id.optional(),
	questGiverMap: Id.optional(),
	questGiverPosition: PositionSchema.optional()
})

const ReferencesSchema = z.object({
	items: z.array(Id).optional(),
	monsters: z.array(Id).optional(),
	npcs: z.array(Id).optional(),
	maps: z.array(Id).optional(),
	characters: z.array(z.string()).optional()
})

export const DIALOGUES_FILE = 'dialogues.json'
export const QUESTS_FILE = 'quests.json'
export const REFERENCES_FILE = 'references.json'

export interface Campaign {
	name: string
	dialogues: DialogueTree[]
	quests: QuestTree[]
	references: ContentReferences
}

/**
 * A campaign file that is missing, is not JSON, or does not match the schema.
 */
export class CampaignLoadError extends Error {
	constructor(
		public readonly file: string,
		public readonly issues: string[]
	) {
		super(`Cannot read ${file}: ${issues.join('; ')}`)
		this.name = 'CampaignLoadError'
	}
}

function readJson(file: string): unknown {
	let text: string
	try {
		text = fs.readFileSync(file, 'utf-8')
	} catch (error) {
		throw new CampaignLoadError(file, [error instanceof Error ? error.message : String(error)])
	}
	try {
		return JSON.parse(text)
	} catch (error) {
		throw new CampaignLoadError(file, [error instanceof Error ? error.message : String(error)])
	}
}

function parseFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
	const result = schema.safeParse(readJson(file))
	if (!result.success) {
		throw new CampaignLoadError(
			file,
			result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		)
	}
	return result.data
}

/**
 * Reads one campaign directory. `references.json` is optional; without it no
 * outside ids are checked.
 */
export function loadCampaign(dir: string): Campaign {
	const dialogues: DialogueTree[] = parseFile(path.join(dir, DIALOGUES_FILE), z.array(DialogueTreeSchema))
	const quests: QuestTree[] = parseFile(path.join(dir, QUESTS_FILE), z.array(QuestTreeSchema))

	const referencesFile = path.join(dir, REFERENCES_FILE)
	const raw: z.infer<typeof ReferencesSchema> = fs.existsSync(referencesFile)
		? parseFile(referencesFile, ReferencesSchema)
		: {}

	return {
		name: path.basename(dir),
		dialogues,
		quests,
		references: {
			items: raw.items && new Set(raw.items),
			monsters: raw.monsters && new Set(raw.monsters),
			npcs: raw.npcs && new Set(raw.npcs),
			maps: raw.maps && new Set(raw.maps),
			characters: raw.characters && new Set(raw.characters)
		}
	}
}
