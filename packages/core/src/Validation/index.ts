import { DialogueStore } from '../Dialogue/DialogueStore'
import type { DialogueTree } from '../Dialogue/types'
import type { QuestId } from '../ids'
import { QuestStore } from '../Quest/QuestStore'
import type { QuestTree } from '../Quest/types'
import { checkDialogues } from './dialogues'
import { Findings } from './Findings'
import { checkQuests } from './quests'
import type { CheckContext } from './references'
import type { ValidateOptions, ValidationFinding, ValidationSummary } from './types'

export * from './types'

/**
 * Stores are accepted as well as raw records, so data a store refused to load
 * can still be diagnosed.
 */
export type DialogueSource = DialogueStore | readonly DialogueTree[]
export type QuestSource = QuestStore | readonly QuestTree[]

function dialogueList(source: DialogueSource): readonly DialogueTree[] {
	return source instanceof DialogueStore ? source.listTrees() : source
}

function questList(source: QuestSource): readonly QuestTree[] {
	return source instanceof QuestStore ? source.listQuests() : source
}

/**
 * Static checks over a campaign's dialogues and quests. Reads its inputs and
 * nothing else; findings come back in dialogue order, then quest order.
 */
export function validate(
	dialogues: DialogueSource,
	quests: QuestSource,
	options: ValidateOptions = {}
): ValidationFinding[] {
	const questRecords = questList(quests)
	const questIndex = new Map<QuestId, QuestTree>()
	for (const quest of questRecords) {
		if (!questIndex.has(quest.id)) {
			questIndex.set(quest.id, quest)
		}
	}

	const context: CheckContext = {
		findings: new Findings(),
		quests: questIndex,
		references: options.references ?? {},
		initialState: options.initialState
	}

	checkDialogues(context, dialogueList(dialogues))
	checkQuests(context, questRecords)

	return context.findings.list
}

export function hasErrors(findings: readonly ValidationFinding[]): boolean {
	return findings.some(finding => finding.severity === 'Error')
}

export function summarize(findings: readonly ValidationFinding[]): ValidationSummary {
	let errors = 0
	let warnings = 0
	for (const finding of findings) {
		if (finding.severity === 'Error') errors++
		else warnings++
	}
	return { errors, warnings }
}
