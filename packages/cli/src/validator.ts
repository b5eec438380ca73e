import path from 'path'
import { LogsManager, summarize, validate } from '@lorebook/core'
import type { ValidationFinding } from '@lorebook/core'
import type { ValidatorConfig } from './config'
import { CampaignLoadError, loadCampaign } from './content'
import { formatFinding, formatSummary } from './report'

export const ExitCode = {
	Ok: 0,
	Invalid: 1,
	Unreadable: 2
} as const

export type ExitCode = typeof ExitCode[keyof typeof ExitCode]

export type OutputLine = (line: string) => void

/**
 * Validates one campaign and writes a line per finding followed by a summary.
 */
export function runValidator(config: ValidatorConfig, out: OutputLine): ExitCode {
	const logs = new LogsManager(config.logLevel)
	const logger = logs.getLogger('CampaignValidator')
	const dir = path.resolve(config.contentDir, config.campaign)

	let findings: ValidationFinding[]
	try {
		const campaign = loadCampaign(dir)
		logger.debug(`Read ${campaign.dialogues.length} dialogues and ${campaign.quests.length} quests from ${dir}`)
		findings = validate(campaign.dialogues, campaign.quests, { references: campaign.references })
	} catch (error) {
		if (error instanceof CampaignLoadError) {
			out(`Cannot read campaign "${config.campaign}" (${error.file}):`)
			for (const issue of error.issues) {
				out(`  ${issue}`)
			}
			return ExitCode.Unreadable
		}
		throw error
	}

	for (const finding of findings) {
		out(formatFinding(finding))
	}

	const summary = summarize(findings)
	out(formatSummary(config.campaign, summary))

	if (summary.errors > 0 || (config.failOnWarnings && summary.warnings > 0)) {
		logger.warn(`Campaign "${config.campaign}" failed validation`)
		return ExitCode.Invalid
	}
	return ExitCode.Ok
}
