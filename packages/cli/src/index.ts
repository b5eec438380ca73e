#!/usr/bin/env node
import dotenv from 'dotenv'
import { loadConfig } from './config'
import { runValidator } from './validator'

export { loadConfig } from './config'
export type { ValidatorConfig } from './config'
export { CampaignLoadError, loadCampaign } from './content'
export type { Campaign } from './content'
export { formatFinding, formatSummary } from './report'
export { ExitCode, runValidator } from './validator'

export function main(argv: readonly string[]): number {
	dotenv.config()
	const config = loadConfig(argv, process.env)
	return runValidator(config, line => console.log(line))
}

if (require.main === module) {
	process.exitCode = main(process.argv.slice(2))
}
