import { LogLevel, parseLogLevel } from '@lorebook/core'

export interface ValidatorConfig {
	contentDir: string
	campaign: string
	logLevel: LogLevel
	failOnWarnings: boolean
}

const DEFAULT_CONTENT_DIR = 'content'
const DEFAULT_CAMPAIGN = 'tutorial'

function parseFlag(value: string | undefined): boolean {
	return ['1', 'true', 'yes'].includes(value?.trim().toLowerCase() ?? '')
}

/**
 * Environment first, then command-line arguments: the first positional
 * argument names the campaign and `--fail-on-warnings` turns warnings into
 * failures.
 */
export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv): ValidatorConfig {
	const positional = argv.filter(arg => !arg.startsWith('--'))

	return {
		contentDir: env.LOREBOOK_CONTENT_DIR || DEFAULT_CONTENT_DIR,
		campaign: positional[0] || env.LOREBOOK_CAMPAIGN || DEFAULT_CAMPAIGN,
		logLevel: parseLogLevel(env.LOREBOOK_LOG_LEVEL, LogLevel.Warn),
		failOnWarnings: argv.includes('--fail-on-warnings') || parseFlag(env.LOREBOOK_FAIL_ON_WARNINGS)
	}
}
