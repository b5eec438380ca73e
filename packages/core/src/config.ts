import { LogLevel } from './Logs'

export interface NarrativeConfig {
	/** Level every manager logs at unless overridden */
	logLevel: LogLevel
	/** Per-manager overrides, keyed by manager name (e.g. 'QuestManager') */
	managerLevels: Record<string, LogLevel>
}

export const DEFAULT_CONFIG: Readonly<NarrativeConfig> = {
	logLevel: LogLevel.Warn,
	managerLevels: {}
}

export function resolveConfig(partial: Partial<NarrativeConfig> = {}): NarrativeConfig {
	return {
		logLevel: partial.logLevel ?? DEFAULT_CONFIG.logLevel,
		managerLevels: { ...DEFAULT_CONFIG.managerLevels, ...partial.managerLevels }
	}
}
