export enum LogLevel {
	Debug = 0,
	Info = 1,
	Warn = 2,
	Error = 3,
	None = 4
}

export interface Logger {
	log(...args: unknown[]): void
	info(...args: unknown[]): void
	warn(...args: unknown[]): void
	error(...args: unknown[]): void
	debug(...args: unknown[]): void
}

export type LogRecordLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogRecord {
	manager: string
	level: LogRecordLevel
	message: string
	args: unknown[]
	timestamp: number
}

export type LogSink = (record: LogRecord) => void

export interface LoggerConfig {
	enabled: boolean
	level: LogLevel
}

const LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.None>, LogRecordLevel> = {
	[LogLevel.Debug]: 'debug',
	[LogLevel.Info]: 'info',
	[LogLevel.Warn]: 'warn',
	[LogLevel.Error]: 'error'
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
	switch (value?.trim().toLowerCase()) {
		case 'debug': return LogLevel.Debug
		case 'info': return LogLevel.Info
		case 'warn': return LogLevel.Warn
		case 'error': return LogLevel.Error
		case 'none': return LogLevel.None
		default: return fallback
	}
}

export class LogsManager {
	private loggers = new Map<string, Logger>()
	private configs = new Map<string, LoggerConfig>()
	private globalLevel: LogLevel
	private globalEnabled: boolean = true
	private sink: LogSink | null = null
	private echo: boolean = true

	constructor(globalLevel: LogLevel = LogLevel.Info) {
		this.globalLevel = globalLevel
	}

	/**
	 * Get a logger instance for a manager
	 * The logger is bound to the manager name and automatically prefixes all logs
	 * @param managerName Name of the manager (e.g., 'DialogueManager', 'QuestManager')
	 */
	public getLogger(managerName: string): Logger {
		const existing = this.loggers.get(managerName)
		if (existing) {
			return existing
		}

		const logger: Logger = {
			log: (...args: unknown[]) => this.log(managerName, LogLevel.Info, args),
			info: (...args: unknown[]) => this.log(managerName, LogLevel.Info, args),
			warn: (...args: unknown[]) => this.log(managerName, LogLevel.Warn, args),
			error: (...args: unknown[]) => this.log(managerName, LogLevel.Error, args),
			debug: (...args: unknown[]) => this.log(managerName, LogLevel.Debug, args),
		}

		this.loggers.set(managerName, logger)

		// Enabled by default, follows the global level until overridden
		if (!this.configs.has(managerName)) {
			this.configs.set(managerName, {
				enabled: true,
				level: this.globalLevel
			})
		}

		return logger
	}

	/**
	 * Route every record that passes the level filter to `sink` as well.
	 * With `echo` false the console is skipped entirely.
	 */
	public setSink(sink: LogSink | null, echo: boolean = true): void {
		this.sink = sink
		this.echo = echo
	}

	private log(managerName: string, level: Exclude<LogLevel, LogLevel.None>, args: unknown[]): void {
		if (!this.globalEnabled) {
			return
		}

		const config = this.configs.get(managerName) || {
			enabled: true,
			level: this.globalLevel
		}

		if (!config.enabled || level < config.level) {
			return
		}

		if (this.sink) {
			const [first, ...rest] = args
			this.sink({
				manager: managerName,
				level: LEVEL_NAMES[level],
				message: typeof first === 'string' ? first : String(first),
				args: rest,
				timestamp: Date.now()
			})
		}

		if (!this.echo) {
			return
		}

		const formattedArgs = [`[${managerName}]`, ...args]

		switch (level) {
			case LogLevel.Debug:
				console.debug(...formattedArgs)
				break
			case LogLevel.Info:
				console.log(...formattedArgs)
				break
			case LogLevel.Warn:
				console.warn(...formattedArgs)
				break
			case LogLevel.Error:
				console.error(...formattedArgs)
				break
		}
	}

	public setManagerEnabled(managerName: string, enabled: boolean): void {
		const config = this.configs.get(managerName) || {
			enabled: true,
			level: this.globalLevel
		}
		config.enabled = enabled
		this.configs.set(managerName, config)
	}

	public setManagerLevel(managerName: string, level: LogLevel): void {
		const config = this.configs.get(managerName) || {
			enabled: true,
			level: this.globalLevel
		}
		config.level = level
		this.configs.set(managerName, config)
	}

	public setGlobalEnabled(enabled: boolean): void {
		this.globalEnabled = enabled
	}

	/**
	 * Set global log level (applies to all managers that still follow the previous global level)
	 */
	public setGlobalLevel(level: LogLevel): void {
		const previous = this.globalLevel
		this.globalLevel = level
		for (const config of this.configs.values()) {
			if (config.level === previous) {
				config.level = level
			}
		}
	}

	public getManagerConfig(managerName: string): LoggerConfig | null {
		return this.configs.get(managerName) || null
	}

	public setManagersLevel(managerNames: string[], level: LogLevel): void {
		for (const managerName of managerNames) {
			this.setManagerLevel(managerName, level)
		}
	}
}

/**
 * Logger that drops everything. Used where a caller supplies no logger.
 */
export const silentLogger: Logger = {
	log: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
	debug: () => undefined
}
