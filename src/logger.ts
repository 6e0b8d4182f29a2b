/**
 * The logging contract used by the engine. Adapt any logging library (pino,
 * winston, the console) by implementing these four methods.
 */
export interface Logger {
	debug: (message: string, context?: object) => void
	info: (message: string, context?: object) => void
	warn: (message: string, context?: object) => void
	error: (message: string, context?: object) => void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Drops every message. Used whenever no logger is supplied, so the engine is
 * silent unless asked otherwise.
 */
export class NullLogger implements Logger {
	debug() { /* no-op */ }
	info() { /* no-op */ }
	warn() { /* no-op */ }
	error() { /* no-op */ }
}

/**
 * Writes to the matching `console` method, skipping anything below `level`.
 */
export class ConsoleLogger implements Logger {
	private readonly minLevel: LogLevel

	/**
	 * @param options.level The lowest level that gets written. Defaults to `'info'`.
	 */
	constructor(options: { level?: LogLevel } = {}) {
		this.minLevel = options.level ?? 'info'
	}

	private write(level: LogLevel, message: string, context?: object) {
		if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel))
			return

		const line = `[${level.toUpperCase()}] ${message}`
		if (context && Object.keys(context).length > 0)
			console[level](line, context)
		else
			console[level](line)
	}

	debug(message: string, context?: object) { this.write('debug', message, context) }
	info(message: string, context?: object) { this.write('info', message, context) }
	warn(message: string, context?: object) { this.write('warn', message, context) }
	error(message: string, context?: object) { this.write('error', message, context) }
}

/**
 * Returns a logger that prefixes every message with `[scope]`. A `NullLogger`
 * is returned unchanged.
 */
export function withScope(logger: Logger, scope: string): Logger {
	if (logger instanceof NullLogger)
		return logger

	return {
		debug: (message, context) => logger.debug(`[${scope}] ${message}`, context),
		info: (message, context) => logger.info(`[${scope}] ${message}`, context),
		warn: (message, context) => logger.warn(`[${scope}] ${message}`, context),
		error: (message, context) => logger.error(`[${scope}] ${message}`, context),
	}
}
