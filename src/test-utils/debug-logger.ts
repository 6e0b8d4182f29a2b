import type { Logger, LogLevel } from '../logger'
import process from 'node:process'
import { ConsoleLogger, isLogLevel, NullLogger } from '../logger'

/** Reads `VITEST_LOGS`: `true` logs everything, a level name logs from that level up. */
function levelFromEnv(value: string | undefined): LogLevel | undefined {
	if (value === 'true')
		return 'debug'
	return isLogLevel(value) ? value : undefined
}

/**
 * The logger handed to nodes in tests. Silent unless `VITEST_LOGS` asks for
 * console output, so engine diagnostics can be switched on per run:
 *
 *   VITEST_LOGS=true npm test
 *   VITEST_LOGS=warn npm test
 */
export class DebugLogger implements Logger {
	private readonly target: Logger

	constructor(setting = process.env.VITEST_LOGS) {
		const level = levelFromEnv(setting)
		this.target = level ? new ConsoleLogger({ level }) : new NullLogger()
	}

	debug(message: string, context?: object) { this.target.debug(message, context) }
	info(message: string, context?: object) { this.target.info(message, context) }
	warn(message: string, context?: object) { this.target.warn(message, context) }
	error(message: string, context?: object) { this.target.error(message, context) }
}
