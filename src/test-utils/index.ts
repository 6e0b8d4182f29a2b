import type { RunOptions } from '../types'
import { ExecutionContext } from '../context'
import { DebugLogger } from './debug-logger'

/**
 * A single, global logger instance for all tests.
 * Its behavior (console vs. null) is controlled by the `VITEST_LOGS` env var.
 */
export const globalTestLogger = new DebugLogger()

/**
 * A ready-to-use, global `RunOptions` object for tests.
 */
export const globalRunOptions: RunOptions = {
	logger: globalTestLogger,
}

/** A root context over `subject` that logs through the test logger. */
export function testContext<T>(subject: T, options: Omit<RunOptions, 'executor'> = {}): ExecutionContext<T> {
	return new ExecutionContext(subject, {
		logger: options.logger ?? globalTestLogger,
		signal: options.signal,
		globalOptions: options.options,
	})
}
