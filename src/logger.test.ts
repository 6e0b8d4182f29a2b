import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConsoleLogger, isLogLevel, NullLogger, withScope } from './logger'

describe('ConsoleLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('should write at or above its level with a level prefix', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		const logger = new ConsoleLogger()

		logger.info('flow built')
		logger.debug('hidden')

		expect(info).toHaveBeenCalledWith('[INFO] flow built')
		expect(debug).not.toHaveBeenCalled()
	})

	it('should pass a non-empty context along', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		const logger = new ConsoleLogger({ level: 'debug' })

		logger.warn('node failed', { node: 'charge' })
		logger.warn('no context', {})

		expect(warn).toHaveBeenNthCalledWith(1, '[WARN] node failed', { node: 'charge' })
		expect(warn).toHaveBeenNthCalledWith(2, '[WARN] no context')
	})
})

describe('withScope', () => {
	it('should prefix every message with the scope', () => {
		const target = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
		const scoped = withScope(target, 'NodeFactory')

		scoped.error('broken', { flow: 'main' })

		expect(target.error).toHaveBeenCalledWith('[NodeFactory] broken', { flow: 'main' })
	})

	it('should return a NullLogger unchanged', () => {
		const silent = new NullLogger()
		expect(withScope(silent, 'anything')).toBe(silent)
	})
})

describe('isLogLevel', () => {
	it('should accept only known levels', () => {
		expect(isLogLevel('warn')).toBe(true)
		expect(isLogLevel('trace')).toBe(false)
		expect(isLogLevel(3)).toBe(false)
	})
})
