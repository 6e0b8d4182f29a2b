import { describe, expect, it } from 'vitest'
import { AbortError } from '../errors'
import { mapInBatches } from './batch'
import { sleep } from './sleep'

describe('mapInBatches', () => {
	it('should start a slice only after the previous one settled', async () => {
		const events: string[] = []
		const results = await mapInBatches([30, 10, 20], 2, async (ms, index) => {
			events.push(`start ${index}`)
			await sleep(ms)
			events.push(`end ${index}`)
			return ms * 2
		})

		expect(results).toEqual([60, 20, 40])
		expect(events).toEqual(['start 0', 'start 1', 'end 1', 'end 0', 'start 2', 'end 2'])
	})

	it('should run everything at once when concurrency is 0', async () => {
		const events: string[] = []
		await mapInBatches(['a', 'b', 'c'], 0, async (item) => {
			events.push(`start ${item}`)
			await sleep(1)
		})
		expect(events).toEqual(['start a', 'start b', 'start c'])
	})

	it('should handle an empty list', async () => {
		expect(await mapInBatches([], 3, async () => 1)).toEqual([])
	})
})

describe('sleep', () => {
	it('should reject straight away when the signal is already aborted', async () => {
		const controller = new AbortController()
		controller.abort()
		await expect(sleep(1000, controller.signal)).rejects.toThrow(AbortError)
	})

	it('should reject once the signal aborts', async () => {
		const controller = new AbortController()
		const pending = sleep(1000, controller.signal)
		controller.abort()
		await expect(pending).rejects.toThrow('Execution was aborted.')
	})

	it('should resolve after the delay', async () => {
		await expect(sleep(1)).resolves.toBeUndefined()
	})
})
