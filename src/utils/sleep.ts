import { AbortError } from '../errors'

/**
 * Pauses for `ms` milliseconds. Rejects with an `AbortError` as soon as `signal`
 * aborts, or straight away if it already has. Leaf work that waits should use
 * this so cancellation reaches it.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted)
			return reject(new AbortError())

		const onAbort = () => {
			clearTimeout(timeoutId)
			reject(new AbortError())
		}
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort)
			resolve()
		}, ms)
		signal?.addEventListener('abort', onAbort, { once: true })
	})
}
