/**
 * Maps every item through `task`, running at most `concurrency` tasks at a time.
 * Items are taken in slices; the next slice starts once the whole previous one
 * settled. A `concurrency` of `0` or less runs everything in a single slice.
 * Results keep the order of `items`, whatever the completion order.
 */
export async function mapInBatches<TItem, TResult>(
	items: readonly TItem[],
	concurrency: number,
	task: (item: TItem, index: number) => Promise<TResult>,
): Promise<TResult[]> {
	const size = concurrency > 0 ? concurrency : items.length
	const results: TResult[] = []

	for (let i = 0; i < items.length; i += size) {
		const batch = items.slice(i, i + size)
		const settled = await Promise.all(batch.map((item, offset) => task(item, i + offset)))
		results.push(...settled)
	}

	return results
}
