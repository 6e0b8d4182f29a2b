/**
 * A value held in a `StateBag`, tagged with its kind. A missing key reads as
 * `{ kind: 'empty' }` instead of raising.
 */
export type StateValue =
	| { kind: 'empty' }
	| { kind: 'string', value: string }
	| { kind: 'number', value: number }
	| { kind: 'boolean', value: boolean }
	| { kind: 'date', value: Date }
	| { kind: 'object', value: object }

/** Anything `StateBag.set` accepts. `null` and `undefined` clear the key. */
export type StateInput = string | number | boolean | Date | object | null | undefined

export const EMPTY_STATE: StateValue = Object.freeze({ kind: 'empty' })

/** Tags a raw value. */
export function toStateValue(input: StateInput): StateValue {
	if (input === null || input === undefined)
		return EMPTY_STATE
	if (typeof input === 'string')
		return { kind: 'string', value: input }
	if (typeof input === 'number')
		return { kind: 'number', value: input }
	if (typeof input === 'boolean')
		return { kind: 'boolean', value: input }
	if (input instanceof Date)
		return { kind: 'date', value: input }
	return { kind: 'object', value: input }
}

/**
 * Open-ended key/value store shared by every node that holds the same execution
 * context. Nodes use it to pass signals to later siblings without declaring a
 * schema up front.
 *
 * The bag does no locking. Parallel siblings of a group should not write the
 * same key.
 */
export class StateBag {
	private readonly values = new Map<string, StateValue>()

	constructor(initial: Record<string, StateInput> = {}) {
		for (const [key, value] of Object.entries(initial))
			this.set(key, value)
	}

	/** Stores a value. Setting `null` or `undefined` removes the key. */
	set(key: string, value: StateInput): this {
		const tagged = toStateValue(value)
		if (tagged.kind === 'empty')
			this.values.delete(key)
		else
			this.values.set(key, tagged)
		return this
	}

	/** Returns the tagged value, or the `empty` value when the key is absent. */
	get(key: string): StateValue {
		return this.values.get(key) ?? EMPTY_STATE
	}

	/** Returns the raw value, or `undefined` when the key is absent. */
	getValue(key: string): unknown {
		const entry = this.get(key)
		return entry.kind === 'empty' ? undefined : entry.value
	}

	getString(key: string): string | undefined {
		const entry = this.get(key)
		return entry.kind === 'string' ? entry.value : undefined
	}

	getNumber(key: string): number | undefined {
		const entry = this.get(key)
		return entry.kind === 'number' ? entry.value : undefined
	}

	getBoolean(key: string): boolean | undefined {
		const entry = this.get(key)
		return entry.kind === 'boolean' ? entry.value : undefined
	}

	getDate(key: string): Date | undefined {
		const entry = this.get(key)
		return entry.kind === 'date' ? entry.value : undefined
	}

	getObject(key: string): object | undefined {
		const entry = this.get(key)
		return entry.kind === 'object' ? entry.value : undefined
	}

	/**
	 * Returns the stored value when its kind matches the fallback's, otherwise the fallback.
	 */
	getOrDefault(key: string, fallback: string): string
	getOrDefault(key: string, fallback: number): number
	getOrDefault(key: string, fallback: boolean): boolean
	getOrDefault(key: string, fallback: string | number | boolean): string | number | boolean {
		const entry = this.get(key)
		if ((entry.kind === 'string' || entry.kind === 'number' || entry.kind === 'boolean') && typeof entry.value === typeof fallback)
			return entry.value
		return fallback
	}

	has(key: string): boolean {
		return this.values.has(key)
	}

	delete(key: string): boolean {
		return this.values.delete(key)
	}

	keys(): string[] {
		return Array.from(this.values.keys())
	}

	get size(): number {
		return this.values.size
	}

	/** Plain-object snapshot of the raw values. */
	toJSON(): Record<string, unknown> {
		const snapshot: Record<string, unknown> = {}
		for (const [key, entry] of this.values) {
			if (entry.kind !== 'empty')
				snapshot[key] = entry.value
		}
		return snapshot
	}
}
