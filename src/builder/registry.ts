import type { BaseNode } from '../workflow/BaseNode'
import type { FlowReference, FlowRegistry, NodeCreator, NodeRegistry } from './types'
import { DuplicateRegistrationError } from '../errors'

function describeRegistration(type: string, name?: string): string {
	return name === undefined ? type : `${type}:${name}`
}

/**
 * A `NodeRegistry` backed by a `Map` of creators. Every `resolve` calls the
 * creator again, so each built tree owns its nodes.
 *
 * @example
 * const nodes = new InMemoryNodeRegistry<Order>()
 *   .register('validate', () => new ValidateOrder())
 *   .register('notify', () => new SendEmail(), 'email')
 */
export class InMemoryNodeRegistry<T> implements NodeRegistry<T> {
	/** Creators by type, then by name; `undefined` holds the default. */
	private readonly creators = new Map<string, Map<string | undefined, NodeCreator<T>>>()

	/**
	 * @param name Registers a named variant; without it, the default for `type`.
	 * @throws {DuplicateRegistrationError} If `(type, name)` is already taken.
	 */
	register(type: string, create: NodeCreator<T>, name?: string): this {
		let variants = this.creators.get(type)
		if (!variants) {
			variants = new Map()
			this.creators.set(type, variants)
		}
		if (variants.has(name))
			throw new DuplicateRegistrationError(describeRegistration(type, name))

		variants.set(name, create)
		return this
	}

	resolve(type: string, name?: string): BaseNode<T> | undefined {
		return this.creators.get(type)?.get(name)?.()
	}

	has(type: string, name?: string): boolean {
		return this.creators.get(type)?.has(name) ?? false
	}

	get size(): number {
		let size = 0
		for (const variants of this.creators.values())
			size += variants.size
		return size
	}
}

/** A `FlowRegistry` backed by a `Map`, keyed by flow name. */
export class InMemoryFlowRegistry<T> implements FlowRegistry<T> {
	private readonly flows = new Map<string, FlowReference<T>>()

	/**
	 * @throws {DuplicateRegistrationError} If a flow of the same name exists.
	 */
	register(flow: FlowReference<T>): this {
		if (this.flows.has(flow.name))
			throw new DuplicateRegistrationError(flow.name)

		this.flows.set(flow.name, flow)
		return this
	}

	get(name: string): FlowReference<T> | undefined {
		return this.flows.get(name)
	}

	has(name: string): boolean {
		return this.flows.has(name)
	}

	names(): string[] {
		return [...this.flows.keys()]
	}
}
