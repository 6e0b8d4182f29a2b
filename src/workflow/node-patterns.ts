import type { ExecutionContext } from '../context'
import type { NodeResult } from '../result'
import type { LeafOutcome } from '../types'
import { Node } from './Node'

/** The work of a function node. */
export type NodeFunction<T> = (context: ExecutionContext<T>) => LeafOutcome | Promise<LeafOutcome>

export interface FuncNodeHooks<T> {
	before?: (context: ExecutionContext<T>) => void | Promise<void>
	after?: (context: ExecutionContext<T>, result: NodeResult<T>) => void | Promise<void>
}

/**
 * A leaf whose work and hooks are plain functions, for nodes that need no class
 * of their own.
 */
export class FuncNode<T> extends Node<T> {
	constructor(
		private readonly work: NodeFunction<T>,
		private readonly hooks: FuncNodeHooks<T> = {},
	) {
		super()
	}

	async performExecute(context: ExecutionContext<T>): Promise<LeafOutcome> {
		return this.work(context)
	}

	override async onBeforeExecute(context: ExecutionContext<T>): Promise<void> {
		await this.hooks.before?.(context)
	}

	override async onAfterExecute(context: ExecutionContext<T>, result: NodeResult<T>): Promise<void> {
		await this.hooks.after?.(context, result)
	}
}

/**
 * Creates a named `FuncNode`.
 * @example
 * const validate = funcNode<Order>('validate', ctx => ctx.subject.lines.length > 0 ? 'Succeeded' : 'Failed')
 */
export function funcNode<T>(id: string, work: NodeFunction<T>, hooks?: FuncNodeHooks<T>): FuncNode<T> {
	return new FuncNode(work, hooks).withId(id)
}
