import type { ExecutionContext } from '../context'
import type { LeafOutcome } from '../types'
import { BaseNode } from './BaseNode'

/**
 * The atomic unit of work. Subclasses implement `performExecute`; the executor
 * wraps it with the predicate check and the before/after hooks.
 *
 * @example
 * class ChargeCard extends Node<Order> {
 *   async performExecute(ctx: ExecutionContext<Order>) {
 *     await payments.charge(ctx.subject.total, { signal: ctx.signal })
 *     ctx.state.set('charged', true)
 *   }
 * }
 *
 * @template T The type of the subject.
 */
export abstract class Node<T> extends BaseNode<T> {
	readonly kind = 'leaf' as const

	/**
	 * (Lifecycle) The node's own work. Return nothing or `'Succeeded'` on success;
	 * return `'Failed'`, or return or throw an `Error`, on failure.
	 */
	abstract performExecute(context: ExecutionContext<T>): Promise<LeafOutcome>
}
