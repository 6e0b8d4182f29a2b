import type { ResolutionStack } from '../builder/types'
import type { ExecutionContext } from '../context'
import type { IExecutor } from '../executors/types'
import type { NodeResult } from '../result'
import type { NodeResultStatus } from '../types'
import type { BaseNode } from './BaseNode'
import type { MultiNode } from './MultiNode'
import type { Node } from './Node'

/**
 * What the executor and the factory need from a transition, without its
 * destination subject type. `TransitionNode` is the implementation.
 */
export interface TransitionBoundary<T> extends BaseNode<T> {
	readonly kind: 'transition'
	/**
	 * Maps the subject across, runs the child over a linked context, attaches the
	 * child's errors to `result`, maps back, and returns the child's status.
	 * @internal
	 */
	crossBoundary: (context: ExecutionContext<T>, result: NodeResult<T>, executor: IExecutor) => Promise<NodeResultStatus>
	/**
	 * Builds the child from a referenced flow when none is attached yet.
	 * @param stack The flows being resolved by the caller, for cycle detection.
	 */
	resolveChild: (stack: ResolutionStack) => void
}

export function isLeafNode<T>(node: BaseNode<T>): node is Node<T> {
	return node.kind === 'leaf'
}

export function isMultiNode<T>(node: BaseNode<T>): node is MultiNode<T> {
	return node.kind === 'multi'
}

export function isTransitionNode<T>(node: BaseNode<T>): node is TransitionBoundary<T> {
	return node.kind === 'transition'
}
