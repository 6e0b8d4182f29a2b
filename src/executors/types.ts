import type { ExecutionContext } from '../context'
import type { NodeResult } from '../result'
import type { BaseNode } from '../workflow/BaseNode'

/**
 * Defines the contract for an execution engine. An executor takes one node of any
 * kind and runs it, and everything beneath it, over a context.
 */
export interface IExecutor {
	/**
	 * Runs `node` over `context` and reports the outcome. Failures of the node's
	 * own work are captured in the result, never thrown.
	 * @param entry `true` when `node` is the first node run with `context`; its
	 * result then becomes the context's `parentResult`.
	 */
	execute: <T>(node: BaseNode<T>, context: ExecutionContext<T>, entry?: boolean) => Promise<NodeResult<T>>
}
