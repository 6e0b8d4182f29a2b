import type { ExecutionContext } from '../context'
import type { LeafOutcome } from '../types'
import type { BaseNode } from '../workflow/BaseNode'
import type { MultiNode } from '../workflow/MultiNode'
import type { IExecutor } from './types'
import { AbortError, combineErrors, NodeExecutionError, NodeStateError, toError } from '../errors'
import { NodeResult } from '../result'
import { NodeResultStatus } from '../types'
import { mapInBatches } from '../utils/batch'
import { isLeafNode, isMultiNode, isTransitionNode } from '../workflow/guards'
import { combineChildStatuses } from '../workflow/policies'

/**
 * The default executor. Runs a node tree within the current process, dispatching
 * on each node's `kind`: leaves run their own work, multi-nodes fan out to their
 * children, transitions cross into a sub-tree of another subject type.
 */
export class InMemoryExecutor implements IExecutor {
	public async execute<T>(node: BaseNode<T>, context: ExecutionContext<T>, entry = false): Promise<NodeResult<T>> {
		const { logger } = context
		const result = new NodeResult<T>(node.name, context.subject)
		if (entry)
			context.bindResult(result)

		if (node.running || node.status !== NodeResultStatus.NotRun) {
			const error = new NodeStateError(node.name, node.status, node.running)
			logger.error(error.message)
			result.status = NodeResultStatus.Failed
			result.errors.push(error)
			result.exception = error
			return result
		}

		node.running = true
		result.startedAt = new Date()
		try {
			context.throwIfCancelled()
			if (await this.shouldRun(node, context)) {
				logger.debug(`Running ${node.kind} node '${node.name}'.`)
				await node.onBeforeExecute(context)
				result.status = await this.dispatch(node, context, result)
				await node.onAfterExecute(context, result)
			}
			else {
				logger.debug(`Skipping node '${node.name}': predicate returned false.`)
				result.status = NodeResultStatus.NotRun
			}
		}
		catch (e) {
			const error = toError(e, node.name)
			result.errors.push(error)
			result.status = isMultiNode(node) && !(error instanceof AbortError)
				? NodeResultStatus.SingleNodeFailed
				: NodeResultStatus.Failed
			logger.warn(`Node '${node.name}' failed: ${error.message}`, { error })
		}
		finally {
			node.running = false
		}

		result.subject = context.subject
		result.completedAt = new Date()
		const failures = result.getFailExceptions()
		result.exception = combineErrors(failures, `Node '${node.name}' finished with ${failures.length} errors.`)

		node.status = result.status
		node.lastResult = result
		logger.debug(`Node '${node.name}' finished with status '${result.status}'.`)
		return result
	}

	private async shouldRun<T>(node: BaseNode<T>, context: ExecutionContext<T>): Promise<boolean> {
		if (node.shouldExecuteAsync)
			return node.shouldExecuteAsync(context)
		if (node.shouldExecute)
			return node.shouldExecute(context)
		return true
	}

	private async dispatch<T>(node: BaseNode<T>, context: ExecutionContext<T>, result: NodeResult<T>): Promise<NodeResultStatus> {
		if (isLeafNode(node))
			return leafStatus(await node.performExecute(context), result)
		if (isMultiNode(node))
			return this.runChildren(node, context, result)
		if (isTransitionNode(node))
			return node.crossBoundary(context, result, this)

		throw new NodeExecutionError(`Node '${node.name}' has an unsupported kind '${node.kind}'.`, node.name)
	}

	private async runChildren<T>(node: MultiNode<T>, context: ExecutionContext<T>, result: NodeResult<T>): Promise<NodeResultStatus> {
		const options = context.resolveOptions(node.localOptions)
		const children = [...node.children]

		if (node.composition === 'group') {
			const childResults = await mapInBatches(children, options.degreeOfParallelism, child => this.execute(child, context))
			result.children.push(...childResults)
			return combineChildStatuses(childResults.map(r => r.status), node.policy)
		}

		const stopOn = node.composition === 'pipeline'
			? (r: NodeResult<T>) => r.isFailure && !options.continueOnFailure
			: (r: NodeResult<T>) => r.isSuccess
		const { results, stopped } = await this.runSequentially(children, context, stopOn)
		result.children.push(...results)

		// Cancellation between children stops the sequence; the rest stay NotRun.
		context.throwIfCancelled()

		if (stopped)
			return node.composition === 'pipeline' ? NodeResultStatus.GroupFailed : NodeResultStatus.Succeeded

		return combineChildStatuses(results.map(r => r.status), node.policy)
	}

	private async runSequentially<T>(
		children: readonly BaseNode<T>[],
		context: ExecutionContext<T>,
		stopOn: (result: NodeResult<T>) => boolean,
	): Promise<{ results: NodeResult<T>[], stopped: boolean }> {
		const results: NodeResult<T>[] = []
		let stopped = false

		for (const child of children) {
			if (stopped || context.isCancelled) {
				results.push(NodeResult.notRun(child.name, context.subject))
				continue
			}
			const childResult = await this.execute(child, context)
			results.push(childResult)
			if (stopOn(childResult)) {
				context.logger.debug(`Stopping after child '${child.name}' with status '${childResult.status}'.`)
				stopped = true
			}
		}

		return { results, stopped }
	}
}

function leafStatus<T>(outcome: LeafOutcome, result: NodeResult<T>): NodeResultStatus {
	if (outcome instanceof Error) {
		result.errors.push(outcome)
		return NodeResultStatus.Failed
	}
	return outcome === NodeResultStatus.Failed ? NodeResultStatus.Failed : NodeResultStatus.Succeeded
}

/** The executor used when `execute()` is not handed one. */
export const defaultExecutor: IExecutor = new InMemoryExecutor()
