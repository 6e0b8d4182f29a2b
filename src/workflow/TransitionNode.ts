import type { NodeFactory } from '../builder/node-factory'
import type { ResolutionStack } from '../builder/types'
import type { ExecutionContext } from '../context'
import type { IExecutor } from '../executors/types'
import type { NodeResult } from '../result'
import type { ChildVisitor } from './BaseNode'
import type { TransitionBoundary } from './guards'
import { FlowDefinitionError } from '../errors'
import { NodeResultStatus } from '../types'
import { BaseNode } from './BaseNode'

/**
 * Maps a subject across a transition and back.
 *
 * @template TSource The subject type on the calling side.
 * @template TDestination The subject type the child runs over.
 */
export interface SubjectTransition<TSource, TDestination> {
	/** Builds the destination subject from the source context. */
	toDestination: (context: ExecutionContext<TSource>) => TDestination | Promise<TDestination>
	/**
	 * Builds the source subject once the child finished. When omitted, the current
	 * source subject is kept.
	 */
	toSource?: (context: ExecutionContext<TSource>, result: NodeResult<TDestination>) => TSource | Promise<TSource>
}

export interface TransitionNodeOptions<TDestination> {
	/** A ready child. Takes precedence over `childFlow`. */
	childNode?: BaseNode<TDestination>
	/**
	 * A flow of the destination type, built through `nodeFactory` when a factory
	 * resolves the transition, or on the first run otherwise.
	 */
	childFlow?: string
	nodeFactory?: NodeFactory<TDestination>
}

/**
 * Bridges two sub-trees over different subject types. The child runs in its own
 * context, linked to the caller's, sharing its global options, signal and logger.
 * Whatever the child raised is attached to this node's own result, not to the
 * caller's `parentResult`; the entry result gathers it through
 * `getFailExceptions()` once it completes. Nothing thrown on the destination side
 * crosses back as an exception.
 *
 * @example
 * const toInvoice = new TransitionNode<Order, Invoice>(
 *   {
 *     toDestination: ctx => ({ orderId: ctx.subject.id, lines: [] }),
 *     toSource: (ctx, result) => ({ ...ctx.subject, invoiced: result.isSuccess }),
 *   },
 *   { childNode: new PipelineNode<Invoice>().addChildren([price, issue]) },
 * )
 */
export class TransitionNode<TSource, TDestination> extends BaseNode<TSource> implements TransitionBoundary<TSource> {
	readonly kind = 'transition' as const
	public childNode?: BaseNode<TDestination>
	public readonly childFlow?: string
	public readonly nodeFactory?: NodeFactory<TDestination>

	constructor(
		private readonly transition: SubjectTransition<TSource, TDestination>,
		options: TransitionNodeOptions<TDestination> = {},
	) {
		super()
		if (options.childFlow !== undefined && !options.nodeFactory && !options.childNode)
			throw new FlowDefinitionError(options.childFlow, 'a transition to a flow needs a node factory for the destination type')

		this.childNode = options.childNode
		this.childFlow = options.childFlow
		this.nodeFactory = options.nodeFactory
	}

	/** Attaches the child, replacing any child or flow reference resolved before. */
	setChild(node: BaseNode<TDestination>): this {
		this.childNode = node
		return this
	}

	resolveChild(stack: ResolutionStack = []): void {
		if (this.childNode || this.childFlow === undefined || !this.nodeFactory)
			return

		this.childNode = this.nodeFactory.buildFlow(this.childFlow, stack)
	}

	override visitChildren(visit: ChildVisitor): void {
		if (this.childNode)
			visit(this.childNode)
	}

	async crossBoundary(context: ExecutionContext<TSource>, result: NodeResult<TSource>, executor: IExecutor): Promise<NodeResultStatus> {
		this.resolveChild()

		const child = this.childNode
		if (!child) {
			context.logger.warn(`Transition '${this.name}' has no child node. Nothing was run.`)
			return NodeResultStatus.NotRun
		}

		const destination = await this.transition.toDestination(context)
		const destinationContext = context.createChild(destination)
		const destinationResult = await executor.execute(child, destinationContext, true)

		result.destination = destinationResult
		const failures = destinationResult.getFailExceptions()
		if (failures.length > 0) {
			context.logger.debug(`Transition '${this.name}' attached ${failures.length} error(s) from '${child.name}'.`)
			result.errors.push(...failures)
		}

		const source = this.transition.toSource
			? await this.transition.toSource(context, destinationResult)
			: context.subject
		if (!Object.is(source, context.subject))
			context.changeSubject(source)

		return destinationResult.status
	}
}
