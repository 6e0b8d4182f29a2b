import type { Composition } from '../types'
import type { ChildVisitor } from './BaseNode'
import type { CombinationPolicy } from './policies'
import { BaseNode } from './BaseNode'
import { allowPartialSuccess } from './policies'

export interface MultiNodeOptions {
	/** Decides partial success when some children fail. Defaults to `allowPartialSuccess`. */
	policy?: CombinationPolicy
}

/**
 * A node that owns an ordered list of children of the same subject type. How the
 * children are scheduled is set by `composition`; how their statuses combine is
 * set by `policy`.
 *
 * @template T The type of the subject.
 */
export class MultiNode<T> extends BaseNode<T> {
	readonly kind = 'multi' as const
	/** Children in declaration order. */
	public readonly children: BaseNode<T>[] = []
	public policy: CombinationPolicy

	constructor(public readonly composition: Composition, options: MultiNodeOptions = {}) {
		super()
		this.policy = options.policy ?? allowPartialSuccess
	}

	addChild(node: BaseNode<T>): this {
		this.children.push(node)
		return this
	}

	addChildren(nodes: Iterable<BaseNode<T>>): this {
		for (const node of nodes)
			this.addChild(node)
		return this
	}

	withPolicy(policy: CombinationPolicy): this {
		this.policy = policy
		return this
	}

	override visitChildren(visit: ChildVisitor): void {
		for (const child of this.children)
			visit(child)
	}
}

/**
 * Runs every child, concurrently when `degreeOfParallelism` allows, and only then
 * combines their statuses. Child results keep declaration order.
 */
export class GroupNode<T> extends MultiNode<T> {
	constructor(options?: MultiNodeOptions) {
		super('group', options)
	}
}

/**
 * Runs children one after another. The first failing child stops the pipeline:
 * later children stay `NotRun` and the pipeline reports `GroupFailed`, unless
 * `continueOnFailure` is set.
 */
export class PipelineNode<T> extends MultiNode<T> {
	constructor(options?: MultiNodeOptions) {
		super('pipeline', options)
	}
}

/**
 * Runs children one after another until one succeeds. Later children stay `NotRun`.
 */
export class FirstMatchNode<T> extends MultiNode<T> {
	constructor(options?: MultiNodeOptions) {
		super('firstMatch', options)
	}
}
