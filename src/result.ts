import { isFailureStatus, isSuccessStatus, NodeResultStatus } from './types'

/**
 * The outcome of one node execution. Multi-nodes hold one child result per
 * declared child, in declaration order; children that never ran are present
 * with status `NotRun`.
 *
 * @template T The type of the subject the node ran over.
 */
export class NodeResult<T> {
	public status: NodeResultStatus = NodeResultStatus.NotRun
	/** Errors raised by this node itself or attached to it (e.g. by a transition). */
	public readonly errors: Error[] = []
	/**
	 * Summary exception: the node's own error, or the single error beneath it, or
	 * an `AggregateError` holding each original error.
	 */
	public exception?: Error
	public readonly children: NodeResult<T>[] = []
	/** A transition's destination result. Its errors are already attached to `errors`. */
	public destination?: NodeResult<unknown>
	public startedAt?: Date
	public completedAt?: Date

	/**
	 * @param node Display name of the executed node.
	 * @param subject Snapshot of the subject, refreshed when the node completes.
	 */
	constructor(
		public readonly node: string,
		public subject: T,
	) {}

	/** A result for a child that was never started. */
	static notRun<T>(node: string, subject: T): NodeResult<T> {
		return new NodeResult(node, subject)
	}

	get isSuccess(): boolean {
		return isSuccessStatus(this.status)
	}

	get isFailure(): boolean {
		return isFailureStatus(this.status)
	}

	/** Milliseconds between start and completion, once both are known. */
	get duration(): number | undefined {
		if (!this.startedAt || !this.completedAt)
			return undefined
		return this.completedAt.getTime() - this.startedAt.getTime()
	}

	/**
	 * Gathers, depth-first, every error held anywhere in this result tree. Each
	 * result is visited once, so every error appears exactly once.
	 */
	getFailExceptions(): Error[] {
		const gathered: Error[] = []
		const visited = new Set<NodeResult<unknown>>()

		const visit = (result: NodeResult<unknown>) => {
			if (visited.has(result))
				return
			visited.add(result)
			gathered.push(...result.errors)
			for (const child of result.children)
				visit(child)
		}

		visit(this)
		return gathered
	}

	/** Finds the first result in the tree produced by the named node. */
	find(node: string): NodeResult<T> | undefined {
		if (this.node === node)
			return this
		for (const child of this.children) {
			const match = child.find(node)
			if (match)
				return match
		}
		return undefined
	}
}
