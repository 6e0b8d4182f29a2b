import type { NodeResult } from '../result'
import type { ExecutionOptions, NodeKind, RunOptions, ShouldExecute, ShouldExecuteAsync } from '../types'
import { ExecutionContext } from '../context'
import { defaultExecutor } from '../executors/in-memory'
import { NodeResultStatus } from '../types'

/**
 * Visits one child node. Generic so that a transition can hand over a child whose
 * subject type differs from its own.
 */
export type ChildVisitor = <X>(child: BaseNode<X>) => void

/**
 * The shared state and configuration of every executable node: identity,
 * execution predicates, lifecycle hooks, local option overrides and the status
 * of the last run.
 *
 * Subclasses never run themselves. `execute()` hands the node to the executor,
 * which dispatches on `kind`.
 *
 * @template T The type of the subject the node runs over.
 */
export abstract class BaseNode<T> {
	/** The composition role the executor dispatches on. */
	abstract readonly kind: NodeKind

	/** Optional identifier, used in results, logs and diagrams instead of the class name. */
	public id?: string
	public shouldExecute?: ShouldExecute<T>
	public shouldExecuteAsync?: ShouldExecuteAsync<T>
	/** Overrides laid over the context's global options while this node runs. */
	public localOptions?: Partial<ExecutionOptions>
	public status: NodeResultStatus = NodeResultStatus.NotRun
	/** The result of the last run, cleared by `reset()`. */
	public lastResult?: NodeResult<T>
	/** @internal */
	public running = false

	/** The display name: `id` when set, otherwise the class name. */
	get name(): string {
		return this.id ?? this.constructor.name
	}

	withId(id: string): this {
		this.id = id
		return this
	}

	/** Sets the synchronous execution predicate. */
	when(predicate: ShouldExecute<T>): this {
		this.shouldExecute = predicate
		return this
	}

	/** Sets the asynchronous execution predicate. */
	whenAsync(predicate: ShouldExecuteAsync<T>): this {
		this.shouldExecuteAsync = predicate
		return this
	}

	withOptions(options: Partial<ExecutionOptions>): this {
		this.localOptions = { ...this.localOptions, ...options }
		return this
	}

	/**
	 * (Lifecycle) Runs after the predicate passed and before the node's work.
	 */
	async onBeforeExecute(_context: ExecutionContext<T>): Promise<void> {}

	/**
	 * (Lifecycle) Runs after the node's work, with the result assembled so far.
	 */
	async onAfterExecute(_context: ExecutionContext<T>, _result: NodeResult<T>): Promise<void> {}

	/** Calls `visit` for each direct child. Leaves have none. */
	visitChildren(_visit: ChildVisitor): void {}

	/**
	 * Returns this node and everything beneath it to `NotRun`, dropping captured
	 * results and errors so the tree can run again.
	 */
	reset(): void {
		this.status = NodeResultStatus.NotRun
		this.lastResult = undefined
		this.visitChildren(child => child.reset())
	}

	/**
	 * Executes the node over a subject, or over a context built by the caller.
	 * Failures are reported in the returned result, never thrown.
	 *
	 * @param target The subject, or an existing `ExecutionContext`.
	 * @param options `logger`, `signal` and `options` are used only when a new root
	 * context is built from a subject; `executor` always applies.
	 */
	async execute(target: T | ExecutionContext<T>, options: RunOptions = {}): Promise<NodeResult<T>> {
		const context = target instanceof ExecutionContext
			? target
			: new ExecutionContext<T>(target, {
				globalOptions: options.options,
				signal: options.signal,
				logger: options.logger,
			})
		return (options.executor ?? defaultExecutor).execute(this, context, true)
	}
}
