import type { Logger } from './logger'
import type { NodeResult } from './result'
import type { StateInput } from './state'
import type { ExecutionOptions } from './types'
import { AbortError } from './errors'
import { NullLogger } from './logger'
import { StateBag } from './state'
import { DEFAULT_EXECUTION_OPTIONS } from './types'

export interface ExecutionContextOptions {
	/** Overrides merged over `DEFAULT_EXECUTION_OPTIONS`, then frozen. */
	globalOptions?: Partial<ExecutionOptions>
	signal?: AbortSignal
	logger?: Logger
	/** Initial entries for the state bag. */
	state?: Record<string, StateInput>
}

/**
 * Carries everything a node tree needs while it runs over one subject type:
 * the subject itself, the global options, the shared state bag, the cancellation
 * signal, the logger, and the result of the node that entered this context.
 *
 * One context exists per subject-type boundary. Every node below that boundary
 * receives the same instance, so a subject replaced through `changeSubject` is
 * seen by all of them. A transition node creates a linked child context for its
 * destination sub-tree with `createChild`.
 *
 * @template T The type of the subject.
 */
export class ExecutionContext<T> {
	private current: T
	private entryResult?: NodeResult<T>

	/** Shared, frozen options. The same object is handed to every linked child context. */
	public readonly globalOptions: Readonly<ExecutionOptions>
	public readonly state: StateBag
	public readonly signal?: AbortSignal
	public readonly logger: Logger
	/** The context this one was derived from, when created by a transition. */
	public readonly parent?: ExecutionContext<unknown>

	constructor(subject: T, options: ExecutionContextOptions = {}, parent?: ExecutionContext<unknown>) {
		this.current = subject
		this.parent = parent
		this.globalOptions = parent
			? parent.globalOptions
			: Object.freeze({ ...DEFAULT_EXECUTION_OPTIONS, ...options.globalOptions })
		this.signal = options.signal ?? parent?.signal
		this.logger = options.logger ?? parent?.logger ?? new NullLogger()
		this.state = new StateBag(options.state)
	}

	/** The current subject. */
	get subject(): T {
		return this.current
	}

	/**
	 * Replaces the subject for every node sharing this context.
	 */
	changeSubject(subject: T): void {
		this.logger.debug('Subject replaced on execution context.')
		this.current = subject
	}

	/** The result of the node that entered this context, once execution has started. */
	get parentResult(): NodeResult<T> | undefined {
		return this.entryResult
	}

	/**
	 * Records the result of the node entering this context.
	 * @internal
	 */
	bindResult(result: NodeResult<T>): void {
		this.entryResult = result
	}

	get isCancelled(): boolean {
		return this.signal?.aborted ?? false
	}

	/** Throws an `AbortError` if cancellation has been requested. Long-running node work should call this. */
	throwIfCancelled(): void {
		if (this.isCancelled)
			throw new AbortError()
	}

	/**
	 * Builds the context for a sub-tree of another subject type. The child shares
	 * global options, signal and logger but owns its subject and state.
	 */
	createChild<TDestination>(subject: TDestination): ExecutionContext<TDestination> {
		return new ExecutionContext<TDestination>(subject, {}, this)
	}

	/** Global options with a node's local overrides laid over them. */
	resolveOptions(local?: Partial<ExecutionOptions>): Readonly<ExecutionOptions> {
		return local ? { ...this.globalOptions, ...local } : this.globalOptions
	}
}
