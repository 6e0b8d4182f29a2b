import type { ExecutionContext } from './context'
import type { IExecutor } from './executors/types'
import type { Logger } from './logger'

// =================================================================================
// Node Status
// =================================================================================

/**
 * Every status a node can report once it has been executed. A node starts out as
 * `NotRun` and settles on exactly one of the other values until it is reset.
 */
export const NodeResultStatus = {
	NotRun: 'NotRun',
	Succeeded: 'Succeeded',
	Failed: 'Failed',
	SingleNodeFailed: 'SingleNodeFailed',
	GroupSucceededWithErrors: 'GroupSucceededWithErrors',
	GroupFailed: 'GroupFailed',
	GroupFailedAllChildNodes: 'GroupFailedAllChildNodes',
} as const

export type NodeResultStatus = typeof NodeResultStatus[keyof typeof NodeResultStatus]

const FAILURE_STATUSES: ReadonlySet<NodeResultStatus> = new Set<NodeResultStatus>([
	NodeResultStatus.Failed,
	NodeResultStatus.SingleNodeFailed,
	NodeResultStatus.GroupFailed,
	NodeResultStatus.GroupFailedAllChildNodes,
])

/** `true` for every status that counts as a failure when combining child results. */
export function isFailureStatus(status: NodeResultStatus): boolean {
	return FAILURE_STATUSES.has(status)
}

/** `true` for `Succeeded` and `GroupSucceededWithErrors`. */
export function isSuccessStatus(status: NodeResultStatus): boolean {
	return status === NodeResultStatus.Succeeded || status === NodeResultStatus.GroupSucceededWithErrors
}

// =================================================================================
// Node Shapes
// =================================================================================

/**
 * The composition role of a node. The executor dispatches on this tag:
 * - `leaf` runs its own work,
 * - `multi` fans out to an ordered list of children,
 * - `transition` crosses into a sub-tree with a different subject type.
 */
export type NodeKind = 'leaf' | 'multi' | 'transition'

/** How a multi-node schedules its children. */
export type Composition = 'group' | 'pipeline' | 'firstMatch'

/** A synchronous execution predicate. */
export type ShouldExecute<T> = (context: ExecutionContext<T>) => boolean

/** An asynchronous execution predicate. Takes precedence over the sync form when both are set. */
export type ShouldExecuteAsync<T> = (context: ExecutionContext<T>) => Promise<boolean>

/**
 * What a leaf node's work may report. Returning nothing or `'Succeeded'` marks the
 * node as succeeded; `'Failed'` or an `Error` (returned or thrown) marks it as failed.
 */
// eslint-disable-next-line ts/no-invalid-void-type
export type LeafOutcome = typeof NodeResultStatus.Succeeded | typeof NodeResultStatus.Failed | Error | void

// =================================================================================
// Options
// =================================================================================

/** Options shared, read-only, by every node of a single root execution. */
export interface ExecutionOptions {
	/** When `true`, a pipeline keeps running its remaining children after one fails. */
	continueOnFailure: boolean
	/** Maximum number of group children running at once. `0` runs them all together. */
	degreeOfParallelism: number
}

export const DEFAULT_EXECUTION_OPTIONS: Readonly<ExecutionOptions> = Object.freeze({
	continueOnFailure: false,
	degreeOfParallelism: 0,
})

/** Options accepted by `execute()` when it has to build the root context itself. */
export interface RunOptions {
	logger?: Logger
	signal?: AbortSignal
	/** Overrides merged over `DEFAULT_EXECUTION_OPTIONS` to form the global options. */
	options?: Partial<ExecutionOptions>
	/** Runs the tree. Defaults to the in-memory executor. */
	executor?: IExecutor
}
