import type { NodeKind, NodeResultStatus } from './types'

// =================================================================================
// Execution Errors (captured into results)
// =================================================================================

/** Raised when execution observes an aborted `AbortSignal`. */
export class AbortError extends Error {
	constructor(message = 'Execution was aborted.') {
		super(message)
		this.name = 'AbortError'
	}
}

/**
 * Wraps a thrown value that is not an `Error` so it can travel inside a result.
 */
export class NodeExecutionError extends Error {
	constructor(
		message: string,
		public readonly nodeName: string,
		public readonly originalError?: unknown,
	) {
		super(message)
		this.name = 'NodeExecutionError'
	}
}

/** Raised when a node is executed while running, or again without a `reset()`. */
export class NodeStateError extends Error {
	constructor(
		public readonly nodeName: string,
		public readonly status: NodeResultStatus,
		public readonly running: boolean,
	) {
		super(running
			? `Node '${nodeName}' is already running.`
			: `Node '${nodeName}' already finished with status '${status}'. Call reset() before executing it again.`)
		this.name = 'NodeStateError'
	}
}

// =================================================================================
// Configuration Errors (thrown while building a flow)
// =================================================================================

/** No flow is registered under the requested name. */
export class FlowNotFoundError extends Error {
	constructor(public readonly flowName: string) {
		super(`Flow '${flowName}' is not registered.`)
		this.name = 'FlowNotFoundError'
	}
}

/** No node registration matches the requested type and name. */
export class NodeNotFoundError extends Error {
	constructor(public readonly nodeType: string, public readonly nodeName?: string) {
		super(nodeName
			? `No node is registered for type '${nodeType}' with name '${nodeName}'.`
			: `No default node is registered for type '${nodeType}'.`)
		this.name = 'NodeNotFoundError'
	}
}

/** A node was found but cannot play the role its flow component asks of it. */
export class NodeTypeMismatchError extends Error {
	constructor(
		public readonly component: string,
		public readonly expected: NodeKind,
		public readonly actual: NodeKind,
	) {
		super(`Component '${component}' requires a '${expected}' node but resolved to a '${actual}' node.`)
		this.name = 'NodeTypeMismatchError'
	}
}

/** A flow references itself, directly or through other flows. */
export class CyclicFlowError extends Error {
	constructor(public readonly path: readonly string[]) {
		super(`Cyclic flow reference detected: ${path.join(' -> ')}`)
		this.name = 'CyclicFlowError'
	}
}

/** A flow definition is structurally invalid. */
export class FlowDefinitionError extends Error {
	constructor(public readonly flowName: string, reason: string) {
		super(`Invalid definition for flow '${flowName}': ${reason}`)
		this.name = 'FlowDefinitionError'
	}
}

/** A registry already holds an entry under the same key. */
export class DuplicateRegistrationError extends Error {
	constructor(public readonly key: string) {
		super(`'${key}' is already registered.`)
		this.name = 'DuplicateRegistrationError'
	}
}

// =================================================================================
// Helpers
// =================================================================================

/** Normalizes any thrown value into an `Error`. */
export function toError(value: unknown, nodeName: string): Error {
	if (value instanceof Error)
		return value

	return new NodeExecutionError(`Node '${nodeName}' threw a non-error value: ${String(value)}`, nodeName, value)
}

/**
 * Collapses a list of errors into one value: nothing for an empty list, the error
 * itself for a single entry, otherwise an `AggregateError` holding every original.
 */
export function combineErrors(errors: readonly Error[], message: string): Error | undefined {
	if (errors.length === 0)
		return undefined
	if (errors.length === 1)
		return errors[0]

	return new AggregateError([...errors], message)
}
