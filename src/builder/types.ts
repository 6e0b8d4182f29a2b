import type { ShouldExecute, ShouldExecuteAsync } from '../types'
import type { BaseNode } from '../workflow/BaseNode'

interface FlowComponentBase<T> {
	/** Overrides the predicate the node would otherwise inherit. */
	shouldExecute?: ShouldExecute<T>
	/** Overrides the async predicate the node would otherwise inherit. Checked before the sync form. */
	shouldExecuteAsync?: ShouldExecuteAsync<T>
	/** Ordered child components. Only components resolving to a multi-node may have any. */
	children: FlowComponent<T>[]
}

/** Describes one node, looked up in a `NodeRegistry` by `type` and optional `name`. */
export interface NodeComponent<T> extends FlowComponentBase<T> {
	isFlow: false
	type: string
	name?: string
}

/**
 * Refers to a registered flow by name. Registered flow definitions are themselves
 * flow references whose single child is the flow's root component; a reference
 * inside a tree has no children.
 */
export interface FlowReference<T> extends FlowComponentBase<T> {
	isFlow: true
	name: string
}

/**
 * A declarative, serializable description of a node tree. It never runs; a
 * `NodeFactory` turns it into live nodes.
 */
export type FlowComponent<T> = NodeComponent<T> | FlowReference<T>

/** Creates a fresh node instance for every build. */
export type NodeCreator<T> = () => BaseNode<T>

/**
 * Supplies nodes by `(type, name)`. A missing `name` selects the default
 * registration of `type`.
 */
export interface NodeRegistry<T> {
	resolve: (type: string, name?: string) => BaseNode<T> | undefined
	has: (type: string, name?: string) => boolean
}

/** Supplies flow definitions by name. */
export interface FlowRegistry<T> {
	get: (name: string) => FlowReference<T> | undefined
	has: (name: string) => boolean
}

/**
 * One flow being built. `scope` is the factory building it, so that flows of the
 * same name in different factories stay apart.
 */
export interface ResolutionFrame {
	scope: object
	flow: string
}

/** The flows currently being built, outermost first. */
export type ResolutionStack = readonly ResolutionFrame[]

/** Predicates handed down from a flow definition to its root node. */
export interface InheritedPredicates<T> {
	shouldExecute?: ShouldExecute<T>
	shouldExecuteAsync?: ShouldExecuteAsync<T>
}
