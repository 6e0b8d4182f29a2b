import type { ShouldExecute, ShouldExecuteAsync } from '../types'
import type { FlowComponent, FlowReference, NodeComponent } from './types'
import { FlowDefinitionError } from '../errors'

function nodeComponent<T>(type: string, name?: string): NodeComponent<T> {
	return { isFlow: false, type, name, children: [] }
}

function flowReference<T>(name: string): FlowReference<T> {
	return { isFlow: true, name, children: [] }
}

/**
 * Edits one component of a flow definition. Adding children returns the same
 * builder; `forChild` and `forLastChild` step down into a child.
 */
export class ComponentBuilder<T> {
	constructor(
		private readonly flowName: string,
		public readonly component: FlowComponent<T>,
	) {}

	addChild(type: string, name?: string): this {
		this.component.children.push(nodeComponent(type, name))
		return this
	}

	/** Adds a reference to another registered flow as the next child. */
	addFlow(name: string): this {
		this.component.children.push(flowReference(name))
		return this
	}

	/**
	 * Steps into the last child registered under `type` and `name`.
	 * @throws {FlowDefinitionError} If there is no such child.
	 */
	forChild(type: string, name?: string): ComponentBuilder<T> {
		const match = [...this.component.children].reverse().find(child => !child.isFlow && child.type === type && child.name === name)
		if (!match)
			throw new FlowDefinitionError(this.flowName, `no child of type '${type}'${name === undefined ? '' : ` named '${name}'`}`)
		return new ComponentBuilder(this.flowName, match)
	}

	/**
	 * Steps into the most recently added child.
	 * @throws {FlowDefinitionError} If there are no children yet.
	 */
	forLastChild(): ComponentBuilder<T> {
		const last = this.component.children.at(-1)
		if (!last)
			throw new FlowDefinitionError(this.flowName, 'the component has no children yet')
		return new ComponentBuilder(this.flowName, last)
	}

	setShouldExecute(predicate: ShouldExecute<T>): this {
		this.component.shouldExecute = predicate
		return this
	}

	setShouldExecuteAsync(predicate: ShouldExecuteAsync<T>): this {
		this.component.shouldExecuteAsync = predicate
		return this
	}
}

/**
 * Edits a flow definition. Predicates set here are inherited by the flow's root
 * node unless the root component declares its own.
 */
export class FlowRootBuilder<T> {
	constructor(public readonly definition: FlowReference<T>) {}

	/**
	 * Sets the root component to a registered node.
	 * @throws {FlowDefinitionError} If the flow already has a root.
	 */
	addRoot(type: string, name?: string): ComponentBuilder<T> {
		return new ComponentBuilder(this.definition.name, this.setRoot(nodeComponent(type, name)))
	}

	/** Sets the root component to a reference to another registered flow. */
	addRootFlow(name: string): ComponentBuilder<T> {
		return new ComponentBuilder(this.definition.name, this.setRoot(flowReference(name)))
	}

	setShouldExecute(predicate: ShouldExecute<T>): this {
		this.definition.shouldExecute = predicate
		return this
	}

	setShouldExecuteAsync(predicate: ShouldExecuteAsync<T>): this {
		this.definition.shouldExecuteAsync = predicate
		return this
	}

	private setRoot(component: FlowComponent<T>): FlowComponent<T> {
		if (this.definition.children.length > 0)
			throw new FlowDefinitionError(this.definition.name, 'the flow already has a root component')
		this.definition.children.push(component)
		return component
	}
}

/**
 * Builds flow definitions fluently and hands them to a flow registry.
 *
 * @example
 * const flows = new FlowBuilder<Order>()
 * flows.createFlow('checkout')
 *   .addRoot('pipeline')
 *   .addChild('validate')
 *   .addFlow('payment')
 *   .addChild('notify', 'email')
 *   .forChild('notify', 'email')
 *   .setShouldExecute(ctx => ctx.subject.customer.email !== undefined)
 * flows.register(registry)
 */
export class FlowBuilder<T> {
	private readonly flows: FlowReference<T>[] = []

	/** Starts a new flow definition. */
	createFlow(name: string): FlowRootBuilder<T> {
		const definition = flowReference<T>(name)
		this.flows.push(definition)
		return new FlowRootBuilder(definition)
	}

	/** Every definition created so far, in creation order. */
	get definitions(): readonly FlowReference<T>[] {
		return this.flows
	}

	/** Stores every created flow in `registry`. */
	register(registry: { register: (flow: FlowReference<T>) => unknown }): void {
		for (const flow of this.flows)
			registry.register(flow)
	}
}
