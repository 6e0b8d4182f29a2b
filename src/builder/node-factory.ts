import type { Logger } from '../logger'
import type { BaseNode, ChildVisitor } from '../workflow/BaseNode'
import type { FlowComponent, FlowReference, FlowRegistry, InheritedPredicates, NodeComponent, NodeRegistry, ResolutionStack } from './types'
import { CyclicFlowError, FlowDefinitionError, FlowNotFoundError, NodeNotFoundError, NodeTypeMismatchError } from '../errors'
import { NullLogger, withScope } from '../logger'
import { isMultiNode, isTransitionNode } from '../workflow/guards'

/**
 * Turns flow definitions into live node trees.
 *
 * A flow definition names one root component. Components either reference
 * another registered flow, which is built in full in their place, or name a node
 * registration. Predicates declared on the definition apply to its root node; a
 * component's own predicates win over them. Children receive nothing implicitly.
 *
 * Every problem with a definition (unknown flow or node, children under a node
 * that takes none, a flow that references itself) is thrown while building,
 * never while executing.
 *
 * @template T The subject type of the nodes this factory builds.
 */
export class NodeFactory<T> {
	private readonly logger: Logger

	constructor(
		private readonly nodes: NodeRegistry<T>,
		private readonly flows: FlowRegistry<T>,
		logger: Logger = new NullLogger(),
	) {
		this.logger = withScope(logger, 'NodeFactory')
	}

	hasFlow(name: string): boolean {
		return this.flows.has(name)
	}

	/**
	 * Resolves a single registered node, without children.
	 * @throws {NodeNotFoundError}
	 */
	getNode(type: string, name?: string): BaseNode<T> {
		const node = this.nodes.resolve(type, name)
		if (!node)
			throw new NodeNotFoundError(type, name)
		return node
	}

	/**
	 * Builds the full node tree of a registered flow.
	 * @throws {FlowNotFoundError | FlowDefinitionError | NodeNotFoundError | NodeTypeMismatchError | CyclicFlowError}
	 */
	getFlow(name: string): BaseNode<T> {
		return this.buildFlow(name, [])
	}

	/**
	 * Builds a flow while other flows are being built, possibly by other factories.
	 * @param stack The flows already being built, outermost first.
	 * @internal
	 */
	buildFlow(name: string, stack: ResolutionStack): BaseNode<T> {
		const definition = this.flows.get(name)
		if (!definition)
			throw new FlowNotFoundError(name)

		if (stack.some(frame => frame.scope === this && frame.flow === name))
			throw new CyclicFlowError([...stack.map(frame => frame.flow), name])

		const [root, ...rest] = definition.children
		if (!root || rest.length > 0)
			throw new FlowDefinitionError(name, `a flow needs exactly one root component, found ${definition.children.length}`)

		this.logger.debug(`Building flow '${name}'.`, { depth: stack.length })
		return this.buildComponent(root, [...stack, { scope: this, flow: name }], {
			shouldExecute: definition.shouldExecute,
			shouldExecuteAsync: definition.shouldExecuteAsync,
		})
	}

	private buildComponent(component: FlowComponent<T>, stack: ResolutionStack, inherited: InheritedPredicates<T>): BaseNode<T> {
		const node = component.isFlow
			? this.buildReference(component, stack)
			: this.buildNode(component, stack)

		const shouldExecute = component.shouldExecute ?? inherited.shouldExecute
		if (shouldExecute)
			node.shouldExecute = shouldExecute
		const shouldExecuteAsync = component.shouldExecuteAsync ?? inherited.shouldExecuteAsync
		if (shouldExecuteAsync)
			node.shouldExecuteAsync = shouldExecuteAsync

		return node
	}

	private buildReference(component: FlowReference<T>, stack: ResolutionStack): BaseNode<T> {
		if (component.children.length > 0)
			throw new FlowDefinitionError(component.name, 'a reference to a flow cannot declare children')

		return this.buildFlow(component.name, stack)
	}

	private buildNode(component: NodeComponent<T>, stack: ResolutionStack): BaseNode<T> {
		const node = this.getNode(component.type, component.name)
		this.logger.debug(`Resolved '${component.name ?? component.type}' to a ${node.kind} node.`)
		this.resolveTransitions(node, stack)

		if (component.children.length === 0)
			return node

		if (!isMultiNode(node))
			throw new NodeTypeMismatchError(component.name ?? component.type, 'multi', node.kind)

		for (const child of component.children)
			node.addChild(this.buildComponent(child, stack, {}))

		return node
	}

	/** Builds the flow-referencing children of every transition in a registered node's tree. */
	private resolveTransitions(node: BaseNode<T>, stack: ResolutionStack): void {
		const visit: ChildVisitor = (child) => {
			if (isTransitionNode(child))
				child.resolveChild(stack)
			child.visitChildren(visit)
		}
		visit(node)
	}
}
