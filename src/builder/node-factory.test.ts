import type { BaseNode } from '../workflow/BaseNode'
import type { FlowReference } from './types'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { CyclicFlowError, FlowDefinitionError, FlowNotFoundError, NodeNotFoundError, NodeTypeMismatchError } from '../errors'
import { globalRunOptions, globalTestLogger } from '../test-utils'
import { NodeResultStatus } from '../types'
import { isMultiNode } from '../workflow/guards'
import { GroupNode, PipelineNode } from '../workflow/MultiNode'
import { funcNode } from '../workflow/node-patterns'
import { TransitionNode } from '../workflow/TransitionNode'
import { FlowBuilder } from './flow-builder'
import { NodeFactory } from './node-factory'
import { InMemoryFlowRegistry, InMemoryNodeRegistry } from './registry'

interface Job {
	id: string
}

function childrenOf(node: BaseNode<Job>): BaseNode<Job>[] {
	if (!isMultiNode(node))
		throw new Error(`'${node.name}' is not a multi-node`)
	return node.children
}

describe('NodeFactory', () => {
	let nodes: InMemoryNodeRegistry<Job>
	let flows: InMemoryFlowRegistry<Job>
	let builder: FlowBuilder<Job>
	let factory: NodeFactory<Job>

	beforeEach(() => {
		nodes = new InMemoryNodeRegistry<Job>()
			.register('pipeline', () => new PipelineNode<Job>())
			.register('group', () => new GroupNode<Job>())
			.register('step', () => funcNode<Job>('step', (ctx) => {
				ctx.state.set('step', true)
			}))
			.register('step', () => funcNode<Job>('audit', () => {}), 'audit')
		flows = new InMemoryFlowRegistry<Job>()
		builder = new FlowBuilder<Job>()
		factory = new NodeFactory(nodes, flows, globalTestLogger)
	})

	describe('lookups', () => {
		it('should throw FlowNotFoundError for an unknown flow', () => {
			expect(factory.hasFlow('missing')).toBe(false)
			expect(() => factory.getFlow('missing')).toThrow(FlowNotFoundError)
			expect(() => factory.getFlow('missing')).toThrow('Flow \'missing\' is not registered.')
		})

		it('should resolve default and named node registrations', () => {
			expect(factory.getNode('step').name).toBe('step')
			expect(factory.getNode('step', 'audit').name).toBe('audit')
		})

		it('should throw NodeNotFoundError for an unknown node', () => {
			expect(() => factory.getNode('unknown')).toThrow(NodeNotFoundError)
			expect(() => factory.getNode('unknown')).toThrow('No default node is registered for type \'unknown\'.')
			expect(() => factory.getNode('step', 'nope')).toThrow('No node is registered for type \'step\' with name \'nope\'.')
		})
	})

	describe('building', () => {
		it('should build the component tree with sub-flows built in place', async () => {
			builder.createFlow('main')
				.addRoot('pipeline')
				.addChild('step')
				.addChild('step', 'audit')
				.addFlow('sub')
			builder.createFlow('sub')
				.addRoot('group')
				.addChild('step')
			builder.register(flows)

			const root = factory.getFlow('main')

			expect(root).toBeInstanceOf(PipelineNode)
			const children = childrenOf(root)
			expect(children.map(c => c.name)).toEqual(['step', 'audit', 'GroupNode'])
			expect(childrenOf(children[2]).map(c => c.name)).toEqual(['step'])

			const result = await root.execute({ id: 'job-1' }, globalRunOptions)
			expect(result.status).toBe(NodeResultStatus.Succeeded)
		})

		it('should build fresh node instances on every call', () => {
			builder.createFlow('main').addRoot('pipeline').addChild('step')
			builder.register(flows)

			const first = factory.getFlow('main')
			const second = factory.getFlow('main')
			expect(second).not.toBe(first)
			expect(childrenOf(second)[0]).not.toBe(childrenOf(first)[0])
		})

		it('should build the same sub-flow twice when referenced twice', () => {
			builder.createFlow('main').addRoot('group').addFlow('sub').addFlow('sub')
			builder.createFlow('sub').addRoot('step')
			builder.register(flows)

			const [a, b] = childrenOf(factory.getFlow('main'))
			expect(a.name).toBe('step')
			expect(b).not.toBe(a)
		})

		it('should reject children under a node that takes none', () => {
			builder.createFlow('main').addRoot('step').addChild('step', 'audit')
			builder.register(flows)

			expect(() => factory.getFlow('main')).toThrow(NodeTypeMismatchError)
			expect(() => factory.getFlow('main')).toThrow('Component \'step\' requires a \'multi\' node but resolved to a \'leaf\' node.')
		})

		it('should reject a flow without exactly one root component', () => {
			flows.register({ isFlow: true, name: 'empty', children: [] })
			expect(() => factory.getFlow('empty')).toThrow(FlowDefinitionError)
			expect(() => factory.getFlow('empty')).toThrow('Invalid definition for flow \'empty\': a flow needs exactly one root component, found 0')
		})

		it('should reject a flow reference that declares children', () => {
			const definition: FlowReference<Job> = {
				isFlow: true,
				name: 'main',
				children: [{ isFlow: true, name: 'sub', children: [{ isFlow: false, type: 'step', children: [] }] }],
			}
			flows.register(definition)
			expect(() => factory.getFlow('main')).toThrow('Invalid definition for flow \'sub\': a reference to a flow cannot declare children')
		})

		it('should log each flow it builds', () => {
			const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
			builder.createFlow('main').addRoot('step')
			builder.register(flows)

			new NodeFactory(nodes, flows, logger).getFlow('main')

			expect(logger.debug).toHaveBeenCalledWith('[NodeFactory] Building flow \'main\'.', { depth: 0 })
		})
	})

	describe('predicates', () => {
		const fromFlow = () => true
		const fromComponent = () => false
		const fromFlowAsync = async () => true

		it('should hand the flow\'s predicate to its root node only', () => {
			builder.createFlow('main')
				.setShouldExecute(fromFlow)
				.addRoot('pipeline')
				.addChild('step')
			builder.register(flows)

			const root = factory.getFlow('main')
			expect(root.shouldExecute).toBe(fromFlow)
			expect(childrenOf(root)[0].shouldExecute).toBeUndefined()
		})

		it('should let a component\'s predicate win over the inherited one', () => {
			builder.createFlow('main')
				.setShouldExecute(fromFlow)
				.addRoot('pipeline')
				.setShouldExecute(fromComponent)
			builder.register(flows)

			expect(factory.getFlow('main').shouldExecute).toBe(fromComponent)
		})

		it('should wire the sync and async forms independently', () => {
			builder.createFlow('main')
				.setShouldExecuteAsync(fromFlowAsync)
				.addRoot('pipeline')
				.setShouldExecute(fromComponent)
			builder.register(flows)

			const root = factory.getFlow('main')
			expect(root.shouldExecute).toBe(fromComponent)
			expect(root.shouldExecuteAsync).toBe(fromFlowAsync)
		})

		it('should keep a referenced flow\'s own predicate unless the reference overrides it', () => {
			builder.createFlow('main')
				.addRoot('group')
				.addFlow('sub')
				.addFlow('sub')
				.forLastChild()
				.setShouldExecute(fromComponent)
			builder.createFlow('sub').setShouldExecute(fromFlow).addRoot('step')
			builder.register(flows)

			const [plain, overridden] = childrenOf(factory.getFlow('main'))
			expect(plain.shouldExecute).toBe(fromFlow)
			expect(overridden.shouldExecute).toBe(fromComponent)
		})

		it('should skip a built node whose predicate returns false', async () => {
			builder.createFlow('main')
				.addRoot('pipeline')
				.addChild('step')
				.forChild('step')
				.setShouldExecute(ctx => ctx.subject.id !== 'skip-me')
			builder.register(flows)

			const result = await factory.getFlow('main').execute({ id: 'skip-me' }, globalRunOptions)
			expect(result.status).toBe(NodeResultStatus.Succeeded)
			expect(result.children[0].status).toBe(NodeResultStatus.NotRun)
		})
	})

	describe('cycle detection', () => {
		it('should reject a flow that references itself', () => {
			builder.createFlow('loop').addRootFlow('loop')
			builder.register(flows)

			expect(() => factory.getFlow('loop')).toThrow(CyclicFlowError)
			expect(() => factory.getFlow('loop')).toThrow('Cyclic flow reference detected: loop -> loop')
		})

		it('should reject a flow that references itself through others', () => {
			builder.createFlow('a').addRoot('pipeline').addChild('step').addFlow('b')
			builder.createFlow('b').addRoot('group').addFlow('c')
			builder.createFlow('c').addRootFlow('a')
			builder.register(flows)

			let caught: unknown
			try {
				factory.getFlow('a')
			}
			catch (error) {
				caught = error
			}
			expect(caught).toBeInstanceOf(CyclicFlowError)
			expect(caught instanceof CyclicFlowError && caught.path).toEqual(['a', 'b', 'c', 'a'])
		})
	})
})

describe('NodeFactory with transitions', () => {
	interface Order {
		id: string
		invoiced: boolean
	}

	interface Invoice {
		orderId: string
		issued: boolean
	}

	function setup(invoiceFlowName: string) {
		const orderNodes = new InMemoryNodeRegistry<Order>()
		const orderFlows = new InMemoryFlowRegistry<Order>()
		const invoiceNodes = new InMemoryNodeRegistry<Invoice>()
		const invoiceFlows = new InMemoryFlowRegistry<Invoice>()
		const orders = new NodeFactory(orderNodes, orderFlows, globalTestLogger)
		const invoices = new NodeFactory(invoiceNodes, invoiceFlows, globalTestLogger)

		orderNodes.register('invoice', () => new TransitionNode<Order, Invoice>(
			{
				toDestination: ctx => ({ orderId: ctx.subject.id, issued: false }),
				toSource: (ctx, result) => ({ ...ctx.subject, invoiced: result.subject.issued }),
			},
			{ childFlow: invoiceFlowName, nodeFactory: invoices },
		))
		invoiceNodes
			.register('issue', () => funcNode<Invoice>('issue', (ctx) => {
				ctx.changeSubject({ ...ctx.subject, issued: true })
			}))
			.register('reorder', () => new TransitionNode<Invoice, Order>(
				{ toDestination: ctx => ({ id: ctx.subject.orderId, invoiced: false }) },
				{ childFlow: 'main', nodeFactory: orders },
			))

		const orderBuilder = new FlowBuilder<Order>()
		orderBuilder.createFlow('main').addRoot('invoice')
		orderBuilder.register(orderFlows)

		return { orders, invoiceFlows }
	}

	it('should build a transition\'s child flow through the destination factory', async () => {
		const { orders, invoiceFlows } = setup('main')
		invoiceFlows.register({ isFlow: true, name: 'main', children: [{ isFlow: false, type: 'issue', children: [] }] })

		const root = orders.getFlow('main')
		expect(root).toBeInstanceOf(TransitionNode)
		expect(root instanceof TransitionNode && root.childNode?.name).toBe('issue')

		const result = await root.execute({ id: 'order-1', invoiced: false }, globalRunOptions)
		expect(result.status).toBe(NodeResultStatus.Succeeded)
		expect(result.subject).toEqual({ id: 'order-1', invoiced: true })
	})

	it('should detect a cycle that runs through another factory', () => {
		const { orders, invoiceFlows } = setup('billing')
		invoiceFlows.register({ isFlow: true, name: 'billing', children: [{ isFlow: false, type: 'reorder', children: [] }] })

		expect(() => orders.getFlow('main')).toThrow('Cyclic flow reference detected: main -> billing -> main')
	})
})
