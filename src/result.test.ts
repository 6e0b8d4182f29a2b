import { describe, expect, it } from 'vitest'
import { combineErrors, NodeExecutionError, toError } from './errors'
import { NodeResult } from './result'
import { NodeResultStatus } from './types'

describe('NodeResult', () => {
	it('should start out NotRun with no errors or children', () => {
		const result = new NodeResult('a', 'subject')
		expect(result.status).toBe(NodeResultStatus.NotRun)
		expect(result.errors).toEqual([])
		expect(result.children).toEqual([])
		expect(result.isSuccess).toBe(false)
		expect(result.isFailure).toBe(false)
		expect(result.duration).toBeUndefined()
	})

	it('should classify statuses', () => {
		const result = new NodeResult('a', 0)
		result.status = NodeResultStatus.GroupSucceededWithErrors
		expect(result.isSuccess).toBe(true)
		result.status = NodeResultStatus.GroupFailedAllChildNodes
		expect(result.isFailure).toBe(true)
		expect(result.isSuccess).toBe(false)
	})

	it('should gather every error in the tree exactly once, depth-first', () => {
		const e1 = new Error('root')
		const e2 = new Error('child')
		const e3 = new Error('grandchild')
		const e4 = new Error('second child')

		const root = new NodeResult('root', 0)
		const child = new NodeResult('child', 0)
		const grandchild = new NodeResult('grandchild', 0)
		const second = new NodeResult('second', 0)
		root.errors.push(e1)
		child.errors.push(e2)
		grandchild.errors.push(e3)
		second.errors.push(e4)
		child.children.push(grandchild)
		root.children.push(child, second, child)

		expect(root.getFailExceptions()).toEqual([e1, e2, e3, e4])
	})

	it('should not walk a transition destination', () => {
		const root = new NodeResult('transition', 0)
		const destination = new NodeResult('child', 'dest')
		destination.errors.push(new Error('already attached'))
		root.destination = destination
		expect(root.getFailExceptions()).toEqual([])
	})

	it('should find a result by node name', () => {
		const root = new NodeResult('root', 0)
		const child = new NodeResult('child', 0)
		const grandchild = new NodeResult('target', 0)
		child.children.push(grandchild)
		root.children.push(child)
		expect(root.find('target')).toBe(grandchild)
		expect(root.find('root')).toBe(root)
		expect(root.find('missing')).toBeUndefined()
	})

	it('should report the duration between start and completion', () => {
		const result = new NodeResult('a', 0)
		result.startedAt = new Date(1000)
		result.completedAt = new Date(1250)
		expect(result.duration).toBe(250)
	})
})

describe('error helpers', () => {
	it('should wrap thrown values that are not errors', () => {
		const error = toError('boom', 'leaf')
		expect(error).toBeInstanceOf(NodeExecutionError)
		expect(error.message).toBe('Node \'leaf\' threw a non-error value: boom')
		expect(error).toMatchObject({ nodeName: 'leaf', originalError: 'boom' })
	})

	it('should pass errors through unchanged', () => {
		const original = new TypeError('bad')
		expect(toError(original, 'leaf')).toBe(original)
	})

	it('should combine errors into nothing, the single error, or an AggregateError', () => {
		const a = new Error('a')
		const b = new Error('b')
		expect(combineErrors([], 'none')).toBeUndefined()
		expect(combineErrors([a], 'one')).toBe(a)

		const combined = combineErrors([a, b], 'two failed')
		expect(combined).toBeInstanceOf(AggregateError)
		expect(combined?.message).toBe('two failed')
		expect(combined instanceof AggregateError && combined.errors).toEqual([a, b])
	})
})
