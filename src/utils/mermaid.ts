import type { BaseNode } from '../workflow/BaseNode'
import { isMultiNode, isTransitionNode } from '../workflow/guards'

function quote(text: string): string {
	return `"${text.replace(/"/g, '#quot;')}"`
}

/**
 * Generates a descriptive label for a node: a box for leaves, a subroutine box
 * with the composition for multi-nodes, a hexagon for transitions.
 */
function getNodeLabel<T>(node: BaseNode<T>): string {
	if (isMultiNode(node))
		return `[[${quote(`${node.name} (${node.composition})`)}]]`
	if (isTransitionNode(node))
		return `{{${quote(node.name)}}}`
	return `[${quote(node.name)}]`
}

/**
 * Builds the edge from a parent to its `position`-th child (1-based). Sequential
 * compositions number their edges; a transition's edge is dotted.
 */
function getEdge<T>(parent: BaseNode<T>, sourceId: string, targetId: string, position: number): string {
	if (isTransitionNode(parent))
		return `  ${sourceId} -. transition .-> ${targetId}`
	if (isMultiNode(parent) && parent.composition !== 'group')
		return `  ${sourceId} -- "${position}" --> ${targetId}`
	return `  ${sourceId} --> ${targetId}`
}

/**
 * Generates a Mermaid graph definition of a node tree, walking multi-node
 * children and transition children depth-first. A node instance shared by
 * several parents is drawn once.
 *
 * @example
 * const checkout = new PipelineNode<Order>().withId('checkout')
 *   .addChild(funcNode('validate', validate))
 *   .addChild(funcNode('charge', charge))
 *
 * generateMermaidGraph(checkout)
 * // graph TD
 * //   checkout_0[["checkout (pipeline)"]]
 * //   validate_0["validate"]
 * //   charge_0["charge"]
 * //   checkout_0 -- "1" --> validate_0
 * //   checkout_0 -- "2" --> charge_0
 */
export function generateMermaidGraph<T>(root: BaseNode<T>): string {
	const nodes: string[] = []
	const edges: string[] = []
	const idMap = new Map<object, string>()
	const nameCounts = new Map<string, number>()

	const addNode = <X>(node: BaseNode<X>): string => {
		const sanitized = node.name.replace(/:/g, '_').replace(/\W/g, '') || 'node'
		const count = nameCounts.get(sanitized) ?? 0
		const uniqueId = `${sanitized}_${count}`
		nameCounts.set(sanitized, count + 1)
		idMap.set(node, uniqueId)
		nodes.push(`  ${uniqueId}${getNodeLabel(node)}`)
		return uniqueId
	}

	const walk = <X>(node: BaseNode<X>, id: string): void => {
		let position = 0
		node.visitChildren((child) => {
			position += 1
			const known = idMap.get(child)
			const childId = known ?? addNode(child)
			edges.push(getEdge(node, id, childId, position))
			if (!known)
				walk(child, childId)
		})
	}

	walk(root, addNode(root))
	return ['graph TD', ...nodes, ...edges].join('\n')
}
