import type { WorkflowBlueprint } from './types'

/**
 * A list of cycles found in the graph. Each cycle is an array of node IDs.
 */
export type Cycles = string[][]

/**
 * Analysis result for a pipeline blueprint
 */
export interface BlueprintAnalysis {
	cycles: Cycles
	/** Node IDs that have no incoming edges (start nodes) */
	startNodeIds: string[]
	/** Node IDs that have no outgoing edges (terminal nodes) */
	terminalNodeIds: string[]
	/** Edges whose source or target is not a declared node */
	danglingEdges: Array<{ source: string; target: string }>
	nodeCount: number
	edgeCount: number
	isDag: boolean
}

/**
 * Detects cycles with a depth-first walk.
 * Each cycle is reported as the path that closes on its first node.
 */
export function checkForCycles(blueprint: WorkflowBlueprint): Cycles {
	const cycles: Cycles = []
	if (blueprint.nodes.length === 0) {
		return cycles
	}

	const allNodeIds = blueprint.nodes.map((node) => node.id)
	const adj = new Map<string, string[]>()
	for (const id of allNodeIds) adj.set(id, [])
	for (const edge of blueprint.edges) adj.get(edge.source)?.push(edge.target)

	const visited = new Set<string>()
	const recursionStack = new Set<string>()

	function detectCycleUtil(nodeId: string, path: string[]) {
		visited.add(nodeId)
		recursionStack.add(nodeId)
		path.push(nodeId)

		for (const neighbor of adj.get(nodeId) ?? []) {
			if (recursionStack.has(neighbor)) {
				const cycle = path.slice(path.indexOf(neighbor))
				cycles.push([...cycle, neighbor])
			} else if (!visited.has(neighbor)) {
				detectCycleUtil(neighbor, path)
			}
		}

		recursionStack.delete(nodeId)
		path.pop()
	}

	for (const nodeId of allNodeIds) {
		if (!visited.has(nodeId)) {
			detectCycleUtil(nodeId, [])
		}
	}

	return cycles
}

/**
 * Computes the structural facts the runtime needs before a run.
 */
export function analyzeBlueprint(blueprint: WorkflowBlueprint): BlueprintAnalysis {
	const cycles = checkForCycles(blueprint)
	const nodeIds = new Set(blueprint.nodes.map((node) => node.id))
	const withIncoming = new Set(blueprint.edges.map((edge) => edge.target))
	const withOutgoing = new Set(blueprint.edges.map((edge) => edge.source))

	return {
		cycles,
		startNodeIds: [...nodeIds].filter((id) => !withIncoming.has(id)),
		terminalNodeIds: [...nodeIds].filter((id) => !withOutgoing.has(id)),
		danglingEdges: blueprint.edges
			.filter((edge) => !nodeIds.has(edge.source) || !nodeIds.has(edge.target))
			.map(({ source, target }) => ({ source, target })),
		nodeCount: blueprint.nodes.length,
		edgeCount: blueprint.edges.length,
		isDag: cycles.length === 0,
	}
}
