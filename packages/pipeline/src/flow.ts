import { randomUUID } from 'node:crypto'
import { isNodeClass } from './node'
import type { EdgeDefinition, NodeDefinition, NodeImplementation, RuntimeDependencies, WorkflowBlueprint } from './types'

/**
 * A fluent API for programmatically constructing a WorkflowBlueprint.
 */
export class Flow<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> {
	private blueprint: WorkflowBlueprint
	private functionRegistry: Map<string, NodeImplementation<TContext, TDependencies>>

	constructor(id: string) {
		this.blueprint = { id, nodes: [], edges: [] }
		this.functionRegistry = new Map()
	}

	node(
		id: string,
		implementation: NodeImplementation<TContext, TDependencies>,
		options?: Omit<NodeDefinition, 'id' | 'uses'>,
	): this {
		if (this.blueprint.nodes.some((node) => node.id === id)) {
			throw new Error(`Node '${id}' is already defined in flow '${this.blueprint.id}'.`)
		}

		const usesKey = isNodeClass(implementation)
			? implementation.name || `class_${randomUUID()}`
			: `fn_${randomUUID()}`
		this.functionRegistry.set(usesKey, implementation)

		this.blueprint.nodes.push({ id, uses: usesKey, ...options })
		return this
	}

	edge(source: string, target: string, options?: Omit<EdgeDefinition, 'source' | 'target'>): this {
		this.blueprint.edges.push({ source, target, ...options })
		return this
	}

	toBlueprint(): WorkflowBlueprint {
		if (this.blueprint.nodes.length === 0) {
			throw new Error('Cannot build a blueprint with no nodes.')
		}
		return structuredClone(this.blueprint)
	}

	getFunctionRegistry(): Map<string, NodeImplementation<TContext, TDependencies>> {
		return new Map(this.functionRegistry)
	}
}

/**
 * Helper function to create a new Flow builder instance.
 */
export function createFlow<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies>(
	id: string,
): Flow<TContext, TDependencies> {
	return new Flow(id)
}
