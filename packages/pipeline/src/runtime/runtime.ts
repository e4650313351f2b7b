import { randomUUID } from 'node:crypto'
import { analyzeBlueprint } from '../analysis'
import { Context } from '../context'
import { PipelineError } from '../errors'
import { PropertyEvaluator } from '../evaluator'
import { NullLogger } from '../logger'
import { isNodeClass } from '../node'
import type {
	EdgeDefinition,
	IEvaluator,
	IEventBus,
	ILogger,
	ISyncContext,
	Middleware,
	NodeDefinition,
	NodeImplementation,
	NodeResult,
	RuntimeDependencies,
	RuntimeOptions,
	WorkflowBlueprint,
	WorkflowError,
	WorkflowResult,
	WorkflowStatus,
} from '../types'
import { ClassNodeExecutor, type ExecutionStrategy, FunctionNodeExecutor, NodeExecutor } from './executors'

export interface RunOptions<TContext extends object, TDependencies extends object> {
	/** Implementations registered by a `Flow` builder, merged over the runtime registry. */
	functionRegistry?: Map<string, NodeImplementation<TContext, TDependencies>>
	strict?: boolean
	signal?: AbortSignal
}

interface PendingNode {
	nodeId: string
	input: unknown
}

/**
 * Executes blueprints one node at a time, following the edges each result selects.
 */
export class FlowRuntime<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> {
	public registry: Map<string, NodeImplementation<TContext, TDependencies>>
	public dependencies: TDependencies
	public logger: ILogger
	public eventBus: IEventBus
	public evaluator: IEvaluator
	public middleware: Middleware<TContext>[]
	public options: RuntimeOptions<TContext, TDependencies>

	constructor(options: RuntimeOptions<TContext, TDependencies> & { dependencies: TDependencies }) {
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus ?? { emit: () => {} }
		this.evaluator = options.evaluator ?? new PropertyEvaluator()
		this.middleware = options.middleware ?? []
		this.registry = new Map(Object.entries(options.registry ?? {}))
		this.dependencies = options.dependencies
		this.options = options
	}

	async run(
		blueprint: WorkflowBlueprint,
		initialState: Partial<TContext> = {},
		options: RunOptions<TContext, TDependencies> = {},
	): Promise<WorkflowResult<TContext>> {
		const startTime = Date.now()
		const executionId = randomUUID()
		const context = new Context<TContext>(initialState)
		const registry = new Map([...this.registry, ...(options.functionRegistry ?? [])])
		const outputs: Record<string, unknown> = {}
		const errors: WorkflowError[] = []
		const meta = { blueprintId: blueprint.id, executionId }

		this.logger.info(`Starting workflow execution`, meta)
		await this.eventBus.emit({ type: 'workflow:start', payload: meta })

		const analysis = analyzeBlueprint(blueprint)
		if (analysis.danglingEdges.length > 0) {
			const [edge] = analysis.danglingEdges
			throw new PipelineError(`Edge '${edge.source}' -> '${edge.target}' references an unknown node.`, meta)
		}
		if ((options.strict ?? this.options.strict) && !analysis.isDag) {
			throw new PipelineError(`Workflow '${blueprint.id}' failed strictness check: Cycles are not allowed.`, meta)
		}

		const fallbackTargets = new Set(blueprint.nodes.flatMap((node) => (node.config?.fallback ? [node.config.fallback] : [])))
		const queue: PendingNode[] = analysis.startNodeIds
			.filter((id) => !fallbackTargets.has(id))
			.map((nodeId) => ({ nodeId, input: undefined }))

		let status: WorkflowStatus = 'completed'
		try {
			for (let pending = queue.shift(); pending; pending = queue.shift()) {
				options.signal?.throwIfAborted()
				const nodeDef = this.findNode(blueprint, pending.nodeId)
				const executor = new NodeExecutor<TContext, TDependencies>({
					blueprint,
					nodeDef,
					context,
					dependencies: this.dependencies,
					logger: this.logger,
					eventBus: this.eventBus,
					middleware: this.middleware,
					strategy: this.getStrategy(nodeDef, registry),
					executionId,
					signal: options.signal,
				})
				const outcome = await executor.execute(pending.input)

				if (outcome.status === 'failed_with_fallback') {
					queue.unshift({ nodeId: outcome.fallbackNodeId, input: pending.input })
					continue
				}
				if (outcome.status === 'failed') {
					errors.push({
						message: outcome.error.message,
						nodeId: nodeDef.id,
						timestamp: new Date().toISOString(),
						isFatal: outcome.error.isFatal,
					})
					this.logger.error(`Node failed`, { ...meta, nodeId: nodeDef.id, error: outcome.error.message })
					status = 'failed'
					break
				}

				outputs[nodeDef.id] = outcome.result.output
				for (const { node } of this.determineNextNodes(blueprint, nodeDef.id, outcome.result, context)) {
					queue.push({ nodeId: node.id, input: outcome.result.output })
				}
			}
		} catch (error) {
			if (!options.signal?.aborted) throw error
			status = 'cancelled'
			errors.push({ message: 'Workflow execution was cancelled.', timestamp: new Date().toISOString(), isFatal: false })
		}

		this.logger.info(`Workflow execution finished`, { ...meta, status, duration: Date.now() - startTime })
		await this.eventBus.emit({
			type: 'workflow:finish',
			payload: { ...meta, status, errors: errors.length > 0 ? errors : undefined },
		})

		return {
			executionId,
			context: context.toJSON(),
			outputs,
			status,
			errors: errors.length > 0 ? errors : undefined,
		}
	}

	/**
	 * Selects the outgoing edges a result activates: the action must match when the edge names one,
	 * and the condition must evaluate truthy against `{ result, context }`.
	 */
	determineNextNodes(
		blueprint: WorkflowBlueprint,
		nodeId: string,
		result: NodeResult,
		context: ISyncContext<TContext>,
	): Array<{ node: NodeDefinition; edge: EdgeDefinition }> {
		const next: Array<{ node: NodeDefinition; edge: EdgeDefinition }> = []
		for (const edge of blueprint.edges) {
			if (edge.source !== nodeId) continue
			if (edge.action && edge.action !== result.action) continue
			if (edge.condition) {
				const scope: Record<string, unknown> = { result, context: context.toJSON() }
				if (!this.evaluator.evaluate(edge.condition, scope)) continue
			}
			next.push({ node: this.findNode(blueprint, edge.target), edge })
		}
		return next
	}

	private findNode(blueprint: WorkflowBlueprint, nodeId: string): NodeDefinition {
		const nodeDef = blueprint.nodes.find((node) => node.id === nodeId)
		if (!nodeDef) {
			throw new PipelineError(`Node '${nodeId}' not found in blueprint '${blueprint.id}'.`, {
				nodeId,
				blueprintId: blueprint.id,
				isFatal: true,
			})
		}
		return nodeDef
	}

	private getStrategy(
		nodeDef: NodeDefinition,
		registry: Map<string, NodeImplementation<TContext, TDependencies>>,
	): ExecutionStrategy<TContext, TDependencies> {
		const implementation = registry.get(nodeDef.uses)
		if (!implementation) {
			throw new PipelineError(`Implementation for '${nodeDef.uses}' not found.`, {
				nodeId: nodeDef.id,
				isFatal: true,
			})
		}
		return isNodeClass(implementation) ? new ClassNodeExecutor(implementation) : new FunctionNodeExecutor(implementation)
	}
}
