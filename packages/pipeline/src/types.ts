import type { PipelineError } from './errors'
import type { BaseNode } from './node'

// =================================================================================
// Blueprint Interfaces (The Declarative Definition)
// =================================================================================

/** The central, serializable representation of a pipeline. */
export interface WorkflowBlueprint {
	id: string
	nodes: NodeDefinition[]
	edges: EdgeDefinition[]
	metadata?: Record<string, unknown>
}

/** Defines a single step in the pipeline. */
export interface NodeDefinition {
	id: string
	/** A key that resolves to an implementation in a registry. */
	uses: string
	/** Static parameters for the node. */
	params?: Record<string, unknown>
	/** Configuration for retries, timeouts, etc. */
	config?: NodeConfig
}

/** Defines the connection between two nodes. */
export interface EdgeDefinition {
	source: string
	target: string
	/** An 'action' from the source node that triggers this edge. */
	action?: string
	/** A property path that must be truthy for this edge to be taken. */
	condition?: string
}

/** Configuration for a node's resiliency. */
export interface NodeConfig {
	/** Total number of `exec` attempts. Defaults to 1. */
	maxRetries?: number
	/** Delay between attempts, in milliseconds. */
	retryDelay?: number
	/** Upper bound for a single attempt, in milliseconds. */
	timeout?: number
	/** The id of a node to run in place of this one when it fails. */
	fallback?: string
}

// =================================================================================
// Node Implementation Interfaces
// =================================================================================

/** The required return type for any node implementation. */
export interface NodeResult<TOutput = unknown, TAction extends string = string> {
	output?: TOutput
	action?: TAction
}

/** The context object passed to every node's execution logic. */
export interface NodeContext<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> {
	/** The async-only interface for interacting with the run's state. */
	context: IAsyncContext<TContext>
	/** The output of the predecessor that scheduled this node. */
	input?: unknown
	/** Static parameters defined in the blueprint. */
	params: Record<string, unknown>
	/** Shared, runtime-level dependencies (e.g., model clients, stores). */
	dependencies: TDependencies & { logger: ILogger }
	/** A signal to cancel long-running node operations. */
	signal?: AbortSignal
}

/** A simple function-based node implementation. */
export type NodeFunction<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> = (
	context: NodeContext<TContext, TDependencies>,
) => Promise<NodeResult>

/** Represents a constructor for any concrete class that extends the abstract BaseNode. */
export type NodeClass<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> = new (
	params?: Record<string, unknown>,
) => BaseNode<TContext, TDependencies>

/** A union of all possible node implementation types. */
export type NodeImplementation<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> =
	| NodeFunction<TContext, TDependencies>
	| NodeClass<TContext, TDependencies>

// =================================================================================
// Context Interfaces (State Management)
// =================================================================================

/** The synchronous context interface for in-memory state. */
export interface ISyncContext<TContext extends object = Record<string, unknown>> {
	readonly type: 'sync'
	get<K extends keyof TContext>(key: K): TContext[K] | undefined
	set<K extends keyof TContext>(key: K, value: TContext[K]): void
	has<K extends keyof TContext>(key: K): boolean
	delete<K extends keyof TContext>(key: K): boolean
	toJSON: () => Partial<TContext>
}

/** The asynchronous context interface handed to nodes. */
export interface IAsyncContext<TContext extends object = Record<string, unknown>> {
	readonly type: 'async'
	get<K extends keyof TContext>(key: K): Promise<TContext[K] | undefined>
	set<K extends keyof TContext>(key: K, value: TContext[K]): Promise<void>
	has<K extends keyof TContext>(key: K): Promise<boolean>
	delete<K extends keyof TContext>(key: K): Promise<boolean>
	toJSON: () => Promise<Partial<TContext>>
}

// =================================================================================
// Runtime & Extensibility Interfaces
// =================================================================================

/** Generic for any set of dependencies. */
export type RuntimeDependencies = Record<string, unknown>

/** Configuration options for the FlowRuntime. */
export interface RuntimeOptions<TContext extends object = Record<string, unknown>, TDependencies extends object = RuntimeDependencies> {
	/** A registry of globally available node implementations. */
	registry?: Record<string, NodeImplementation<TContext, TDependencies>>
	/** Shared dependencies to be injected into every node. */
	dependencies?: TDependencies
	/** A pluggable logger for consistent output. */
	logger?: ILogger
	/** A pluggable event bus for observability. */
	eventBus?: IEventBus
	/**
	 * A pluggable evaluator for edge conditions.
	 * @default new PropertyEvaluator()
	 */
	evaluator?: IEvaluator
	/** An array of middleware to wrap node execution. */
	middleware?: Middleware<TContext>[]
	/** Reject blueprints that contain cycles. */
	strict?: boolean
}

/** Interface for a pluggable expression evaluator for edge conditions. */
export interface IEvaluator {
	evaluate: (expression: string, context: Record<string, unknown>) => unknown
}

/** Interface for a pluggable logger. */
export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** Structured event types for execution tracing. */
export type PipelineEvent =
	| { type: 'workflow:start'; payload: { blueprintId: string; executionId: string } }
	| {
			type: 'workflow:finish'
			payload: { blueprintId: string; executionId: string; status: WorkflowStatus; errors?: WorkflowError[] }
	  }
	| { type: 'node:start'; payload: { nodeId: string; executionId: string; blueprintId: string } }
	| { type: 'node:finish'; payload: { nodeId: string; result: NodeResult; executionId: string; blueprintId: string } }
	| { type: 'node:error'; payload: { nodeId: string; error: PipelineError; executionId: string; blueprintId: string } }
	| { type: 'node:fallback'; payload: { nodeId: string; executionId: string; fallback: string; blueprintId: string } }
	| { type: 'node:retry'; payload: { nodeId: string; attempt: number; executionId: string; blueprintId: string } }

/** Interface for a pluggable event bus. */
export interface IEventBus {
	emit: (event: PipelineEvent) => void | Promise<void>
}

/** Interface for middleware to handle cross-cutting concerns. */
export interface Middleware<TContext extends object = Record<string, unknown>> {
	beforeNode?: (ctx: IAsyncContext<TContext>, nodeId: string) => void | Promise<void>
	afterNode?: (
		ctx: IAsyncContext<TContext>,
		nodeId: string,
		result: NodeResult | undefined,
		error: Error | undefined,
	) => void | Promise<void>
	aroundNode?: (ctx: IAsyncContext<TContext>, nodeId: string, next: () => Promise<NodeResult>) => Promise<NodeResult>
}

/** A structured error entry returned from a failed run. */
export interface WorkflowError {
	message: string
	nodeId?: string
	timestamp: string // ISO 8601 format
	isFatal: boolean
}

/** The status of a pipeline run. */
export type WorkflowStatus = 'completed' | 'failed' | 'cancelled'

/** The final result of a pipeline run. */
export interface WorkflowResult<TContext extends object = Record<string, unknown>> {
	executionId: string
	context: Partial<TContext>
	/** Each executed node's output, keyed by node id. */
	outputs: Record<string, unknown>
	status: WorkflowStatus
	errors?: WorkflowError[]
}
