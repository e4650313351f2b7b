import { AsyncContextView } from '../context'
import { isAbortError, NodeTimeoutError, PipelineError } from '../errors'
import type {
	IEventBus,
	ILogger,
	ISyncContext,
	Middleware,
	NodeClass,
	NodeContext,
	NodeDefinition,
	NodeFunction,
	NodeResult,
	WorkflowBlueprint,
} from '../types'

interface AttemptScope {
	nodeDef: NodeDefinition
	blueprintId: string
	executionId: string
	logger: ILogger
	eventBus: IEventBus
	signal?: AbortSignal
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer)
			reject(signal?.reason)
		}
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort)
			resolve()
		}, ms)
		signal?.addEventListener('abort', onAbort, { once: true })
	})
}

/**
 * Runs one attempt under the node's timeout. The attempt gets its own signal,
 * aborted with the `NodeTimeoutError` once the deadline passes.
 */
async function withTimeout<T>(executor: (signal?: AbortSignal) => Promise<T>, scope: AttemptScope): Promise<T> {
	const timeout = scope.nodeDef.config?.timeout
	if (!timeout) return executor(scope.signal)

	const attempt = new AbortController()
	const forwardAbort = () => attempt.abort(scope.signal?.reason)
	scope.signal?.addEventListener('abort', forwardAbort, { once: true })

	let timer: NodeJS.Timeout | undefined
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new NodeTimeoutError(timeout, {
				nodeId: scope.nodeDef.id,
				blueprintId: scope.blueprintId,
				executionId: scope.executionId,
			})
			// the deadline settles the race before the attempt reacts to the abort
			reject(error)
			attempt.abort(error)
		}, timeout)
	})
	try {
		return await Promise.race([executor(attempt.signal), deadline])
	} finally {
		clearTimeout(timer)
		scope.signal?.removeEventListener('abort', forwardAbort)
	}
}

async function withRetries<T>(executor: (signal?: AbortSignal) => Promise<T>, scope: AttemptScope): Promise<T> {
	const { nodeDef, logger, eventBus, executionId, signal } = scope
	const maxRetries = Math.max(1, nodeDef.config?.maxRetries ?? 1)
	const retryDelay = nodeDef.config?.retryDelay ?? 0
	let lastError: unknown

	for (let attempt = 1; attempt <= maxRetries; attempt++) {
		try {
			signal?.throwIfAborted()
			const result = await withTimeout(executor, scope)
			if (attempt > 1) {
				logger.info(`Node execution succeeded after retry`, { nodeId: nodeDef.id, attempt, executionId })
			}
			return result
		} catch (error) {
			lastError = error
			if (isAbortError(error)) throw error
			if (error instanceof PipelineError && error.isFatal) break
			if (attempt < maxRetries) {
				logger.warn(`Node execution failed, retrying`, {
					nodeId: nodeDef.id,
					attempt,
					maxRetries,
					error: toError(error).message,
					executionId,
				})
				await eventBus.emit({
					type: 'node:retry',
					payload: { nodeId: nodeDef.id, attempt, executionId, blueprintId: scope.blueprintId },
				})
				if (retryDelay > 0) await sleep(retryDelay, signal)
			} else {
				logger.error(`Node execution failed after all retries`, {
					nodeId: nodeDef.id,
					attempts: maxRetries,
					error: toError(error).message,
					executionId,
				})
			}
		}
	}
	throw lastError
}

export interface ExecutionStrategy<TContext extends object, TDependencies extends object> {
	execute: (context: NodeContext<TContext, TDependencies>, scope: AttemptScope) => Promise<NodeResult>
}

export class FunctionNodeExecutor<TContext extends object, TDependencies extends object>
	implements ExecutionStrategy<TContext, TDependencies>
{
	constructor(private implementation: NodeFunction<TContext, TDependencies>) {}

	execute(context: NodeContext<TContext, TDependencies>, scope: AttemptScope): Promise<NodeResult> {
		return withRetries((signal) => this.implementation({ ...context, signal }), scope)
	}
}

export class ClassNodeExecutor<TContext extends object, TDependencies extends object>
	implements ExecutionStrategy<TContext, TDependencies>
{
	constructor(private implementation: NodeClass<TContext, TDependencies>) {}

	async execute(context: NodeContext<TContext, TDependencies>, scope: AttemptScope): Promise<NodeResult> {
		const instance = new this.implementation(scope.nodeDef.params ?? {})
		scope.signal?.throwIfAborted()
		const prepResult = await instance.prep(context)
		let execResult: NodeResult
		try {
			execResult = await withRetries((signal) => instance.exec(prepResult, { ...context, signal }), scope)
		} catch (error) {
			if (isAbortError(error) || (error instanceof PipelineError && error.isFatal)) {
				throw error
			}
			scope.signal?.throwIfAborted()
			execResult = await instance.fallback(toError(error), prepResult, context)
		}
		scope.signal?.throwIfAborted()
		return instance.post(execResult, context)
	}
}

export type NodeExecutionResult =
	| { status: 'success'; result: NodeResult }
	| { status: 'failed_with_fallback'; fallbackNodeId: string; error: PipelineError }
	| { status: 'failed'; error: PipelineError }

export interface NodeExecutorConfig<TContext extends object, TDependencies extends object> {
	blueprint: WorkflowBlueprint
	nodeDef: NodeDefinition
	context: ISyncContext<TContext>
	dependencies: TDependencies
	logger: ILogger
	eventBus: IEventBus
	middleware: Middleware<TContext>[]
	strategy: ExecutionStrategy<TContext, TDependencies>
	executionId: string
	signal?: AbortSignal
}

/**
 * Runs one node: middleware chain, execution strategy, lifecycle events.
 */
export class NodeExecutor<TContext extends object, TDependencies extends object> {
	constructor(private config: NodeExecutorConfig<TContext, TDependencies>) {}

	private wrap(error: unknown): PipelineError {
		const { nodeDef, blueprint, executionId } = this.config
		if (error instanceof PipelineError) return error
		return new PipelineError(`Node '${nodeDef.id}' execution failed`, {
			cause: toError(error),
			nodeId: nodeDef.id,
			blueprintId: blueprint.id,
			executionId,
		})
	}

	async execute(input: unknown): Promise<NodeExecutionResult> {
		const { nodeDef, blueprint, executionId, logger, eventBus, middleware, strategy, signal } = this.config
		const asyncContext = new AsyncContextView(this.config.context)

		const nodeContext: NodeContext<TContext, TDependencies> = {
			context: asyncContext,
			input,
			params: nodeDef.params ?? {},
			dependencies: { ...this.config.dependencies, logger },
			signal,
		}
		const scope: AttemptScope = { nodeDef, blueprintId: blueprint.id, executionId, logger, eventBus, signal }

		const coreExecution = async (): Promise<NodeResult> => {
			let result: NodeResult | undefined
			let error: Error | undefined
			try {
				for (const m of middleware) await m.beforeNode?.(asyncContext, nodeDef.id)
				result = await strategy.execute(nodeContext, scope)
				return result
			} catch (e) {
				error = toError(e)
				throw e
			} finally {
				for (const m of middleware) await m.afterNode?.(asyncContext, nodeDef.id, result, error)
			}
		}

		let executionChain = coreExecution
		for (const m of [...middleware].reverse()) {
			const around = m.aroundNode
			if (!around) continue
			const next = executionChain
			executionChain = () => around(asyncContext, nodeDef.id, next)
		}

		await eventBus.emit({ type: 'node:start', payload: { nodeId: nodeDef.id, executionId, blueprintId: blueprint.id } })
		try {
			const result = await executionChain()
			await eventBus.emit({
				type: 'node:finish',
				payload: { nodeId: nodeDef.id, result, executionId, blueprintId: blueprint.id },
			})
			return { status: 'success', result }
		} catch (e) {
			if (isAbortError(e)) throw e
			const error = this.wrap(e)
			await eventBus.emit({
				type: 'node:error',
				payload: { nodeId: nodeDef.id, error, executionId, blueprintId: blueprint.id },
			})
			const fallbackNodeId = nodeDef.config?.fallback
			if (fallbackNodeId && !error.isFatal) {
				logger.warn(`Node failed, fallback required`, {
					nodeId: nodeDef.id,
					fallbackNodeId,
					error: error.message,
					executionId,
				})
				await eventBus.emit({
					type: 'node:fallback',
					payload: { nodeId: nodeDef.id, executionId, fallback: fallbackNodeId, blueprintId: blueprint.id },
				})
				return { status: 'failed_with_fallback', fallbackNodeId, error }
			}
			return { status: 'failed', error }
		}
	}
}
