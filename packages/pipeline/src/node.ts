import type { NodeClass, NodeContext, NodeImplementation, NodeResult, RuntimeDependencies } from './types'

/** A type guard to reliably distinguish a NodeClass from a NodeFunction. */
export function isNodeClass<TContext extends object, TDependencies extends object>(
	impl: NodeImplementation<TContext, TDependencies>,
): impl is NodeClass<TContext, TDependencies> {
	return impl.prototype instanceof BaseNode
}

/**
 * A structured, class-based node for logic that needs a granular lifecycle.
 * Only `exec` is retried; `fallback` runs once every attempt has failed.
 */
export abstract class BaseNode<
	TContext extends object = Record<string, unknown>,
	TDependencies extends object = RuntimeDependencies,
	TPrep = unknown,
	TOutput = unknown,
	TAction extends string = string,
> {
	/**
	 * @param params Static parameters for this node instance, passed from the blueprint.
	 */
	constructor(protected params: Record<string, unknown> = {}) {}

	/**
	 * Phase 1: Gathers and prepares data for execution. This phase is NOT retried on failure.
	 */
	abstract prep(context: NodeContext<TContext, TDependencies>): Promise<TPrep>

	/**
	 * Phase 2: Performs the core, isolated logic. This is the ONLY phase that is retried.
	 */
	abstract exec(prepResult: TPrep, context: NodeContext<TContext, TDependencies>): Promise<NodeResult<TOutput, TAction>>

	/**
	 * Phase 3: Processes the result and saves state. This phase is NOT retried.
	 */
	async post(
		execResult: NodeResult<TOutput, TAction>,
		_context: NodeContext<TContext, TDependencies>,
	): Promise<NodeResult<TOutput, TAction>> {
		return execResult
	}

	/**
	 * An optional safety net that runs if all `exec` retries fail.
	 * By default, re-throws the error, failing the node.
	 */
	async fallback(
		error: Error,
		_prepResult: TPrep,
		_context: NodeContext<TContext, TDependencies>,
	): Promise<NodeResult<TOutput, TAction>> {
		throw error
	}
}
