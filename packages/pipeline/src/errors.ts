/**
 * The single error class raised by the pipeline runtime.
 * Node failures are wrapped in it so callers see which node and run failed.
 */
export class PipelineError extends Error {
	public readonly nodeId?: string
	public readonly blueprintId?: string
	public readonly executionId?: string
	public readonly isFatal: boolean

	constructor(
		message: string,
		options: {
			cause?: unknown
			nodeId?: string
			blueprintId?: string
			executionId?: string
			isFatal?: boolean
		} = {},
	) {
		super(message, { cause: options.cause })
		this.name = 'PipelineError'

		this.nodeId = options.nodeId
		this.blueprintId = options.blueprintId
		this.executionId = options.executionId
		this.isFatal = options.isFatal ?? false
	}
}

/** Raised when a single node attempt exceeds its configured `timeout`. */
export class NodeTimeoutError extends PipelineError {
	constructor(
		public readonly timeoutMs: number,
		options: { nodeId: string; blueprintId?: string; executionId?: string },
	) {
		super(`Node '${options.nodeId}' timed out after ${timeoutMs}ms`, options)
		this.name = 'NodeTimeoutError'
	}
}

/** Returns true for the error `AbortSignal.throwIfAborted` raises. */
export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === 'AbortError'
}
