export type AssistantErrorCode =
	| 'configuration'
	| 'access_denied'
	| 'invalid_query'
	| 'index_unavailable'
	| 'upstream_model'
	| 'internal'

/**
 * Base class for every failure the assistant reports to a caller.
 * `statusCode` is the HTTP status the server answers with.
 */
export class AssistantError extends Error {
	constructor(
		message: string,
		public readonly code: AssistantErrorCode,
		public readonly statusCode: number,
		options: { cause?: unknown } = {},
	) {
		super(message, { cause: options.cause })
		this.name = 'AssistantError'
	}
}

export class ConfigurationError extends AssistantError {
	constructor(
		message: string,
		public readonly missing: string[] = [],
	) {
		super(message, 'configuration', 500)
		this.name = 'ConfigurationError'
	}
}

export class AccessDeniedError extends AssistantError {
	constructor(message = 'Access password required.') {
		super(message, 'access_denied', 401)
		this.name = 'AccessDeniedError'
	}
}

export class InvalidQueryError extends AssistantError {
	constructor(message: string) {
		super(message, 'invalid_query', 400)
		this.name = 'InvalidQueryError'
	}
}

export class IndexUnavailableError extends AssistantError {
	constructor(message: string, options: { cause?: unknown } = {}) {
		super(message, 'index_unavailable', 503, options)
		this.name = 'IndexUnavailableError'
	}
}

export type UpstreamFailureKind = 'quota' | 'timeout' | 'malformed' | 'unavailable'

/** A language-model or embedding call that did not produce a usable result. */
export class UpstreamModelError extends AssistantError {
	constructor(
		message: string,
		public readonly kind: UpstreamFailureKind,
		options: { cause?: unknown } = {},
	) {
		super(message, 'upstream_model', 502, options)
		this.name = 'UpstreamModelError'
	}
}
