import { createHash, timingSafeEqual } from 'node:crypto'
import type { ILogger } from '@markaz/pipeline'
import { z } from 'zod'
import type { AssistantConfig } from './config'
import { AccessDeniedError, InvalidQueryError } from './errors'
import type { Session } from './session/session'

export const MAX_QUESTION_LENGTH = 2000

export const chatRequestSchema = z.object({
	question: z
		.string({ required_error: 'A question is required.', invalid_type_error: 'The question must be text.' })
		.trim()
		.min(1, 'The question must not be empty.')
		.max(MAX_QUESTION_LENGTH, `The question must be at most ${MAX_QUESTION_LENGTH} characters.`),
})

export const loginRequestSchema = z.object({
	password: z.string({ required_error: 'A password is required.' }),
})

/** Validates a chat request body and returns the trimmed question. */
export function parseQuestion(body: unknown): string {
	const parsed = chatRequestSchema.safeParse(body)
	if (!parsed.success) {
		throw new InvalidQueryError(parsed.error.issues[0]?.message ?? 'Invalid question.')
	}
	return parsed.data.question
}

/**
 * Decides which sessions may ask questions.
 *
 * Gating is on in production or whenever a password is configured. A gated
 * deployment without a password rejects every login rather than opening up.
 */
export class AccessGate {
	constructor(
		private readonly access: AssistantConfig['access'],
		private readonly logger: ILogger,
	) {}

	get enabled(): boolean {
		return this.access.environment === 'production' || this.access.password !== undefined
	}

	isAdmitted(session: Session): boolean {
		return !this.enabled || session.authenticated
	}

	/** Throws unless the session may submit queries. */
	admit(session: Session): void {
		if (!this.isAdmitted(session)) throw new AccessDeniedError()
	}

	authenticate(session: Session, body: unknown): boolean {
		if (!this.enabled) {
			session.authenticated = true
			return true
		}
		const parsed = loginRequestSchema.safeParse(body)
		if (!parsed.success) throw new InvalidQueryError(parsed.error.issues[0]?.message ?? 'Invalid login request.')

		if (this.access.password === undefined) {
			this.logger.error('Access gating is enabled but ACCESS_PASSWORD is not set; refusing login.')
			return false
		}
		const accepted = constantTimeEquals(parsed.data.password, this.access.password)
		if (accepted) session.authenticated = true
		else this.logger.warn('Rejected login attempt', { sessionId: session.id })
		return accepted
	}
}

function constantTimeEquals(candidate: string, expected: string): boolean {
	const digest = (value: string) => createHash('sha256').update(value).digest()
	return timingSafeEqual(digest(candidate), digest(expected))
}
