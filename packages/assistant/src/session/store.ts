import type { ILogger } from '@markaz/pipeline'
import { NullLogger } from '@markaz/pipeline'
import { Session } from './session'

export interface SessionStoreOptions {
	ttlMs: number
	now?: () => number
	logger?: ILogger
}

/** In-memory sessions keyed by id, expired after `ttlMs` of inactivity. */
export class SessionStore {
	private readonly sessions = new Map<string, Session>()
	private readonly ttlMs: number
	private readonly now: () => number
	private readonly logger: ILogger

	constructor(options: SessionStoreOptions) {
		this.ttlMs = options.ttlMs
		this.now = options.now ?? Date.now
		this.logger = options.logger ?? new NullLogger()
	}

	get size(): number {
		return this.sessions.size
	}

	get(id: string): Session | undefined {
		const session = this.sessions.get(id)
		if (!session) return undefined
		if (this.isExpired(session)) {
			this.sessions.delete(id)
			return undefined
		}
		session.lastSeenAt = this.now()
		return session
	}

	create(): Session {
		const session = new Session(this.now())
		this.sessions.set(session.id, session)
		this.logger.debug('Session created', { sessionId: session.id })
		return session
	}

	/** Returns the live session for `id`, or a fresh one. */
	resolve(id: string | undefined): { session: Session; created: boolean } {
		const existing = id ? this.get(id) : undefined
		if (existing) return { session: existing, created: false }
		return { session: this.create(), created: true }
	}

	/** Drops expired sessions and returns how many were removed. */
	sweep(): number {
		let removed = 0
		for (const [id, session] of this.sessions) {
			if (this.isExpired(session)) {
				this.sessions.delete(id)
				removed++
			}
		}
		if (removed > 0) this.logger.debug('Expired sessions removed', { removed })
		return removed
	}

	private isExpired(session: Session): boolean {
		return this.now() - session.lastSeenAt > this.ttlMs
	}
}
