import { randomUUID } from 'node:crypto'
import type { ChatMessage } from '../types'

/** Per-message overhead for role and separators. */
const MESSAGE_OVERHEAD_TOKENS = 4

/** A rough token count: four characters per token plus a fixed overhead. */
export function estimateTokens(message: ChatMessage): number {
	return Math.ceil(message.content.length / 4) + MESSAGE_OVERHEAD_TOKENS
}

/**
 * One visitor's conversation. History grows for the life of the session;
 * only the prompt window is bounded.
 */
export class Session {
	readonly id: string
	authenticated = false
	lastSeenAt: number
	private readonly messages: ChatMessage[] = []

	constructor(now: number = Date.now(), id: string = randomUUID()) {
		this.id = id
		this.lastSeenAt = now
	}

	get history(): readonly ChatMessage[] {
		return this.messages
	}

	append(message: ChatMessage): void {
		this.messages.push({ ...message })
	}

	clear(): void {
		this.messages.length = 0
	}

	/**
	 * The newest messages that fit in `tokenBudget`, oldest first, followed by
	 * `next` when given. The last message is always included.
	 */
	window(tokenBudget: number, next?: ChatMessage): ChatMessage[] {
		const candidates = next ? [...this.messages, next] : this.messages
		const selected: ChatMessage[] = []
		let used = 0
		for (let i = candidates.length - 1; i >= 0; i--) {
			const message = candidates[i]
			const cost = estimateTokens(message)
			if (selected.length > 0 && used + cost > tokenBudget) break
			selected.unshift(message)
			used += cost
		}
		return selected
	}
}
