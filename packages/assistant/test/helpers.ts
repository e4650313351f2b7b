import type { CompletionOptions, ModelGateway, ModelMessage } from '../src/model/gateway'
import { PassageStore, type StoredPassage } from '../src/retrieval/passage-store'

/** A scripted model: embeddings by exact text, completions from a queue. */
export class FakeModel implements ModelGateway {
	readonly embeddings = new Map<string, number[]>()
	readonly completions: Array<string | Error> = []
	readonly embedCalls: string[][] = []
	readonly completeCalls: Array<{ messages: ModelMessage[]; options: CompletionOptions }> = []
	defaultVector = [1, 0, 0]
	embedError?: Error

	async embed(texts: string[]): Promise<number[][]> {
		this.embedCalls.push(texts)
		if (this.embedError) throw this.embedError
		return texts.map((text) => this.embeddings.get(text) ?? this.defaultVector)
	}

	async complete(messages: ModelMessage[], options: CompletionOptions): Promise<string> {
		this.completeCalls.push({ messages, options })
		const next = this.completions.shift()
		if (next instanceof Error) throw next
		return next ?? 'OK'
	}
}

export function passage(id: string, text: string, vector: number[], page: number, title: string | null = null): StoredPassage {
	return { id, text, vector, metadata: { filename: 'report.pdf', pageNumbers: [page], title } }
}

export function createMemoryStore(passages: StoredPassage[] = []): PassageStore {
	const store = new PassageStore({ databasePath: ':memory:', table: 'report_passages', create: true })
	store.insert(passages)
	return store
}

export const COMPLETION = { temperature: 0.7, maxTokens: 300, timeoutMs: 1000, maxRetries: 2 }
