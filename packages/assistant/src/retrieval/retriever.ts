import type { ILogger } from '@markaz/pipeline'
import type { ModelGateway } from '../model/gateway'
import type { PassageMetadata, RetrievedPassage } from '../types'
import type { PassageIndex } from './passage-store'

export const DEFAULT_TOP_K = 5

/** Human-readable citation: `file - p. 1, 2`, or 'Unknown source'. */
export function formatOrigin(metadata: PassageMetadata): string {
	const parts: string[] = []
	if (metadata.filename) parts.push(metadata.filename)
	if (metadata.pageNumbers.length > 0) parts.push(`p. ${metadata.pageNumbers.join(', ')}`)
	return parts.length > 0 ? parts.join(' - ') : 'Unknown source'
}

/** Renders passages as the grounding block of the system prompt. */
export function formatContext(passages: readonly RetrievedPassage[]): string {
	return passages
		.map((passage) => {
			let block = `${passage.sourceExcerpt}\nSource: ${passage.originReference}`
			if (passage.title) block += `\nTitle: ${passage.title}`
			return block
		})
		.join('\n\n')
}

export class ContextRetriever {
	constructor(
		private readonly index: PassageIndex,
		private readonly model: Pick<ModelGateway, 'embed'>,
		private readonly logger: ILogger,
		private readonly topK: number = DEFAULT_TOP_K,
	) {}

	/**
	 * Embeds `question` and returns up to `topK` passages by descending similarity.
	 * An empty index yields no passages without calling the model.
	 */
	async retrieve(question: string, signal?: AbortSignal): Promise<RetrievedPassage[]> {
		if (this.index.count() === 0) {
			this.logger.warn('Passage index is empty; answering without context')
			return []
		}
		const [vector] = await this.model.embed([question], signal)
		const matches = this.index.search(vector, this.topK)
		this.logger.debug('Retrieved passages', { count: matches.length, best: matches[0]?.score })
		return matches.map(({ passage, score }) => ({
			sourceExcerpt: passage.text,
			similarityScore: score,
			originReference: formatOrigin(passage.metadata),
			title: passage.metadata.title,
		}))
	}
}
