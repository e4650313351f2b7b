import { type ILogger, NodeTimeoutError } from '@markaz/pipeline'
import { UpstreamModelError, type UpstreamFailureKind } from '../errors'
import type { ModelGateway, ModelMessage } from '../model/gateway'
import { formatContext } from '../retrieval/retriever'
import type { ChatMessage, ChatReply, RetrievedPassage } from '../types'
import { detectDefinitionRequest, formatDefinitionResponse } from './definition'
import { buildSystemPrompt } from './prompt'

export const DEGRADED_MESSAGES: Record<UpstreamFailureKind, string> = {
	quota: 'The assistant has reached its usage quota. Please try again later.',
	timeout: 'The language model took too long to respond. Please try again.',
	malformed: 'The language model returned an unexpected response. Please try again.',
	unavailable: 'The assistant could not reach the language model right now. Please try again later.',
}

export interface ComposerOptions {
	reportTitle: string
	temperature: number
	maxTokens: number
}

export class AnswerComposer {
	constructor(
		private readonly model: Pick<ModelGateway, 'complete'>,
		private readonly options: ComposerOptions,
		private readonly logger: ILogger,
	) {}

	/** `[system, ...history]`; the history already ends with the question. */
	buildMessages(history: readonly ChatMessage[], passages: readonly RetrievedPassage[]): ModelMessage[] {
		const system = buildSystemPrompt(formatContext(passages), this.options.reportTitle)
		return [{ role: 'system', content: system }, ...history]
	}

	async compose(
		question: string,
		history: readonly ChatMessage[],
		passages: RetrievedPassage[],
		signal?: AbortSignal,
	): Promise<ChatReply> {
		const answer = await this.model.complete(this.buildMessages(history, passages), {
			temperature: this.options.temperature,
			maxTokens: this.options.maxTokens,
			signal,
		})
		const message = detectDefinitionRequest(question) ? formatDefinitionResponse(answer) : answer
		return { kind: 'answer', message, passages }
	}

	/** The reply sent when the model could not produce an answer. */
	degrade(error: unknown, passages: RetrievedPassage[]): ChatReply {
		const kind = failureKind(error)
		this.logger.error('Answer composition failed; sending degraded reply', {
			kind,
			error: error instanceof Error ? error.message : String(error),
		})
		return { kind: 'degraded', message: DEGRADED_MESSAGES[kind], passages }
	}
}

function failureKind(error: unknown): UpstreamFailureKind {
	if (error instanceof UpstreamModelError) return error.kind
	if (error instanceof NodeTimeoutError) return 'timeout'
	return 'unavailable'
}
