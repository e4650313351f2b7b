import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError, AzureOpenAI } from 'openai'
import type { AssistantConfig } from '../config'
import { UpstreamModelError } from '../errors'

export interface ModelMessage {
	role: 'system' | 'user' | 'assistant'
	content: string
}

export interface CompletionOptions {
	temperature: number
	maxTokens: number
	signal?: AbortSignal
}

/** The two model capabilities the assistant needs. */
export interface ModelGateway {
	embed(texts: string[], signal?: AbortSignal): Promise<number[][]>
	complete(messages: ModelMessage[], options: CompletionOptions): Promise<string>
}

export interface Deployments {
	chat: string
	embedding: string
}

interface RequestOptions {
	signal?: AbortSignal
}

/** The slice of the SDK client the gateway calls. */
export interface ModelClient {
	chat: {
		completions: {
			create(
				body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
				options?: RequestOptions,
			): Promise<{ choices: Array<{ message: { content: string | null } }> }>
		}
	}
	embeddings: {
		create(
			body: OpenAI.Embeddings.EmbeddingCreateParams,
			options?: RequestOptions,
		): Promise<{ data: Array<{ embedding: number[]; index: number }> }>
	}
}

/**
 * A gateway over an OpenAI-compatible client. On Azure the `model` field
 * names the deployment.
 */
export class OpenAIModelGateway implements ModelGateway {
	constructor(
		private readonly client: ModelClient,
		private readonly deployments: Deployments,
	) {}

	async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		try {
			const response = await this.client.embeddings.create({ model: this.deployments.embedding, input: texts }, { signal })
			const vectors = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding)
			if (vectors.length !== texts.length) {
				throw new UpstreamModelError(`Expected ${texts.length} embeddings, received ${vectors.length}.`, 'malformed')
			}
			return vectors
		} catch (error) {
			throw toUpstreamError(error)
		}
	}

	async complete(messages: ModelMessage[], options: CompletionOptions): Promise<string> {
		try {
			const response = await this.client.chat.completions.create(
				{
					model: this.deployments.chat,
					messages,
					temperature: options.temperature,
					max_tokens: options.maxTokens,
				},
				{ signal: options.signal },
			)
			const content = response.choices[0]?.message.content
			if (typeof content !== 'string' || content.trim() === '') {
				throw new UpstreamModelError('The completion contained no text.', 'malformed')
			}
			return content
		} catch (error) {
			throw toUpstreamError(error)
		}
	}
}

/**
 * Maps SDK failures onto the assistant's upstream categories.
 * Aborts pass through unchanged so cancellation is not mistaken for an outage.
 */
export function toUpstreamError(error: unknown): unknown {
	if (error instanceof UpstreamModelError || error instanceof APIUserAbortError) return error
	if (error instanceof Error && error.name === 'AbortError') return error
	if (error instanceof APIConnectionTimeoutError) {
		return new UpstreamModelError('The model request timed out.', 'timeout', { cause: error })
	}
	if (error instanceof APIConnectionError) {
		return new UpstreamModelError('The model endpoint could not be reached.', 'unavailable', { cause: error })
	}
	if (error instanceof APIError) {
		if (error.status === 429 || error.code === 'insufficient_quota') {
			return new UpstreamModelError('The model quota was exceeded.', 'quota', { cause: error })
		}
		return new UpstreamModelError(`The model endpoint returned status ${error.status ?? 'unknown'}.`, 'unavailable', {
			cause: error,
		})
	}
	return new UpstreamModelError('The model call failed unexpectedly.', 'unavailable', { cause: error })
}

/** Builds the Azure-backed gateway. SDK retries are off; the pipeline owns retry policy. */
export function createAzureModelGateway(config: AssistantConfig): OpenAIModelGateway {
	const client = new AzureOpenAI({
		apiKey: config.azure.apiKey,
		endpoint: config.azure.endpoint,
		apiVersion: config.azure.apiVersion,
		timeout: config.completion.timeoutMs,
		maxRetries: 0,
	})
	return new OpenAIModelGateway(client, {
		chat: config.azure.chatDeployment,
		embedding: config.azure.embeddingDeployment,
	})
}
