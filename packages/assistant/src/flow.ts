import { BaseNode, createFlow, type NodeContext, type NodeResult } from '@markaz/pipeline'
import type { AnswerComposer } from './composer/composer'
import type { AssistantConfig } from './config'
import { formatContext, type ContextRetriever } from './retrieval/retriever'
import type { ChatMessage, ChatReply, RetrievedPassage } from './types'
import { renderChartReply } from './visualization/chart'
import { detectVisualizationRequest } from './visualization/intent'

/** State shared by the nodes of one question. */
export interface QuestionContext {
	question: string
	/** The prompt window, ending with the question itself. */
	history: ChatMessage[]
	passages: RetrievedPassage[]
	reply: ChatReply
}

export interface QuestionDependencies {
	retriever: ContextRetriever
	composer: AnswerComposer
}

type QuestionNodeContext = NodeContext<QuestionContext, QuestionDependencies>

export type QuestionAction = 'chart' | 'answer'

async function requireQuestion(ctx: QuestionNodeContext): Promise<string> {
	const question = await ctx.context.get('question')
	if (question === undefined) throw new Error('Question flow started without a question.')
	return question
}

async function retrievePassages(ctx: QuestionNodeContext): Promise<NodeResult<RetrievedPassage[]>> {
	const question = await requireQuestion(ctx)
	const passages = await ctx.dependencies.retriever.retrieve(question, ctx.signal)
	await ctx.context.set('passages', passages)
	return { output: passages }
}

/** Runs in place of retrieval when the embedding call fails. */
async function continueWithoutPassages(ctx: QuestionNodeContext): Promise<NodeResult<RetrievedPassage[]>> {
	ctx.dependencies.logger.warn('Retrieval failed; continuing without report context')
	await ctx.context.set('passages', [])
	return { output: [] }
}

async function routeQuestion(ctx: QuestionNodeContext): Promise<NodeResult<undefined, QuestionAction>> {
	const question = await requireQuestion(ctx)
	return { action: detectVisualizationRequest(question) ? 'chart' : 'answer' }
}

async function renderChart(ctx: QuestionNodeContext): Promise<NodeResult<ChatReply>> {
	const question = await requireQuestion(ctx)
	const passages = (await ctx.context.get('passages')) ?? []
	const reply = renderChartReply(question, formatContext(passages), passages)
	await ctx.context.set('reply', reply)
	return { output: reply }
}

interface ComposePrep {
	question: string
	history: ChatMessage[]
	passages: RetrievedPassage[]
}

/**
 * Asks the model for an answer. Only the completion call is retried; once
 * every attempt fails the reply degrades instead of failing the run.
 */
export class ComposeAnswerNode extends BaseNode<QuestionContext, QuestionDependencies, ComposePrep, ChatReply> {
	async prep(ctx: QuestionNodeContext): Promise<ComposePrep> {
		return {
			question: await requireQuestion(ctx),
			history: (await ctx.context.get('history')) ?? [],
			passages: (await ctx.context.get('passages')) ?? [],
		}
	}

	async exec(prep: ComposePrep, ctx: QuestionNodeContext): Promise<NodeResult<ChatReply>> {
		const history = prep.history.length > 0 ? prep.history : [{ role: 'user' as const, content: prep.question }]
		const reply = await ctx.dependencies.composer.compose(prep.question, history, prep.passages, ctx.signal)
		return { output: reply }
	}

	async fallback(error: Error, prep: ComposePrep, ctx: QuestionNodeContext): Promise<NodeResult<ChatReply>> {
		return { output: ctx.dependencies.composer.degrade(error, prep.passages) }
	}

	async post(result: NodeResult<ChatReply>, ctx: QuestionNodeContext): Promise<NodeResult<ChatReply>> {
		if (result.output) await ctx.context.set('reply', result.output)
		return result
	}
}

export const QUESTION_FLOW_ID = 'answer-question'

export function createQuestionFlow(completion: AssistantConfig['completion']) {
	return createFlow<QuestionContext, QuestionDependencies>(QUESTION_FLOW_ID)
		.node('retrieve', retrievePassages, { config: { fallback: 'retrieve-failed' } })
		.node('retrieve-failed', continueWithoutPassages)
		.node('route', routeQuestion)
		.node('render-chart', renderChart)
		.node('compose-answer', ComposeAnswerNode, {
			config: { maxRetries: completion.maxRetries, timeout: completion.timeoutMs, retryDelay: 250 },
		})
		.edge('retrieve', 'route')
		.edge('retrieve-failed', 'route')
		.edge('route', 'render-chart', { action: 'chart' })
		.edge('route', 'compose-answer', { action: 'answer' })
}
