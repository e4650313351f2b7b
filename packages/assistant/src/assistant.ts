import { FlowRuntime, type IEventBus, type ILogger } from '@markaz/pipeline'
import type { AnswerComposer } from './composer/composer'
import type { AssistantConfig } from './config'
import { AssistantError } from './errors'
import { createQuestionFlow, type QuestionContext, type QuestionDependencies } from './flow'
import type { ContextRetriever } from './retrieval/retriever'
import type { Session } from './session/session'
import type { ChatMessage, ChatReply } from './types'

export interface ReportAssistantOptions {
	retriever: ContextRetriever
	composer: AnswerComposer
	completion: AssistantConfig['completion']
	historyTokenBudget: number
	logger: ILogger
	eventBus?: IEventBus
}

/**
 * Answers questions for sessions. Questions on one session run one at a time,
 * and a question enters the history only together with its reply.
 */
export class ReportAssistant {
	private readonly runtime: FlowRuntime<QuestionContext, QuestionDependencies>
	private readonly flow: ReturnType<typeof createQuestionFlow>
	private readonly historyTokenBudget: number
	private readonly logger: ILogger
	private readonly turns = new WeakMap<Session, Promise<unknown>>()

	constructor(options: ReportAssistantOptions) {
		this.runtime = new FlowRuntime<QuestionContext, QuestionDependencies>({
			dependencies: { retriever: options.retriever, composer: options.composer },
			logger: options.logger,
			eventBus: options.eventBus,
			strict: true,
		})
		this.flow = createQuestionFlow(options.completion)
		this.historyTokenBudget = options.historyTokenBudget
		this.logger = options.logger
	}

	ask(session: Session, question: string, signal?: AbortSignal): Promise<ChatReply> {
		const previous = this.turns.get(session) ?? Promise.resolve()
		// a failed turn is reported to its own caller and must not block the next one
		const turn = previous.catch(() => undefined).then(() => this.answer(session, question, signal))
		this.turns.set(session, turn)
		return turn
	}

	private async answer(session: Session, question: string, signal?: AbortSignal): Promise<ChatReply> {
		const asked: ChatMessage = { role: 'user', content: question }
		const result = await this.runtime.run(
			this.flow.toBlueprint(),
			{ question, history: session.window(this.historyTokenBudget, asked) },
			{ functionRegistry: this.flow.getFunctionRegistry(), signal },
		)

		const reply = result.context.reply
		if (result.status !== 'completed' || !reply) {
			this.logger.error('Question flow did not produce a reply', {
				sessionId: session.id,
				status: result.status,
				errors: result.errors,
			})
			throw new AssistantError('The assistant could not answer this question.', 'internal', 500)
		}

		session.append(asked)
		session.append({ role: 'assistant', content: reply.message })
		this.logger.info('Question answered', {
			sessionId: session.id,
			kind: reply.kind,
			passages: reply.passages.length,
		})
		return reply
	}
}
