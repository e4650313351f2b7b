import type { ILogger } from '@markaz/pipeline'
import {
	type App,
	createApp,
	createError,
	createRouter,
	defineEventHandler,
	type EventHandlerRequest,
	getCookie,
	type H3Error,
	type H3Event,
	isError,
	readBody,
	sendNoContent,
	setCookie,
	setResponseHeader,
} from 'h3'
import type { ReportAssistant } from '../assistant'
import { AssistantError } from '../errors'
import { type AccessGate, parseQuestion } from '../gateway'
import type { PassageIndex } from '../retrieval/passage-store'
import type { Session } from '../session/session'
import type { SessionStore } from '../session/store'

export const SESSION_COOKIE = 'markaz_session'

export interface ServerOptions {
	assistant: Pick<ReportAssistant, 'ask'>
	gate: AccessGate
	sessions: SessionStore
	index: Pick<PassageIndex, 'count'>
	logger: ILogger
	/** The chat page served at `/`. */
	indexHtml: string
	secureCookies?: boolean
}

export function createServerApp(options: ServerOptions): App {
	const { assistant, gate, sessions, index, logger } = options

	const toHttpError = (error: unknown): H3Error => {
		if (error instanceof AssistantError && error.statusCode < 500) {
			return createError({ statusCode: error.statusCode, statusMessage: error.message, data: { code: error.code } })
		}
		if (isError(error)) return error
		logger.error('Request failed', { error: error instanceof Error ? error.message : String(error) })
		return createError({ statusCode: 500, statusMessage: 'Internal server error', data: { code: 'internal' } })
	}

	const handle = <T>(handler: (event: H3Event<EventHandlerRequest>) => Promise<T>) =>
		defineEventHandler(async (event) => {
			try {
				return await handler(event)
			} catch (error) {
				throw toHttpError(error)
			}
		})

	const sessionFor = (event: H3Event): Session => {
		const { session, created } = sessions.resolve(getCookie(event, SESSION_COOKIE))
		if (created) {
			setCookie(event, SESSION_COOKIE, session.id, {
				httpOnly: true,
				sameSite: 'lax',
				path: '/',
				secure: options.secureCookies ?? false,
			})
		}
		return session
	}

	const router = createRouter()
		.get(
			'/',
			handle(async (event) => {
				setResponseHeader(event, 'content-type', 'text/html; charset=utf-8')
				return options.indexHtml
			}),
		)
		.get(
			'/api/health',
			handle(async () => ({ status: 'ok', passages: index.count() })),
		)
		.post(
			'/api/login',
			handle(async (event) => {
				const session = sessionFor(event)
				if (!gate.authenticate(session, await readBody(event))) {
					throw createError({ statusCode: 401, statusMessage: 'Incorrect password.', data: { code: 'access_denied' } })
				}
				return sendNoContent(event)
			}),
		)
		.get(
			'/api/history',
			handle(async (event) => {
				const session = sessionFor(event)
				gate.admit(session)
				return { messages: session.history }
			}),
		)
		.delete(
			'/api/history',
			handle(async (event) => {
				const session = sessionFor(event)
				gate.admit(session)
				session.clear()
				return sendNoContent(event)
			}),
		)
		.post(
			'/api/chat',
			handle(async (event) => {
				const session = sessionFor(event)
				gate.admit(session)
				const question = parseQuestion(await readBody(event))
				return assistant.ask(session, question)
			}),
		)

	const app = createApp({
		onRequest(event) {
			logger.debug('Request', { method: event.method, path: event.path })
		},
	})
	app.use(router)
	return app
}
