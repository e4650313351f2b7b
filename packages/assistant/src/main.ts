import 'dotenv/config'
import { readFile } from 'node:fs/promises'
import { ConsoleLogger } from '@markaz/pipeline'
import { ReportAssistant } from './assistant'
import { AnswerComposer } from './composer/composer'
import { loadConfig } from './config'
import { AssistantError } from './errors'
import { AccessGate } from './gateway'
import { createAzureModelGateway } from './model/gateway'
import { PassageStore } from './retrieval/passage-store'
import { ContextRetriever } from './retrieval/retriever'
import { createServerApp } from './server/app'
import { close, listen } from './server/http'
import { SessionStore } from './session/store'

const SWEEP_INTERVAL_MS = 60_000

async function main() {
	const config = loadConfig()
	const logger = new ConsoleLogger({ level: config.logLevel })

	const model = createAzureModelGateway(config)
	const store = new PassageStore({ databasePath: config.index.databasePath, table: config.index.table, logger })
	logger.info('Passage index opened', { path: config.index.databasePath, passages: store.count() })

	const assistant = new ReportAssistant({
		retriever: new ContextRetriever(store, model, logger, config.index.topK),
		composer: new AnswerComposer(model, { reportTitle: config.reportTitle, ...config.completion }, logger),
		completion: config.completion,
		historyTokenBudget: config.session.historyTokenBudget,
		logger,
	})
	const sessions = new SessionStore({ ttlMs: config.session.ttlMs, logger })
	const gate = new AccessGate(config.access, logger)
	if (gate.enabled && config.access.password === undefined) {
		logger.error('ENVIRONMENT is production but ACCESS_PASSWORD is not set; all logins will be refused.')
	}

	const app = createServerApp({
		assistant,
		gate,
		sessions,
		index: store,
		logger,
		indexHtml: await readFile(new URL('../public/index.html', import.meta.url), 'utf8'),
		secureCookies: config.access.environment === 'production',
	})
	const server = await listen(app, config.server, logger)
	const sweeper = setInterval(() => sessions.sweep(), SWEEP_INTERVAL_MS)
	sweeper.unref()

	const shutdown = (signal: string) => {
		logger.info(`Received ${signal}, shutting down`)
		clearInterval(sweeper)
		close(server)
			.then(() => store.close())
			.catch((error: unknown) => logger.error('Shutdown failed', { error: String(error) }))
	}
	process.once('SIGINT', shutdown)
	process.once('SIGTERM', shutdown)
}

main().catch((error: unknown) => {
	if (error instanceof AssistantError) {
		console.error(`[ERROR] ${error.message}`)
		if (error.code === 'index_unavailable') {
			console.error('Check DB_PATH and PASSAGE_TABLE, then run `markaz check-index`.')
		}
	} else {
		console.error(error)
	}
	process.exit(1)
})
