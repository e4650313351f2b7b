import { IndexUnavailableError, PassageStore } from '@markaz/assistant'
import { Command } from 'commander'
import { consoleOutput, type Output } from '../output'

export interface CheckIndexOptions {
	db: string
	table: string
}

/** Opens the passage database read-only and reports what it holds. */
export async function runCheckIndex(options: CheckIndexOptions, output: Output): Promise<number> {
	let store: PassageStore
	try {
		store = new PassageStore({ databasePath: options.db, table: options.table })
	} catch (error) {
		if (!(error instanceof IndexUnavailableError)) throw error
		output.error(`Error: ${error.message}`)
		output.info('Set DB_PATH (and PASSAGE_TABLE) to the database produced by the ingestion step.')
		return 1
	}

	try {
		const count = store.count()
		if (count === 0) {
			output.error(`Error: table '${options.table}' in ${options.db} contains no passages.`)
			return 1
		}
		output.info(`Database: ${options.db}`)
		output.info(`Table: ${options.table}`)
		output.info(`Passages: ${count}`)
		output.info(`Vector dimensions: ${store.dimensions() ?? 'unknown'}`)
		output.success('Passage index is ready.')
		return 0
	} finally {
		store.close()
	}
}

export const checkIndexCommand = new Command('check-index')
	.description('Verify the passage database the assistant searches')
	.option('--db <path>', 'SQLite database path', process.env.DB_PATH ?? 'data/passages.db')
	.option('--table <name>', 'Passage table', process.env.PASSAGE_TABLE ?? 'report_passages')
	.action(async (options: CheckIndexOptions) => {
		process.exitCode = await runCheckIndex(options, consoleOutput)
	})
