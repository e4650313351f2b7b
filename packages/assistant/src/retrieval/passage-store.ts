import type { ILogger } from '@markaz/pipeline'
import { NullLogger } from '@markaz/pipeline'
import Database from 'better-sqlite3'
import { z } from 'zod'
import { IndexUnavailableError } from '../errors'
import type { PassageMetadata } from '../types'
import { cosineSimilarity } from './similarity'

export interface StoredPassage {
	id: string
	text: string
	metadata: PassageMetadata
	vector: number[]
}

export interface PassageMatch {
	passage: StoredPassage
	score: number
}

/** Read access to an embedded passage collection. */
export interface PassageIndex {
	count(): number
	search(vector: readonly number[], limit: number): PassageMatch[]
}

export interface PassageStoreOptions {
	/** A file path, or `:memory:`. */
	databasePath: string
	table: string
	/** Create the file and table when missing. Off for serving. */
	create?: boolean
	logger?: ILogger
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

const rowSchema = z.object({
	id: z.string(),
	text: z.string(),
	filename: z.string().nullable(),
	page_numbers: z.string().nullable(),
	title: z.string().nullable(),
	vector: z.string(),
})

const numberArray = z.array(z.number())

function openDatabase(options: PassageStoreOptions): Database.Database {
	try {
		return options.create
			? new Database(options.databasePath)
			: new Database(options.databasePath, { readonly: true, fileMustExist: true })
	} catch (error) {
		throw new IndexUnavailableError(`Cannot open passage database at '${options.databasePath}'.`, { cause: error })
	}
}

/**
 * Passages and their embeddings in a single SQLite table. Vectors are stored as
 * JSON arrays and scored in memory; the table is loaded once and cached until written.
 */
export class PassageStore implements PassageIndex {
	private readonly db: Database.Database
	private readonly table: string
	private readonly logger: ILogger
	private cache?: StoredPassage[]

	constructor(options: PassageStoreOptions) {
		if (!IDENTIFIER.test(options.table)) {
			throw new IndexUnavailableError(`Invalid passage table name '${options.table}'.`)
		}
		this.table = options.table
		this.logger = options.logger ?? new NullLogger()

		this.db = openDatabase(options)

		if (options.create) {
			this.db.exec(`
				CREATE TABLE IF NOT EXISTS ${this.table} (
					id TEXT PRIMARY KEY,
					text TEXT NOT NULL,
					filename TEXT,
					page_numbers TEXT,
					title TEXT,
					vector TEXT NOT NULL
				)
			`)
		} else if (!this.hasTable()) {
			this.db.close()
			throw new IndexUnavailableError(`Table '${this.table}' not found in '${options.databasePath}'.`)
		}
	}

	count(): number {
		const row = z.object({ total: z.number() }).parse(this.db.prepare(`SELECT COUNT(*) AS total FROM ${this.table}`).get())
		return row.total
	}

	/** The vector width of the first stored passage, if any. */
	dimensions(): number | undefined {
		return this.load()[0]?.vector.length
	}

	/**
	 * Scores every passage against `vector` and returns the best `limit`, highest first.
	 * Rows whose width differs from the query are skipped.
	 */
	search(vector: readonly number[], limit: number): PassageMatch[] {
		const passages = this.load()
		const matches: PassageMatch[] = []
		let skipped = 0
		for (const passage of passages) {
			if (passage.vector.length !== vector.length) {
				skipped++
				continue
			}
			matches.push({ passage, score: cosineSimilarity(vector, passage.vector) })
		}
		if (skipped > 0) {
			this.logger.warn('Skipped passages with mismatched vector dimensions', {
				skipped,
				expected: vector.length,
			})
		}
		return matches.sort((a, b) => b.score - a.score).slice(0, limit)
	}

	insert(passages: StoredPassage[]): void {
		const statement = this.db.prepare(
			`INSERT OR REPLACE INTO ${this.table} (id, text, filename, page_numbers, title, vector) VALUES (?, ?, ?, ?, ?, ?)`,
		)
		const insertAll = this.db.transaction((rows: StoredPassage[]) => {
			for (const row of rows) {
				statement.run(
					row.id,
					row.text,
					row.metadata.filename,
					JSON.stringify(row.metadata.pageNumbers),
					row.metadata.title,
					JSON.stringify(row.vector),
				)
			}
		})
		insertAll(passages)
		this.cache = undefined
	}

	close(): void {
		this.db.close()
	}

	private hasTable(): boolean {
		const row = this.db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`).get(this.table)
		return row !== undefined
	}

	private load(): StoredPassage[] {
		if (this.cache) return this.cache
		const rows = z.array(rowSchema).parse(this.db.prepare(`SELECT id, text, filename, page_numbers, title, vector FROM ${this.table}`).all())
		this.cache = rows.map((row) => ({
			id: row.id,
			text: row.text,
			metadata: {
				filename: row.filename,
				pageNumbers: row.page_numbers ? numberArray.parse(JSON.parse(row.page_numbers)) : [],
				title: row.title,
			},
			vector: numberArray.parse(JSON.parse(row.vector)),
		}))
		this.logger.debug('Passage index loaded', { table: this.table, passages: this.cache.length })
		return this.cache
	}
}
