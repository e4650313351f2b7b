import { z } from 'zod'
import { ConfigurationError } from './errors'
import type { LogLevel } from '@markaz/pipeline'

export const DEFAULT_API_VERSION = '2024-02-15-preview'

const logLevels = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[]

const envSchema = z.object({
	AZURE_OPENAI_API_KEY: z.string(),
	AZURE_OPENAI_ENDPOINT: z.string().url(),
	AZURE_OPENAI_DEPLOYMENT_NAME: z.string(),
	AZURE_OPENAI_EMBEDDING_DEPLOYMENT_NAME: z.string(),
	AZURE_OPENAI_API_VERSION: z.string().default(DEFAULT_API_VERSION),
	DB_PATH: z.string().default('data/passages.db'),
	PASSAGE_TABLE: z
		.string()
		.regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier')
		.default('report_passages'),
	REPORT_TITLE: z.string().default('Real Estate Report'),
	ENVIRONMENT: z.string().default('development'),
	ACCESS_PASSWORD: z.string().optional(),
	PORT: z.coerce.number().int().min(1).max(65535).default(8501),
	HOST: z.string().default('0.0.0.0'),
	LOG_LEVEL: z.enum(logLevels).default('info'),
	RETRIEVAL_TOP_K: z.coerce.number().int().min(1).default(5),
	HISTORY_TOKEN_BUDGET: z.coerce.number().int().min(1).default(3000),
	SESSION_IDLE_TTL_MS: z.coerce.number().int().min(1).default(3_600_000),
	COMPLETION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
	COMPLETION_MAX_TOKENS: z.coerce.number().int().min(1).default(300),
	COMPLETION_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
	COMPLETION_MAX_RETRIES: z.coerce.number().int().min(1).default(2),
})

/** Variables without which the assistant cannot reach the model. */
export const REQUIRED_VARIABLES = [
	'AZURE_OPENAI_API_KEY',
	'AZURE_OPENAI_ENDPOINT',
	'AZURE_OPENAI_DEPLOYMENT_NAME',
	'AZURE_OPENAI_EMBEDDING_DEPLOYMENT_NAME',
] as const

/** Every variable the assistant reads, in documentation order. */
export const CONFIG_VARIABLES = Object.keys(envSchema.shape)

export interface AssistantConfig {
	azure: {
		apiKey: string
		endpoint: string
		apiVersion: string
		chatDeployment: string
		embeddingDeployment: string
	}
	index: {
		databasePath: string
		table: string
		topK: number
	}
	completion: {
		temperature: number
		maxTokens: number
		timeoutMs: number
		maxRetries: number
	}
	session: {
		historyTokenBudget: number
		ttlMs: number
	}
	access: {
		environment: string
		password?: string
	}
	server: {
		host: string
		port: number
	}
	reportTitle: string
	logLevel: LogLevel
}

/**
 * Reads and validates the assistant configuration. Empty strings count as unset.
 * The returned object is frozen; call once at startup and pass it down.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
	const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''))

	const missing = REQUIRED_VARIABLES.filter((name) => !(name in present))
	if (missing.length > 0) {
		throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, [...missing])
	}

	const parsed = envSchema.safeParse(present)
	if (!parsed.success) {
		const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
		throw new ConfigurationError(`Invalid environment variables: ${problems.join('; ')}`)
	}

	const vars = parsed.data
	return deepFreeze({
		azure: {
			apiKey: vars.AZURE_OPENAI_API_KEY,
			endpoint: vars.AZURE_OPENAI_ENDPOINT,
			apiVersion: vars.AZURE_OPENAI_API_VERSION,
			chatDeployment: vars.AZURE_OPENAI_DEPLOYMENT_NAME,
			embeddingDeployment: vars.AZURE_OPENAI_EMBEDDING_DEPLOYMENT_NAME,
		},
		index: {
			databasePath: vars.DB_PATH,
			table: vars.PASSAGE_TABLE,
			topK: vars.RETRIEVAL_TOP_K,
		},
		completion: {
			temperature: vars.COMPLETION_TEMPERATURE,
			maxTokens: vars.COMPLETION_MAX_TOKENS,
			timeoutMs: vars.COMPLETION_TIMEOUT_MS,
			maxRetries: vars.COMPLETION_MAX_RETRIES,
		},
		session: {
			historyTokenBudget: vars.HISTORY_TOKEN_BUDGET,
			ttlMs: vars.SESSION_IDLE_TTL_MS,
		},
		access: {
			environment: vars.ENVIRONMENT,
			password: vars.ACCESS_PASSWORD,
		},
		server: {
			host: vars.HOST,
			port: vars.PORT,
		},
		reportTitle: vars.REPORT_TITLE,
		logLevel: vars.LOG_LEVEL,
	})
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const child of Object.values(value)) {
		if (typeof child === 'object' && child !== null) deepFreeze(child)
	}
	return Object.freeze(value)
}
