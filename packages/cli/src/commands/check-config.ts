import {
	type AssistantConfig,
	ConfigurationError,
	createAzureModelGateway,
	type ModelGateway,
	loadConfig,
	REQUIRED_VARIABLES,
	UpstreamModelError,
} from '@markaz/assistant'
import { Command } from 'commander'
import { table } from 'table'
import { consoleOutput, type Output } from '../output'

export interface CheckConfigOptions {
	ping?: boolean
}

function mask(value: string): string {
	return value.length <= 8 ? '********' : `${value.slice(0, 4)}…${value.slice(-4)}`
}

/**
 * Validates the environment and, with `ping`, sends a one-line completion
 * to prove the chat deployment answers.
 */
export async function runCheckConfig(
	env: NodeJS.ProcessEnv,
	options: CheckConfigOptions,
	output: Output,
	createGateway: (config: AssistantConfig) => Pick<ModelGateway, 'complete'> = createAzureModelGateway,
): Promise<number> {
	let config: AssistantConfig
	try {
		config = loadConfig(env)
	} catch (error) {
		if (!(error instanceof ConfigurationError)) throw error
		output.error(error.message)
		if (error.missing.length > 0) output.info('Add them to .env or the hosting platform secrets.')
		return 1
	}

	output.info(
		table([
			['Variable', 'Value'],
			['AZURE_OPENAI_ENDPOINT', config.azure.endpoint],
			['AZURE_OPENAI_API_KEY', mask(config.azure.apiKey)],
			['AZURE_OPENAI_API_VERSION', config.azure.apiVersion],
			['AZURE_OPENAI_DEPLOYMENT_NAME', config.azure.chatDeployment],
			['AZURE_OPENAI_EMBEDDING_DEPLOYMENT_NAME', config.azure.embeddingDeployment],
			['DB_PATH', config.index.databasePath],
			['ENVIRONMENT', config.access.environment],
		]),
	)
	output.success(`All ${REQUIRED_VARIABLES.length} required variables are set.`)
	if (!options.ping) return 0

	const gateway = createGateway(config)
	try {
		const reply = await output.task(`Calling deployment '${config.azure.chatDeployment}'`, () =>
			gateway.complete([{ role: 'user', content: 'Reply with the single word OK.' }], {
				temperature: 0,
				maxTokens: 5,
			}),
		)
		output.success(`Deployment '${config.azure.chatDeployment}' responded: ${reply.trim()}`)
		return 0
	} catch (error) {
		const detail = error instanceof UpstreamModelError ? `${error.kind}: ${error.message}` : String(error)
		output.error(`Error: the chat deployment did not respond (${detail}).`)
		return 1
	}
}

export const checkConfigCommand = new Command('check-config')
	.description('Validate the environment the assistant needs')
	.option('--ping', 'Send a test completion to the chat deployment')
	.action(async (options: CheckConfigOptions) => {
		process.exitCode = await runCheckConfig(process.env, options, consoleOutput)
	})
