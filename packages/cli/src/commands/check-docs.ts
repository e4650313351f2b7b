import { readFile } from 'node:fs/promises'
import { Command } from 'commander'
import { compareVariables, extractEnvBlock } from '../docs'
import { consoleOutput, type Output } from '../output'

export const README_HEADING = 'Deployment secrets'
export const GUIDE_HEADING = 'Configuration'

export interface CheckDocsOptions {
	readme: string
	guide: string
}

/** Fails when the README secrets block and the migration guide name different variables. */
export function checkDocs(readme: string, guide: string, output: Output): number {
	const secrets = extractEnvBlock(readme, README_HEADING)
	const configuration = extractEnvBlock(guide, GUIDE_HEADING)
	if (!secrets) {
		output.error(`Error: no fenced block under a "${README_HEADING}" heading in the README.`)
		return 1
	}
	if (!configuration) {
		output.error(`Error: no fenced block under a "${GUIDE_HEADING}" heading in the migration guide.`)
		return 1
	}

	const drift = compareVariables(secrets, configuration)
	if (drift.onlyInFirst.length === 0 && drift.onlyInSecond.length === 0) {
		output.success(`README and migration guide agree on ${secrets.length} variables.`)
		return 0
	}
	if (drift.onlyInFirst.length > 0) {
		output.error(`Only in README: ${drift.onlyInFirst.join(', ')}`)
	}
	if (drift.onlyInSecond.length > 0) {
		output.error(`Only in migration guide: ${drift.onlyInSecond.join(', ')}`)
	}
	return 1
}

export const checkDocsCommand = new Command('check-docs')
	.description('Check that deployment docs name the same environment variables')
	.option('--readme <path>', 'README path', 'README.md')
	.option('--guide <path>', 'Migration guide path', 'docs/azure-migration.md')
	.action(async (options: CheckDocsOptions) => {
		const [readme, guide] = await Promise.all([readFile(options.readme, 'utf8'), readFile(options.guide, 'utf8')])
		process.exitCode = checkDocs(readme, guide, consoleOutput)
	})
