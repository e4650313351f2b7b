#!/usr/bin/env node
import 'dotenv/config'
import { Command } from 'commander'
import { checkConfigCommand } from './commands/check-config'
import { checkDocsCommand } from './commands/check-docs'
import { checkIndexCommand } from './commands/check-index'
import { deployCommand } from './commands/deploy'

const program = new Command()

program.name('markaz').description('Markaz report assistant - deployment and diagnostics').version('0.1.0')
program.addCommand(deployCommand)
program.addCommand(checkConfigCommand)
program.addCommand(checkIndexCommand)
program.addCommand(checkDocsCommand)

program.parseAsync().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
