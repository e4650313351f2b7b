import { Command } from 'commander'
import { ExecGitClient, type GitClient } from '../git'
import { consoleOutput, type Output } from '../output'

export const NOT_A_REPOSITORY_MESSAGE = 'Error: not a git repository. Run "git init" and add a remote first.'
export const NO_REMOTE_MESSAGE = 'Error: no git remote configured. Run "git remote add origin <url>" first.'

export interface DeployOptions {
	remote: string
	branch: string
}

const describe = (error: unknown) => (error instanceof Error ? error.message : String(error))

const pad = (value: number) => String(value).padStart(2, '0')

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	return `${day} ${time}`
}

/**
 * Commits everything in the working tree and pushes it to the hosting remote.
 * Returns the process exit code.
 */
export async function runDeploy(
	git: GitClient,
	options: DeployOptions,
	output: Output,
	now: () => Date = () => new Date(),
): Promise<number> {
	if (!(await git.isRepository())) {
		output.error(NOT_A_REPOSITORY_MESSAGE)
		return 1
	}
	const remotes = await git.remotes()
	if (remotes.length === 0) {
		output.error(NO_REMOTE_MESSAGE)
		return 1
	}
	if (!remotes.includes(options.remote)) {
		output.error(`Error: git remote '${options.remote}' is not configured. Known remotes: ${remotes.join(', ')}.`)
		return 1
	}

	try {
		await git.addAll()
		if (await git.hasChanges()) {
			await git.commit(`Deploy: ${formatTimestamp(now())}`)
		} else {
			output.info('Nothing to commit; pushing the current branch.')
		}
	} catch (error) {
		output.error(`Error: could not commit changes. ${describe(error)}`)
		return 1
	}

	try {
		await output.task(`Pushing to ${options.remote}/${options.branch}`, () => git.push(options.remote, options.branch))
	} catch (error) {
		output.error(`Error: push failed. ${describe(error)}`)
		return 1
	}
	output.success(`Deployment pushed to ${options.remote}/${options.branch}.`)
	return 0
}

export const deployCommand = new Command('deploy')
	.description('Commit the working tree and push it to the hosting remote')
	.option('-r, --remote <name>', 'Remote to push to', 'origin')
	.option('-b, --branch <name>', 'Branch to push', 'main')
	.option('--cwd <dir>', 'Repository directory', process.cwd())
	.action(async (options: DeployOptions & { cwd: string }) => {
		process.exitCode = await runDeploy(new ExecGitClient(options.cwd), options, consoleOutput)
	})
