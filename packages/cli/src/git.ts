import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

const execFileAsync = promisify(execFile)

/** The git operations `deploy` needs. */
export interface GitClient {
	isRepository(): Promise<boolean>
	remotes(): Promise<string[]>
	hasChanges(): Promise<boolean>
	addAll(): Promise<void>
	commit(message: string): Promise<void>
	push(remote: string, branch: string): Promise<void>
}

export class GitCommandError extends Error {
	constructor(
		public readonly args: string[],
		public readonly stderr: string,
		options: { cause?: unknown } = {},
	) {
		super(`git ${args.join(' ')} failed${stderr ? `: ${stderr.trim()}` : ''}`, options)
		this.name = 'GitCommandError'
	}
}

function stderrOf(error: unknown): string {
	if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
		return error.stderr
	}
	return ''
}

/** Runs the `git` binary in `cwd`. */
export class ExecGitClient implements GitClient {
	constructor(private readonly cwd: string) {}

	private async git(...args: string[]): Promise<string> {
		try {
			const { stdout } = await execFileAsync('git', args, { cwd: this.cwd })
			return stdout
		} catch (error) {
			throw new GitCommandError(args, stderrOf(error), { cause: error })
		}
	}

	async isRepository(): Promise<boolean> {
		try {
			return (await this.git('rev-parse', '--is-inside-work-tree')).trim() === 'true'
		} catch (error) {
			if (error instanceof GitCommandError) return false
			throw error
		}
	}

	async remotes(): Promise<string[]> {
		const stdout = await this.git('remote')
		return stdout
			.split('\n')
			.map((line) => line.trim())
			.filter((line) => line !== '')
	}

	async hasChanges(): Promise<boolean> {
		return (await this.git('status', '--porcelain')).trim() !== ''
	}

	async addAll(): Promise<void> {
		await this.git('add', '-A')
	}

	async commit(message: string): Promise<void> {
		await this.git('commit', '-m', message)
	}

	async push(remote: string, branch: string): Promise<void> {
		await this.git('push', remote, branch)
	}
}
