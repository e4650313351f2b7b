import type { GitClient } from '../src/git'
import type { Output } from '../src/output'

export interface RecordedLine {
	level: 'info' | 'success' | 'error'
	text: string
}

export function createOutput() {
	const lines: RecordedLine[] = []
	const tasks: string[] = []
	const output: Output = {
		info: (text) => void lines.push({ level: 'info', text }),
		success: (text) => void lines.push({ level: 'success', text }),
		error: (text) => void lines.push({ level: 'error', text }),
		async task(label, work) {
			tasks.push(label)
			return work()
		},
	}
	return { output, lines, tasks }
}

/** An in-memory repository that records the git commands it receives. */
export class FakeGit implements GitClient {
	repository = true
	remoteNames = ['origin']
	dirty = true
	pushError?: Error
	readonly commands: string[] = []

	async isRepository(): Promise<boolean> {
		return this.repository
	}

	async remotes(): Promise<string[]> {
		return this.remoteNames
	}

	async hasChanges(): Promise<boolean> {
		return this.dirty
	}

	async addAll(): Promise<void> {
		this.commands.push('add -A')
	}

	async commit(message: string): Promise<void> {
		this.commands.push(`commit -m ${message}`)
		this.dirty = false
	}

	async push(remote: string, branch: string): Promise<void> {
		this.commands.push(`push ${remote} ${branch}`)
		if (this.pushError) throw this.pushError
	}
}
