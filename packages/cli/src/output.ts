import chalk from 'chalk'
import ora from 'ora'

/** Where commands report progress. Lines are plain text; styling is the sink's concern. */
export interface Output {
	info(line: string): void
	success(line: string): void
	error(line: string): void
	/** Runs `work` under a progress indicator labelled `label`. */
	task<T>(label: string, work: () => Promise<T>): Promise<T>
}

export const consoleOutput: Output = {
	info: (line) => console.log(line),
	success: (line) => console.log(chalk.green(line)),
	error: (line) => console.error(chalk.red(line)),
	async task(label, work) {
		const spinner = ora(label).start()
		try {
			const result = await work()
			spinner.succeed()
			return result
		} catch (error) {
			spinner.fail()
			throw error
		}
	},
}
