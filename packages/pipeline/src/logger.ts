import type { ILogger } from './types'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const levelPriorities: Record<LogLevel, number> = {
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
}

/**
 * A logger implementation that writes messages to the `console`.
 * It supports a minimum log level to control verbosity.
 */
export class ConsoleLogger implements ILogger {
	private minLevel: LogLevel

	/**
	 * @param options.level The minimum level of messages to log. Defaults to 'info'.
	 */
	constructor(options: { level?: LogLevel } = {}) {
		this.minLevel = options.level ?? 'info'
	}

	private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
		if (levelPriorities[level] < levelPriorities[this.minLevel]) {
			return
		}

		const fullMessage = `[${level.toUpperCase()}] ${message}`
		if (meta && Object.keys(meta).length > 0) {
			console[level](fullMessage, meta)
		} else {
			console[level](fullMessage)
		}
	}

	debug(message: string, meta?: Record<string, unknown>): void {
		this.log('debug', message, meta)
	}

	info(message: string, meta?: Record<string, unknown>): void {
		this.log('info', message, meta)
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		this.log('warn', message, meta)
	}

	error(message: string, meta?: Record<string, unknown>): void {
		this.log('error', message, meta)
	}
}

/** A logger implementation that does nothing (no-op). */
export class NullLogger implements ILogger {
	debug(_message: string, _meta?: Record<string, unknown>): void {}
	info(_message: string, _meta?: Record<string, unknown>): void {}
	warn(_message: string, _meta?: Record<string, unknown>): void {}
	error(_message: string, _meta?: Record<string, unknown>): void {}
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(levelPriorities, value)
}
