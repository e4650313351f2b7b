import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConsoleLogger, isLogLevel, NullLogger } from '../src/logger'

describe('ConsoleLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('should prefix messages with the level and pass metadata', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		new ConsoleLogger().info('Request handled', { status: 200 })
		expect(info).toHaveBeenCalledWith('[INFO] Request handled', { status: 200 })
	})

	it('should omit empty metadata', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		new ConsoleLogger().warn('Careful', {})
		expect(warn).toHaveBeenCalledWith('[WARN] Careful')
	})

	it('should drop messages below the minimum level', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		const logger = new ConsoleLogger({ level: 'warn' })
		logger.debug('noise')
		logger.info('noise')
		expect(debug).not.toHaveBeenCalled()
		expect(info).not.toHaveBeenCalled()
	})

	it('should recognise valid levels', () => {
		expect(isLogLevel('debug')).toBe(true)
		expect(isLogLevel('verbose')).toBe(false)
	})
})

describe('NullLogger', () => {
	it('should not write anything', () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		new NullLogger().error('ignored')
		expect(error).not.toHaveBeenCalled()
		error.mockRestore()
	})
})
