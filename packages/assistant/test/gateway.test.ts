import { NullLogger } from '@markaz/pipeline'
import { describe, expect, it } from 'vitest'
import { AccessDeniedError, InvalidQueryError } from '../src/errors'
import { AccessGate, MAX_QUESTION_LENGTH, parseQuestion } from '../src/gateway'
import { Session } from '../src/session/session'

const logger = new NullLogger()

describe('parseQuestion', () => {
	it('should return the trimmed question', () => {
		expect(parseQuestion({ question: '  What drove credit growth?  ' })).toBe('What drove credit growth?')
	})

	it('should reject blank questions', () => {
		expect(() => parseQuestion({ question: '   ' })).toThrow(new InvalidQueryError('The question must not be empty.'))
	})

	it('should reject a missing question', () => {
		expect(() => parseQuestion({})).toThrow('A question is required.')
		expect(() => parseQuestion({ question: 42 })).toThrow('The question must be text.')
		expect(() => parseQuestion(undefined)).toThrow(InvalidQueryError)
	})

	it('should enforce the maximum length', () => {
		expect(parseQuestion({ question: 'a'.repeat(MAX_QUESTION_LENGTH) })).toHaveLength(MAX_QUESTION_LENGTH)
		expect(() => parseQuestion({ question: 'a'.repeat(MAX_QUESTION_LENGTH + 1) })).toThrow(
			`The question must be at most ${MAX_QUESTION_LENGTH} characters.`,
		)
	})
})

describe('AccessGate', () => {
	it('should admit everyone when gating is off', () => {
		const gate = new AccessGate({ environment: 'development' }, logger)
		const session = new Session()

		expect(gate.enabled).toBe(false)
		expect(() => gate.admit(session)).not.toThrow()
		expect(gate.authenticate(session, undefined)).toBe(true)
	})

	it('should gate production and reject unauthenticated sessions', () => {
		const gate = new AccessGate({ environment: 'production', password: 'test-secret' }, logger)

		expect(gate.enabled).toBe(true)
		expect(() => gate.admit(new Session())).toThrow(AccessDeniedError)
	})

	it('should gate any deployment that sets a password', () => {
		expect(new AccessGate({ environment: 'development', password: 'test-secret' }, logger).enabled).toBe(true)
	})

	it('should authenticate a session with the right password only', () => {
		const gate = new AccessGate({ environment: 'production', password: 'test-secret' }, logger)
		const session = new Session()

		expect(gate.authenticate(session, { password: 'wrong' })).toBe(false)
		expect(session.authenticated).toBe(false)
		expect(gate.authenticate(session, { password: 'test-secret' })).toBe(true)
		expect(gate.isAdmitted(session)).toBe(true)
	})

	it('should keep a signed-in session signed in after a wrong password', () => {
		const gate = new AccessGate({ environment: 'production', password: 'test-secret' }, logger)
		const session = new Session()
		gate.authenticate(session, { password: 'test-secret' })

		expect(gate.authenticate(session, { password: 'wrong' })).toBe(false)
		expect(session.authenticated).toBe(true)
		expect(() => gate.admit(session)).not.toThrow()
	})

	it('should fail closed when production has no password configured', () => {
		const gate = new AccessGate({ environment: 'production' }, logger)
		const session = new Session()

		expect(gate.authenticate(session, { password: '' })).toBe(false)
		expect(gate.authenticate(session, { password: 'default123' })).toBe(false)
		expect(() => gate.admit(session)).toThrow(AccessDeniedError)
	})

	it('should reject a login body without a password', () => {
		const gate = new AccessGate({ environment: 'production', password: 'test-secret' }, logger)

		expect(() => gate.authenticate(new Session(), {})).toThrow(InvalidQueryError)
	})
})
