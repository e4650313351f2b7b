import { describe, expect, it } from 'vitest'
import { SessionStore } from '../../src/session/store'

function createStore() {
	let now = 0
	const store = new SessionStore({ ttlMs: 1000, now: () => now })
	return { store, advance: (ms: number) => void (now += ms) }
}

describe('SessionStore', () => {
	it('should resolve a known id to the same session', () => {
		const { store } = createStore()
		const first = store.resolve(undefined)
		const second = store.resolve(first.session.id)

		expect(first.created).toBe(true)
		expect(second.created).toBe(false)
		expect(second.session).toBe(first.session)
	})

	it('should create a new session for an unknown id', () => {
		const { store } = createStore()
		const { session, created } = store.resolve('unknown')

		expect(created).toBe(true)
		expect(session.id).not.toBe('unknown')
	})

	it('should extend a session on every access', () => {
		const { store, advance } = createStore()
		const { session } = store.resolve(undefined)

		advance(800)
		expect(store.get(session.id)).toBe(session)
		advance(800)
		expect(store.get(session.id)).toBe(session)
	})

	it('should expire idle sessions', () => {
		const { store, advance } = createStore()
		const { session } = store.resolve(undefined)

		advance(1001)

		expect(store.get(session.id)).toBeUndefined()
		expect(store.size).toBe(0)
	})

	it('should sweep expired sessions', () => {
		const { store, advance } = createStore()
		store.create()
		advance(600)
		const recent = store.create()
		advance(600)

		expect(store.sweep()).toBe(1)
		expect(store.get(recent.id)).toBe(recent)
	})
})
