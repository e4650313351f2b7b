import type { IAsyncContext, ISyncContext } from './types'

/**
 * A default, in-memory implementation of ISyncContext.
 */
export class Context<TContext extends object> implements ISyncContext<TContext> {
	public readonly type = 'sync' as const
	private data: Partial<TContext>

	constructor(initialData: Partial<TContext> = {}) {
		this.data = { ...initialData }
	}

	get<K extends keyof TContext>(key: K): TContext[K] | undefined {
		return this.data[key]
	}

	set<K extends keyof TContext>(key: K, value: TContext[K]): void {
		this.data[key] = value
	}

	has<K extends keyof TContext>(key: K): boolean {
		return Object.hasOwn(this.data, key)
	}

	delete<K extends keyof TContext>(key: K): boolean {
		if (!this.has(key)) return false
		delete this.data[key]
		return true
	}

	toJSON(): Partial<TContext> {
		return { ...this.data }
	}
}

/**
 * An adapter that provides a consistent, Promise-based view of a synchronous context.
 * This is created by the runtime and is transparent to the node author.
 */
export class AsyncContextView<TContext extends object> implements IAsyncContext<TContext> {
	public readonly type = 'async' as const

	constructor(private syncContext: ISyncContext<TContext>) {}

	get<K extends keyof TContext>(key: K): Promise<TContext[K] | undefined> {
		return Promise.resolve(this.syncContext.get(key))
	}

	set<K extends keyof TContext>(key: K, value: TContext[K]): Promise<void> {
		this.syncContext.set(key, value)
		return Promise.resolve()
	}

	has<K extends keyof TContext>(key: K): Promise<boolean> {
		return Promise.resolve(this.syncContext.has(key))
	}

	delete<K extends keyof TContext>(key: K): Promise<boolean> {
		return Promise.resolve(this.syncContext.delete(key))
	}

	toJSON(): Promise<Partial<TContext>> {
		return Promise.resolve(this.syncContext.toJSON())
	}
}
