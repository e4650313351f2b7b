import { describe, expect, it, vi } from 'vitest'
import { NodeTimeoutError, PipelineError } from '../../src/errors'
import { createFlow } from '../../src/flow'
import { BaseNode } from '../../src/node'
import { FlowRuntime } from '../../src/runtime/runtime'
import type { NodeContext, NodeResult, PipelineEvent } from '../../src/types'

interface CounterContext {
	visited: string[]
	route: 'left' | 'right'
}

interface CounterDependencies {
	multiplier: number
}

function recordVisit(id: string) {
	return async ({ context }: NodeContext<CounterContext, CounterDependencies>): Promise<NodeResult> => {
		const visited = (await context.get('visited')) ?? []
		await context.set('visited', [...visited, id])
		return { output: id }
	}
}

function createRuntime(events: PipelineEvent[] = []) {
	return new FlowRuntime<CounterContext, CounterDependencies>({
		dependencies: { multiplier: 3 },
		eventBus: { emit: (event) => void events.push(event) },
	})
}

describe('FlowRuntime', () => {
	it('should run a linear flow and pass outputs as inputs', async () => {
		const flow = createFlow<CounterContext, CounterDependencies>('linear')
			.node('A', async () => ({ output: 2 }))
			.node('B', async ({ input, dependencies }) => ({
				output: typeof input === 'number' ? input * dependencies.multiplier : null,
			}))
			.edge('A', 'B')

		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('completed')
		expect(result.outputs).toEqual({ A: 2, B: 6 })
	})

	it('should follow only the edge matching the returned action', async () => {
		const flow = createFlow<CounterContext, CounterDependencies>('branching')
			.node('router', async ({ context }) => ({ action: await context.get('route') }))
			.node('left', recordVisit('left'))
			.node('right', recordVisit('right'))
			.edge('router', 'left', { action: 'left' })
			.edge('router', 'right', { action: 'right' })

		const result = await createRuntime().run(
			flow.toBlueprint(),
			{ route: 'right' },
			{ functionRegistry: flow.getFunctionRegistry() },
		)

		expect(result.context.visited).toEqual(['right'])
		expect(Object.keys(result.outputs)).toEqual(['router', 'right'])
	})

	it('should evaluate edge conditions against the result', async () => {
		const flow = createFlow<CounterContext, CounterDependencies>('conditional')
			.node('check', async () => ({ output: { ok: false } }))
			.node('next', recordVisit('next'))
			.edge('check', 'next', { condition: 'result.output.ok' })

		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('completed')
		expect(result.context.visited).toBeUndefined()
	})

	it('should retry failing nodes up to maxRetries', async () => {
		const attempts = vi.fn()
		const flow = createFlow<CounterContext, CounterDependencies>('retry').node(
			'flaky',
			async () => {
				attempts()
				if (attempts.mock.calls.length < 3) throw new Error('transient')
				return { output: 'ok' }
			},
			{ config: { maxRetries: 3 } },
		)
		const events: PipelineEvent[] = []

		const result = await createRuntime(events).run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('completed')
		expect(attempts).toHaveBeenCalledTimes(3)
		expect(events.filter((e) => e.type === 'node:retry')).toHaveLength(2)
	})

	it('should report a failed run with the node error', async () => {
		const flow = createFlow<CounterContext, CounterDependencies>('failing').node('boom', async () => {
			throw new Error('kaput')
		})

		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('failed')
		expect(result.errors).toHaveLength(1)
		expect(result.errors?.[0].nodeId).toBe('boom')
		expect(result.errors?.[0].message).toBe("Node 'boom' execution failed")
	})

	it('should not retry fatal errors', async () => {
		const attempts = vi.fn()
		const flow = createFlow<CounterContext, CounterDependencies>('fatal').node(
			'stop',
			async () => {
				attempts()
				throw new PipelineError('do not retry', { isFatal: true })
			},
			{ config: { maxRetries: 5 } },
		)

		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(attempts).toHaveBeenCalledTimes(1)
		expect(result.errors?.[0]).toMatchObject({ message: 'do not retry', isFatal: true })
	})

	it('should time out slow attempts', async () => {
		const flow = createFlow<CounterContext, CounterDependencies>('slow').node(
			'sleepy',
			() => new Promise<NodeResult>((resolve) => setTimeout(() => resolve({ output: 'late' }), 200)),
			{ config: { timeout: 10 } },
		)

		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('failed')
		expect(result.errors?.[0].message).toBe("Node 'sleepy' timed out after 10ms")
	})

	it('should abort the signal of an attempt that timed out', async () => {
		const signals: Array<AbortSignal | undefined> = []
		const flow = createFlow<CounterContext, CounterDependencies>('abandoned').node(
			'sleepy',
			({ signal }) => {
				signals.push(signal)
				return new Promise<NodeResult>((resolve) => setTimeout(() => resolve({ output: 'late' }), 200))
			},
			{ config: { timeout: 10, maxRetries: 2 } },
		)

		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('failed')
		expect(signals).toHaveLength(2)
		expect(signals[0]).not.toBe(signals[1])
		expect(signals.map((signal) => signal?.aborted)).toEqual([true, true])
		expect(signals[0]?.reason).toBeInstanceOf(NodeTimeoutError)
	})

	it('should detach abort listeners after each retry delay', async () => {
		const controller = new AbortController()
		const added = vi.spyOn(controller.signal, 'addEventListener')
		const removed = vi.spyOn(controller.signal, 'removeEventListener')
		let attempts = 0
		const flow = createFlow<CounterContext, CounterDependencies>('delayed').node(
			'flaky',
			async () => {
				attempts++
				if (attempts < 3) throw new Error('transient')
				return { output: 'ok' }
			},
			{ config: { maxRetries: 3, retryDelay: 1 } },
		)

		const result = await createRuntime().run(
			flow.toBlueprint(),
			{},
			{ functionRegistry: flow.getFunctionRegistry(), signal: controller.signal },
		)

		expect(result.status).toBe('completed')
		expect(added).toHaveBeenCalledTimes(2)
		expect(removed).toHaveBeenCalledTimes(2)
	})

	it('should run the fallback node with the same input when a node fails', async () => {
		const flow = createFlow<CounterContext, CounterDependencies>('fallback')
			.node('source', async () => ({ output: 'payload' }))
			.node(
				'primary',
				async () => {
					throw new Error('down')
				},
				{ config: { fallback: 'secondary' } },
			)
			.node('secondary', async ({ input }) => ({ output: `recovered ${String(input)}` }))
			.edge('source', 'primary')

		const events: PipelineEvent[] = []
		const result = await createRuntime(events).run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.status).toBe('completed')
		expect(result.outputs.secondary).toBe('recovered payload')
		expect(events.some((e) => e.type === 'node:fallback')).toBe(true)
	})

	it('should call the class node fallback after exec attempts are exhausted', async () => {
		class GuardedNode extends BaseNode<CounterContext, CounterDependencies, string, string> {
			async prep() {
				return 'prepared'
			}

			async exec(): Promise<NodeResult<string>> {
				throw new Error('upstream down')
			}

			async fallback(error: Error, prepResult: string): Promise<NodeResult<string>> {
				return { output: `${prepResult}: ${error.message}`, action: 'degraded' }
			}

			async post(execResult: NodeResult<string>): Promise<NodeResult<string>> {
				return { ...execResult, output: execResult.output?.toUpperCase() }
			}
		}

		const flow = createFlow<CounterContext, CounterDependencies>('class-fallback').node('guarded', GuardedNode, {
			config: { maxRetries: 2 },
		})
		const result = await createRuntime().run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(result.outputs.guarded).toBe('PREPARED: UPSTREAM DOWN')
	})

	it('should wrap execution in middleware', async () => {
		const calls: string[] = []
		const runtime = new FlowRuntime<CounterContext, CounterDependencies>({
			dependencies: { multiplier: 1 },
			middleware: [
				{
					beforeNode: (_ctx, nodeId) => void calls.push(`before:${nodeId}`),
					afterNode: (_ctx, nodeId, result) => void calls.push(`after:${nodeId}:${String(result?.output)}`),
					aroundNode: async (_ctx, nodeId, next) => {
						calls.push(`around:${nodeId}`)
						return next()
					},
				},
			],
		})
		const flow = createFlow<CounterContext, CounterDependencies>('mw').node('only', async () => ({ output: 'done' }))

		await runtime.run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(calls).toEqual(['around:only', 'before:only', 'after:only:done'])
	})

	it('should reject cycles in strict mode', async () => {
		const runtime = createRuntime()
		const blueprint = {
			id: 'loop',
			nodes: [
				{ id: 'A', uses: 'noop' },
				{ id: 'B', uses: 'noop' },
			],
			edges: [
				{ source: 'A', target: 'B' },
				{ source: 'B', target: 'A' },
			],
		}

		await expect(runtime.run(blueprint, {}, { strict: true })).rejects.toThrow(
			"Workflow 'loop' failed strictness check: Cycles are not allowed.",
		)
	})

	it('should report cancellation when the signal is aborted', async () => {
		const controller = new AbortController()
		controller.abort()
		const flow = createFlow<CounterContext, CounterDependencies>('cancel').node('A', async () => ({}))

		const result = await createRuntime().run(
			flow.toBlueprint(),
			{},
			{ functionRegistry: flow.getFunctionRegistry(), signal: controller.signal },
		)

		expect(result.status).toBe('cancelled')
	})

	it('should emit lifecycle events in order', async () => {
		const events: PipelineEvent[] = []
		const flow = createFlow<CounterContext, CounterDependencies>('events').node('A', async () => ({ output: 1 }))

		await createRuntime(events).run(flow.toBlueprint(), {}, { functionRegistry: flow.getFunctionRegistry() })

		expect(events.map((e) => e.type)).toEqual(['workflow:start', 'node:start', 'node:finish', 'workflow:finish'])
	})
})
