import type { IEvaluator } from './types'

const PROPERTY_PATH = /^[a-zA-Z0-9_$.]+$/

/**
 * A safe evaluator that only allows simple property access.
 * It cannot execute arbitrary code.
 *
 * Example expressions:
 * - "result.output.kind"
 * - "context.authenticated"
 */
export class PropertyEvaluator implements IEvaluator {
	evaluate(expression: string, context: Record<string, unknown>): unknown {
		if (!PROPERTY_PATH.test(expression)) {
			return undefined
		}

		const [startKey, ...rest] = expression.split('.')
		if (!Object.hasOwn(context, startKey)) {
			return undefined
		}

		let current: unknown = context[startKey]
		for (const part of rest) {
			if (current === null || typeof current !== 'object' || !Object.hasOwn(current, part)) {
				return undefined
			}
			current = Reflect.get(current, part)
		}
		return current
	}
}
