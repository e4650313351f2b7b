import { describe, expect, it } from 'vitest'
import { cosineSimilarity } from '../../src/retrieval/similarity'

describe('cosineSimilarity', () => {
	it('should score identical directions as 1', () => {
		expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1)
	})

	it('should score orthogonal vectors as 0', () => {
		expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
	})

	it('should clamp opposite vectors to 0', () => {
		expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0)
	})

	it('should score zero vectors as 0', () => {
		expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
	})
})
