import { describe, expect, it } from 'vitest'
import { analyzeBlueprint, checkForCycles } from '../src/analysis'

describe('analyzeBlueprint', () => {
	it('should find start and terminal nodes of a linear graph', () => {
		const analysis = analyzeBlueprint({
			id: 'linear',
			nodes: [
				{ id: 'A', uses: 'x' },
				{ id: 'B', uses: 'x' },
				{ id: 'C', uses: 'x' },
			],
			edges: [
				{ source: 'A', target: 'B' },
				{ source: 'B', target: 'C' },
			],
		})
		expect(analysis.startNodeIds).toEqual(['A'])
		expect(analysis.terminalNodeIds).toEqual(['C'])
		expect(analysis.isDag).toBe(true)
		expect(analysis.danglingEdges).toEqual([])
	})

	it('should report cycles', () => {
		const cycles = checkForCycles({
			id: 'cyclic',
			nodes: [
				{ id: 'A', uses: 'x' },
				{ id: 'B', uses: 'x' },
			],
			edges: [
				{ source: 'A', target: 'B' },
				{ source: 'B', target: 'A' },
			],
		})
		expect(cycles).toEqual([['A', 'B', 'A']])
	})

	it('should report edges to unknown nodes', () => {
		const analysis = analyzeBlueprint({
			id: 'dangling',
			nodes: [{ id: 'A', uses: 'x' }],
			edges: [{ source: 'A', target: 'Z' }],
		})
		expect(analysis.danglingEdges).toEqual([{ source: 'A', target: 'Z' }])
	})
})
