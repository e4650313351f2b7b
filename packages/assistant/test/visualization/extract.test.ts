import { describe, expect, it } from 'vitest'
import { extractChartData } from '../../src/visualization/extract'

describe('extractChartData', () => {
	it('should read labelled values and ignore citations', () => {
		const data = extractChartData('Residential: 1250\nCommercial: 830.5\nSource: report.pdf - p. 2')

		expect(data).toEqual({
			categories: ['Residential', 'Commercial'],
			values: [1250, 830.5],
			labels: ['Residential: 1,250.00', 'Commercial: 830.50'],
		})
	})

	it('should skip short and reserved categories', () => {
		const data = extractChartData('Report total: 500\nPage count: 12\nTax: 9\nOffice: 40')

		expect(data.categories).toEqual(['Office'])
		expect(data.values).toEqual([40])
	})

	it('should read percentages', () => {
		expect(extractChartData('Residential share 45.5%')).toMatchObject({
			categories: ['Residential share'],
			values: [45.5],
		})
	})

	it('should fall back to domain keywords', () => {
		expect(extractChartData('Housing demand grew strongly in 2024')).toEqual({
			categories: ['Housing'],
			values: [2024],
			labels: ['Housing: 2,024.00'],
		})
	})

	it('should keep the ten largest values in descending order', () => {
		const text = Array.from({ length: 12 }, (_, i) => `Zone ${i + 1}: ${(i + 1) * 10}`).join('\n')

		const data = extractChartData(text)

		expect(data.values).toEqual([120, 110, 100, 90, 80, 70, 60, 50, 40, 30])
		expect(data.categories[0]).toBe('Zone 12')
		expect(data.labels).toHaveLength(10)
	})

	it('should ignore zero values', () => {
		expect(extractChartData('Vacant lots: 0')).toEqual({ categories: [], values: [], labels: [] })
	})
})
