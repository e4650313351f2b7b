import { describe, expect, it } from 'vitest'
import { buildChartSpec, NO_CHART_DATA_MESSAGE, renderChartReply } from '../../src/visualization/chart'

describe('buildChartSpec', () => {
	it('should title the chart by type', () => {
		const spec = buildChartSpec({ categories: ['A sector'], values: [1], labels: ['A sector: 1.00'] }, 'pie')

		expect(spec.title).toBe('Pie Chart - Real Estate Data')
		expect(spec.layout).toEqual({ height: 400, xAxisTitle: 'Categories', yAxisTitle: 'Values', showLegend: false })
	})

	it('should tilt labels when there are many categories', () => {
		const categories = ['One', 'Two', 'Three', 'Four', 'Five', 'Six']
		const spec = buildChartSpec({ categories, values: [6, 5, 4, 3, 2, 1], labels: categories }, 'bar')

		expect(spec.layout.tickAngle).toBe(45)
	})

	it('should describe an empty chart', () => {
		expect(buildChartSpec({ categories: [], values: [], labels: [] }, 'line').title).toBe(
			'No Data Available for Visualization',
		)
	})
})

describe('renderChartReply', () => {
	it('should chart the numbers found in the context', () => {
		const reply = renderChartReply('Create a pie chart of lending', 'Residential: 1250\nCommercial: 830.5', [])

		expect(reply.kind).toBe('chart')
		expect(reply.message).toBe('Generated pie chart with 2 data points')
		expect(reply.chart?.chartType).toBe('pie')
		expect(reply.chart?.categories).toEqual(['Residential', 'Commercial'])
	})

	it('should explain when there is nothing to chart', () => {
		expect(renderChartReply('Create a chart', 'No figures here', [])).toEqual({
			kind: 'no-chart-data',
			message: NO_CHART_DATA_MESSAGE,
			passages: [],
		})
	})
})
