import type { ChartData, ChartSpec, ChartType, ChatReply, RetrievedPassage } from '../types'
import { extractChartData } from './extract'
import { detectChartType } from './intent'

export const CHART_HEIGHT = 400

export const NO_CHART_DATA_MESSAGE =
	'No numerical data found in the context for visualization. Try asking about specific numbers, percentages, or values from the report.'

export function buildChartSpec(data: ChartData, chartType: ChartType): ChartSpec {
	if (data.categories.length === 0) {
		return {
			chartType,
			title: 'No Data Available for Visualization',
			categories: [],
			values: [],
			labels: [],
			layout: { height: CHART_HEIGHT, showLegend: false },
		}
	}
	return {
		chartType,
		title: `${chartType.charAt(0).toUpperCase()}${chartType.slice(1)} Chart - Real Estate Data`,
		...data,
		layout: {
			height: CHART_HEIGHT,
			xAxisTitle: 'Categories',
			yAxisTitle: 'Values',
			showLegend: false,
			...(data.categories.length > 5 ? { tickAngle: 45 } : {}),
		},
	}
}

/** Answers a chart request from the retrieved context without calling the model. */
export function renderChartReply(question: string, context: string, passages: RetrievedPassage[]): ChatReply {
	const data = extractChartData(context)
	if (data.values.length === 0) {
		return { kind: 'no-chart-data', message: NO_CHART_DATA_MESSAGE, passages }
	}
	const chartType = detectChartType(question)
	return {
		kind: 'chart',
		message: `Generated ${chartType} chart with ${data.values.length} data points`,
		passages,
		chart: buildChartSpec(data, chartType),
	}
}
