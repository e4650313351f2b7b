import type { ChartType } from '../types'

const VISUALIZATION_PHRASES = [
	'create chart',
	'make chart',
	'show chart',
	'display chart',
	'create graph',
	'make graph',
	'show graph',
	'display graph',
	'create plot',
	'make plot',
	'show plot',
	'display plot',
	'draw chart',
	'draw graph',
	'draw plot',
	'visualize',
	'visualise',
	'visualization',
	'visualisation',
	'chart of',
	'graph of',
	'plot of',
	'bar chart',
	'pie chart',
	'line chart',
	'scatter plot',
	'heatmap',
	'histogram',
]

/** Phrases that mark a question as wanting prose, even next to a chart word. */
const TEXT_ONLY_PHRASES = [
	'what is',
	'what are',
	'how much',
	'how many',
	'when',
	'where',
	'why',
	'summarize',
	'summary',
	'explain',
	'describe',
	'tell me about',
	'average',
	'total',
	'price',
	'rent',
	'cost',
	'value',
	'trends',
	'analysis',
	'overview',
	'insights',
	'details',
	'information',
]

const CHART_PHRASES: Array<[ChartType, string[]]> = [
	['bar', ['bar chart', 'bar graph']],
	['pie', ['pie chart', 'pie graph']],
	['line', ['line chart', 'line graph']],
	['scatter', ['scatter plot', 'scatter chart']],
]

const CHART_WORDS: Array<[ChartType, string[]]> = [
	['bar', ['bar', 'column', 'vertical', 'horizontal']],
	['pie', ['pie', 'circle', 'donut', 'sector']],
	['line', ['line']],
	['scatter', ['scatter', 'point', 'correlation']],
]

/** True only for explicit chart requests that carry no text-only phrase. */
export function detectVisualizationRequest(text: string): boolean {
	const lower = text.toLowerCase()
	const wantsChart = VISUALIZATION_PHRASES.some((phrase) => lower.includes(phrase))
	const wantsText = TEXT_ONLY_PHRASES.some((phrase) => lower.includes(phrase))
	return wantsChart && !wantsText
}

export function detectChartType(text: string): ChartType {
	const lower = text.toLowerCase()
	for (const table of [CHART_PHRASES, CHART_WORDS]) {
		for (const [chartType, terms] of table) {
			if (terms.some((term) => lower.includes(term))) return chartType
		}
	}
	return 'bar'
}
