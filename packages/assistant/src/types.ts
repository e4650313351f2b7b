/** A single turn of the conversation as the model sees it. */
export interface ChatMessage {
	role: 'user' | 'assistant'
	content: string
}

/** Where a passage came from inside the report. */
export interface PassageMetadata {
	filename: string | null
	pageNumbers: number[]
	title: string | null
}

/** A report passage selected for one query. Never persisted. */
export interface RetrievedPassage {
	sourceExcerpt: string
	/** Cosine similarity clamped to [0, 1]. */
	similarityScore: number
	originReference: string
	title: string | null
}

export type ChartType = 'bar' | 'pie' | 'line' | 'scatter'

export interface ChartData {
	categories: string[]
	values: number[]
	labels: string[]
}

/** A renderer-agnostic chart description the page draws. */
export interface ChartSpec extends ChartData {
	chartType: ChartType
	title: string
	layout: {
		height: number
		xAxisTitle?: string
		yAxisTitle?: string
		tickAngle?: number
		showLegend: boolean
	}
}

export type ReplyKind = 'answer' | 'chart' | 'no-chart-data' | 'degraded'

export interface ChatReply {
	kind: ReplyKind
	message: string
	passages: RetrievedPassage[]
	chart?: ChartSpec
}
