import type { ChartData } from '../types'

const NUMBER = String.raw`([\d,]+\.?\d*)`

/** Tried in order; the first pattern to name a category wins. */
const VALUE_PATTERNS = [
	new RegExp(String.raw`([^:=\n]+)[:=]\s*${NUMBER}`, 'g'),
	new RegExp(String.raw`([^=\n]+)=\s*${NUMBER}`, 'g'),
	new RegExp(String.raw`([^,\n]+),\s*${NUMBER}`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*Credit\s*directed:\s*KD\s*${NUMBER}\s*billion`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*Credit\s*directed:\s*${NUMBER}`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*Share:\s*${NUMBER}%`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*Total:\s*KD\s*${NUMBER}\s*billion`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*Total:\s*${NUMBER}\s*billion`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*KD\s*${NUMBER}\s*billion`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*${NUMBER}\s*billion`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*${NUMBER}\s*million`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*${NUMBER}\s*thousand`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*${NUMBER}%`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*${NUMBER}\s*units`, 'g'),
	new RegExp(String.raw`([^:]+?)\s*${NUMBER}\s*properties`, 'g'),
]

const SKIP_TERMS = ['source:', 'page', 'file', 'pdf', 'report', 'title']

/** Domain terms used to salvage a single value when no pattern matched. */
const FALLBACK_KEYWORDS = [
	'real estate',
	'construction',
	'housing',
	'credit',
	'facilities',
	'instalment',
	'private',
	'model',
	'total',
	'residential',
	'commercial',
	'investment',
	'development',
	'market',
	'price',
	'value',
]

export const MAX_CHART_CATEGORIES = 10

const valueFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })

interface DataPoint {
	category: string
	value: number
}

function cleanCategory(raw: string): string {
	return raw
		.replace(/\s+/g, ' ')
		.trim()
		.replace(/[^\p{L}\p{N}_\s\-&]/gu, '')
}

function titleCase(text: string): string {
	return text.replace(/\b\p{L}/gu, (letter) => letter.toUpperCase())
}

/**
 * Pulls labelled numbers out of report text: `label: 12`, `label = 12`,
 * `label, 12`, and amounts with units (`KD 1.2 billion`, `45%`, `300 units`).
 * Returns at most ten points, largest first.
 */
export function extractChartData(text: string): ChartData {
	const points: DataPoint[] = []
	const seen = new Set<string>()

	for (const pattern of VALUE_PATTERNS) {
		for (const match of text.matchAll(pattern)) {
			const value = Number.parseFloat(match[2].replaceAll(',', ''))
			if (!Number.isFinite(value) || value <= 0) continue
			const category = cleanCategory(match[1])
			if (category.length <= 3) continue
			const lower = category.toLowerCase()
			if (SKIP_TERMS.some((term) => lower.includes(term))) continue
			if (seen.has(category)) continue
			seen.add(category)
			points.push({ category, value })
		}
	}

	if (points.length === 0) {
		const lower = text.toLowerCase()
		const firstNumber = /(\d+\.?\d*)/.exec(text)
		const value = firstNumber ? Number.parseFloat(firstNumber[1]) : 0
		if (value > 0) {
			for (const keyword of FALLBACK_KEYWORDS) {
				if (lower.includes(keyword)) points.push({ category: titleCase(keyword), value })
			}
		}
	}

	const top = points.sort((a, b) => b.value - a.value).slice(0, MAX_CHART_CATEGORIES)
	return {
		categories: top.map((point) => point.category),
		values: top.map((point) => point.value),
		labels: top.map((point) => `${point.category}: ${valueFormat.format(point.value)}`),
	}
}
