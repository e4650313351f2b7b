const FENCE = /^\s*(```|~~~)/
const ASSIGNMENT = /^\s*(?:export\s+)?([A-Z][A-Z0-9_]*)\s*=/

/**
 * Variable names assigned in the first fenced block below the heading that
 * contains `heading` (case-insensitive). Returns undefined when there is no
 * such heading or block.
 */
export function extractEnvBlock(markdown: string, heading: string): string[] | undefined {
	const lines = markdown.split(/\r?\n/)
	const needle = heading.toLowerCase()
	const headingIndex = lines.findIndex((line) => /^#{1,6}\s/.test(line) && line.toLowerCase().includes(needle))
	if (headingIndex === -1) return undefined

	let inBlock = false
	const names: string[] = []
	for (const line of lines.slice(headingIndex + 1)) {
		if (!inBlock && /^#{1,6}\s/.test(line)) return undefined
		if (FENCE.test(line)) {
			if (inBlock) return names
			inBlock = true
			continue
		}
		if (!inBlock) continue
		const match = ASSIGNMENT.exec(line)
		if (match && !names.includes(match[1])) names.push(match[1])
	}
	return inBlock ? names : undefined
}

export interface VariableDrift {
	/** Named in the first list only. */
	onlyInFirst: string[]
	/** Named in the second list only. */
	onlyInSecond: string[]
}

export function compareVariables(first: readonly string[], second: readonly string[]): VariableDrift {
	return {
		onlyInFirst: first.filter((name) => !second.includes(name)).sort(),
		onlyInSecond: second.filter((name) => !first.includes(name)).sort(),
	}
}
