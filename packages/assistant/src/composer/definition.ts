export const DEFINITION_HEADER = '## 📖 Definition'

const DEFINITION_PHRASES = [
	'what is',
	'what are',
	'definition',
	'define',
	'what does mean',
	'what does this mean',
	'explain',
	'describe',
	'tell me about',
	'meaning of',
	'concept of',
	'understanding',
]

const LIST_MARKER = /^(\s*)[*-]\s+/gm
const HAS_LIST_MARKER = /^\s*[*-]\s+/m

export function detectDefinitionRequest(text: string): boolean {
	const lower = text.toLowerCase()
	return DEFINITION_PHRASES.some((phrase) => lower.includes(phrase))
}

/**
 * Puts a definition header over the answer and renders it as `•` bullets.
 * Existing list markers are converted; otherwise each sentence becomes a bullet.
 * Bold markup is left alone.
 */
export function formatDefinitionResponse(answer: string): string {
	if (answer.includes('•') || HAS_LIST_MARKER.test(answer)) {
		const bulleted = answer.replace(LIST_MARKER, '$1• ')
		return answer.startsWith('##') ? bulleted : `${DEFINITION_HEADER}\n\n${bulleted}`
	}

	const sentences = answer
		.split('. ')
		.map((sentence) => sentence.trim())
		.filter((sentence) => sentence !== '')
	if (sentences.length > 1) {
		return `${DEFINITION_HEADER}\n\n${sentences.map((sentence) => `• ${sentence}`).join('\n')}`
	}
	return answer
}
