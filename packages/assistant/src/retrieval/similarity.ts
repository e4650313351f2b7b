/**
 * Cosine similarity clamped to [0, 1]. Zero vectors score 0.
 * Callers must pass vectors of equal length.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	const score = dot / (Math.sqrt(normA) * Math.sqrt(normB))
	return Math.min(1, Math.max(0, score))
}
