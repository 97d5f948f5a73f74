import { ratio } from "fuzzball";

export interface SeriesSuggestion {
	key: string;
	score: number; // 0-100
}

/** Suggestions scoring below this are noise rather than typos. */
export const SUGGESTION_THRESHOLD = 60;

/**
 * Closest known series key for an unresolved "<publisher> <series>" token,
 * e.g. "NIST SPP" -> "NIST SP". Ties keep the earlier candidate.
 */
export function suggestSeries(
	token: string,
	candidates: readonly string[],
	threshold: number = SUGGESTION_THRESHOLD,
): SeriesSuggestion | undefined {
	const normalized = token.toUpperCase().replace(/\s+/g, " ").trim();
	if (!normalized) return undefined;

	let best: SeriesSuggestion | undefined;
	for (const key of candidates) {
		const score = ratio(normalized, key);
		if (score >= threshold && (!best || score > best.score)) {
			best = { key, score };
		}
	}
	return best;
}
