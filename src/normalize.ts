import { getRegistry } from "./defaults.js";
import { PubId } from "./model/pubid.js";
import type { PubIdStyle } from "./model/qualifiers.js";
import { comparePubIds } from "./ordering/compare.js";
import type { SeriesRegistry } from "./registry/series-registry.js";

/** Parse any accepted spelling and render it in one style. Throws PubIdParseError. */
export function normalizePubId(
	text: string,
	style: PubIdStyle = "short",
	registry?: SeriesRegistry,
): string {
	return PubId.parse(text, registry).toString(style);
}

/** Sorted copy in catalog order, drafts ordered by the registry's stage list. */
export function sortPubIds(pubids: readonly PubId[], registry: SeriesRegistry = getRegistry()): PubId[] {
	const stageOrder = registry.stageCodes();
	return [...pubids].sort((a, b) => comparePubIds(a, b, stageOrder));
}
