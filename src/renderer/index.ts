import type { PubIdStyle, PubIdView } from "../model/qualifiers.js";
import type { SeriesRegistry } from "../registry/series-registry.js";
import { renderMachineReadable, renderShort } from "./compact.js";
import { ABBREV_VOCABULARY, LONG_VOCABULARY, renderHuman } from "./human.js";

export { compactMarkers } from "./compact.js";
export type { HumanVocabulary } from "./human.js";

/**
 * Project an identifier onto one textual style. Total for any identifier
 * that passed model validation.
 */
export function render(view: PubIdView, style: PubIdStyle, registry: SeriesRegistry): string {
	switch (style) {
		case "long":
			return renderHuman(view, LONG_VOCABULARY, registry);
		case "abbrev":
			return renderHuman(view, ABBREV_VOCABULARY, registry);
		case "short":
			return renderShort(view);
		case "mr":
			return renderMachineReadable(view);
	}
}
