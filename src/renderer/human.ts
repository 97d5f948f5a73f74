import { COMPACT_MARKERS, type CompactQualifier, type PubIdView } from "../model/qualifiers.js";
import type { SeriesRegistry } from "../registry/series-registry.js";

/** Wording for the long and abbreviated styles. */
export interface HumanVocabulary {
	titles: "long" | "abbrev";
	/** Whole-string prefix for an addendum. */
	addendum: (number: number) => string;
	/** Text placed between the previous field and the qualifier value. */
	markers: Record<CompactQualifier, string>;
	update: string;
}

export const LONG_VOCABULARY: HumanVocabulary = {
	titles: "long",
	addendum: (number) => (number === 1 ? "Addendum to " : `Addendum ${number} to `),
	markers: {
		volume: ", Volume ",
		part: " Part ",
		revision: ", Revision ",
		edition: " Edition ",
		version: ", Version ",
	},
	update: " Update ",
};

export const ABBREV_VOCABULARY: HumanVocabulary = {
	titles: "abbrev",
	addendum: (number) => (number === 1 ? "Add. to " : `Add. ${number} to `),
	markers: {
		volume: ", Vol. ",
		part: " Pt. ",
		revision: ", Rev. ",
		edition: " Ed. ",
		version: ", Ver. ",
	},
	update: " Upd. ",
};

export function renderHuman(
	view: PubIdView,
	vocabulary: HumanVocabulary,
	registry: SeriesRegistry,
): string {
	const words: string[] = [];
	if (!view.series.embedsPublisher) {
		words.push(registry.publisher(view.publisher)[vocabulary.titles]);
	}
	words.push(view.series[vocabulary.titles]);
	if (view.stage !== undefined) {
		// Stage phrases have no abbreviated form.
		words.push(registry.stage(view.stage)?.name ?? view.stage);
	}
	words.push(view.docnumber);

	let text = words.join(" ");
	for (const rule of COMPACT_MARKERS) {
		const value = view[rule.kind];
		if (value !== undefined) text += `${vocabulary.markers[rule.kind]}${value}`;
	}
	if (view.update) {
		text += `${vocabulary.update}${view.update.number}:${view.update.date}`;
	}
	if (view.translation) {
		text += ` (${view.translation.toUpperCase()})`;
	}

	return view.addendum === undefined ? text : `${vocabulary.addendum(view.addendum)}${text}`;
}
