import type { PubIdView } from "../model/qualifiers.js";
import { PUBLISHERS, type Publisher } from "../registry/types.js";

// Predecessor first.
const PUBLISHER_ORDER: readonly Publisher[] = [...PUBLISHERS].reverse();

function compareNumbers(a: number, b: number): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/** Absent sorts before present: "800-53" precedes "800-53r1". */
function compareOptional<T>(a: T | undefined, b: T | undefined, compare: (x: T, y: T) => number): number {
	if (a === undefined) return b === undefined ? 0 : -1;
	if (b === undefined) return 1;
	return compare(a, b);
}

/**
 * Compare document numbers group by group: the numeric lead of each dash
 * group numerically, then its sub-series letters. "800-38" < "800-38A" <
 * "800-38B" < "800-39" < "800-100".
 */
export function compareDocnumbers(a: string, b: string): number {
	const groupsA = a.split("-");
	const groupsB = b.split("-");
	const length = Math.min(groupsA.length, groupsB.length);

	for (let i = 0; i < length; i++) {
		const [, digitsA = "", suffixA = ""] = groupsA[i].match(/^(\d*)(.*)$/) ?? [];
		const [, digitsB = "", suffixB = ""] = groupsB[i].match(/^(\d*)(.*)$/) ?? [];
		const byNumber = compareOptional(
			digitsA ? Number(digitsA) : undefined,
			digitsB ? Number(digitsB) : undefined,
			compareNumbers,
		);
		if (byNumber !== 0) return byNumber;
		const bySuffix = compareStrings(suffixA, suffixB);
		if (bySuffix !== 0) return bySuffix;
	}
	return compareNumbers(groupsA.length, groupsB.length);
}

/**
 * Catalog order: publisher, series, document number, then qualifiers in
 * canonical order. Drafts sort before the final publication; stages compare
 * by their position in `stageOrder`.
 */
export function comparePubIds(
	a: PubIdView,
	b: PubIdView,
	stageOrder: readonly string[] = [],
): number {
	const stageRank = (stage: string | undefined): number => {
		if (stage === undefined) return Number.MAX_SAFE_INTEGER;
		const index = stageOrder.indexOf(stage);
		return index === -1 ? stageOrder.length : index;
	};

	const steps = [
		() => compareNumbers(PUBLISHER_ORDER.indexOf(a.publisher), PUBLISHER_ORDER.indexOf(b.publisher)),
		() => compareStrings(a.series.code, b.series.code),
		() => compareDocnumbers(a.docnumber, b.docnumber),
		() => compareOptional(a.volume, b.volume, compareNumbers),
		() => compareOptional(a.part, b.part, compareDocnumbers),
		() => compareOptional(a.revision ?? a.edition, b.revision ?? b.edition, compareNumbers),
		// revision before edition at the same number
		() => compareNumbers(a.revision === undefined ? 1 : 0, b.revision === undefined ? 1 : 0),
		() => compareOptional(a.version, b.version, compareNumbers),
		() => compareOptional(a.addendum, b.addendum, compareNumbers),
		() => compareOptional(a.update?.number, b.update?.number, compareNumbers),
		() => compareNumbers(stageRank(a.stage), stageRank(b.stage)),
		() => compareOptional(a.translation, b.translation, compareStrings),
	];

	for (const step of steps) {
		const result = step();
		if (result !== 0) return result;
	}
	return 0;
}
