import { COMPACT_MARKERS, type CompactQualifier, type MarkerRule } from "../model/qualifiers.js";

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build the "docnumber + glued markers" rule. The document number is lazy,
 * so the earliest split where the markers consume the rest of the token wins.
 */
export function buildCompactGrammar(rules: readonly MarkerRule[] = COMPACT_MARKERS): RegExp {
	const slots = new Map<number, string[]>();
	for (const rule of rules) {
		const alternatives = slots.get(rule.slot) ?? [];
		alternatives.push(`${escapeRegExp(rule.marker)}(?<${rule.kind}>${rule.value})`);
		slots.set(rule.slot, alternatives);
	}
	const suffixes = [...slots.entries()]
		.sort(([a], [b]) => a - b)
		.map(([, alternatives]) => `(?:${alternatives.join("|")})?`)
		.join("");
	return new RegExp(`^(?<docnumber>.+?)${suffixes}$`);
}

const COMPACT_GRAMMAR = buildCompactGrammar();

export interface CompactMatch {
	docnumber: string;
	values: Partial<Record<CompactQualifier, string>>;
}

export function matchCompact(token: string): CompactMatch | undefined {
	const groups = token.match(COMPACT_GRAMMAR)?.groups;
	if (!groups) return undefined;

	const values: Partial<Record<CompactQualifier, string>> = {};
	for (const rule of COMPACT_MARKERS) {
		const value = groups[rule.kind];
		if (value !== undefined) values[rule.kind] = value;
	}
	return { docnumber: groups.docnumber, values };
}

// Trailing qualifiers, peeled off the end of the input in reverse canonical order.
export const TRANSLATION_SUFFIX = /\((?<lang>[A-Za-z]{3})\)$/;
export const SHORT_UPDATE_SUFFIX = /\/Upd\s?(?<number>\d+)[:-](?<date>\d{4}(?:-\d{2})?)$/;
export const SHORT_ADDENDUM_SUFFIX = /\s+Addendum(?:\s+(?<number>\d+))?$/;
export const MR_UPDATE_FIELD = /^u(?<number>\d+)-(?<date>\d{4}(?:-\d{2})?)$/;
export const MR_ADDENDUM_FIELD = /^add-(?<number>\d+)$/;

/** "(IPD)" glued to the series code. */
export const GLUED_STAGE = /^\((?<code>[^()\s]*)\)/;
