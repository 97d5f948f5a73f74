import { PubIdParseError } from "../errors.js";
import { suggestSeries } from "../matching/suggest-series.js";
import { COMPACT_MARKERS, type Qualifiers } from "../model/qualifiers.js";
import type { SeriesRegistry } from "../registry/series-registry.js";
import type { Publisher, SeriesEntry } from "../registry/types.js";
import {
	GLUED_STAGE,
	MR_ADDENDUM_FIELD,
	MR_UPDATE_FIELD,
	SHORT_ADDENDUM_SUFFIX,
	SHORT_UPDATE_SUFFIX,
	TRANSLATION_SUFFIX,
	matchCompact,
} from "./grammar.js";

export type InputStyle = "short" | "mr";

export interface ParsedComponents {
	style: InputStyle;
	publisher: Publisher;
	series: SeriesEntry;
	/** The series was written with a retired spelling. */
	legacy: boolean;
	docnumber: string;
	qualifiers: Qualifiers;
}

interface Trailing {
	head: string;
	qualifiers: Qualifiers;
}

/** Short form always has a space between series and number; MR never has one. */
export function detectInputStyle(text: string): InputStyle {
	return /\s/.test(text.trim()) ? "short" : "mr";
}

function malformed(input: string, message: string): PubIdParseError {
	return new PubIdParseError("MALFORMED_DOCNUMBER", message, input);
}

function unknownSeries(input: string, head: string, registry: SeriesRegistry): PubIdParseError {
	const token = head
		.split(/\s+/)
		.slice(0, 2)
		.join(" ")
		.replace(/\(.*$/, "");
	const suggestion = suggestSeries(token, registry.keys());
	const hint = suggestion ? ` Did you mean "${suggestion.key}"?` : "";
	return new PubIdParseError(
		"UNKNOWN_SERIES",
		`Unknown series in "${input}".${hint}`,
		input,
		suggestion?.key,
	);
}

function stripTranslation(text: string, qualifiers: Qualifiers): string {
	const match = text.match(TRANSLATION_SUFFIX);
	if (!match?.groups) return text;
	qualifiers.translation = match.groups.lang.toLowerCase();
	return text.slice(0, text.length - match[0].length);
}

function stripShortSuffixes(text: string): Trailing {
	const qualifiers: Qualifiers = {};
	let head = stripTranslation(text, qualifiers);

	const update = head.match(SHORT_UPDATE_SUFFIX);
	if (update?.groups) {
		qualifiers.update = { number: Number(update.groups.number), date: update.groups.date };
		head = head.slice(0, head.length - update[0].length);
	}

	const addendum = head.match(SHORT_ADDENDUM_SUFFIX);
	if (addendum) {
		const number = addendum.groups?.number;
		qualifiers.addendum = number === undefined ? 1 : Number(number);
		head = head.slice(0, head.length - addendum[0].length);
	}

	return { head: head.trim(), qualifiers };
}

function stripMrSuffixes(text: string, input: string): Trailing {
	const qualifiers: Qualifiers = {};
	const fields = stripTranslation(text, qualifiers).split(".");
	if (fields.some((field) => field === "")) {
		throw malformed(input, `Empty field in machine-readable PubID "${text}"`);
	}

	while (fields.length > 1) {
		const last = fields[fields.length - 1];
		const update = last.match(MR_UPDATE_FIELD);
		if (update?.groups && qualifiers.update === undefined) {
			qualifiers.update = { number: Number(update.groups.number), date: update.groups.date };
			fields.pop();
			continue;
		}
		const addendum = last.match(MR_ADDENDUM_FIELD);
		if (addendum?.groups && qualifiers.addendum === undefined) {
			qualifiers.addendum = Number(addendum.groups.number);
			fields.pop();
			continue;
		}
		break;
	}

	return { head: fields.join(" "), qualifiers };
}

function splitStage(
	rest: string,
	registry: SeriesRegistry,
	input: string,
): { stage: string | undefined; token: string } {
	let remainder = rest;
	let stage: string | undefined;

	const glued = remainder.match(GLUED_STAGE);
	if (glued?.groups) {
		const info = registry.stage(glued.groups.code);
		if (!info) throw malformed(input, `Unknown stage "${glued.groups.code}"`);
		stage = info.code;
		remainder = remainder.slice(glued[0].length);
	}

	const tokens = remainder
		.trim()
		.split(/\s+/)
		.filter((token) => token.length > 0);

	// MR form and spaced short form: "NIST.SP.IPD.800-53", "NIST SP IPD 800-53"
	if (stage === undefined && tokens.length === 2) {
		const info = registry.stage(tokens[0]);
		if (info) {
			stage = info.code;
			tokens.shift();
		}
	}

	if (tokens.length === 0) throw malformed(input, "Missing document number");
	if (tokens.length > 1) {
		throw malformed(input, `Unexpected text after document number: "${tokens.slice(1).join(" ")}"`);
	}
	return { stage, token: tokens[0] };
}

/**
 * Split a short-form or machine-readable PubID into its fields.
 * Throws PubIdParseError; model invariants are checked by the caller.
 */
export function parseComponents(input: string, registry: SeriesRegistry): ParsedComponents {
	const text = input.trim();
	if (!text) throw malformed(input, "Empty input");

	const style = detectInputStyle(text);
	const { head, qualifiers } =
		style === "short" ? stripShortSuffixes(text) : stripMrSuffixes(text, input);

	if (qualifiers.addendum !== undefined && qualifiers.update !== undefined) {
		throw malformed(input, "A PubID cannot carry both an addendum and an update");
	}

	const match = registry.resolvePrefix(head);
	if (!match) throw unknownSeries(input, head, registry);

	const { stage, token } = splitStage(match.rest, registry, input);
	if (stage !== undefined) qualifiers.stage = stage;

	const compact = matchCompact(token);
	if (!compact || !match.entry.docnumberPattern.test(compact.docnumber)) {
		throw malformed(
			input,
			`Malformed document number "${compact?.docnumber ?? token}" for series ${match.entry.key}`,
		);
	}

	for (const rule of COMPACT_MARKERS) {
		const value = compact.values[rule.kind];
		if (value === undefined) continue;
		if (rule.kind === "part") {
			qualifiers.part = value;
		} else {
			qualifiers[rule.kind] = Number(value);
		}
	}

	return {
		style,
		publisher: match.entry.publisher,
		series: match.entry,
		legacy: match.legacy,
		docnumber: compact.docnumber,
		qualifiers,
	};
}
