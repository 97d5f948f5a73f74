import { z } from "zod";
import { PUBLISHERS, type Publisher, type SeriesEntry } from "../registry/types.js";

export const PUBID_STYLES = ["long", "abbrev", "short", "mr"] as const;

export type PubIdStyle = (typeof PUBID_STYLES)[number];

export interface PubIdUpdate {
	number: number;
	/** "YYYY" or "YYYY-MM" */
	date: string;
}

export interface Qualifiers {
	stage?: string;
	volume?: number;
	part?: string;
	revision?: number;
	edition?: number;
	version?: number;
	addendum?: number;
	update?: PubIdUpdate;
	translation?: string;
}

/** What the renderer needs to know about an identifier. */
export interface PubIdView extends Qualifiers {
	readonly publisher: Publisher;
	readonly series: SeriesEntry;
	readonly docnumber: string;
}

export type CompactQualifier = "volume" | "part" | "revision" | "edition" | "version";

/**
 * Qualifiers written directly after the document number in short and MR
 * form ("800-57pt1r4"). Parser and renderer both read this table.
 * Rules sharing a slot are alternatives; slots appear in ascending order.
 */
export interface MarkerRule {
	kind: CompactQualifier;
	marker: string;
	/** Regex source for the value. */
	value: string;
	slot: number;
}

export const COMPACT_MARKERS: readonly MarkerRule[] = [
	{ kind: "volume", marker: "v", value: "\\d+", slot: 0 },
	{ kind: "part", marker: "pt", value: "\\d+[A-Z]?", slot: 1 },
	{ kind: "revision", marker: "r", value: "\\d+", slot: 2 },
	{ kind: "edition", marker: "e", value: "\\d+", slot: 2 },
	{ kind: "version", marker: "ver", value: "\\d+", slot: 3 },
];

// Digit runs past 2^53 - 1 lose precision as numbers.
const SAFE_INTEGER_MESSAGE = "Number must be a safe integer";

const SafeIntegerSchema = z.number().int().max(Number.MAX_SAFE_INTEGER, SAFE_INTEGER_MESSAGE);

export const CountSchema = SafeIntegerSchema.nonnegative();

export const PartSchema = z.union([
	z.string().regex(/^\d+[A-Z]?$/, "part must be a number, optionally followed by one capital letter"),
	CountSchema.transform(String),
]);

export const UpdateSchema = z.object({
	number: SafeIntegerSchema.positive(),
	date: z.string().regex(/^\d{4}(?:-(?:0[1-9]|1[0-2]))?$/, "update date must be YYYY or YYYY-MM"),
});

export const TranslationSchema = z
	.string()
	.regex(/^[A-Za-z]{3}$/, "translation must be a three-letter language code")
	.transform((code) => code.toLowerCase());

/** `true` means the first addendum. */
export const AddendumSchema = z
	.union([z.boolean(), SafeIntegerSchema.positive()])
	.transform((value) => (value === true ? 1 : value === false ? undefined : value));

export const StageCodeSchema = z
	.string()
	.min(1)
	.transform((code) => code.toUpperCase());

export const PubIdParamsSchema = z
	.object({
		publisher: z.enum(PUBLISHERS),
		/** "SP", "NIST SP" or a retired spelling such as "NISTIR". */
		series: z.string().trim().min(1),
		docnumber: z.string().trim().min(1),
		stage: StageCodeSchema.optional(),
		volume: CountSchema.optional(),
		part: PartSchema.optional(),
		revision: CountSchema.optional(),
		edition: CountSchema.optional(),
		version: CountSchema.optional(),
		addendum: AddendumSchema.optional(),
		update: UpdateSchema.optional(),
		translation: TranslationSchema.optional(),
	})
	.strict()
	.superRefine((params, ctx) => {
		if (params.revision !== undefined && params.edition !== undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["edition"],
				message: "revision and edition are mutually exclusive",
			});
		}
		if (params.addendum !== undefined && params.update !== undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["update"],
				message: "addendum and update are mutually exclusive",
			});
		}
	});

export type PubIdParams = z.input<typeof PubIdParamsSchema>;
