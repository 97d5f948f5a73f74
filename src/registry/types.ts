import { z } from "zod";

export const PUBLISHERS = ["NIST", "NBS"] as const;

export type Publisher = (typeof PUBLISHERS)[number];

const TitlesSchema = z.object({
	long: z.string().min(1),
	abbrev: z.string().min(1),
});

export type Titles = z.infer<typeof TitlesSchema>;

const SeriesDataSchema = z.object({
	code: z.string().regex(/^[A-Z0-9-]+(?: [A-Z0-9-]+)*$/, "series codes are uppercase tokens"),
	publishers: z.array(z.enum(PUBLISHERS)).min(1),
	long: z.string().min(1),
	abbrev: z.string().min(1),
	embedsPublisher: z.boolean().optional(),
	docnumberPattern: z.string().min(1).optional(),
	titles: z
		.object({
			NIST: TitlesSchema.optional(),
			NBS: TitlesSchema.optional(),
		})
		.optional(),
});

const AliasDataSchema = z.object({
	from: z.string().min(1),
	publisher: z.enum(PUBLISHERS),
	code: z.string().min(1),
});

export const RegistryDataSchema = z.object({
	publishers: z.object({
		NIST: TitlesSchema,
		NBS: TitlesSchema,
	}),
	stages: z.record(z.string().regex(/^[A-Z0-9]+$/), z.string().min(1)),
	series: z.array(SeriesDataSchema).min(1),
	aliases: z.array(AliasDataSchema).default([]),
});

export type RegistryData = z.input<typeof RegistryDataSchema>;

/** Display metadata for one series as issued by one publisher. */
export interface SeriesEntry {
	readonly publisher: Publisher;
	/** Canonical short code, e.g. "SP" or "FIPS PUB". */
	readonly code: string;
	/** Registry key, "<publisher> <code>". */
	readonly key: string;
	readonly long: string;
	readonly abbrev: string;
	/** Titles already name the organization, so no publisher name is prepended. */
	readonly embedsPublisher: boolean;
	readonly docnumberPattern: RegExp;
}

export interface StageInfo {
	code: string;
	name: string;
}

export interface SeriesMatch {
	entry: SeriesEntry;
	/** Input text consumed by the series prefix, as written. */
	matched: string;
	/** Text following the series prefix. */
	rest: string;
	/** True when the prefix was a retired spelling. */
	legacy: boolean;
}
