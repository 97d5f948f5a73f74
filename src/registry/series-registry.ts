import type { z } from "zod";
import { RegistryError } from "../errors.js";
import { logger } from "../logger.js";
import {
	type Publisher,
	RegistryDataSchema,
	type SeriesEntry,
	type SeriesMatch,
	type StageInfo,
	type Titles,
} from "./types.js";

/**
 * Document numbers start with a digit; further groups are dash separated.
 * Letters are uppercase only, so the lowercase qualifier markers ("r5",
 * "pt1") can never be read as part of the number.
 */
export const DEFAULT_DOCNUMBER_PATTERN = "^\\d[0-9A-Z]*(?:-[0-9A-Z]+)*$";

type ParsedRegistryData = z.output<typeof RegistryDataSchema>;

interface RegistryHit {
	entry: SeriesEntry;
	legacy: boolean;
}

/**
 * Lookup key normalization: uppercase, periods dropped, whitespace collapsed.
 * "nist  s.p." and "NIST SP" share a key.
 */
export function normalizeKey(text: string): string {
	return text.toUpperCase().replace(/\./g, "").replace(/\s+/g, " ").trim();
}

/**
 * Match a normalized key at the start of text. Returns the number of
 * characters consumed, or undefined when the key does not match at a token
 * boundary.
 */
function matchKeyAt(text: string, key: string): number | undefined {
	let i = 0;
	for (const ch of key) {
		while (text[i] === ".") i++;
		if (ch === " ") {
			if (!/\s/.test(text[i] ?? "")) return undefined;
			while (/\s/.test(text[i] ?? "")) i++;
			continue;
		}
		if ((text[i] ?? "").toUpperCase() !== ch) return undefined;
		i++;
	}
	while (text[i] === ".") i++;

	const next = text[i];
	if (next === undefined || /[\s(]/.test(next)) return i;
	// "NBS CRPL-F-B150": number glued to a code ending in a letter
	if (/\d/.test(next) && /[A-Z]$/.test(key)) return i;
	return undefined;
}

function compilePattern(code: string, source: string): RegExp {
	try {
		return new RegExp(source);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new RegistryError(`Invalid docnumber pattern for series "${code}": ${reason}`);
	}
}

/**
 * Read-only table of series known per publisher, including retired
 * spellings. Every normalized key maps to exactly one entry.
 */
export class SeriesRegistry {
	private readonly index = new Map<string, RegistryHit>();
	private readonly canonical: SeriesEntry[] = [];
	private readonly prefixKeys: string[];
	private readonly publisherTitles: Record<Publisher, Titles>;
	private readonly stages: Map<string, string>;

	static from(raw: unknown): SeriesRegistry {
		const result = RegistryDataSchema.safeParse(raw);
		if (!result.success) {
			const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
			throw new RegistryError(`Invalid series registry: ${issues.join(", ")}`);
		}
		return new SeriesRegistry(result.data);
	}

	private constructor(data: ParsedRegistryData) {
		this.publisherTitles = data.publishers;
		this.stages = new Map(Object.entries(data.stages));

		for (const series of data.series) {
			const pattern = compilePattern(
				series.code,
				series.docnumberPattern ?? DEFAULT_DOCNUMBER_PATTERN,
			);
			for (const publisher of series.publishers) {
				const titles = series.titles?.[publisher];
				const entry: SeriesEntry = Object.freeze({
					publisher,
					code: series.code,
					key: `${publisher} ${series.code}`,
					long: titles?.long ?? series.long,
					abbrev: titles?.abbrev ?? series.abbrev,
					embedsPublisher: series.embedsPublisher ?? false,
					docnumberPattern: pattern,
				});
				this.register(entry.key, { entry, legacy: false });
				this.canonical.push(entry);
			}
		}

		for (const alias of data.aliases) {
			const target = this.index.get(normalizeKey(`${alias.publisher} ${alias.code}`));
			if (!target || target.legacy) {
				throw new RegistryError(
					`Alias "${alias.from}" points at unknown series "${alias.publisher} ${alias.code}"`,
				);
			}
			this.register(alias.from, { entry: target.entry, legacy: true });
		}

		// Longest first, so the first matching key is the longest match.
		this.prefixKeys = [...this.index.keys()].sort((a, b) => b.length - a.length);

		logger.debug(
			`Series registry loaded: ${this.canonical.length} series, ${data.aliases.length} aliases`,
		);
	}

	private register(rawKey: string, hit: RegistryHit): void {
		const key = normalizeKey(rawKey);
		if (this.index.has(key)) {
			throw new RegistryError(`Duplicate registry key "${key}"`);
		}
		this.index.set(key, hit);
	}

	/** Resolve a series token issued by the given publisher, e.g. ("NIST", "sp"). */
	resolve(publisher: string, seriesToken: string): SeriesEntry | undefined {
		const hit = this.index.get(normalizeKey(`${publisher} ${seriesToken}`));
		if (!hit || hit.entry.publisher !== normalizeKey(publisher)) return undefined;
		return hit.entry;
	}

	/** Resolve a full key or retired spelling, e.g. "NIST SP" or "NISTIR". */
	lookup(key: string): { entry: SeriesEntry; legacy: boolean } | undefined {
		return this.index.get(normalizeKey(key));
	}

	/** Find the longest series key that prefixes text at a token boundary. */
	resolvePrefix(text: string): SeriesMatch | undefined {
		for (const key of this.prefixKeys) {
			const consumed = matchKeyAt(text, key);
			if (consumed === undefined) continue;
			const hit = this.index.get(key);
			if (!hit) continue;
			return {
				entry: hit.entry,
				matched: text.slice(0, consumed),
				rest: text.slice(consumed),
				legacy: hit.legacy,
			};
		}
		return undefined;
	}

	publisher(code: Publisher): Titles {
		return this.publisherTitles[code];
	}

	stage(code: string): StageInfo | undefined {
		const normalized = code.toUpperCase();
		const name = this.stages.get(normalized);
		return name === undefined ? undefined : { code: normalized, name };
	}

	/** Stage codes in maturity order, earliest draft first. */
	stageCodes(): string[] {
		return [...this.stages.keys()];
	}

	entries(): readonly SeriesEntry[] {
		return this.canonical;
	}

	/** Canonical keys ("NIST SP", "NBS FIPS PUB", ...) without retired spellings. */
	keys(): string[] {
		return this.canonical.map((entry) => entry.key);
	}
}
