import type { z } from "zod";
import { getParseCache, getRegistry } from "../defaults.js";
import { InvalidModelError, PubIdParseError } from "../errors.js";
import { logger } from "../logger.js";
import { parseComponents } from "../parser/index.js";
import type { SeriesRegistry } from "../registry/series-registry.js";
import type { Publisher, SeriesEntry } from "../registry/types.js";
import { render } from "../renderer/index.js";
import {
	AddendumSchema,
	CountSchema,
	PartSchema,
	type PubIdParams,
	PubIdParamsSchema,
	type PubIdStyle,
	type PubIdUpdate,
	type PubIdView,
	type Qualifiers,
	StageCodeSchema,
	TranslationSchema,
	UpdateSchema,
} from "./qualifiers.js";

export type ParseResult = { ok: true; pubid: PubId } | { ok: false; error: PubIdParseError };

function issuesOf(error: z.ZodError, field?: string): string[] {
	return error.issues.map((issue) => {
		const path = field ?? (issue.path.join(".") || "params");
		return `${path}: ${issue.message}`;
	});
}

function checkField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, field: string, value: unknown): T {
	const result = schema.safeParse(value);
	if (!result.success) throw new InvalidModelError(issuesOf(result.error, field));
	return result.data;
}

/** Accepts "SP", "NIST SP" or a retired spelling such as "NISTIR". */
function resolveSeries(
	registry: SeriesRegistry,
	publisher: Publisher,
	series: string,
): SeriesEntry | undefined {
	const hit = registry.lookup(series);
	if (hit) return hit.entry.publisher === publisher ? hit.entry : undefined;
	return registry.resolve(publisher, series);
}

/**
 * A NIST or NBS publication identifier. Publisher, series and document number
 * are fixed at construction; qualifiers can be reassigned through setters.
 *
 * Setters apply last-write-wins to exclusive pairs: assigning `revision`
 * clears `edition` (and vice versa), assigning `addendum` clears `update`
 * (and vice versa). Construction and parsing reject such pairs instead.
 */
export class PubId implements PubIdView {
	readonly publisher: Publisher;
	readonly series: SeriesEntry;
	readonly docnumber: string;
	private readonly fields: Qualifiers;
	private readonly registry: SeriesRegistry;

	constructor(params: PubIdParams, registry: SeriesRegistry = getRegistry()) {
		const result = PubIdParamsSchema.safeParse(params);
		if (!result.success) throw new InvalidModelError(issuesOf(result.error));
		const data = result.data;

		const series = resolveSeries(registry, data.publisher, data.series);
		if (!series) {
			throw new InvalidModelError([
				`series: unknown series "${data.series}" for publisher ${data.publisher}`,
			]);
		}
		if (!series.docnumberPattern.test(data.docnumber)) {
			throw new InvalidModelError([
				`docnumber: "${data.docnumber}" is not a valid ${series.key} document number`,
			]);
		}
		if (data.stage !== undefined && !registry.stage(data.stage)) {
			throw new InvalidModelError([`stage: unknown stage "${data.stage}"`]);
		}

		this.registry = registry;
		this.publisher = data.publisher;
		this.series = series;
		this.docnumber = data.docnumber;
		this.fields = {
			stage: data.stage,
			volume: data.volume,
			part: data.part,
			revision: data.revision,
			edition: data.edition,
			version: data.version,
			addendum: data.addendum,
			update: data.update,
			translation: data.translation,
		};
	}

	/** Parse a short-form or machine-readable PubID; throws PubIdParseError. */
	static parse(text: string, registry?: SeriesRegistry): PubId {
		const result = PubId.tryParse(text, registry);
		if (!result.ok) throw result.error;
		return result.pubid;
	}

	/**
	 * Non-throwing parse. Results for the default registry are cached as
	 * parameter snapshots; every call returns a fresh identifier.
	 */
	static tryParse(text: string, registry?: SeriesRegistry): ParseResult {
		const cache = registry ? null : getParseCache();
		const activeRegistry = registry ?? getRegistry();
		const key = text.trim();

		const cached = cache?.get(key);
		if (cached) return { ok: true, pubid: new PubId(cached, activeRegistry) };

		try {
			const components = parseComponents(text, activeRegistry);
			const pubid = new PubId(
				{
					publisher: components.publisher,
					series: components.series.code,
					docnumber: components.docnumber,
					...components.qualifiers,
				},
				activeRegistry,
			);
			cache?.set(key, pubid.toParams());
			return { ok: true, pubid };
		} catch (err) {
			const error =
				err instanceof InvalidModelError
					? new PubIdParseError("MALFORMED_DOCNUMBER", err.message, text)
					: err;
			if (!(error instanceof PubIdParseError)) throw error;
			logger.debug(`Rejected PubID "${text}": ${error.message}`);
			return { ok: false, error };
		}
	}

	get stage(): string | undefined {
		return this.fields.stage;
	}

	set stage(value: string | undefined) {
		const code = checkField(StageCodeSchema.optional(), "stage", value);
		if (code !== undefined && !this.registry.stage(code)) {
			throw new InvalidModelError([`stage: unknown stage "${code}"`]);
		}
		this.fields.stage = code;
	}

	get volume(): number | undefined {
		return this.fields.volume;
	}

	set volume(value: number | undefined) {
		this.fields.volume = checkField(CountSchema.optional(), "volume", value);
	}

	get part(): string | undefined {
		return this.fields.part;
	}

	set part(value: string | number | undefined) {
		this.fields.part = checkField(PartSchema.optional(), "part", value);
	}

	get revision(): number | undefined {
		return this.fields.revision;
	}

	set revision(value: number | undefined) {
		this.fields.revision = checkField(CountSchema.optional(), "revision", value);
		if (value !== undefined) this.fields.edition = undefined;
	}

	get edition(): number | undefined {
		return this.fields.edition;
	}

	set edition(value: number | undefined) {
		this.fields.edition = checkField(CountSchema.optional(), "edition", value);
		if (value !== undefined) this.fields.revision = undefined;
	}

	get version(): number | undefined {
		return this.fields.version;
	}

	set version(value: number | undefined) {
		this.fields.version = checkField(CountSchema.optional(), "version", value);
	}

	get addendum(): number | undefined {
		return this.fields.addendum;
	}

	set addendum(value: number | boolean | undefined) {
		const addendum = checkField(AddendumSchema.optional(), "addendum", value);
		this.fields.addendum = addendum;
		if (addendum !== undefined) this.fields.update = undefined;
	}

	get update(): PubIdUpdate | undefined {
		const update = this.fields.update;
		return update ? { ...update } : undefined;
	}

	set update(value: PubIdUpdate | undefined) {
		this.fields.update = checkField(UpdateSchema.optional(), "update", value);
		if (value !== undefined) this.fields.addendum = undefined;
	}

	get translation(): string | undefined {
		return this.fields.translation;
	}

	set translation(value: string | undefined) {
		this.fields.translation = checkField(TranslationSchema.optional(), "translation", value);
	}

	toString(style: PubIdStyle = "short"): string {
		return render(this, style, this.registry);
	}

	/** Plain snapshot with the canonical series code; feeds back into the constructor. */
	toParams(): PubIdParams {
		const { stage, volume, part, revision, edition, version, addendum, update, translation } =
			this.fields;
		return {
			publisher: this.publisher,
			series: this.series.code,
			docnumber: this.docnumber,
			...(stage !== undefined ? { stage } : {}),
			...(volume !== undefined ? { volume } : {}),
			...(part !== undefined ? { part } : {}),
			...(revision !== undefined ? { revision } : {}),
			...(edition !== undefined ? { edition } : {}),
			...(version !== undefined ? { version } : {}),
			...(addendum !== undefined ? { addendum } : {}),
			...(update !== undefined ? { update: { ...update } } : {}),
			...(translation !== undefined ? { translation } : {}),
		};
	}

	toJSON(): PubIdParams {
		return this.toParams();
	}

	clone(): PubId {
		return new PubId(this.toParams(), this.registry);
	}

	/** The MR form carries every field, so equal MR strings mean equal identifiers. */
	equals(other: PubId): boolean {
		return this.toString("mr") === other.toString("mr");
	}
}
