export { ParseCache } from "./cache/parse-cache.js";
export type { CacheStats } from "./cache/parse-cache.js";
export { ConfigSchema, loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { getConfig, getParseCache, getRegistry, resetDefaults } from "./defaults.js";
export { InvalidModelError, PubIdParseError, RegistryError } from "./errors.js";
export type { ParseErrorCode } from "./errors.js";
export { LOG_LEVELS, logger, setLogLevel } from "./logger.js";
export type { LogLevel } from "./logger.js";
export { suggestSeries } from "./matching/suggest-series.js";
export type { SeriesSuggestion } from "./matching/suggest-series.js";
export { PubId } from "./model/pubid.js";
export type { ParseResult } from "./model/pubid.js";
export { COMPACT_MARKERS, PUBID_STYLES, PubIdParamsSchema } from "./model/qualifiers.js";
export type {
	PubIdParams,
	PubIdStyle,
	PubIdUpdate,
	PubIdView,
	Qualifiers,
} from "./model/qualifiers.js";
export { normalizePubId, sortPubIds } from "./normalize.js";
export { compareDocnumbers, comparePubIds } from "./ordering/compare.js";
export { detectInputStyle, parseComponents } from "./parser/index.js";
export type { InputStyle, ParsedComponents } from "./parser/index.js";
export {
	DEFAULT_REGISTRY_PATH,
	PUBLISHERS,
	SeriesRegistry,
	loadRegistryFile,
	normalizeKey,
} from "./registry/index.js";
export type { Publisher, RegistryData, SeriesEntry, StageInfo } from "./registry/index.js";
export { render } from "./renderer/index.js";
