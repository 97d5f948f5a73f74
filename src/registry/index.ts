export { DEFAULT_REGISTRY_PATH, loadRegistryFile } from "./load.js";
export { DEFAULT_DOCNUMBER_PATTERN, SeriesRegistry, normalizeKey } from "./series-registry.js";
export { PUBLISHERS, RegistryDataSchema } from "./types.js";
export type {
	Publisher,
	RegistryData,
	SeriesEntry,
	SeriesMatch,
	StageInfo,
	Titles,
} from "./types.js";
