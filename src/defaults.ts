import { ParseCache } from "./cache/parse-cache.js";
import { type Config, loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { loadRegistryFile } from "./registry/load.js";
import type { SeriesRegistry } from "./registry/series-registry.js";

/**
 * Process-wide defaults, built on first use. The registry is read-only after
 * loading, so one instance serves every caller.
 */
let sharedConfig: Config | null = null;
let sharedRegistry: SeriesRegistry | null = null;
let sharedCache: ParseCache | null = null;

export function getConfig(): Config {
	if (!sharedConfig) {
		sharedConfig = loadConfig();
		setLogLevel(sharedConfig.PUBID_LOG_LEVEL);
	}
	return sharedConfig;
}

export function getRegistry(): SeriesRegistry {
	if (!sharedRegistry) {
		const path = getConfig().PUBID_REGISTRY_PATH;
		sharedRegistry = loadRegistryFile(path);
		if (path) logger.info("Using series registry from", path);
	}
	return sharedRegistry;
}

export function getParseCache(): ParseCache {
	if (!sharedCache) {
		sharedCache = new ParseCache(getConfig().PUBID_PARSE_CACHE_SIZE);
	}
	return sharedCache;
}

/** Drop the shared config, registry and cache (for testing). */
export function resetDefaults(): void {
	sharedConfig = null;
	sharedRegistry = null;
	sharedCache = null;
}
