import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { RegistryError } from "../errors.js";
import { SeriesRegistry } from "./series-registry.js";

/** Bundled registry data; the same relative location from src/ and dist/. */
export const DEFAULT_REGISTRY_PATH = fileURLToPath(
	new URL("../../data/series.json", import.meta.url),
);

export function loadRegistryFile(path: string = DEFAULT_REGISTRY_PATH): SeriesRegistry {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf8"));
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new RegistryError(`Cannot read series registry at ${path}: ${reason}`);
	}
	return SeriesRegistry.from(raw);
}
