import { LRUCache } from "lru-cache";
import type { PubIdParams } from "../model/qualifiers.js";

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/**
 * Successful parses keyed by trimmed input. Entries are parameter snapshots,
 * never PubId instances, since identifiers are mutable.
 * A cache created with maxEntries 0 stores nothing.
 */
export class ParseCache {
	private readonly cache: LRUCache<string, PubIdParams> | null;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 500) {
		this.cache = maxEntries > 0 ? new LRUCache<string, PubIdParams>({ max: maxEntries }) : null;
	}

	get(input: string): PubIdParams | undefined {
		const result = this.cache?.get(input);
		if (result !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return result;
	}

	set(input: string, params: PubIdParams): void {
		this.cache?.set(input, params);
	}

	stats(): CacheStats {
		return {
			size: this.cache?.size ?? 0,
			maxSize: this.cache?.max ?? 0,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	clear(): void {
		this.cache?.clear();
		this.hitCount = 0;
		this.missCount = 0;
	}
}
