/**
 * Versioned, TTL'd JSON cache over a key-value storage
 *
 * Lets the client render cached collections on a cold start before the
 * network answers. Every entry is wrapped with the schema version and write
 * time; anything stale, from another schema version or undecodable is evicted
 * on read and reported as a miss.
 */

import { z } from 'zod';
import type { KeyValueStorage } from './storage.js';
import { resolveClientConfig, type ClientConfig } from '../config.js';

const VERSION_KEY = 'cache_version';

const cacheEntrySchema = z.object({
	version: z.number().int(),
	/** ISO-8601 write time */
	timestamp: z.string(),
	ttlSeconds: z.number().nonnegative(),
	data: z.unknown(),
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

/**
 * Turns the cached `data` back into a typed value; throws on a bad shape
 */
export type Decoder<T> = (data: unknown) => T;

export interface GetJsonOptions {
	/** Set to false to accept expired entries (still version-checked) */
	checkTtl?: boolean;
}

export class PersistentCacheStore {
	private storage: KeyValueStorage;
	private config: ClientConfig;

	constructor(storage: KeyValueStorage, config: Partial<ClientConfig> = {}) {
		this.storage = storage;
		this.config = resolveClientConfig(config);
	}

	get schemaVersion(): number {
		return this.config.schemaVersion;
	}

	/**
	 * Purge every entry when the stored schema version is not the running one.
	 * Call once at startup, before any read.
	 *
	 * @returns true if the cache was purged
	 */
	async checkSchemaVersion(): Promise<boolean> {
		const stored = await this.storage.getItem(VERSION_KEY);
		if (stored === String(this.config.schemaVersion)) {
			return false;
		}

		console.log(
			`[PersistentCache] Schema version changed (${stored ?? 'none'} -> ${this.config.schemaVersion}), clearing cache`
		);
		await this.clearAll();
		return true;
	}

	/**
	 * Store a JSON-serializable value
	 *
	 * @param ttlSeconds - defaults to the configured TTL (24 hours)
	 */
	async setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
		const entry: CacheEntry = {
			version: this.config.schemaVersion,
			timestamp: new Date(this.config.clock()).toISOString(),
			ttlSeconds: ttlSeconds ?? this.config.defaultTtlSeconds,
			data: value,
		};

		try {
			await this.storage.setItem(key, JSON.stringify(entry));
		} catch (error) {
			// Quota exceeded or storage unavailable; the write is dropped
			console.warn(`[PersistentCache] Failed to write '${key}':`, error);
		}
	}

	/**
	 * Read a value written by setJson
	 *
	 * @returns the decoded value, or null on a miss. A version mismatch, an
	 * expired entry or a decode failure evicts the key and counts as a miss.
	 */
	async getJson<T>(key: string, decode: Decoder<T>, options: GetJsonOptions = {}): Promise<T | null> {
		const { checkTtl = true } = options;

		let raw: string | null;
		try {
			raw = await this.storage.getItem(key);
		} catch (error) {
			console.warn(`[PersistentCache] Failed to read '${key}':`, error);
			return null;
		}
		if (raw === null) return null;

		let entry: CacheEntry;
		try {
			entry = cacheEntrySchema.parse(JSON.parse(raw));
		} catch {
			await this.evict(key, 'corrupt entry');
			return null;
		}

		if (entry.version !== this.config.schemaVersion) {
			await this.evict(key, `version ${entry.version} != ${this.config.schemaVersion}`);
			return null;
		}

		if (checkTtl) {
			const writtenAt = Date.parse(entry.timestamp);
			const ageMs = this.config.clock() - writtenAt;
			if (Number.isNaN(writtenAt) || ageMs > entry.ttlSeconds * 1000) {
				await this.evict(key, 'expired');
				return null;
			}
		}

		try {
			return decode(entry.data);
		} catch {
			await this.evict(key, 'payload failed to decode');
			return null;
		}
	}

	async remove(key: string): Promise<void> {
		await this.storage.removeItem(key);
	}

	/**
	 * Clear a specific cache key
	 */
	async clear(key: string): Promise<void> {
		await this.remove(key);
	}

	/**
	 * Drop every entry (sign-out) and re-record the running schema version
	 */
	async clearAll(): Promise<void> {
		await this.storage.clear();
		await this.storage.setItem(VERSION_KEY, String(this.config.schemaVersion));
	}

	private async evict(key: string, reason: string): Promise<void> {
		console.warn(`[PersistentCache] Evicting '${key}': ${reason}`);
		try {
			await this.storage.removeItem(key);
		} catch (error) {
			console.warn(`[PersistentCache] Failed to evict '${key}':`, error);
		}
	}
}
