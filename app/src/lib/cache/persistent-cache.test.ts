/**
 * PersistentCacheStore tests
 *
 * Versioning, TTL expiry, eviction of corrupt entries and manual clearing,
 * over the in-memory storage with a hand-driven clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { PersistentCacheStore } from './persistent-cache.js';
import { MemoryStorage, type KeyValueStorage } from './storage.js';

const decodeNumbers = (data: unknown) => z.array(z.number()).parse(data);

describe('PersistentCacheStore', () => {
	let now: number;
	let storage: MemoryStorage;
	let cache: PersistentCacheStore;

	beforeEach(() => {
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		vi.spyOn(console, 'log').mockImplementation(() => {});
		now = Date.UTC(2024, 5, 1, 12, 0, 0);
		storage = new MemoryStorage();
		cache = new PersistentCacheStore(storage, { clock: () => now });
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe('setJson / getJson', () => {
		it('should round-trip a value through the decoder', async () => {
			await cache.setJson('numbers', [1, 2, 3]);
			expect(await cache.getJson('numbers', decodeNumbers)).toEqual([1, 2, 3]);
		});

		it('should wrap the value with version, timestamp and default TTL', async () => {
			await cache.setJson('numbers', [1]);
			const raw = await storage.getItem('numbers');
			expect(JSON.parse(raw ?? '')).toEqual({
				version: 2,
				timestamp: '2024-06-01T12:00:00.000Z',
				ttlSeconds: 86400,
				data: [1],
			});
		});

		it('should return null for a missing key', async () => {
			expect(await cache.getJson('missing', decodeNumbers)).toBeNull();
		});
	});

	describe('TTL', () => {
		it('should serve an entry up to its TTL and evict it after', async () => {
			await cache.setJson('numbers', [7], 60);

			now += 60_000;
			expect(await cache.getJson('numbers', decodeNumbers)).toEqual([7]);

			now += 1;
			expect(await cache.getJson('numbers', decodeNumbers)).toBeNull();
			expect(await storage.getItem('numbers')).toBeNull();
		});

		it('should expire entries after 24 hours by default', async () => {
			await cache.setJson('numbers', [7]);
			now += 24 * 60 * 60 * 1000 + 1;
			expect(await cache.getJson('numbers', decodeNumbers)).toBeNull();
		});

		it('should ignore TTL when checkTtl is false', async () => {
			await cache.setJson('numbers', [7], 1);
			now += 10_000;
			expect(await cache.getJson('numbers', decodeNumbers, { checkTtl: false })).toEqual([7]);
		});
	});

	describe('schema version', () => {
		it('should miss and evict entries written under another version', async () => {
			await cache.setJson('numbers', [1]);

			const next = new PersistentCacheStore(storage, { clock: () => now, schemaVersion: 3 });
			expect(await next.getJson('numbers', decodeNumbers)).toBeNull();
			expect(await storage.getItem('numbers')).toBeNull();
		});

		it('should purge everything on startup when the version changed', async () => {
			expect(await cache.checkSchemaVersion()).toBe(true);
			expect(await storage.getItem('cache_version')).toBe('2');

			await cache.setJson('numbers', [1]);
			expect(await cache.checkSchemaVersion()).toBe(false);
			expect(await cache.getJson('numbers', decodeNumbers)).toEqual([1]);

			const next = new PersistentCacheStore(storage, { clock: () => now, schemaVersion: 3 });
			expect(await next.checkSchemaVersion()).toBe(true);
			expect(await storage.getItem('numbers')).toBeNull();
			expect(await storage.getItem('cache_version')).toBe('3');
		});
	});

	describe('corruption', () => {
		it('should evict an entry that is not JSON', async () => {
			await storage.setItem('numbers', 'not json');
			expect(await cache.getJson('numbers', decodeNumbers)).toBeNull();
			expect(await storage.getItem('numbers')).toBeNull();
		});

		it('should evict an entry without an envelope', async () => {
			await storage.setItem('numbers', JSON.stringify([1, 2]));
			expect(await cache.getJson('numbers', decodeNumbers)).toBeNull();
			expect(storage.size).toBe(0);
		});

		it('should evict an entry whose payload fails to decode', async () => {
			await cache.setJson('numbers', ['one', 'two']);
			expect(await cache.getJson('numbers', decodeNumbers)).toBeNull();
			expect(await storage.getItem('numbers')).toBeNull();
		});
	});

	describe('clearing', () => {
		it('should clear a single key', async () => {
			await cache.setJson('a', [1]);
			await cache.setJson('b', [2]);
			await cache.clear('a');
			expect(await cache.getJson('a', decodeNumbers)).toBeNull();
			expect(await cache.getJson('b', decodeNumbers)).toEqual([2]);
		});

		it('should clear everything but keep the version marker', async () => {
			await cache.setJson('a', [1]);
			await cache.setJson('b', [2]);
			await cache.clearAll();
			expect(storage.size).toBe(1);
			expect(await storage.getItem('cache_version')).toBe('2');
			expect(await cache.checkSchemaVersion()).toBe(false);
		});
	});

	it('should not throw when the storage write fails', async () => {
		const failing: KeyValueStorage = {
			getItem: async () => null,
			setItem: async () => {
				throw new Error('quota exceeded');
			},
			removeItem: async () => {},
			clear: async () => {},
		};
		const store = new PersistentCacheStore(failing);
		await expect(store.setJson('numbers', [1])).resolves.toBeUndefined();
	});

	it('should report a miss when evicting a corrupt entry fails', async () => {
		const failing: KeyValueStorage = {
			getItem: async () => 'not json',
			setItem: async () => {},
			removeItem: async () => {
				throw new Error('disk I/O error');
			},
			clear: async () => {},
		};
		const store = new PersistentCacheStore(failing);
		await expect(store.getJson('numbers', decodeNumbers)).resolves.toBeNull();
	});
});
