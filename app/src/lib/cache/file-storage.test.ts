import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { FileStorage } from './file-storage.js';
import { PersistentCacheStore } from './persistent-cache.js';

describe('FileStorage', () => {
	let dir: string;
	let filename: string;
	let storage: FileStorage;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'scorebook-storage-'));
		filename = join(dir, 'cache', 'kv.json');
		storage = new FileStorage(filename);
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await storage.flushed();
		await rm(dir, { recursive: true, force: true });
	});

	it('should store and read back a value', async () => {
		await storage.setItem('key', 'value');
		expect(await storage.getItem('key')).toBe('value');
	});

	it('should return null for a missing key before the file exists', async () => {
		expect(await storage.getItem('missing')).toBeNull();
	});

	it('should write every entry to the file', async () => {
		await storage.setItem('a', '1');
		await storage.setItem('b', '2');

		expect(JSON.parse(await readFile(filename, 'utf8'))).toEqual({ a: '1', b: '2' });
	});

	it('should survive a reopen', async () => {
		await storage.setItem('key', 'value');

		const reopened = new FileStorage(filename);
		expect(await reopened.getItem('key')).toBe('value');
	});

	it('should overwrite an existing key', async () => {
		await storage.setItem('key', 'first');
		await storage.setItem('key', 'second');
		expect(await storage.getItem('key')).toBe('second');
	});

	it('should remove a single key', async () => {
		await storage.setItem('a', '1');
		await storage.setItem('b', '2');
		await storage.removeItem('a');

		expect(await storage.getItem('a')).toBeNull();
		expect(JSON.parse(await readFile(filename, 'utf8'))).toEqual({ b: '2' });
	});

	it('should clear every key', async () => {
		await storage.setItem('a', '1');
		await storage.clear();

		expect(await storage.getItem('a')).toBeNull();
		expect(JSON.parse(await readFile(filename, 'utf8'))).toEqual({});
	});

	it('should keep the last of concurrent writes', async () => {
		await Promise.all([storage.setItem('key', 'first'), storage.setItem('key', 'second')]);

		const reopened = new FileStorage(filename);
		expect(await reopened.getItem('key')).toBe('second');
	});

	it('should start empty over an unreadable file', async () => {
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		await writeFile(join(dir, 'broken.json'), 'not json', 'utf8');

		const broken = new FileStorage(join(dir, 'broken.json'));
		expect(await broken.getItem('key')).toBeNull();
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	it('should back a PersistentCacheStore', async () => {
		const cache = new PersistentCacheStore(storage);
		await cache.setJson('games_cache_t1', [{ gameId: 'g1' }]);

		const games = await cache.getJson('games_cache_t1', (data) =>
			z.array(z.object({ gameId: z.string() })).parse(data)
		);
		expect(games).toEqual([{ gameId: 'g1' }]);
	});
});
