/**
 * File-backed key-value storage
 *
 * The whole store lives in memory after the first read and is written back
 * to one JSON file after every change, so cached collections survive a
 * relaunch. Writes go out in call order.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { KeyValueStorage } from './storage.js';

const storedFileSchema = z.record(z.string());

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStorage implements KeyValueStorage {
	readonly filename: string;
	private entries: Promise<Map<string, string>> | null = null;
	private writes: Promise<void> = Promise.resolve();

	constructor(filename: string) {
		this.filename = filename;
	}

	async getItem(key: string): Promise<string | null> {
		const entries = await this.load();
		return entries.get(key) ?? null;
	}

	async setItem(key: string, value: string): Promise<void> {
		const entries = await this.load();
		entries.set(key, value);
		await this.save(entries);
	}

	async removeItem(key: string): Promise<void> {
		const entries = await this.load();
		if (entries.delete(key)) {
			await this.save(entries);
		}
	}

	async clear(): Promise<void> {
		const entries = await this.load();
		entries.clear();
		await this.save(entries);
	}

	/**
	 * Resolves once every write issued so far has finished
	 */
	flushed(): Promise<void> {
		return this.writes;
	}

	private load(): Promise<Map<string, string>> {
		if (!this.entries) {
			this.entries = this.readEntries();
		}
		return this.entries;
	}

	private async readEntries(): Promise<Map<string, string>> {
		let raw: string;
		try {
			raw = await readFile(this.filename, 'utf8');
		} catch (error) {
			if (isMissingFile(error)) return new Map();
			throw error;
		}

		try {
			return new Map(Object.entries(storedFileSchema.parse(JSON.parse(raw))));
		} catch (error) {
			console.warn(`[FileStorage] Ignoring unreadable ${this.filename}:`, error);
			return new Map();
		}
	}

	private save(entries: Map<string, string>): Promise<void> {
		const snapshot = JSON.stringify(Object.fromEntries(entries));
		const write = this.writes.then(async () => {
			await mkdir(dirname(this.filename), { recursive: true });
			await writeFile(this.filename, snapshot, 'utf8');
		});
		// A failed write must not block the ones queued after it
		this.writes = write.catch((error: unknown) => {
			console.warn(`[FileStorage] Failed to write ${this.filename}:`, error);
		});
		return write;
	}
}
