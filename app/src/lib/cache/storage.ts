/**
 * Key-value storage contract used by the persistent cache.
 * String in, string out; no transactions across keys.
 */
export interface KeyValueStorage {
	getItem(key: string): Promise<string | null>;
	setItem(key: string, value: string): Promise<void>;
	removeItem(key: string): Promise<void>;
	/** Remove every key */
	clear(): Promise<void>;
}

/**
 * In-process storage. Nothing survives a restart; used in tests and as a
 * fallback when no durable storage is available.
 */
export class MemoryStorage implements KeyValueStorage {
	private items = new Map<string, string>();

	async getItem(key: string): Promise<string | null> {
		return this.items.get(key) ?? null;
	}

	async setItem(key: string, value: string): Promise<void> {
		this.items.set(key, value);
	}

	async removeItem(key: string): Promise<void> {
		this.items.delete(key);
	}

	async clear(): Promise<void> {
		this.items.clear();
	}

	get size(): number {
		return this.items.size;
	}
}
