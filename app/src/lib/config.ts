/**
 * Client data layer configuration
 */

export interface ClientConfig {
	/**
	 * Cache schema version. Entries written under any other version are
	 * dropped; bump it whenever a cached shape changes.
	 */
	schemaVersion: number;
	/** TTL applied when setJson is called without one */
	defaultTtlSeconds: number;
	/** How long a game state node outlives its last observer */
	keepAliveMs: number;
	/** Wall clock in epoch milliseconds */
	clock: () => number;
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
	schemaVersion: 2,
	defaultTtlSeconds: 24 * 60 * 60,
	keepAliveMs: 5 * 60 * 1000,
	clock: () => Date.now(),
};

export function resolveClientConfig(config: Partial<ClientConfig> = {}): ClientConfig {
	return {
		schemaVersion: config.schemaVersion ?? DEFAULT_CLIENT_CONFIG.schemaVersion,
		defaultTtlSeconds: config.defaultTtlSeconds ?? DEFAULT_CLIENT_CONFIG.defaultTtlSeconds,
		keepAliveMs: config.keepAliveMs ?? DEFAULT_CLIENT_CONFIG.keepAliveMs,
		clock: config.clock ?? DEFAULT_CLIENT_CONFIG.clock,
	};
}
