/**
 * Scorebook client data layer - public entry point
 *
 * Optimistic at-bat collections, derived game state and the persistent
 * cache behind them.
 *
 * @example
 * ```ts
 * const cache = new PersistentCacheStore(new FileStorage('.scorebook/cache.json'));
 * await cache.checkSchemaVersion();
 *
 * const atBats = new AtBatCollections({ api, cache, mutations: new MutationEngine() });
 * const gameState = new GameStateCache({ atBats, lineups: new GameLineupSource(gameApi, cache) });
 *
 * const stop = gameState.observe({ gameId, teamId }, (value) => render(value));
 * await gameState.recordAtBat({ gameId, teamId }, { playerId, resultCode: 'K', battingOrder: 1 });
 * ```
 */

// ====================================================================
// Configuration
// ====================================================================
export { DEFAULT_CLIENT_CONFIG, resolveClientConfig } from './config.js';
export type { ClientConfig } from './config.js';

// ====================================================================
// Persistent cache
// ====================================================================
export { PersistentCacheStore } from './cache/persistent-cache.js';
export type { CacheEntry, Decoder, GetJsonOptions } from './cache/persistent-cache.js';
export { MemoryStorage } from './cache/storage.js';
export type { KeyValueStorage } from './cache/storage.js';
export { FileStorage } from './cache/file-storage.js';
export { CacheKeys } from './cache/cache-keys.js';

// ====================================================================
// Mutations
// ====================================================================
export { CollectionStore } from './mutation/collection-store.js';
export type { AsyncValue, CollectionListener } from './mutation/collection-store.js';
export { MutationEngine } from './mutation/mutation-engine.js';
export type { MutationDescriptor, MutationResult } from './mutation/mutation-engine.js';
export { ApiError, describeMutationError } from './mutation/api-error.js';
export { consoleNotifier } from './mutation/notifier.js';
export type { Notifier } from './mutation/notifier.js';

// ====================================================================
// At-bats
// ====================================================================
export {
	atBatRecordSchema,
	decodeAtBat,
	decodeAtBatList,
	fromAtBatRecord,
	toAtBatRecord,
} from './atbats/atbat-record.js';
export type { AtBatRecord } from './atbats/atbat-record.js';
export type { AtBatApi, CreateAtBatRequest, UpdateAtBatRequest } from './atbats/atbat-api.js';
export { AtBatCollection, AtBatCollections, isTempAtBatId } from './atbats/atbat-collection.js';
export type { AtBatCollectionDeps, AtBatEdit, RecordAtBatInput } from './atbats/atbat-collection.js';

// ====================================================================
// Lineups
// ====================================================================
export { GameLineupSource, decodeGameList, lineupEntrySchema } from './lineups/lineup-source.js';
export type { GameApi, GameRecord, LineupSource } from './lineups/lineup-source.js';

// ====================================================================
// Game state
// ====================================================================
export { GameStateCache } from './game-state/game-state-cache.js';
export type {
	GameStateCacheDeps,
	GameStateListener,
	GameStateParams,
	GameStateValue,
	RecordAtBatRequest,
} from './game-state/game-state-cache.js';
