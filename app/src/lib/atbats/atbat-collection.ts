/**
 * At-bat log of one game
 *
 * Holds the published at-bat list for a game, seeds it from the persistent
 * cache for instant display, refreshes it from the API, and records, edits
 * and deletes at-bats optimistically through the MutationEngine.
 */

import { sortAtBats, type AtBatEvent, type HitLocation } from '@scorebook/engine';
import type { AtBatApi, UpdateAtBatRequest } from './atbat-api.js';
import { decodeAtBat, decodeAtBatList, toAtBatRecord } from './atbat-record.js';
import { CollectionStore } from '../mutation/collection-store.js';
import { describeMutationError } from '../mutation/api-error.js';
import type { MutationEngine, MutationResult } from '../mutation/mutation-engine.js';
import type { PersistentCacheStore } from '../cache/persistent-cache.js';
import { CacheKeys } from '../cache/cache-keys.js';

const TEMP_ID_PREFIX = 'temp-';

// A background fetch that keeps losing to confirmed mutations gives up after this
const MAX_FETCH_ATTEMPTS = 3;

// Shared across games so local creation order is total for the process
let nextSequence = 1;

export function isTempAtBatId(atBatId: string): boolean {
	return atBatId.startsWith(TEMP_ID_PREFIX);
}

export interface RecordAtBatInput {
	playerId: string;
	resultCode: string;
	inning: number;
	outs: number;
	battingOrder: number;
	hitLocation?: HitLocation;
	hitType?: string;
	rbis?: number;
}

export interface AtBatEdit {
	resultCode?: string;
	inning?: number;
	outs?: number;
	hitLocation?: HitLocation;
	hitType?: string;
	rbis?: number;
}

/**
 * Edits and deletes in flight for one at-bat
 *
 * `base` is the newest server-confirmed version; a failed mutation restores it
 * instead of the copy it started from.
 */
interface PendingChanges {
	count: number;
	base: AtBatEvent;
}

export interface AtBatCollectionDeps {
	api: AtBatApi;
	cache: PersistentCacheStore;
	mutations: MutationEngine;
	clock?: () => number;
}

/**
 * Insert or replace by id, keeping log order
 */
function upsert(events: AtBatEvent[], event: AtBatEvent): AtBatEvent[] {
	return sortAtBats([...events.filter((e) => e.id !== event.id), event]);
}

function replaceById(events: AtBatEvent[], event: AtBatEvent): AtBatEvent[] {
	return events.map((e) => (e.id === event.id ? event : e));
}

function toUpdateRequest(edit: AtBatEdit): UpdateAtBatRequest {
	return {
		result: edit.resultCode,
		inning: edit.inning,
		outs: edit.outs,
		hitLocation: edit.hitLocation,
		hitType: edit.hitType,
		rbis: edit.rbis,
	};
}

export class AtBatCollection {
	readonly gameId: string;
	readonly store: CollectionStore<AtBatEvent[]>;

	private api: AtBatApi;
	private cache: PersistentCacheStore;
	private mutations: MutationEngine;
	private clock: () => number;

	private loading: Promise<void> | null = null;
	private backgroundRefresh: Promise<void> = Promise.resolve();
	private pending = new Map<string, PendingChanges>();
	// Bumped as soon as the server confirms a mutation
	private confirmedCount = 0;

	constructor(gameId: string, deps: AtBatCollectionDeps) {
		this.gameId = gameId;
		this.api = deps.api;
		this.cache = deps.cache;
		this.mutations = deps.mutations;
		this.clock = deps.clock ?? (() => Date.now());
		this.store = new CollectionStore<AtBatEvent[]>(`atbats:${gameId}`);
	}

	/**
	 * Current at-bats in log order; empty while nothing is loaded
	 */
	events(): AtBatEvent[] {
		return this.store.value() ?? [];
	}

	/**
	 * Most recently created at-bat, or null for an empty log
	 */
	last(): AtBatEvent | null {
		const events = sortAtBats(this.events());
		return events.length > 0 ? events[events.length - 1] : null;
	}

	/**
	 * Make sure the collection has data
	 *
	 * A non-empty cached log is published immediately and refreshed in the
	 * background; otherwise the API is awaited. Concurrent calls share one load.
	 */
	load(): Promise<void> {
		if (this.store.get().status === 'data') {
			return Promise.resolve();
		}
		if (!this.loading) {
			this.loading = this.loadInitial().finally(() => {
				this.loading = null;
			});
		}
		return this.loading;
	}

	/**
	 * Resolves once any background refresh started by load() has finished
	 */
	settled(): Promise<void> {
		return this.backgroundRefresh;
	}

	/**
	 * Pull-to-refresh: republish from the API, surfacing failures as an error state
	 */
	async refresh(): Promise<void> {
		this.store.set({ status: 'loading' });
		try {
			await this.fetchAndPublish();
		} catch (error) {
			console.warn(`[AtBats] Refresh failed for game ${this.gameId}:`, error);
			this.store.set({ status: 'error', error });
		}
	}

	async create(input: RecordAtBatInput): Promise<MutationResult<AtBatEvent>> {
		const sequence = nextSequence++;
		const now = new Date(this.clock()).toISOString();
		const temp: AtBatEvent = {
			id: `${TEMP_ID_PREFIX}${sequence}`,
			gameId: this.gameId,
			playerId: input.playerId,
			resultCode: input.resultCode,
			inning: input.inning,
			outs: input.outs,
			battingOrder: input.battingOrder,
			hitLocation: input.hitLocation,
			hitType: input.hitType,
			rbis: input.rbis,
			createdAt: now,
			updatedAt: now,
			sequence,
		};

		const result = await this.mutations.mutate<AtBatEvent[], AtBatEvent>(this.store, {
			optimisticUpdate: (current) => upsert(current, temp),
			apiCall: async () => {
				const created = decodeAtBat(
					await this.api.createAtBat({
						gameId: this.gameId,
						playerId: input.playerId,
						result: input.resultCode,
						inning: input.inning,
						outs: input.outs,
						battingOrder: input.battingOrder,
						hitLocation: input.hitLocation,
						hitType: input.hitType,
						rbis: input.rbis,
					})
				);
				this.confirmedCount++;
				return created;
			},
			applyResult: (current, created) =>
				upsert(
					current.filter((e) => e.id !== temp.id),
					created
				),
			rollback: (current) => current.filter((e) => e.id !== temp.id),
			successMessage: 'At-bat recorded successfully',
			errorMessage: (error) => `Failed to record at-bat: ${describeMutationError(error)}`,
		});

		if (result.ok) await this.persist();
		return result;
	}

	/**
	 * Edit an at-bat in place; it keeps its id and its position in the log
	 */
	async update(atBatId: string, edit: AtBatEdit): Promise<MutationResult<AtBatEvent>> {
		const existing = this.events().find((e) => e.id === atBatId);
		if (!existing) {
			return this.mutations.reject('At-bat not found');
		}

		const edited: AtBatEvent = {
			...existing,
			resultCode: edit.resultCode ?? existing.resultCode,
			inning: edit.inning ?? existing.inning,
			outs: edit.outs ?? existing.outs,
			hitLocation: edit.hitLocation ?? existing.hitLocation,
			hitType: edit.hitType ?? existing.hitType,
			rbis: edit.rbis ?? existing.rbis,
			updatedAt: new Date(this.clock()).toISOString(),
		};

		const changes = this.hold(existing);
		try {
			const result = await this.mutations.mutate<AtBatEvent[], AtBatEvent>(this.store, {
				optimisticUpdate: (current) => replaceById(current, edited),
				apiCall: async () => {
					const saved = decodeAtBat(
						await this.api.updateAtBat(this.gameId, atBatId, toUpdateRequest(edit))
					);
					this.confirmedCount++;
					return { ...saved, createdAt: existing.createdAt, sequence: existing.sequence };
				},
				applyResult: (current, saved) => {
					// Leave a newer optimistic edit of the same at-bat on screen
					const previous = changes.base;
					changes.base = saved;
					return current.map((e) => (e === edited || e === previous ? saved : e));
				},
				rollback: (current) => current.map((e) => (e === edited ? changes.base : e)),
				successMessage: 'At-bat updated successfully',
				errorMessage: (error) => `Failed to update at-bat: ${describeMutationError(error)}`,
			});

			if (result.ok) await this.persist();
			return result;
		} finally {
			this.release(atBatId);
		}
	}

	async remove(atBatId: string): Promise<MutationResult<void>> {
		const existing = this.events().find((e) => e.id === atBatId);
		if (!existing) {
			return this.mutations.reject('At-bat not found');
		}

		const withoutTarget = (current: AtBatEvent[]) => current.filter((e) => e.id !== atBatId);

		const changes = this.hold(existing);
		try {
			const result = await this.mutations.mutate<AtBatEvent[], void>(this.store, {
				optimisticUpdate: withoutTarget,
				apiCall: async () => {
					await this.api.deleteAtBat(this.gameId, atBatId);
					this.confirmedCount++;
				},
				applyResult: withoutTarget,
				rollback: (current) =>
					current.some((e) => e.id === atBatId) ? current : upsert(current, changes.base),
				successMessage: 'At-bat deleted successfully',
				errorMessage: (error) => `Failed to delete at-bat: ${describeMutationError(error)}`,
			});

			if (result.ok) await this.persist();
			return result;
		} finally {
			this.release(atBatId);
		}
	}

	private async loadInitial(): Promise<void> {
		const cached = await this.cache.getJson(CacheKeys.atBats(this.gameId), decodeAtBatList);

		if (cached && cached.length > 0) {
			this.store.setData(sortAtBats(cached));
			this.backgroundRefresh = this.fetchAndPublish().catch((error: unknown) => {
				console.warn(`[AtBats] Background refresh failed for game ${this.gameId}, keeping cached log:`, error);
			});
			return;
		}

		try {
			await this.fetchAndPublish();
		} catch (error) {
			this.store.set({ status: 'error', error });
			throw error;
		}
	}

	/**
	 * Publish the server log over the live one
	 *
	 * A list fetched before a mutation was confirmed is stale; it is thrown
	 * away and fetched again.
	 */
	private async fetchAndPublish(): Promise<void> {
		for (let attempt = 1; ; attempt++) {
			const confirmedBefore = this.confirmedCount;
			const fresh = decodeAtBatList(await this.api.listAtBats(this.gameId));

			if (confirmedBefore === this.confirmedCount) {
				this.store.setData(this.reconcile(fresh));
				await this.persist();
				return;
			}
			if (attempt >= MAX_FETCH_ATTEMPTS && this.store.get().status === 'data') {
				console.warn(`[AtBats] Game ${this.gameId} kept changing during refresh, keeping the live log`);
				return;
			}
		}
	}

	/**
	 * Server list plus what is still in flight locally: temporary at-bats and
	 * the live version of at-bats being edited or deleted
	 */
	private reconcile(fresh: AtBatEvent[]): AtBatEvent[] {
		if (this.store.get().status !== 'data') {
			return sortAtBats(fresh);
		}
		const held = this.events().filter((e) => isTempAtBatId(e.id) || this.pending.has(e.id));
		return sortAtBats([...fresh.filter((e) => !this.pending.has(e.id)), ...held]);
	}

	private hold(existing: AtBatEvent): PendingChanges {
		const changes = this.pending.get(existing.id) ?? { count: 0, base: existing };
		changes.count++;
		this.pending.set(existing.id, changes);
		return changes;
	}

	private release(atBatId: string): void {
		const changes = this.pending.get(atBatId);
		if (!changes) return;
		changes.count--;
		if (changes.count === 0) this.pending.delete(atBatId);
	}

	private async persist(): Promise<void> {
		const confirmed = this.events().filter((e) => !isTempAtBatId(e.id));
		await this.cache.setJson(CacheKeys.atBats(this.gameId), confirmed.map(toAtBatRecord));
	}
}

/**
 * One collection per game, created on first use
 */
export class AtBatCollections {
	private deps: AtBatCollectionDeps;
	private collections = new Map<string, AtBatCollection>();

	constructor(deps: AtBatCollectionDeps) {
		this.deps = deps;
	}

	get(gameId: string): AtBatCollection {
		let collection = this.collections.get(gameId);
		if (!collection) {
			collection = new AtBatCollection(gameId, this.deps);
			this.collections.set(gameId, collection);
		}
		return collection;
	}

	/**
	 * Forget every collection (sign-out)
	 */
	clear(): void {
		this.collections.clear();
	}
}
