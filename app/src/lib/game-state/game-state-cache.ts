/**
 * Reactive game state per (gameId, teamId)
 *
 * Each node derives InGameState from its game's at-bat collection and lineup,
 * and re-derives it whenever the collection publishes a new list. Nodes are
 * reference counted by observer; when the last observer leaves, a keep-alive
 * timer holds the node (and its last state) for a grace period so returning
 * to the scoring screen is instant.
 *
 * The published value is Loading until the first derivation succeeds, then
 * Data. There is no error state: a failed first load stays Loading and a
 * failed recompute keeps the previous Data.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { compute, type AtBatEvent, type InGameState } from '@scorebook/engine';
import type { AtBatCollection, AtBatCollections, AtBatEdit, RecordAtBatInput } from '../atbats/atbat-collection.js';
import type { LineupSource } from '../lineups/lineup-source.js';
import type { MutationResult } from '../mutation/mutation-engine.js';
import { resolveClientConfig, type ClientConfig } from '../config.js';

export interface GameStateParams {
	gameId: string;
	teamId: string;
}

export type GameStateValue = { status: 'loading' } | { status: 'data'; state: InGameState };

export type GameStateListener = (value: GameStateValue) => void;

/** inning and outs are filled in from the current game state */
export type RecordAtBatRequest = Omit<RecordAtBatInput, 'inning' | 'outs'>;

export interface GameStateCacheDeps {
	atBats: AtBatCollections;
	lineups: LineupSource;
	config?: Partial<ClientConfig>;
}

function keyOf(params: GameStateParams): string {
	return `${params.gameId}::${params.teamId}`;
}

function sameState(a: InGameState, b: InGameState): boolean {
	return (
		a.inning === b.inning &&
		a.outs === b.outs &&
		a.batterIndex === b.batterIndex &&
		a.batterPlayerId === b.batterPlayerId
	);
}

/**
 * Load what the reducer needs and run it
 */
async function deriveGameState(
	params: GameStateParams,
	collection: AtBatCollection,
	lineups: LineupSource
): Promise<InGameState> {
	await collection.load();
	const lineup = await lineups.getLineup(params.gameId, params.teamId);
	// Read the log after the last await so the newest list is used
	return compute(collection.events(), lineup);
}

class GameStateNode {
	readonly params: GameStateParams;

	private collection: AtBatCollection;
	private lineups: LineupSource;
	private keepAliveMs: number;
	private onRelease: (node: GameStateNode) => void;

	private store: StoreApi<GameStateValue>;
	private observers = 0;
	private releaseTimer: ReturnType<typeof setTimeout> | null = null;
	private detachCollection: (() => void) | null = null;
	private generation = 0;
	private publishedGeneration = 0;
	private started = false;
	private released = false;
	private pending: Promise<void> = Promise.resolve();

	constructor(
		params: GameStateParams,
		collection: AtBatCollection,
		lineups: LineupSource,
		keepAliveMs: number,
		onRelease: (node: GameStateNode) => void
	) {
		this.params = params;
		this.collection = collection;
		this.lineups = lineups;
		this.keepAliveMs = keepAliveMs;
		this.onRelease = onRelease;
		this.store = createStore<GameStateValue>()(() => ({ status: 'loading' }));
	}

	get value(): GameStateValue {
		return this.store.getState();
	}

	get observerCount(): number {
		return this.observers;
	}

	/**
	 * Resolves once the latest scheduled load or recompute has finished
	 */
	settled(): Promise<void> {
		return this.pending;
	}

	attach(listener: GameStateListener): () => void {
		if (this.releaseTimer) {
			clearTimeout(this.releaseTimer);
			this.releaseTimer = null;
		}

		this.observers++;
		const unsubscribe = this.store.subscribe((value) => listener(value));
		if (!this.started) {
			this.start();
		}

		let attached = true;
		return () => {
			if (!attached) return;
			attached = false;
			unsubscribe();
			this.observers--;
			if (this.observers === 0) {
				this.armRelease();
			}
		};
	}

	/**
	 * Drop the node now: stop listening to the collection and cancel the timer
	 */
	release(): void {
		if (this.released) return;
		this.released = true;

		if (this.releaseTimer) {
			clearTimeout(this.releaseTimer);
			this.releaseTimer = null;
		}
		this.detachCollection?.();
		this.detachCollection = null;
		this.onRelease(this);
	}

	private start(): void {
		this.started = true;
		this.detachCollection = this.collection.store.subscribe((next) => {
			if (next.status === 'data' && this.value.status === 'data') {
				this.scheduleRecompute();
			}
		});

		const generation = ++this.generation;
		this.pending = deriveGameState(this.params, this.collection, this.lineups).then(
			(state) => this.publish(generation, state),
			(error: unknown) => {
				console.warn(
					`[GameState] Initial load failed for game ${this.params.gameId}, staying in loading:`,
					error
				);
			}
		);
	}

	private scheduleRecompute(): void {
		const generation = ++this.generation;
		this.pending = deriveGameState(this.params, this.collection, this.lineups).then(
			(state) => this.publish(generation, state),
			(error: unknown) => {
				console.warn(
					`[GameState] Recompute failed for game ${this.params.gameId}, keeping last state:`,
					error
				);
			}
		);
	}

	private publish(generation: number, state: InGameState): void {
		// A newer derivation already published
		if (this.released || generation < this.publishedGeneration) return;
		this.publishedGeneration = generation;

		const current = this.value;
		if (current.status === 'data' && sameState(current.state, state)) return;

		this.store.setState({ status: 'data', state }, true);
	}

	private armRelease(): void {
		if (this.released) return;
		this.releaseTimer = setTimeout(() => {
			this.releaseTimer = null;
			this.release();
		}, this.keepAliveMs);
	}
}

export class GameStateCache {
	private atBats: AtBatCollections;
	private lineups: LineupSource;
	private config: ClientConfig;
	private nodes = new Map<string, GameStateNode>();

	constructor(deps: GameStateCacheDeps) {
		this.atBats = deps.atBats;
		this.lineups = deps.lineups;
		this.config = resolveClientConfig(deps.config);
	}

	/**
	 * Observe the game state. The listener is called right away with the
	 * current value, then on every change.
	 *
	 * @returns detach function; the node is kept alive for `keepAliveMs`
	 * after the last observer detaches
	 */
	observe(params: GameStateParams, listener: GameStateListener): () => void {
		const node = this.nodeFor(params);
		const detach = node.attach(listener);
		listener(node.value);
		return detach;
	}

	/**
	 * Current value of a live node, without subscribing
	 */
	peek(params: GameStateParams): GameStateValue | undefined {
		return this.nodes.get(keyOf(params))?.value;
	}

	/**
	 * Resolves when the node's latest load or recompute has finished
	 */
	async settled(params: GameStateParams): Promise<void> {
		await this.nodes.get(keyOf(params))?.settled();
	}

	get size(): number {
		return this.nodes.size;
	}

	/**
	 * Record an at-bat at the current inning/outs
	 *
	 * Goes through the collection's optimistic mutation; the game state
	 * follows through the collection change, not from here.
	 */
	async recordAtBat(params: GameStateParams, request: RecordAtBatRequest): Promise<MutationResult<AtBatEvent>> {
		const collection = this.atBats.get(params.gameId);
		const current = this.peek(params);
		const state =
			current?.status === 'data' ? current.state : await deriveGameState(params, collection, this.lineups);

		return collection.create({ ...request, inning: state.inning, outs: state.outs });
	}

	async updateAtBat(
		params: GameStateParams,
		atBatId: string,
		edit: AtBatEdit
	): Promise<MutationResult<AtBatEvent>> {
		return this.atBats.get(params.gameId).update(atBatId, edit);
	}

	/**
	 * Most recently created at-bat of the game, for resuming an edit
	 */
	getLastAtBat(params: GameStateParams): AtBatEvent | null {
		return this.atBats.get(params.gameId).last();
	}

	/**
	 * Release every node and pending keep-alive timer
	 */
	dispose(): void {
		for (const node of [...this.nodes.values()]) {
			node.release();
		}
		this.nodes.clear();
	}

	private nodeFor(params: GameStateParams): GameStateNode {
		const key = keyOf(params);
		let node = this.nodes.get(key);
		if (!node) {
			node = new GameStateNode(
				{ ...params },
				this.atBats.get(params.gameId),
				this.lineups,
				this.config.keepAliveMs,
				(released) => {
					if (this.nodes.get(key) === released) this.nodes.delete(key);
				}
			);
			this.nodes.set(key, node);
		}
		return node;
	}
}
