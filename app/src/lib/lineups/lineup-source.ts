/**
 * Lineups for game state derivation
 *
 * The lineup lives on the game resource. GameLineupSource reads the team's
 * game list (cache first) and hands back the lineup of one game.
 */

import { z } from 'zod';
import type { LineupEntry } from '@scorebook/engine';
import type { PersistentCacheStore } from '../cache/persistent-cache.js';
import { CacheKeys } from '../cache/cache-keys.js';

export interface LineupSource {
	/**
	 * Rejects when the game is unknown or its lineup is not set
	 */
	getLineup(gameId: string, teamId: string): Promise<LineupEntry[]>;
}

/**
 * Remote games endpoint; rejects with an ApiError on non-2xx
 */
export interface GameApi {
	listGames(teamId: string): Promise<unknown>;
}

export const lineupEntrySchema = z.object({
	playerId: z.string().min(1),
	battingOrder: z.number().int(),
});

const gameRecordSchema = z.object({
	gameId: z.string().min(1),
	teamId: z.string().nullish(),
	status: z.string().nullish(),
	lineup: z.array(lineupEntrySchema).nullish(),
});

export type GameRecord = z.infer<typeof gameRecordSchema>;

export function decodeGameList(json: unknown): GameRecord[] {
	return z.array(gameRecordSchema).parse(json);
}

function findLineup(games: GameRecord[], gameId: string): LineupEntry[] | null {
	const lineup = games.find((g) => g.gameId === gameId)?.lineup;
	return lineup && lineup.length > 0 ? lineup : null;
}

export class GameLineupSource implements LineupSource {
	private api: GameApi;
	private cache: PersistentCacheStore;

	constructor(api: GameApi, cache: PersistentCacheStore) {
		this.api = api;
		this.cache = cache;
	}

	async getLineup(gameId: string, teamId: string): Promise<LineupEntry[]> {
		const cached = await this.cache.getJson(CacheKeys.games(teamId), decodeGameList);
		const fromCache = cached ? findLineup(cached, gameId) : null;
		if (fromCache) return fromCache;

		// Not cached, or cached before the lineup was set
		const games = decodeGameList(await this.api.listGames(teamId));
		await this.cache.setJson(CacheKeys.games(teamId), games);

		if (!games.some((g) => g.gameId === gameId)) {
			throw new Error(`[Lineups] Game ${gameId} not found for team ${teamId}`);
		}
		const lineup = findLineup(games, gameId);
		if (!lineup) {
			throw new Error(`[Lineups] Game ${gameId} lineup not set`);
		}
		return lineup;
	}
}
