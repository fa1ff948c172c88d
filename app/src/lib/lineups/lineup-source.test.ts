import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { GameLineupSource, type GameApi } from './lineup-source.js';
import { PersistentCacheStore } from '../cache/persistent-cache.js';
import { MemoryStorage } from '../cache/storage.js';
import { CacheKeys } from '../cache/cache-keys.js';
import { ApiError } from '../mutation/api-error.js';

const LINEUP = [
	{ playerId: 'p1', battingOrder: 1 },
	{ playerId: 'p2', battingOrder: 2 },
	{ playerId: 'p3', battingOrder: 3 },
];

describe('GameLineupSource', () => {
	let listGames: Mock<GameApi['listGames']>;
	let cache: PersistentCacheStore;
	let source: GameLineupSource;

	beforeEach(() => {
		listGames = vi.fn<GameApi['listGames']>(async () => [
			{ gameId: 'g1', teamId: 't1', status: 'in_progress', lineup: LINEUP },
			{ gameId: 'g2', teamId: 't1', status: 'scheduled', lineup: null },
		]);
		cache = new PersistentCacheStore(new MemoryStorage());
		source = new GameLineupSource({ listGames }, cache);
	});

	it('should fetch the game list and return the lineup', async () => {
		expect(await source.getLineup('g1', 't1')).toEqual(LINEUP);
		expect(listGames).toHaveBeenCalledWith('t1');
	});

	it('should serve a cached lineup without calling the API', async () => {
		await source.getLineup('g1', 't1');
		await source.getLineup('g1', 't1');
		expect(listGames).toHaveBeenCalledTimes(1);
	});

	it('should refetch when the cached game has no lineup yet', async () => {
		await cache.setJson(CacheKeys.games('t1'), [{ gameId: 'g1', teamId: 't1', lineup: [] }]);

		expect(await source.getLineup('g1', 't1')).toEqual(LINEUP);
		expect(listGames).toHaveBeenCalledTimes(1);
	});

	it('should reject an unknown game', async () => {
		await expect(source.getLineup('g9', 't1')).rejects.toThrow('[Lineups] Game g9 not found for team t1');
	});

	it('should reject a game whose lineup is not set', async () => {
		await expect(source.getLineup('g2', 't1')).rejects.toThrow('[Lineups] Game g2 lineup not set');
	});

	it('should propagate API failures', async () => {
		const failure = new ApiError(503, 'Unavailable');
		listGames.mockRejectedValueOnce(failure);
		await expect(source.getLineup('g1', 't1')).rejects.toBe(failure);
	});
});
