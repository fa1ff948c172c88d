/**
 * Centralized cache keys
 */
export const CacheKeys = {
	games: (teamId: string) => `games_cache_${teamId}`,
	atBats: (gameId: string) => `atbats_cache_${gameId}`,
} as const;
