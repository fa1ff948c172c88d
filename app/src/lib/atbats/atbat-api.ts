/**
 * Remote at-bat endpoint, as seen by the data layer
 *
 * Implemented by the authenticated request client. Responses are raw JSON
 * and decoded by the caller. Any non-2xx response rejects with an ApiError.
 */

import type { HitLocation } from '@scorebook/engine';

export interface CreateAtBatRequest {
	gameId: string;
	playerId: string;
	result: string;
	inning: number;
	outs: number;
	battingOrder: number;
	hitLocation?: HitLocation;
	hitType?: string;
	rbis?: number;
}

export interface UpdateAtBatRequest {
	result?: string;
	inning?: number;
	outs?: number;
	hitLocation?: HitLocation;
	hitType?: string;
	rbis?: number;
}

export interface AtBatApi {
	listAtBats(gameId: string): Promise<unknown>;
	createAtBat(request: CreateAtBatRequest): Promise<unknown>;
	updateAtBat(gameId: string, atBatId: string, request: UpdateAtBatRequest): Promise<unknown>;
	deleteAtBat(gameId: string, atBatId: string): Promise<void>;
}
