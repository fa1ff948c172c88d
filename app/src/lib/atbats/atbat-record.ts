/**
 * At-bat wire format
 *
 * The at-bat endpoint and the local cache both carry this shape; it is
 * decoded here and mapped onto the engine's AtBatEvent.
 */

import { z } from 'zod';
import type { AtBatEvent } from '@scorebook/engine';

export const hitLocationSchema = z.object({
	x: z.number(),
	y: z.number(),
});

const timestampSchema = z
	.string()
	.refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });

export const atBatRecordSchema = z.object({
	atBatId: z.string().min(1),
	gameId: z.string().min(1),
	teamId: z.string().nullish(),
	playerId: z.string().min(1),
	result: z.string(),
	inning: z.number().int(),
	outs: z.number().int(),
	battingOrder: z.number().int().nullish(),
	hitLocation: hitLocationSchema.nullish(),
	hitType: z.string().nullish(),
	rbis: z.number().int().nullish(),
	createdAt: timestampSchema,
	updatedAt: timestampSchema,
});

export type AtBatRecord = z.infer<typeof atBatRecordSchema>;

export function fromAtBatRecord(record: AtBatRecord): AtBatEvent {
	return {
		id: record.atBatId,
		gameId: record.gameId,
		teamId: record.teamId ?? undefined,
		playerId: record.playerId,
		resultCode: record.result,
		inning: record.inning,
		outs: record.outs,
		battingOrder: record.battingOrder ?? undefined,
		hitLocation: record.hitLocation ?? undefined,
		hitType: record.hitType ?? undefined,
		rbis: record.rbis ?? undefined,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}

export function toAtBatRecord(event: AtBatEvent): AtBatRecord {
	return {
		atBatId: event.id,
		gameId: event.gameId,
		teamId: event.teamId ?? null,
		playerId: event.playerId,
		result: event.resultCode,
		inning: event.inning,
		outs: event.outs,
		battingOrder: event.battingOrder ?? null,
		hitLocation: event.hitLocation ?? null,
		hitType: event.hitType ?? null,
		rbis: event.rbis ?? null,
		createdAt: event.createdAt,
		updatedAt: event.updatedAt,
	};
}

/**
 * Decode one at-bat from untrusted JSON; throws ZodError on a bad shape
 */
export function decodeAtBat(json: unknown): AtBatEvent {
	return fromAtBatRecord(atBatRecordSchema.parse(json));
}

export function decodeAtBatList(json: unknown): AtBatEvent[] {
	return z.array(atBatRecordSchema).parse(json).map(fromAtBatRecord);
}
