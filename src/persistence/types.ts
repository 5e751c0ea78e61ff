/**
 * Engine snapshot — everything a copy session needs to resume after a restart.
 */

import type { FillCursorSnapshot } from "../feed/fill-cursor.js";
import { type LedgerSnapshot, ledgerSnapshotSchema } from "../ledger/snapshot.js";
import { type ValidationError, z } from "../lib/validation/index.js";
import type { PersistenceError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

export const SNAPSHOT_VERSION = 1;

export interface EngineSnapshot {
	readonly version: typeof SNAPSHOT_VERSION;
	readonly savedAtMs: number;
	readonly ledger: LedgerSnapshot;
	readonly cursor: FillCursorSnapshot;
}

export const fillCursorSnapshotSchema = z.object({
	lastSeenTimestampMs: z.number().int().nonnegative(),
	seenFillIds: z.array(z.string().min(1)),
});

export const engineSnapshotSchema = z.object({
	version: z.literal(SNAPSHOT_VERSION),
	savedAtMs: z.number().int().nonnegative(),
	ledger: ledgerSnapshotSchema,
	cursor: fillCursorSnapshotSchema,
});

export type LoadError = PersistenceError | ValidationError;

/** Durable home for the latest engine snapshot. */
export interface StateStore {
	/** @returns Ok(null) when nothing has been saved yet */
	load(): Promise<Result<EngineSnapshot | null, LoadError>>;
	/** Replaces the stored snapshot. */
	save(snapshot: EngineSnapshot): Promise<Result<void, PersistenceError>>;
}
