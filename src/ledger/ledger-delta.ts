/**
 * LedgerDelta — the complete set of ledger mutations one fill causes.
 *
 * The classifier produces a delta; the ledger applies it as one unit.
 * Each position op names the position it expects to replace, so a delta
 * computed against a stale view is refused instead of half-applied.
 */

import type { ClosedTradeRecord, Position } from "./types.js";

export type LedgerOp =
	| {
			readonly type: "upsert";
			/** Position currently held for the token, or null when the op creates it */
			readonly expected: Position | null;
			readonly position: Position;
	  }
	| {
			readonly type: "remove";
			readonly expected: Position;
	  }
	| {
			readonly type: "append_closed";
			readonly record: ClosedTradeRecord;
	  };

export interface LedgerDelta {
	readonly ops: readonly LedgerOp[];
}

export function upsertOp(expected: Position | null, position: Position): LedgerOp {
	return { type: "upsert", expected, position };
}

export function removeOp(expected: Position): LedgerOp {
	return { type: "remove", expected };
}

export function appendClosedOp(record: ClosedTradeRecord): LedgerOp {
	return { type: "append_closed", record };
}

export function ledgerDelta(...ops: LedgerOp[]): LedgerDelta {
	return { ops };
}

