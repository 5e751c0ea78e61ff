/**
 * Ledger snapshot — plain-JSON form of open positions and closed-trade history.
 *
 * Identifiers are plain strings; prices, sizes and P&L are decimal strings.
 */

import { CLOSING_KINDS, type ClosingKind } from "../classification/kind.js";
import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { Direction } from "../shared/trade-side.js";
import type { ClosedTradeRecord, Position } from "./types.js";

export interface PositionRow {
	readonly tokenId: string;
	readonly marketId: string;
	readonly outcome: string;
	readonly size: string;
	readonly entryPrice: string;
	readonly direction: Direction;
	readonly openedAtMs: number;
	readonly updatedAtMs: number;
}

export interface ClosedTradeRow {
	readonly marketId: string;
	readonly tokenId: string;
	readonly outcome: string;
	readonly kind: ClosingKind;
	readonly closingSize: string;
	readonly entryPrice: string;
	readonly exitPrice: string;
	readonly realizedPnl: string;
	readonly timestampMs: number;
}

export interface LedgerSnapshot {
	readonly positions: readonly PositionRow[];
	readonly closedTrades: readonly ClosedTradeRow[];
}

// ── Schema ──────────────────────────────────────────────────────────

const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, "not a plain decimal string");
const id = z.string().min(1);
const timestamp = z.number().int().nonnegative();

const positionRowSchema = z.object({
	tokenId: id,
	marketId: id,
	outcome: id,
	size: decimalString,
	entryPrice: decimalString,
	direction: z.union([z.literal(Direction.Long), z.literal(Direction.Short)]),
	openedAtMs: timestamp,
	updatedAtMs: timestamp,
});

const closingKindSchema = z
	.string()
	.refine((v): v is ClosingKind => CLOSING_KINDS.some((k) => k === v), "not a closing kind");

const closedTradeRowSchema = z.object({
	marketId: id,
	tokenId: id,
	outcome: id,
	kind: closingKindSchema,
	closingSize: decimalString,
	entryPrice: decimalString,
	exitPrice: decimalString,
	realizedPnl: decimalString,
	timestampMs: timestamp,
});

export const ledgerSnapshotSchema = z.object({
	positions: z.array(positionRowSchema),
	closedTrades: z.array(closedTradeRowSchema),
});

// ── Conversion ──────────────────────────────────────────────────────

export function toPositionRow(position: Position): PositionRow {
	return {
		tokenId: position.tokenId,
		marketId: position.marketId,
		outcome: position.outcome,
		size: position.size.toString(),
		entryPrice: position.entryPrice.toString(),
		direction: position.direction,
		openedAtMs: position.openedAtMs,
		updatedAtMs: position.updatedAtMs,
	};
}

export function fromPositionRow(row: PositionRow): Position {
	return {
		tokenId: tokenId(row.tokenId),
		marketId: marketId(row.marketId),
		outcome: row.outcome,
		size: Decimal.from(row.size),
		entryPrice: Decimal.from(row.entryPrice),
		direction: row.direction,
		openedAtMs: row.openedAtMs,
		updatedAtMs: row.updatedAtMs,
	};
}

export function toClosedTradeRow(record: ClosedTradeRecord): ClosedTradeRow {
	return {
		marketId: record.marketId,
		tokenId: record.tokenId,
		outcome: record.outcome,
		kind: record.kind,
		closingSize: record.closingSize.toString(),
		entryPrice: record.entryPrice.toString(),
		exitPrice: record.exitPrice.toString(),
		realizedPnl: record.realizedPnl.toString(),
		timestampMs: record.timestampMs,
	};
}

export function fromClosedTradeRow(row: ClosedTradeRow): ClosedTradeRecord {
	return {
		marketId: marketId(row.marketId),
		tokenId: tokenId(row.tokenId),
		outcome: row.outcome,
		kind: row.kind,
		closingSize: Decimal.from(row.closingSize),
		entryPrice: Decimal.from(row.entryPrice),
		exitPrice: Decimal.from(row.exitPrice),
		realizedPnl: Decimal.from(row.realizedPnl),
		timestampMs: row.timestampMs,
	};
}
