/**
 * Ledger domain types.
 */

import type { ClosingKind } from "../classification/kind.js";
import type { Decimal } from "../shared/decimal.js";
import type { MarketId, TokenId } from "../shared/identifiers.js";
import type { Direction } from "../shared/trade-side.js";

/** Open exposure on one outcome token. Never stored with a zero size. */
export interface Position {
	readonly tokenId: TokenId;
	readonly marketId: MarketId;
	readonly outcome: string;
	readonly size: Decimal;
	/** Volume-weighted average entry price */
	readonly entryPrice: Decimal;
	readonly direction: Direction;
	readonly openedAtMs: number;
	readonly updatedAtMs: number;
}

/**
 * Immutable record of one close, partial close, reverse or hedge.
 * Same-token closes book `closingSize * (exitPrice - entryPrice) * direction`.
 * Hedges book `closingSize * (1 - entryPrice - boughtPrice)` and carry
 * `1 - boughtPrice` as exitPrice.
 */
export interface ClosedTradeRecord {
	readonly marketId: MarketId;
	readonly tokenId: TokenId;
	readonly outcome: string;
	readonly kind: ClosingKind;
	readonly closingSize: Decimal;
	readonly entryPrice: Decimal;
	readonly exitPrice: Decimal;
	readonly realizedPnl: Decimal;
	readonly timestampMs: number;
}

/** Read side of the ledger, all the classifier needs. */
export interface LedgerView {
	getPosition(tokenId: TokenId): Position | null;
	/** The position held on the same market under a different outcome label, if any. */
	getOppositePosition(marketId: MarketId, outcome: string): Position | null;
}
