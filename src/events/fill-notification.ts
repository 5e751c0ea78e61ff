/**
 * FillNotification — flat, render-ready summary of one classified fill.
 *
 * Carries enough to produce a human-readable alert without re-deriving
 * anything from the ledger.
 */

import { type Classification, assertNever } from "../classification/types.js";
import type { ClassificationKind } from "../classification/kind.js";
import { Decimal } from "../shared/decimal.js";
import type { FillId, MarketId, TokenId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/trade-side.js";

export interface FillNotification {
	readonly kind: ClassificationKind;
	readonly fillId: FillId;
	readonly tokenId: TokenId;
	readonly marketId: MarketId;
	readonly outcome: string;
	readonly side: TradeSide;
	readonly size: Decimal;
	readonly price: Decimal;
	readonly timestampMs: number;
	/** Outcome whose position was (partly) closed; differs from `outcome` on hedges */
	readonly closedOutcome?: string;
	readonly closingSize?: Decimal;
	readonly entryPrice?: Decimal;
	readonly exitPrice?: Decimal;
	readonly realizedPnl?: Decimal;
	/** Size held on the traded token after the fill; zero once flat */
	readonly resultingPositionSize?: Decimal;
}

export function toNotification(classification: Classification): FillNotification {
	const { event } = classification;
	const base = {
		kind: classification.kind,
		fillId: event.fillId,
		tokenId: event.tokenId,
		marketId: event.marketId,
		outcome: event.outcome,
		side: event.side,
		size: event.size,
		price: event.price,
		timestampMs: event.timestampMs,
	};

	switch (classification.kind) {
		case "OPEN":
		case "INCREASE":
			return { ...base, resultingPositionSize: classification.position.size };
		case "PARTIAL_CLOSE":
		case "FULL_CLOSE":
		case "REVERSE":
		case "HEDGE_CLOSE":
		case "PARTIAL_HEDGE": {
			const { closed, position } = classification;
			return {
				...base,
				closedOutcome: closed.outcome,
				closingSize: closed.closingSize,
				entryPrice: closed.entryPrice,
				exitPrice: closed.exitPrice,
				realizedPnl: closed.realizedPnl,
				resultingPositionSize: position?.size ?? Decimal.zero(),
			};
		}
		default:
			return assertNever(classification);
	}
}
