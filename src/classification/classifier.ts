/**
 * classifyFill — decides what a fill means against the ledger's current view.
 *
 * Pure: reads the view, never mutates it. The returned Classification
 * carries the LedgerDelta the caller applies atomically.
 *
 * Order of evaluation:
 *   1. BUY with a long position held on the market's other outcome, and no
 *      short on the bought token → hedge
 *   2. otherwise the fill's own token → open / increase / close / reverse
 */

import { appendClosedOp, ledgerDelta, removeOp, upsertOp } from "../ledger/ledger-delta.js";
import {
	increasePosition,
	openPosition,
	resizePosition,
	signedSize,
} from "../ledger/position.js";
import type { ClosedTradeRecord, LedgerView, Position } from "../ledger/types.js";
import { Decimal } from "../shared/decimal.js";
import { InvalidEventError, InvalidEventReason } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	Direction,
	TradeSide,
	complementPrice,
	directionOf,
	flipDirection,
} from "../shared/trade-side.js";
import { ClassificationKind, type ClosingKind } from "./kind.js";
import { type TradeEvent, checkTradeEvent } from "./trade-event.js";
import type { Classification, HedgeClassification } from "./types.js";

export interface ClassifierOptions {
	/** Residual share size at or below which a position counts as fully closed */
	readonly sizeEpsilon: Decimal;
	/** Whether a SELL with nothing held opens a short instead of being rejected */
	readonly allowShortOpen: boolean;
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
	sizeEpsilon: Decimal.from("1e-9"),
	allowShortOpen: false,
};

/**
 * Classifies one fill.
 * @returns Err(InvalidEventError) for a size ≤ 0, a price outside [0, 1], or a
 *   SELL with nothing held when shorting is not allowed
 * @example
 * const result = classifyFill(ledger, event);
 * if (result.ok) ledger.apply(result.value.delta);
 */
export function classifyFill(
	view: LedgerView,
	event: TradeEvent,
	options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): Result<Classification, InvalidEventError> {
	const checked = checkTradeEvent(event);
	if (!checked.ok) return checked;

	const held = view.getPosition(event.tokenId);
	if (event.side === TradeSide.Buy && held?.direction !== Direction.Short) {
		const hedged = view.getOppositePosition(event.marketId, event.outcome);
		if (hedged !== null && hedged.direction === Direction.Long && hedged.size.isPositive()) {
			return ok(classifyHedge(event, held, hedged, options));
		}
	}

	return classifySameToken(held, event, options);
}

// ── Hedge ───────────────────────────────────────────────────────────

/**
 * Unwinds the opposite outcome against par: pnl = closing × (1 − entry − price).
 * The bought token is booked at the full fill size even when it exceeds what
 * the hedge closed; only the unwound leg's P&L is capped. `held` is null or long.
 */
function classifyHedge(
	event: TradeEvent,
	held: Position | null,
	hedged: Position,
	options: ClassifierOptions,
): HedgeClassification {
	const closingSize = Decimal.min(event.size, hedged.size);
	const remaining = hedged.size.sub(closingSize);
	const fullyClosed = remaining.lte(options.sizeEpsilon);
	const kind = fullyClosed ? ClassificationKind.HedgeClose : ClassificationKind.PartialHedge;

	const closed: ClosedTradeRecord = {
		marketId: hedged.marketId,
		tokenId: hedged.tokenId,
		outcome: hedged.outcome,
		kind,
		closingSize,
		entryPrice: hedged.entryPrice,
		exitPrice: complementPrice(event.price),
		realizedPnl: closingSize.mul(Decimal.one().sub(hedged.entryPrice).sub(event.price)),
		timestampMs: event.timestampMs,
	};

	const position = held
		? increasePosition(held, event.size, event.price, event.timestampMs)
		: openFrom(event, Direction.Long);

	if (fullyClosed) {
		return {
			kind: ClassificationKind.HedgeClose,
			event,
			hedged,
			hedgedRemaining: null,
			position,
			closed,
			delta: ledgerDelta(removeOp(hedged), upsertOp(held, position), appendClosedOp(closed)),
		};
	}

	const hedgedRemaining = resizePosition(hedged, remaining, event.timestampMs);
	return {
		kind: ClassificationKind.PartialHedge,
		event,
		hedged,
		hedgedRemaining,
		position,
		closed,
		delta: ledgerDelta(
			upsertOp(hedged, hedgedRemaining),
			upsertOp(held, position),
			appendClosedOp(closed),
		),
	};
}

// ── Same token ──────────────────────────────────────────────────────

function classifySameToken(
	held: Position | null,
	event: TradeEvent,
	options: ClassifierOptions,
): Result<Classification, InvalidEventError> {
	if (!held) {
		if (event.side === TradeSide.Sell && !options.allowShortOpen) {
			return err(
				new InvalidEventError(
					`SELL of ${event.size.toString()} on token ${event.tokenId} with no position held`,
					InvalidEventReason.SellWithoutPosition,
					{ fillId: event.fillId, tokenId: event.tokenId },
				),
			);
		}
		const position = openFrom(event, directionOf(event.side));
		return ok({
			kind: ClassificationKind.Open,
			event,
			position,
			delta: ledgerDelta(upsertOp(null, position)),
		});
	}

	const fillSigned = event.side === TradeSide.Buy ? event.size : event.size.neg();
	const heldSigned = signedSize(held);

	if (heldSigned.mul(fillSigned).isPositive()) {
		const position = increasePosition(held, event.size, event.price, event.timestampMs);
		return ok({
			kind: ClassificationKind.Increase,
			event,
			previous: held,
			position,
			delta: ledgerDelta(upsertOp(held, position)),
		});
	}

	const remainingSigned = heldSigned.add(fillSigned);

	if (remainingSigned.abs().lte(options.sizeEpsilon)) {
		const closingSize = Decimal.min(event.size, held.size);
		const closed = closeRecord(held, event, ClassificationKind.FullClose, closingSize);
		return ok({
			kind: ClassificationKind.FullClose,
			event,
			previous: held,
			position: null,
			closed,
			delta: ledgerDelta(removeOp(held), appendClosedOp(closed)),
		});
	}

	if (remainingSigned.sign() !== heldSigned.sign()) {
		const closed = closeRecord(held, event, ClassificationKind.Reverse, held.size);
		const position = openPosition({
			tokenId: held.tokenId,
			marketId: held.marketId,
			outcome: held.outcome,
			size: remainingSigned.abs(),
			price: event.price,
			direction: flipDirection(held.direction),
			timestampMs: event.timestampMs,
		});
		return ok({
			kind: ClassificationKind.Reverse,
			event,
			previous: held,
			position,
			closed,
			delta: ledgerDelta(upsertOp(held, position), appendClosedOp(closed)),
		});
	}

	const closed = closeRecord(held, event, ClassificationKind.PartialClose, event.size);
	const position = resizePosition(held, remainingSigned.abs(), event.timestampMs);
	return ok({
		kind: ClassificationKind.PartialClose,
		event,
		previous: held,
		position,
		closed,
		delta: ledgerDelta(upsertOp(held, position), appendClosedOp(closed)),
	});
}

// ── Helpers ─────────────────────────────────────────────────────────

function openFrom(event: TradeEvent, direction: Direction): Position {
	return openPosition({
		tokenId: event.tokenId,
		marketId: event.marketId,
		outcome: event.outcome,
		size: event.size,
		price: event.price,
		direction,
		timestampMs: event.timestampMs,
	});
}

/** pnl = closing × (exit − entry) × direction */
function closeRecord(
	held: Position,
	event: TradeEvent,
	kind: ClosingKind,
	closingSize: Decimal,
): ClosedTradeRecord {
	const direction = Decimal.from(held.direction);
	return {
		marketId: held.marketId,
		tokenId: held.tokenId,
		outcome: held.outcome,
		kind,
		closingSize,
		entryPrice: held.entryPrice,
		exitPrice: event.price,
		realizedPnl: closingSize.mul(event.price.sub(held.entryPrice)).mul(direction),
		timestampMs: event.timestampMs,
	};
}
