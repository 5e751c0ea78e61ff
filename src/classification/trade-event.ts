/**
 * TradeEvent — one executed fill, as handed to the engine by the feed.
 *
 * parseTradeEvent() is the boundary for untyped input; checkTradeEvent()
 * re-asserts the numeric contract on already-typed events.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { InvalidEventError, InvalidEventReason } from "../shared/errors.js";
import {
	type FillId,
	type MarketId,
	type TokenId,
	fillId,
	marketId,
	tokenId,
} from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { TradeSide } from "../shared/trade-side.js";

export interface TradeEvent {
	readonly fillId: FillId;
	readonly tokenId: TokenId;
	readonly marketId: MarketId;
	/** Outcome label of the token, e.g. "Up" / "Down" */
	readonly outcome: string;
	readonly side: TradeSide;
	readonly size: Decimal;
	readonly price: Decimal;
	readonly timestampMs: number;
}

const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/** Accepts a finite number or a plain decimal string. */
export const decimalInput = z
	.union([z.number().finite(), z.string().trim().regex(DECIMAL_PATTERN, "not a decimal")])
	.transform((v) => Decimal.from(v));

const nonEmpty = z.string().trim().min(1);

export const tradeEventSchema = z.object({
	fillId: nonEmpty.transform(fillId),
	tokenId: nonEmpty.transform(tokenId),
	marketId: nonEmpty.transform(marketId),
	outcome: nonEmpty,
	side: z.enum([TradeSide.Buy, TradeSide.Sell]),
	size: decimalInput,
	price: decimalInput,
	timestampMs: z.number().int().nonnegative(),
});

/** Plain-data shape accepted by parseTradeEvent. */
export type TradeEventInput = z.input<typeof tradeEventSchema>;

/**
 * Parses untyped input into a TradeEvent, then enforces size > 0 and price ∈ [0, 1].
 * @example
 * const result = parseTradeEvent({ fillId: "0xabc", tokenId: "tok-up", marketId: "m-1",
 *   outcome: "Up", side: "BUY", size: 100, price: "0.60", timestampMs: 1_700_000_000_000 });
 */
export function parseTradeEvent(raw: unknown): Result<TradeEvent, InvalidEventError> {
	const parsed = validate(tradeEventSchema, raw, "Malformed trade event");
	if (!parsed.ok) {
		return err(fromValidationError(parsed.error));
	}
	return checkTradeEvent(parsed.value);
}

/** Enforces the numeric input contract. */
export function checkTradeEvent(event: TradeEvent): Result<TradeEvent, InvalidEventError> {
	if (!event.size.isPositive()) {
		return err(
			new InvalidEventError(
				`Fill size must be > 0, got ${event.size.toString()}`,
				InvalidEventReason.NonPositiveSize,
				{ fillId: event.fillId, size: event.size.toString() },
			),
		);
	}
	if (event.price.isNegative() || event.price.gt(Decimal.one())) {
		return err(
			new InvalidEventError(
				`Fill price must be within [0, 1], got ${event.price.toString()}`,
				InvalidEventReason.PriceOutOfRange,
				{ fillId: event.fillId, price: event.price.toString() },
			),
		);
	}
	if (event.outcome.trim().length === 0) {
		return err(
			new InvalidEventError("Fill outcome label is empty", InvalidEventReason.Malformed, {
				fillId: event.fillId,
			}),
		);
	}
	return ok(event);
}

export function fromValidationError(error: ValidationError): InvalidEventError {
	return new InvalidEventError(
		`${error.message}: ${error.describe()}`,
		InvalidEventReason.Malformed,
		{ issues: error.issues, cause: error },
	);
}
