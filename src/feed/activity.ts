/**
 * Activity records — the Data API `/activity` shape a copy session polls.
 *
 * A record maps onto a TradeEvent: `transactionHash` becomes the fill id,
 * `asset` the token, `conditionId` (or legacy `market`) the market, and the
 * timestamp moves from seconds to milliseconds.
 */

import {
	type TradeEvent,
	checkTradeEvent,
	decimalInput,
	fromValidationError,
} from "../classification/trade-event.js";
import { validate, z } from "../lib/validation/index.js";
import { InvalidEventError, InvalidEventReason } from "../shared/errors.js";
import { fillId, marketId, tokenId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { secondsToMs } from "../shared/time.js";
import { TradeSide } from "../shared/trade-side.js";

/** A trade activity record, parsed, with the wallet that made it. */
export interface ActivityFill {
	readonly event: TradeEvent;
	/** Lowercased proxy wallet, or null when the record carries none */
	readonly wallet: string | null;
}

const optionalText = z.string().trim().optional();

export const activityRecordSchema = z
	.object({
		type: optionalText,
		transactionHash: z.string().trim().min(1),
		timestamp: z.number().finite().nonnegative(),
		conditionId: optionalText,
		market: optionalText,
		asset: z.string().trim().min(1),
		outcome: z.string().trim().min(1),
		side: z
			.string()
			.trim()
			.transform((s) => s.toUpperCase())
			.pipe(z.enum([TradeSide.Buy, TradeSide.Sell])),
		size: decimalInput,
		price: decimalInput,
		proxyWallet: optionalText,
		user: optionalText,
	})
	.transform((record, ctx) => {
		const market = record.conditionId || record.market;
		if (!market) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "conditionId or market is required",
				path: ["conditionId"],
			});
			return z.NEVER;
		}
		return { ...record, market };
	});

export type ActivityRecordInput = z.input<typeof activityRecordSchema>;

/**
 * Parses one `/activity` record into a fill.
 * @returns Err(InvalidEventError) for malformed records, non-trade activity,
 *   a size ≤ 0 or a price outside [0, 1]
 * @example
 * const fill = parseActivity({ type: "TRADE", transactionHash: "0xabc", timestamp: 1_700_000_000,
 *   conditionId: "0xcond", asset: "tok-up", outcome: "Up", side: "BUY", size: 10, price: 0.6,
 *   proxyWallet: "0xwallet" });
 */
export function parseActivity(raw: unknown): Result<ActivityFill, InvalidEventError> {
	const parsed = validate(activityRecordSchema, raw, "Malformed activity record");
	if (!parsed.ok) return err(fromValidationError(parsed.error));

	const record = parsed.value;
	if (record.type && record.type.toUpperCase() !== "TRADE") {
		return err(
			new InvalidEventError(
				`Activity ${record.transactionHash} is ${record.type}, not a trade`,
				InvalidEventReason.Malformed,
				{ fillId: record.transactionHash, type: record.type },
			),
		);
	}

	const event: TradeEvent = {
		fillId: fillId(record.transactionHash),
		tokenId: tokenId(record.asset),
		marketId: marketId(record.market),
		outcome: record.outcome,
		side: record.side,
		size: record.size,
		price: record.price,
		timestampMs: secondsToMs(record.timestamp),
	};

	const checked = checkTradeEvent(event);
	if (!checked.ok) return checked;

	const wallet = record.proxyWallet || record.user;
	return ok({ event, wallet: wallet ? wallet.toLowerCase() : null });
}
