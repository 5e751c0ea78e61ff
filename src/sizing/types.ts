/**
 * Copy sizing types.
 *
 * A sizer turns the size a followed wallet traded into the size this
 * session books.
 */

import type { TradeEvent } from "../classification/trade-event.js";
import type { Decimal } from "../shared/decimal.js";

export interface CopySizingResult {
	readonly size: Decimal; // Shares to book
	readonly notional: Decimal; // size × price, in USDC
	readonly capped: boolean; // Whether the notional cap cut the size down
}

export interface FillSizer {
	readonly name: string;
	size(event: TradeEvent): CopySizingResult;
	/** Copy of the event carrying the sized quantity. */
	applyToEvent(event: TradeEvent): TradeEvent;
}
