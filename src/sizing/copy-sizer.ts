/**
 * Copy sizer.
 *
 * Scales the followed fill by a risk multiplier, then caps its notional
 * at a fixed USDC amount per fill.
 */

import type { TradeEvent } from "../classification/trade-event.js";
import { Decimal } from "../shared/decimal.js";
import { type Result, err, ok } from "../shared/result.js";
import type { CopySizingResult, FillSizer } from "./types.js";

export interface CopySizerConfig {
	readonly riskMultiplier: number;
	readonly maxTradeUsdc: number;
}

export class CopySizer implements FillSizer {
	readonly name = "Copy";
	private readonly multiplier: Decimal;
	private readonly maxNotional: Decimal;

	private constructor(multiplier: Decimal, maxNotional: Decimal) {
		this.multiplier = multiplier;
		this.maxNotional = maxNotional;
	}

	static create(config: CopySizerConfig): Result<CopySizer, Error> {
		if (!Number.isFinite(config.riskMultiplier) || config.riskMultiplier <= 0) {
			return err(new Error("CopySizer.create: riskMultiplier must be > 0"));
		}
		if (!Number.isFinite(config.maxTradeUsdc) || config.maxTradeUsdc <= 0) {
			return err(new Error("CopySizer.create: maxTradeUsdc must be > 0"));
		}
		return ok(new CopySizer(Decimal.from(config.riskMultiplier), Decimal.from(config.maxTradeUsdc)));
	}

	size(event: TradeEvent): CopySizingResult {
		const desired = event.size.mul(this.multiplier);
		const notional = desired.mul(event.price);

		// A zero price has no notional to cap
		if (event.price.isZero() || notional.lte(this.maxNotional)) {
			return { size: desired, notional, capped: false };
		}

		return {
			size: this.maxNotional.div(event.price),
			notional: this.maxNotional,
			capped: true,
		};
	}

	applyToEvent(event: TradeEvent): TradeEvent {
		return { ...event, size: this.size(event).size };
	}
}
