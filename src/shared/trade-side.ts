/**
 * Trade side and position direction — binary market semantics.
 *
 * Every market has a complementary pair of outcomes whose prices
 * sum to ≈ $1 USDC at resolution.
 */

import { Decimal } from "./decimal.js";

/** Side of an executed fill. */
export const TradeSide = {
	Buy: "BUY",
	Sell: "SELL",
} as const;

export type TradeSide = (typeof TradeSide)[keyof typeof TradeSide];

/** Direction of held exposure: +1 long, -1 short. */
export const Direction = {
	Long: 1,
	Short: -1,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** Direction a fresh position takes when opened by a fill on this side. */
export function directionOf(side: TradeSide): Direction {
	return side === TradeSide.Buy ? Direction.Long : Direction.Short;
}

export function flipDirection(direction: Direction): Direction {
	return direction === Direction.Long ? Direction.Short : Direction.Long;
}

/** Complement price: buying one outcome @ P ≈ selling the other @ (1 - P). */
export function complementPrice(price: Decimal): Decimal {
	return Decimal.one().sub(price);
}
