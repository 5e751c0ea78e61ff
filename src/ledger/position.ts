/**
 * Pure position arithmetic. Every helper returns a new Position.
 */

import type { Decimal } from "../shared/decimal.js";
import type { MarketId, TokenId } from "../shared/identifiers.js";
import { Direction } from "../shared/trade-side.js";
import type { Position } from "./types.js";

export function openPosition(params: {
	tokenId: TokenId;
	marketId: MarketId;
	outcome: string;
	size: Decimal;
	price: Decimal;
	direction: Direction;
	timestampMs: number;
}): Position {
	return {
		tokenId: params.tokenId,
		marketId: params.marketId,
		outcome: params.outcome,
		size: params.size,
		entryPrice: params.price,
		direction: params.direction,
		openedAtMs: params.timestampMs,
		updatedAtMs: params.timestampMs,
	};
}

/**
 * Adds size at `price`, re-averaging the entry.
 * @example increasePosition({ size: 100, entryPrice: 0.60, ... }, d("50"), d("0.65"), t) // size 150, entry ≈ 0.6167
 */
export function increasePosition(
	position: Position,
	size: Decimal,
	price: Decimal,
	timestampMs: number,
): Position {
	const newSize = position.size.add(size);
	const newEntry = position.size.mul(position.entryPrice).add(size.mul(price)).div(newSize);
	return { ...position, size: newSize, entryPrice: newEntry, updatedAtMs: timestampMs };
}

/** Sets a smaller size, keeping entry price and direction. */
export function resizePosition(position: Position, size: Decimal, timestampMs: number): Position {
	return { ...position, size, updatedAtMs: timestampMs };
}

/** Signed exposure: size × direction. */
export function signedSize(position: Position): Decimal {
	return position.direction === Direction.Long ? position.size : position.size.neg();
}

/** Value equality on the fields a mutation depends on. */
export function samePosition(a: Position, b: Position): boolean {
	return (
		a.tokenId === b.tokenId &&
		a.direction === b.direction &&
		a.size.eq(b.size) &&
		a.entryPrice.eq(b.entryPrice)
	);
}
