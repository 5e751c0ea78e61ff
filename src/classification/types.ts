/**
 * Classification — closed tagged union of what a fill did to the ledger.
 *
 * Every variant carries the LedgerDelta that realizes it. Consumers switch
 * on `kind`; the compiler flags a missing case.
 */

import type { LedgerDelta } from "../ledger/ledger-delta.js";
import type { ClosedTradeRecord, Position } from "../ledger/types.js";
import type { ClassificationKind } from "./kind.js";
import type { TradeEvent } from "./trade-event.js";

interface ClassificationBase {
	readonly event: TradeEvent;
	readonly delta: LedgerDelta;
}

/** No position on the token: a new one is created. */
export interface OpenClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.Open;
	readonly position: Position;
}

/** Same direction as the held position: size added, entry re-averaged. */
export interface IncreaseClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.Increase;
	readonly previous: Position;
	readonly position: Position;
}

/** Opposing fill smaller than the held size. */
export interface PartialCloseClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.PartialClose;
	readonly previous: Position;
	readonly position: Position;
	readonly closed: ClosedTradeRecord;
}

/** Opposing fill that unwinds the held size exactly (within the size epsilon). */
export interface FullCloseClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.FullClose;
	readonly previous: Position;
	readonly position: null;
	readonly closed: ClosedTradeRecord;
}

/** Opposing fill larger than the held size: old leg closed, new leg opened the other way. */
export interface ReverseClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.Reverse;
	readonly previous: Position;
	readonly position: Position;
	readonly closed: ClosedTradeRecord;
}

/** BUY on one outcome that fully unwinds the position held on the other. */
export interface HedgeCloseClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.HedgeClose;
	/** Opposite-outcome position before the fill */
	readonly hedged: Position;
	readonly hedgedRemaining: null;
	/** Bought token's position after the fill */
	readonly position: Position;
	readonly closed: ClosedTradeRecord;
}

/** BUY on one outcome that unwinds part of the position held on the other. */
export interface PartialHedgeClassification extends ClassificationBase {
	readonly kind: typeof ClassificationKind.PartialHedge;
	readonly hedged: Position;
	readonly hedgedRemaining: Position;
	readonly position: Position;
	readonly closed: ClosedTradeRecord;
}

export type Classification =
	| OpenClassification
	| IncreaseClassification
	| PartialCloseClassification
	| FullCloseClassification
	| ReverseClassification
	| HedgeCloseClassification
	| PartialHedgeClassification;

export type HedgeClassification = HedgeCloseClassification | PartialHedgeClassification;

/** Variants that realize P&L. */
export type ClosingClassification = Exclude<
	Classification,
	OpenClassification | IncreaseClassification
>;

export function isClosingClassification(c: Classification): c is ClosingClassification {
	return "closed" in c;
}

export function assertNever(value: never): never {
	throw new Error(`Unhandled classification: ${JSON.stringify(value)}`);
}
