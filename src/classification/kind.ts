/** What a fill means relative to the exposure already held. */
export const ClassificationKind = {
	Open: "OPEN",
	Increase: "INCREASE",
	PartialClose: "PARTIAL_CLOSE",
	FullClose: "FULL_CLOSE",
	Reverse: "REVERSE",
	HedgeClose: "HEDGE_CLOSE",
	PartialHedge: "PARTIAL_HEDGE",
} as const;

export type ClassificationKind = (typeof ClassificationKind)[keyof typeof ClassificationKind];

/** Kinds that realize P&L and append a closed-trade record. */
export type ClosingKind = Exclude<ClassificationKind, "OPEN" | "INCREASE">;

export const CLOSING_KINDS: readonly ClosingKind[] = [
	ClassificationKind.PartialClose,
	ClassificationKind.FullClose,
	ClassificationKind.Reverse,
	ClassificationKind.HedgeClose,
	ClassificationKind.PartialHedge,
];

export function isClosingKind(kind: ClassificationKind): kind is ClosingKind {
	return kind !== ClassificationKind.Open && kind !== ClassificationKind.Increase;
}
