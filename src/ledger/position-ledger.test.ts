import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { isInconsistentStateError } from "../shared/errors.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { isErr, unwrap } from "../shared/result.js";
import { Direction } from "../shared/trade-side.js";
import { appendClosedOp, ledgerDelta, removeOp, upsertOp } from "./ledger-delta.js";
import { PositionLedger } from "./position-ledger.js";
import { openPosition, resizePosition } from "./position.js";
import type { LedgerSnapshot } from "./snapshot.js";
import type { ClosedTradeRecord, Position } from "./types.js";

// ── Test data factories ─────────────────────────────────────────────

const MARKET = marketId("m-1");

function position(token: string, outcome: string, size: string, price = "0.5"): Position {
	return openPosition({
		tokenId: tokenId(token),
		marketId: MARKET,
		outcome,
		size: Decimal.from(size),
		price: Decimal.from(price),
		direction: Direction.Long,
		timestampMs: 1_000,
	});
}

function record(pnl: string, timestampMs: number): ClosedTradeRecord {
	return {
		marketId: MARKET,
		tokenId: tokenId("tok-up"),
		outcome: "Up",
		kind: "PARTIAL_CLOSE",
		closingSize: Decimal.from("10"),
		entryPrice: Decimal.from("0.5"),
		exitPrice: Decimal.from("0.6"),
		realizedPnl: Decimal.from(pnl),
		timestampMs,
	};
}

describe("PositionLedger", () => {
	describe("reads", () => {
		it("starts empty", () => {
			const ledger = PositionLedger.create();

			expect(ledger.listOpenPositions()).toEqual([]);
			expect(ledger.listClosedTrades()).toEqual([]);
			expect(ledger.cumulativeRealizedPnl().toString()).toBe("0");
			expect(ledger.getPosition(tokenId("tok-up"))).toBeNull();
		});

		it("finds the position on the other outcome of the same market", () => {
			const ledger = PositionLedger.create();
			const up = position("tok-up", "Up", "100");
			unwrap(ledger.upsertPosition(up));

			expect(ledger.getOppositePosition(MARKET, "Down")).toBe(up);
			expect(ledger.getOppositePosition(MARKET, "Up")).toBeNull();
			expect(ledger.getOppositePosition(marketId("m-2"), "Down")).toBeNull();
		});

		it("lists positions per market", () => {
			const ledger = PositionLedger.create();
			unwrap(ledger.upsertPosition(position("tok-up", "Up", "1")));
			unwrap(
				ledger.upsertPosition({ ...position("tok-x", "Yes", "2"), marketId: marketId("m-2") }),
			);

			expect(ledger.positionsForMarket(MARKET).map((p) => p.tokenId)).toEqual(["tok-up"]);
		});

		it("lists closed trades newest first, honouring the limit", () => {
			const ledger = PositionLedger.create();
			ledger.appendClosedTrade(record("1", 1));
			ledger.appendClosedTrade(record("2", 2));
			ledger.appendClosedTrade(record("3", 3));

			expect(ledger.listClosedTrades().map((r) => r.timestampMs)).toEqual([3, 2, 1]);
			expect(ledger.listClosedTrades(2).map((r) => r.timestampMs)).toEqual([3, 2]);
			expect(ledger.listClosedTrades(0)).toEqual([]);
			expect(ledger.closedTradeCount()).toBe(3);
		});

		it("keeps cumulative P&L equal to the sum of records", () => {
			const ledger = PositionLedger.create();
			ledger.appendClosedTrade(record("4", 1));
			ledger.appendClosedTrade(record("-10", 2));
			ledger.appendClosedTrade(record("0.25", 3));

			expect(ledger.cumulativeRealizedPnl().toString()).toBe("-5.75");
		});
	});

	describe("apply", () => {
		it("applies every op of a hedge delta together", () => {
			const ledger = PositionLedger.create();
			const up = position("tok-up", "Up", "100", "0.6");
			unwrap(ledger.upsertPosition(up));
			const down = position("tok-down", "Down", "100", "0.5");

			unwrap(
				ledger.apply(ledgerDelta(removeOp(up), upsertOp(null, down), appendClosedOp(record("-10", 2)))),
			);

			expect(ledger.listOpenPositions()).toEqual([down]);
			expect(ledger.cumulativeRealizedPnl().toString()).toBe("-10");
		});

		it("refuses a delta computed against a stale position, changing nothing", () => {
			const ledger = PositionLedger.create();
			const up = position("tok-up", "Up", "100");
			unwrap(ledger.upsertPosition(up));
			const stale = resizePosition(up, Decimal.from("90"), 1_500);
			const before = ledger.snapshot();

			const result = ledger.apply(
				ledgerDelta(
					appendClosedOp(record("1", 2)),
					upsertOp(null, position("tok-down", "Down", "5")),
					removeOp(stale),
				),
			);

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(isInconsistentStateError(result.error)).toBe(true);
				expect(result.error.message).toBe("Ledger position for token tok-up changed underneath");
				expect(result.error.context).toEqual({
					tokenId: "tok-up",
					heldSize: "100",
					expectedSize: "90",
				});
			}
			expect(ledger.snapshot()).toEqual(before);
		});

		it("refuses to create a position that already exists", () => {
			const ledger = PositionLedger.create();
			unwrap(ledger.upsertPosition(position("tok-up", "Up", "100")));

			const result = ledger.apply(ledgerDelta(upsertOp(null, position("tok-up", "Up", "5"))));

			expect(isErr(result)).toBe(true);
		});

		it("refuses to store a non-positive size", () => {
			const ledger = PositionLedger.create();

			const result = ledger.upsertPosition(position("tok-up", "Up", "0"));

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error.message).toBe("Refusing to store token tok-up with size 0");
			}
			expect(ledger.listOpenPositions()).toEqual([]);
		});

		it("removePosition fails when nothing is held", () => {
			const result = PositionLedger.create().removePosition(tokenId("tok-up"));

			expect(isErr(result)).toBe(true);
			if (!result.ok) expect(result.error.message).toBe("No position held for token tok-up");
		});

		it("upsertPosition replaces whatever is held", () => {
			const ledger = PositionLedger.create();
			unwrap(ledger.upsertPosition(position("tok-up", "Up", "100")));
			unwrap(ledger.upsertPosition(position("tok-up", "Up", "7")));

			expect(ledger.getPosition(tokenId("tok-up"))?.size.toString()).toBe("7");
		});
	});

	describe("snapshot / restore", () => {
		it("round-trips positions, history and cumulative P&L", () => {
			const ledger = PositionLedger.create();
			unwrap(ledger.upsertPosition(position("tok-up", "Up", "60", "0.6")));
			ledger.appendClosedTrade(record("4", 2));

			const snapshot = ledger.snapshot();
			const restored = unwrap(PositionLedger.restore(snapshot));

			expect(snapshot).toEqual({
				positions: [
					{
						tokenId: "tok-up",
						marketId: "m-1",
						outcome: "Up",
						size: "60",
						entryPrice: "0.6",
						direction: 1,
						openedAtMs: 1_000,
						updatedAtMs: 1_000,
					},
				],
				closedTrades: [
					{
						marketId: "m-1",
						tokenId: "tok-up",
						outcome: "Up",
						kind: "PARTIAL_CLOSE",
						closingSize: "10",
						entryPrice: "0.5",
						exitPrice: "0.6",
						realizedPnl: "4",
						timestampMs: 2,
					},
				],
			});
			expect(restored.snapshot()).toEqual(snapshot);
			expect(restored.cumulativeRealizedPnl().toString()).toBe("4");
		});

		it("rejects a snapshot with a non-positive size", () => {
			const snapshot: LedgerSnapshot = {
				positions: [{ ...positionRow(), size: "0" }],
				closedTrades: [],
			};

			const result = PositionLedger.restore(snapshot);

			expect(isErr(result)).toBe(true);
			if (!result.ok) expect(result.error.message).toBe("Snapshot position tok-up has size 0");
		});

		it("rejects a snapshot holding the same token twice", () => {
			const snapshot: LedgerSnapshot = { positions: [positionRow(), positionRow()], closedTrades: [] };

			const result = PositionLedger.restore(snapshot);

			expect(isErr(result)).toBe(true);
			if (!result.ok) expect(result.error.message).toBe("Snapshot holds token tok-up twice");
		});
	});
});

function positionRow(): LedgerSnapshot["positions"][number] {
	return {
		tokenId: "tok-up",
		marketId: "m-1",
		outcome: "Up",
		size: "10",
		entryPrice: "0.5",
		direction: Direction.Long,
		openedAtMs: 1,
		updatedAtMs: 1,
	};
}
