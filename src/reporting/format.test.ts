import { describe, expect, it } from "vitest";
import type { TradeEvent } from "../classification/trade-event.js";
import { TradeEngine } from "../engine/trade-engine.js";
import { toNotification } from "../events/fill-notification.js";
import { Decimal } from "../shared/decimal.js";
import { fillId, marketId, tokenId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { TradeSide } from "../shared/trade-side.js";
import { formatNotification, formatPnl, formatStatus } from "./format.js";

function fill(side: TradeSide, size: string, price: string, outcome = "Up"): TradeEvent {
	return {
		fillId: fillId("0xf"),
		tokenId: tokenId(outcome === "Up" ? "tok-up" : "tok-down"),
		marketId: marketId("m-1"),
		outcome,
		side,
		size: Decimal.from(size),
		price: Decimal.from(price),
		timestampMs: 1_000,
	};
}

describe("formatPnl", () => {
	it.each([
		["10", "+$10.00"],
		["-10", "-$10.00"],
		["0", "+$0.00"],
		["4.005", "+$4.01"],
		["-0.004", "-$0.00"],
	])("%s → %s", (value, expected) => {
		expect(formatPnl(Decimal.from(value))).toBe(expected);
	});
});

describe("formatNotification", () => {
	it("renders an opening fill", () => {
		const engine = TradeEngine.create();
		const classification = unwrap(engine.process(fill(TradeSide.Buy, "100", "0.60")));

		expect(formatNotification(toNotification(classification))).toBe(
			"[OPEN] BUY 100 Up @ 0.6000 | market m-1 | position 100",
		);
	});

	it("renders a full close with its P&L", () => {
		const engine = TradeEngine.create();
		engine.process(fill(TradeSide.Buy, "100", "0.60"));
		const classification = unwrap(engine.process(fill(TradeSide.Sell, "100", "0.70")));

		expect(formatNotification(toNotification(classification))).toBe(
			"[FULL_CLOSE] SELL 100 Up @ 0.7000 | market m-1 | closed 100 Up 0.6000 → 0.7000 P&L +$10.00 | position 0",
		);
	});

	it("names the hedged outcome on a hedge", () => {
		const engine = TradeEngine.create();
		engine.process(fill(TradeSide.Buy, "100", "0.60"));
		const classification = unwrap(engine.process(fill(TradeSide.Buy, "100", "0.50", "Down")));

		expect(formatNotification(toNotification(classification))).toBe(
			"[HEDGE_CLOSE] BUY 100 Down @ 0.5000 | market m-1 | closed 100 Up 0.6000 → 0.5000 P&L -$10.00 | position 100",
		);
	});
});

describe("formatStatus", () => {
	it("renders an empty ledger", () => {
		expect(formatStatus(TradeEngine.create())).toBe(
			[
				"Open Positions (0)",
				"  (none)",
				"Closed Trades (0, showing 0)",
				"  (none)",
				"Realized P&L: +$0.00",
			].join("\n"),
		);
	});

	it("renders positions, recent closes and cumulative P&L", () => {
		const engine = TradeEngine.create();
		engine.process(fill(TradeSide.Buy, "100", "0.60"));
		engine.process(fill(TradeSide.Sell, "40", "0.70"));

		expect(formatStatus(engine)).toBe(
			[
				"Open Positions (1)",
				"  Up LONG 60 @ 0.6000 [tok-up / m-1]",
				"Closed Trades (1, showing 1)",
				"  PARTIAL_CLOSE Up 40 0.6000 → 0.7000 +$4.00",
				"Realized P&L: +$4.00",
			].join("\n"),
		);
	});

	it("limits the closed trades shown, newest first", () => {
		const engine = TradeEngine.create();
		engine.process(fill(TradeSide.Buy, "100", "0.60"));
		engine.process(fill(TradeSide.Sell, "10", "0.70"));
		engine.process(fill(TradeSide.Sell, "10", "0.50"));

		const lines = formatStatus(engine, { recentTrades: 1 }).split("\n");

		expect(lines[2]).toBe("Closed Trades (2, showing 1)");
		expect(lines[3]).toBe("  PARTIAL_CLOSE Up 10 0.6000 → 0.5000 -$1.00");
		expect(lines[4]).toBe("Realized P&L: +$0.00");
	});
});
