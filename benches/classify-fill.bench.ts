import { bench, describe } from "vitest";
import { DEFAULT_CLASSIFIER_OPTIONS, classifyFill } from "../src/classification/classifier.js";
import type { TradeEvent } from "../src/classification/trade-event.js";
import { TradeEngine } from "../src/engine/trade-engine.js";
import { PositionLedger } from "../src/ledger/position-ledger.js";
import { openPosition } from "../src/ledger/position.js";
import { Decimal } from "../src/shared/decimal.js";
import { fillId, marketId, tokenId } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";
import { Direction, TradeSide } from "../src/shared/trade-side.js";

function fill(i: number, side: TradeSide, outcome: "Up" | "Down", price: string): TradeEvent {
	return {
		fillId: fillId(`0x${i}`),
		tokenId: tokenId(outcome === "Up" ? "tok-up" : "tok-down"),
		marketId: marketId("m-1"),
		outcome,
		side,
		size: Decimal.from("10"),
		price: Decimal.from(price),
		timestampMs: i,
	};
}

describe("classify fill", () => {
	const ledger = PositionLedger.create();
	unwrap(
		ledger.upsertPosition(
			openPosition({
				tokenId: tokenId("tok-up"),
				marketId: marketId("m-1"),
				outcome: "Up",
				size: Decimal.from("1000"),
				price: Decimal.from("0.55"),
				direction: Direction.Long,
				timestampMs: 0,
			}),
		),
	);
	const increase = fill(1, TradeSide.Buy, "Up", "0.60");
	const partialClose = fill(2, TradeSide.Sell, "Up", "0.65");
	const hedge = fill(3, TradeSide.Buy, "Down", "0.40");

	bench("increase 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			classifyFill(ledger, increase, DEFAULT_CLASSIFIER_OPTIONS);
		}
	});

	bench("partial close 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			classifyFill(ledger, partialClose, DEFAULT_CLASSIFIER_OPTIONS);
		}
	});

	bench("partial hedge 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			classifyFill(ledger, hedge, DEFAULT_CLASSIFIER_OPTIONS);
		}
	});
});

describe("engine process", () => {
	bench("open/close round trip 500x", () => {
		const engine = TradeEngine.create();
		for (let i = 0; i < 500; i++) {
			engine.process(fill(2 * i, TradeSide.Buy, "Up", "0.50"));
			engine.process(fill(2 * i + 1, TradeSide.Sell, "Up", "0.52"));
		}
	});
});
