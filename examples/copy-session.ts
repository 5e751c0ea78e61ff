/**
 * Copy session — replays a short activity feed for one wallet and prints
 * the resulting status report.
 *
 * State lands in FILLBOOK_STATE_FILE (default ./fillbook-state.json); run it
 * twice to see the second run skip every fill as a duplicate.
 * Run: npx tsx examples/copy-session.ts
 */

import {
	CopySession,
	LoggerNotificationSink,
	createLogger,
	resolveConfig,
} from "fillbook";

const WALLET = "0x00000000000000000000000000000000000000aa";
const T0 = 1_700_000_000;

// ── Feed ─────────────────────────────────────────────────────────────

function trade(
	hash: string,
	offsetSec: number,
	side: "BUY" | "SELL",
	outcome: "Up" | "Down",
	size: number,
	price: number,
) {
	return {
		type: "TRADE",
		transactionHash: hash,
		timestamp: T0 + offsetSec,
		conditionId: "btc-up-or-down-15m",
		asset: outcome === "Up" ? "btc-up" : "btc-down",
		outcome,
		side,
		size,
		price,
		proxyWallet: WALLET,
	};
}

const feed = [
	trade("0x01", 0, "BUY", "Up", 100, 0.55),
	trade("0x02", 30, "BUY", "Up", 60, 0.58),
	trade("0x03", 90, "SELL", "Up", 80, 0.63),
	trade("0x04", 120, "BUY", "Down", 50, 0.4),
	trade("0x05", 180, "BUY", "Down", 40, 0.35),
];

// ── Run ──────────────────────────────────────────────────────────────

const config = resolveConfig({ targetWallet: WALLET, maxTradeUsdc: 50 });
const logger = createLogger({ level: config.logLevel, bindings: { example: "copy-session" } });

const opened = await CopySession.fromConfig(config, {
	sink: new LoggerNotificationSink(logger),
	logger,
});
if (!opened.ok) {
	logger.error(opened.error.toJSON(), "Could not open session");
	process.exit(1);
}

const session = opened.value;
const outcomes = await session.ingestMany(feed);
if (!outcomes.ok) {
	logger.error(outcomes.error.toJSON(), "Checkpoint failed");
	process.exit(1);
}

logger.info(
	{ statuses: outcomes.value.map((o) => o.status) },
	"Feed replayed",
);
process.stdout.write(`${session.status()}\n`);
