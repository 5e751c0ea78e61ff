import type { FillNotification } from "../events/fill-notification.js";
import type { ClosedTradeRecord, Position } from "../ledger/types.js";
import type { Decimal } from "../shared/decimal.js";
import { Direction } from "../shared/trade-side.js";

/** Read surface the status report draws from. */
export interface StatusSource {
	listOpenPositions(): readonly Position[];
	listClosedTrades(limit?: number): readonly ClosedTradeRecord[];
	closedTradeCount(): number;
	cumulativeRealizedPnl(): Decimal;
}

export interface StatusOptions {
	/** Closed trades listed, newest first (default 5) */
	readonly recentTrades?: number;
}

export function formatPnl(value: Decimal): string {
	const abs = value.abs().toFixed(2);
	return value.isNegative() ? `-$${abs}` : `+$${abs}`;
}

function formatPrice(value: Decimal): string {
	return value.toFixed(4);
}

function directionLabel(direction: Direction): string {
	return direction === Direction.Long ? "LONG" : "SHORT";
}

/**
 * One-line alert for a classified fill.
 * @example
 * formatNotification(n)
 * // "[FULL_CLOSE] SELL 100 Up @ 0.7000 | market m1 | closed 100 Up 0.6000 → 0.7000 P&L +$10.00 | position 0"
 */
export function formatNotification(n: FillNotification): string {
	const parts = [
		`[${n.kind}] ${n.side} ${n.size.toString()} ${n.outcome} @ ${formatPrice(n.price)}`,
		`market ${n.marketId}`,
	];
	if (
		n.closingSize !== undefined &&
		n.entryPrice !== undefined &&
		n.exitPrice !== undefined &&
		n.realizedPnl !== undefined
	) {
		const outcome = n.closedOutcome ?? n.outcome;
		parts.push(
			`closed ${n.closingSize.toString()} ${outcome} ${formatPrice(n.entryPrice)} → ${formatPrice(n.exitPrice)} P&L ${formatPnl(n.realizedPnl)}`,
		);
	}
	if (n.resultingPositionSize !== undefined) {
		parts.push(`position ${n.resultingPositionSize.toString()}`);
	}
	return parts.join(" | ");
}

function renderPositions(positions: readonly Position[]): string[] {
	const lines = [`Open Positions (${positions.length})`];
	if (positions.length === 0) {
		lines.push("  (none)");
		return lines;
	}
	for (const p of positions) {
		lines.push(
			`  ${p.outcome} ${directionLabel(p.direction)} ${p.size.toString()} @ ${formatPrice(p.entryPrice)} [${p.tokenId} / ${p.marketId}]`,
		);
	}
	return lines;
}

function renderClosed(records: readonly ClosedTradeRecord[], total: number): string[] {
	const lines = [`Closed Trades (${total}, showing ${records.length})`];
	if (records.length === 0) {
		lines.push("  (none)");
		return lines;
	}
	for (const r of records) {
		lines.push(
			`  ${r.kind} ${r.outcome} ${r.closingSize.toString()} ${formatPrice(r.entryPrice)} → ${formatPrice(r.exitPrice)} ${formatPnl(r.realizedPnl)}`,
		);
	}
	return lines;
}

/** Multi-line status report: open positions, recent closed trades, cumulative P&L. */
export function formatStatus(source: StatusSource, options: StatusOptions = {}): string {
	const recent = source.listClosedTrades(options.recentTrades ?? 5);
	return [
		...renderPositions(source.listOpenPositions()),
		...renderClosed(recent, source.closedTradeCount()),
		`Realized P&L: ${formatPnl(source.cumulativeRealizedPnl())}`,
	].join("\n");
}
