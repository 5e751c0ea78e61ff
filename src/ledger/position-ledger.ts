/**
 * PositionLedger — open positions per token plus append-only closed-trade history.
 *
 * State is an immutable value; every mutation builds the next state off to
 * the side and swaps it in with a single assignment, so readers observe a
 * fill's effects entirely or not at all.
 */

import { Decimal } from "../shared/decimal.js";
import { InconsistentStateError } from "../shared/errors.js";
import type { MarketId, TokenId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type LedgerDelta, type LedgerOp, ledgerDelta } from "./ledger-delta.js";
import { samePosition } from "./position.js";
import {
	type LedgerSnapshot,
	fromClosedTradeRow,
	fromPositionRow,
	toClosedTradeRow,
	toPositionRow,
} from "./snapshot.js";
import type { ClosedTradeRecord, LedgerView, Position } from "./types.js";

interface LedgerState {
	readonly positions: ReadonlyMap<TokenId, Position>;
	readonly closed: readonly ClosedTradeRecord[];
	readonly realizedPnl: Decimal;
}

/** Working copy a delta is applied to before it replaces the live state. */
interface Draft {
	positions: Map<TokenId, Position>;
	closed: ClosedTradeRecord[];
	realizedPnl: Decimal;
}

export class PositionLedger implements LedgerView {
	private state: LedgerState;

	private constructor(state: LedgerState) {
		this.state = state;
	}

	static create(): PositionLedger {
		return new PositionLedger({ positions: new Map(), closed: [], realizedPnl: Decimal.zero() });
	}

	/**
	 * Rebuilds a ledger from a snapshot.
	 * @returns Err if the snapshot holds a non-positive size or the same token twice
	 */
	static restore(snapshot: LedgerSnapshot): Result<PositionLedger, InconsistentStateError> {
		const positions = new Map<TokenId, Position>();
		for (const row of snapshot.positions) {
			const position = fromPositionRow(row);
			if (!position.size.isPositive()) {
				return err(
					new InconsistentStateError(`Snapshot position ${row.tokenId} has size ${row.size}`, {
						tokenId: row.tokenId,
					}),
				);
			}
			if (positions.has(position.tokenId)) {
				return err(
					new InconsistentStateError(`Snapshot holds token ${row.tokenId} twice`, {
						tokenId: row.tokenId,
					}),
				);
			}
			positions.set(position.tokenId, position);
		}

		const closed = snapshot.closedTrades.map(fromClosedTradeRow);
		const realizedPnl = closed.reduce((acc, r) => acc.add(r.realizedPnl), Decimal.zero());
		return ok(new PositionLedger({ positions, closed, realizedPnl }));
	}

	// ── Reads ────────────────────────────────────────────────────

	getPosition(tokenId: TokenId): Position | null {
		return this.state.positions.get(tokenId) ?? null;
	}

	getOppositePosition(marketId: MarketId, outcome: string): Position | null {
		for (const position of this.state.positions.values()) {
			if (position.marketId === marketId && position.outcome !== outcome) {
				return position;
			}
		}
		return null;
	}

	/** @returns Open positions in the order they were first opened */
	listOpenPositions(): readonly Position[] {
		return [...this.state.positions.values()];
	}

	/** @returns Open positions on one market */
	positionsForMarket(marketId: MarketId): readonly Position[] {
		return this.listOpenPositions().filter((p) => p.marketId === marketId);
	}

	/**
	 * @param limit - Maximum records to return; all when omitted
	 * @returns Closed-trade records, newest first
	 */
	listClosedTrades(limit?: number): readonly ClosedTradeRecord[] {
		const newestFirst = [...this.state.closed].reverse();
		return limit === undefined ? newestFirst : newestFirst.slice(0, Math.max(0, limit));
	}

	closedTradeCount(): number {
		return this.state.closed.length;
	}

	/** Sum of realized P&L over every closed-trade record. */
	cumulativeRealizedPnl(): Decimal {
		return this.state.realizedPnl;
	}

	// ── Mutations ────────────────────────────────────────────────

	/**
	 * Applies every op of the delta, or none of them.
	 * @returns Err when an op's expected position does not match what is held
	 */
	apply(delta: LedgerDelta): Result<void, InconsistentStateError> {
		const draft: Draft = {
			positions: new Map(this.state.positions),
			closed: [...this.state.closed],
			realizedPnl: this.state.realizedPnl,
		};

		for (const op of delta.ops) {
			const applied = applyOp(draft, op);
			if (!applied.ok) return applied;
		}

		this.state = draft;
		return ok(undefined);
	}

	/** Creates or replaces the position for its token. */
	upsertPosition(position: Position): Result<void, InconsistentStateError> {
		return this.apply(
			ledgerDelta({
				type: "upsert",
				expected: this.getPosition(position.tokenId),
				position,
			}),
		);
	}

	/** @returns Err if no position is held for the token */
	removePosition(tokenId: TokenId): Result<void, InconsistentStateError> {
		const held = this.getPosition(tokenId);
		if (!held) {
			return err(
				new InconsistentStateError(`No position held for token ${tokenId}`, { tokenId }),
			);
		}
		return this.apply(ledgerDelta({ type: "remove", expected: held }));
	}

	appendClosedTrade(record: ClosedTradeRecord): void {
		this.state = {
			...this.state,
			closed: [...this.state.closed, record],
			realizedPnl: this.state.realizedPnl.add(record.realizedPnl),
		};
	}

	// ── Persistence ──────────────────────────────────────────────

	snapshot(): LedgerSnapshot {
		return {
			positions: this.listOpenPositions().map(toPositionRow),
			closedTrades: this.state.closed.map(toClosedTradeRow),
		};
	}
}

function applyOp(draft: Draft, op: LedgerOp): Result<void, InconsistentStateError> {
	switch (op.type) {
		case "upsert": {
			const { position, expected } = op;
			const held = draft.positions.get(position.tokenId) ?? null;
			if (!matches(held, expected)) {
				return err(mismatch(position.tokenId, held, expected));
			}
			if (!position.size.isPositive()) {
				return err(
					new InconsistentStateError(
						`Refusing to store token ${position.tokenId} with size ${position.size.toString()}`,
						{ tokenId: position.tokenId, size: position.size.toString() },
					),
				);
			}
			draft.positions.set(position.tokenId, position);
			return ok(undefined);
		}
		case "remove": {
			const { expected } = op;
			const held = draft.positions.get(expected.tokenId) ?? null;
			if (!matches(held, expected)) {
				return err(mismatch(expected.tokenId, held, expected));
			}
			draft.positions.delete(expected.tokenId);
			return ok(undefined);
		}
		case "append_closed":
			draft.closed.push(op.record);
			draft.realizedPnl = draft.realizedPnl.add(op.record.realizedPnl);
			return ok(undefined);
	}
}

function matches(held: Position | null, expected: Position | null): boolean {
	if (held === null || expected === null) return held === expected;
	return samePosition(held, expected);
}

function mismatch(
	tokenId: TokenId,
	held: Position | null,
	expected: Position | null,
): InconsistentStateError {
	return new InconsistentStateError(`Ledger position for token ${tokenId} changed underneath`, {
		tokenId,
		heldSize: held?.size.toString() ?? null,
		expectedSize: expected?.size.toString() ?? null,
	});
}

