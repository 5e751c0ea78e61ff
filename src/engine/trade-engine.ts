/**
 * TradeEngine — validates, classifies and books fills against an owned ledger.
 *
 * Per fill: classify against the current ledger view, apply the resulting
 * delta as one unit, then announce it to the sink. `process` is synchronous,
 * so two fills can never be evaluated against a racing view of the ledger.
 * A sink that throws does not undo a booked fill: the failure goes to
 * `onSinkError` and is kept as `lastSinkError`. The engine does not log;
 * sinks and callers decide what to report.
 */

import {
	type ClassifierOptions,
	DEFAULT_CLASSIFIER_OPTIONS,
	classifyFill,
} from "../classification/classifier.js";
import { type TradeEvent, parseTradeEvent } from "../classification/trade-event.js";
import type { Classification } from "../classification/types.js";
import { toNotification } from "../events/fill-notification.js";
import {
	type HandlerErrorCallback,
	type NotificationSink,
	nullSink,
} from "../events/notification-sink.js";
import { PositionLedger } from "../ledger/position-ledger.js";
import type { LedgerSnapshot } from "../ledger/snapshot.js";
import type { ClosedTradeRecord, Position } from "../ledger/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { InconsistentStateError, InvalidEventError } from "../shared/errors.js";
import type { TokenId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";

export type ProcessError = InvalidEventError | InconsistentStateError;

export interface TradeEngineConfig {
	readonly ledger?: PositionLedger;
	readonly sink?: NotificationSink;
	readonly options?: Partial<ClassifierOptions>;
	/** Called when the sink throws for a fill already booked */
	readonly onSinkError?: HandlerErrorCallback;
}

export class TradeEngine {
	private readonly ledger: PositionLedger;
	private readonly sink: NotificationSink;
	private readonly onSinkError: HandlerErrorCallback | null;
	private sinkError: unknown = null;
	readonly options: ClassifierOptions;

	private constructor(
		ledger: PositionLedger,
		sink: NotificationSink,
		options: ClassifierOptions,
		onSinkError: HandlerErrorCallback | null,
	) {
		this.ledger = ledger;
		this.sink = sink;
		this.options = options;
		this.onSinkError = onSinkError;
	}

	static create(config: TradeEngineConfig = {}): TradeEngine {
		return new TradeEngine(
			config.ledger ?? PositionLedger.create(),
			config.sink ?? nullSink,
			{ ...DEFAULT_CLASSIFIER_OPTIONS, ...config.options },
			config.onSinkError ?? null,
		);
	}

	/**
	 * Resumes from a saved ledger snapshot.
	 * @returns Err if the snapshot is internally inconsistent
	 */
	static restore(
		snapshot: LedgerSnapshot,
		config: Omit<TradeEngineConfig, "ledger"> = {},
	): Result<TradeEngine, InconsistentStateError> {
		const ledger = PositionLedger.restore(snapshot);
		if (!ledger.ok) return ledger;
		return ok(TradeEngine.create({ ...config, ledger: ledger.value }));
	}

	// ── Processing ─────────────────────────────────────────────────

	/**
	 * Classifies one fill and books it.
	 *
	 * On Err the ledger is untouched and the sink is not called. Once the
	 * delta is applied the result is Ok, even if the sink throws.
	 *
	 * @example
	 * const result = engine.process(event);
	 * if (!result.ok) logger.warn(result.error.toJSON(), "fill rejected");
	 */
	process(event: TradeEvent): Result<Classification, ProcessError> {
		const classified = classifyFill(this.ledger, event, this.options);
		if (!classified.ok) return classified;

		const applied = this.ledger.apply(classified.value.delta);
		if (!applied.ok) return applied;

		this.announce(classified.value);
		return classified;
	}

	/** The last error a sink threw, or null if none has */
	get lastSinkError(): unknown {
		return this.sinkError;
	}

	private announce(classification: Classification): void {
		const notification = toNotification(classification);
		try {
			this.sink.notify(notification);
		} catch (error: unknown) {
			this.sinkError = error;
			this.onSinkError?.(error, notification);
		}
	}

	/** Validates an untyped fill record, then processes it. */
	processRaw(raw: unknown): Result<Classification, ProcessError> {
		const parsed = parseTradeEvent(raw);
		if (!parsed.ok) return parsed;
		return this.process(parsed.value);
	}

	/**
	 * Processes fills in order, stopping at the first failure.
	 * @returns Classifications of every fill, or the first error
	 */
	replay(events: Iterable<TradeEvent>): Result<readonly Classification[], ProcessError> {
		const classifications: Classification[] = [];
		for (const event of events) {
			const result = this.process(event);
			if (!result.ok) return result;
			classifications.push(result.value);
		}
		return ok(classifications);
	}

	// ── Queries ────────────────────────────────────────────────────

	getPosition(tokenId: TokenId): Position | null {
		return this.ledger.getPosition(tokenId);
	}

	listOpenPositions(): readonly Position[] {
		return this.ledger.listOpenPositions();
	}

	listClosedTrades(limit?: number): readonly ClosedTradeRecord[] {
		return this.ledger.listClosedTrades(limit);
	}

	closedTradeCount(): number {
		return this.ledger.closedTradeCount();
	}

	cumulativeRealizedPnl(): Decimal {
		return this.ledger.cumulativeRealizedPnl();
	}

	snapshot(): LedgerSnapshot {
		return this.ledger.snapshot();
	}
}
