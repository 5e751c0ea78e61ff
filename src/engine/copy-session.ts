/**
 * CopySession — feeds activity records from a followed wallet through the
 * engine and keeps the result durable.
 *
 * Per record: parse, drop what the cursor has already taken in, size the
 * copy, book it, then checkpoint ledger and cursor together in one snapshot.
 * A fill the engine refuses is still checkpointed, since the cursor has
 * already marked it seen.
 * Because both live in the same snapshot, a restart resumes exactly where the
 * last successful checkpoint left off.
 */

import type { ClassifierOptions } from "../classification/classifier.js";
import type { Classification } from "../classification/types.js";
import type { HandlerErrorCallback, NotificationSink } from "../events/notification-sink.js";
import { parseActivity } from "../feed/activity.js";
import { CursorDecision, FillCursor } from "../feed/fill-cursor.js";
import type { Logger } from "../lib/logger/index.js";
import { FileStateStore } from "../persistence/file-state-store.js";
import {
	type EngineSnapshot,
	type LoadError,
	SNAPSHOT_VERSION,
	type StateStore,
} from "../persistence/types.js";
import { formatStatus } from "../reporting/format.js";
import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError, type InconsistentStateError, type PersistenceError } from "../shared/errors.js";
import type { FillId } from "../shared/identifiers.js";
import { type Result, mapErr, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { CopySizer } from "../sizing/copy-sizer.js";
import type { CopySizingResult, FillSizer } from "../sizing/types.js";
import { type ProcessError, TradeEngine } from "./trade-engine.js";

export type IngestOutcome =
	| {
			readonly status: "processed";
			readonly classification: Classification;
			readonly sizing: CopySizingResult | null;
	  }
	| {
			readonly status: "duplicate" | "foreign_wallet";
			readonly fillId: FillId;
	  }
	| {
			readonly status: "rejected";
			readonly error: ProcessError;
	  };

export interface CopySessionConfig {
	readonly store: StateStore;
	readonly sink?: NotificationSink;
	/** Called after a sink failure has been logged; the fill stays booked */
	readonly onSinkError?: HandlerErrorCallback;
	/** Sizes each copied fill; fills are booked at the source size when omitted */
	readonly sizer?: FillSizer;
	readonly options?: Partial<ClassifierOptions>;
	/** Only this wallet's fills are taken in, when set */
	readonly targetWallet?: string | undefined;
	readonly maxSeenFills?: number;
	/** Save after every fill the cursor takes in (default true) */
	readonly autoCheckpoint?: boolean;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export type OpenError = LoadError | InconsistentStateError;

export class CopySession {
	readonly engine: TradeEngine;
	private readonly cursor: FillCursor;
	private readonly store: StateStore;
	private readonly sizer: FillSizer | null;
	private readonly autoCheckpoint: boolean;
	private readonly clock: Clock;
	private readonly logger: Logger | null;
	private dirty = false;

	private constructor(
		engine: TradeEngine,
		cursor: FillCursor,
		config: CopySessionConfig,
	) {
		this.engine = engine;
		this.cursor = cursor;
		this.store = config.store;
		this.sizer = config.sizer ?? null;
		this.autoCheckpoint = config.autoCheckpoint ?? true;
		this.clock = config.clock ?? SystemClock;
		this.logger = config.logger ? config.logger.child({ component: "copy-session" }) : null;
	}

	/**
	 * Loads the last snapshot from the store, or starts empty when there is none.
	 * @returns Err if the stored snapshot cannot be read, parsed or trusted
	 */
	static async open(config: CopySessionConfig): Promise<Result<CopySession, OpenError>> {
		const loaded = await config.store.load();
		if (!loaded.ok) return loaded;

		const engineConfig = {
			...(config.sink !== undefined ? { sink: config.sink } : {}),
			...(config.options !== undefined ? { options: config.options } : {}),
			onSinkError: reportSinkError(config),
		};
		const cursorOptions = {
			targetWallet: config.targetWallet,
			...(config.maxSeenFills !== undefined ? { maxSeen: config.maxSeenFills } : {}),
		};

		const snapshot = loaded.value;
		if (snapshot === null) {
			return ok(
				new CopySession(
					TradeEngine.create(engineConfig),
					FillCursor.create(cursorOptions),
					config,
				),
			);
		}

		const engine = TradeEngine.restore(snapshot.ledger, engineConfig);
		if (!engine.ok) return engine;

		const session = new CopySession(
			engine.value,
			FillCursor.restore(snapshot.cursor, cursorOptions),
			config,
		);
		session.logger?.info(
			{
				openPositions: engine.value.listOpenPositions().length,
				closedTrades: engine.value.closedTradeCount(),
				seenFills: session.cursor.seenCount,
			},
			"Resumed from snapshot",
		);
		return ok(session);
	}

	/**
	 * Builds a session from resolved configuration: a CopySizer from the risk
	 * settings and, unless a store is given, a FileStateStore at the state path.
	 * @returns Err(ConfigError) if the sizing settings are unusable
	 */
	static async fromConfig(
		config: EngineConfig,
		deps: Omit<CopySessionConfig, "store" | "sizer" | "options" | "targetWallet"> & {
			readonly store?: StateStore;
		} = {},
	): Promise<Result<CopySession, OpenError | ConfigError>> {
		const sizer = mapErr(
			CopySizer.create({
				riskMultiplier: config.riskMultiplier,
				maxTradeUsdc: config.maxTradeUsdc,
			}),
			(error) => new ConfigError(error.message, { cause: error }),
		);
		if (!sizer.ok) return sizer;

		return CopySession.open({
			...deps,
			store: deps.store ?? FileStateStore.create({ filePath: config.stateFilePath }),
			sizer: sizer.value,
			options: {
				sizeEpsilon: Decimal.from(config.sizeEpsilon),
				allowShortOpen: config.allowShortOpen,
			},
			targetWallet: config.targetWallet,
		});
	}

	// ── Ingestion ──────────────────────────────────────────────────

	/**
	 * Takes in one activity record.
	 *
	 * A rejected or skipped record is an Ok outcome; Err means the cursor
	 * moved in memory but the checkpoint after it could not be saved.
	 */
	async ingest(raw: unknown): Promise<Result<IngestOutcome, PersistenceError>> {
		const outcome = this.take(raw);
		if (this.dirty && this.autoCheckpoint) {
			const saved = await this.checkpoint();
			if (!saved.ok) return saved;
		}
		return ok(outcome);
	}

	/** Takes in records in order; stops at the first failed checkpoint. */
	async ingestMany(
		records: Iterable<unknown>,
	): Promise<Result<readonly IngestOutcome[], PersistenceError>> {
		const outcomes: IngestOutcome[] = [];
		for (const raw of records) {
			const result = await this.ingest(raw);
			if (!result.ok) return result;
			outcomes.push(result.value);
		}
		return ok(outcomes);
	}

	/** Saves ledger and cursor as one snapshot. */
	async checkpoint(): Promise<Result<void, PersistenceError>> {
		const saved = await this.store.save(this.snapshot());
		if (!saved.ok) {
			this.logger?.error(saved.error.toJSON(), "Checkpoint failed");
			return saved;
		}
		this.dirty = false;
		return saved;
	}

	snapshot(): EngineSnapshot {
		return {
			version: SNAPSHOT_VERSION,
			savedAtMs: this.clock.now(),
			ledger: this.engine.snapshot(),
			cursor: this.cursor.snapshot(),
		};
	}

	/** Plain-text status report for a chat command. */
	status(recentTrades = 5): string {
		return formatStatus(this.engine, { recentTrades });
	}

	private take(raw: unknown): IngestOutcome {
		const parsed = parseActivity(raw);
		if (!parsed.ok) {
			this.logger?.warn(parsed.error.toJSON(), "Activity record rejected");
			return { status: "rejected", error: parsed.error };
		}

		const fill = parsed.value;
		const decision = this.cursor.accept(fill);
		switch (decision) {
			case CursorDecision.Duplicate:
			case CursorDecision.ForeignWallet:
				this.logger?.debug({ fillId: fill.event.fillId, decision }, "Fill skipped");
				return { status: decision, fillId: fill.event.fillId };
			case CursorDecision.Accepted:
				this.dirty = true;
				break;
		}

		const sizing = this.sizer ? this.sizer.size(fill.event) : null;
		if (sizing?.capped) {
			this.logger?.info(
				{
					fillId: fill.event.fillId,
					sourceSize: fill.event.size.toString(),
					size: sizing.size.toString(),
				},
				"Copy size capped",
			);
		}
		const event = sizing ? { ...fill.event, size: sizing.size } : fill.event;

		const result = this.engine.process(event);
		if (!result.ok) {
			this.logger?.warn(result.error.toJSON(), "Fill rejected");
			return { status: "rejected", error: result.error };
		}
		return { status: "processed", classification: result.value, sizing };
	}
}

function reportSinkError(config: CopySessionConfig): HandlerErrorCallback {
	const logger = config.logger ? config.logger.child({ component: "copy-session" }) : null;
	return (error, notification) => {
		logger?.error(
			{
				fillId: notification.fillId,
				error: error instanceof Error ? error.message : String(error),
			},
			"Notification sink failed",
		);
		config.onSinkError?.(error, notification);
	};
}
