/**
 * FillCursor — remembers which fills a session has already taken in.
 *
 * Polling the activity feed returns overlapping pages, newest first, so
 * fills are deduplicated by id against a bounded set. Order across markets
 * is not guaranteed; an older fill with a new id is still taken in. The
 * newest timestamp seen is kept as the polling watermark. The cursor is saved
 * alongside the ledger; restoring both from the same snapshot keeps a
 * restarted session from booking a fill twice.
 */

import type { FillId } from "../shared/identifiers.js";
import type { ActivityFill } from "./activity.js";

export const DEFAULT_MAX_SEEN_FILLS = 10_000;

export const CursorDecision = {
	Accepted: "accepted",
	Duplicate: "duplicate",
	ForeignWallet: "foreign_wallet",
} as const;

export type CursorDecision = (typeof CursorDecision)[keyof typeof CursorDecision];

export interface FillCursorSnapshot {
	readonly lastSeenTimestampMs: number;
	/** Oldest first */
	readonly seenFillIds: readonly string[];
}

export interface FillCursorOptions {
	/** Lowercased wallet whose fills are accepted; any wallet when omitted */
	readonly targetWallet?: string | undefined;
	/** Seen-id capacity; the oldest ids are forgotten past it (default 10 000) */
	readonly maxSeen?: number;
}

export class FillCursor {
	private readonly seen: Set<string>;
	private lastSeenMs: number;
	private readonly targetWallet: string | null;
	private readonly maxSeen: number;

	private constructor(seen: Set<string>, lastSeenMs: number, options: FillCursorOptions) {
		this.seen = seen;
		this.lastSeenMs = lastSeenMs;
		this.targetWallet = options.targetWallet ? options.targetWallet.toLowerCase() : null;
		this.maxSeen = Math.max(1, options.maxSeen ?? DEFAULT_MAX_SEEN_FILLS);
		this.evict();
	}

	static create(options: FillCursorOptions = {}): FillCursor {
		return new FillCursor(new Set(), 0, options);
	}

	static restore(snapshot: FillCursorSnapshot, options: FillCursorOptions = {}): FillCursor {
		return new FillCursor(new Set(snapshot.seenFillIds), snapshot.lastSeenTimestampMs, options);
	}

	/** Decides whether a fill is new, and marks it seen when it is. */
	accept(fill: ActivityFill): CursorDecision {
		const { event, wallet } = fill;
		if (this.targetWallet !== null && wallet !== this.targetWallet) {
			return CursorDecision.ForeignWallet;
		}
		if (this.seen.has(event.fillId)) {
			return CursorDecision.Duplicate;
		}

		this.seen.add(event.fillId);
		this.lastSeenMs = Math.max(this.lastSeenMs, event.timestampMs);
		this.evict();
		return CursorDecision.Accepted;
	}

	hasSeen(id: FillId): boolean {
		return this.seen.has(id);
	}

	get lastSeenTimestampMs(): number {
		return this.lastSeenMs;
	}

	get seenCount(): number {
		return this.seen.size;
	}

	snapshot(): FillCursorSnapshot {
		return { lastSeenTimestampMs: this.lastSeenMs, seenFillIds: [...this.seen] };
	}

	private evict(): void {
		while (this.seen.size > this.maxSeen) {
			const oldest = this.seen.values().next();
			if (oldest.done) return;
			this.seen.delete(oldest.value);
		}
	}
}
