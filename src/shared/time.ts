/**
 * Time sources and unit conversion.
 *
 * The ledger stores epoch milliseconds. Feeds report epoch seconds, and
 * snapshot stamps come from an injected Clock so tests can pin them.
 */

export interface Clock {
	/** Epoch milliseconds */
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Epoch seconds (possibly fractional) to whole epoch milliseconds. */
export function secondsToMs(seconds: number): number {
	return Math.round(seconds * 1000);
}

/** Clock that only moves when told to. */
export class FakeClock implements Clock {
	private ms: number;

	constructor(startMs = 0) {
		this.ms = startMs;
	}

	now(): number {
		return this.ms;
	}

	advance(ms: number): void {
		this.ms += ms;
	}
}
