/**
 * MemoryStateStore — in-process StateStore for tests and dry runs.
 *
 * Holds a deep copy of the last saved snapshot, so later changes to the
 * caller's objects never leak into what was "persisted".
 */

import type { PersistenceError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { EngineSnapshot, LoadError, StateStore } from "./types.js";

export class MemoryStateStore implements StateStore {
	private stored: EngineSnapshot | null;
	private saves = 0;

	constructor(initial: EngineSnapshot | null = null) {
		this.stored = initial ? structuredClone(initial) : null;
	}

	async load(): Promise<Result<EngineSnapshot | null, LoadError>> {
		return ok(this.stored ? structuredClone(this.stored) : null);
	}

	async save(snapshot: EngineSnapshot): Promise<Result<void, PersistenceError>> {
		this.stored = structuredClone(snapshot);
		this.saves += 1;
		return ok(undefined);
	}

	/** Number of saves since construction. */
	get saveCount(): number {
		return this.saves;
	}

	/** Last saved snapshot, without copying. */
	peek(): EngineSnapshot | null {
		return this.stored;
	}
}
