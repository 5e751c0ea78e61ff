/**
 * Decimal — safe financial math wrapper over decimal.js-light.
 *
 * All prices, sizes and P&L values in the ledger use Decimal.
 * Never use raw `number` for money inside the engine; convert at the
 * persistence and presentation boundaries only.
 */

import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error for non-finite numbers and empty or malformed strings
	 * @example Decimal.from("0.55")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	static zero(): Decimal {
		return new Decimal(new DecimalLight(0));
	}

	static one(): Decimal {
		return new Decimal(new DecimalLight(1));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	/** @throws Error when dividing by zero */
	div(other: Decimal): Decimal {
		if (other.raw.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	neg(): Decimal {
		return new Decimal(this.raw.negated());
	}

	abs(): Decimal {
		return new Decimal(this.raw.absoluteValue());
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: Decimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	/** @returns -1, 0 or 1 */
	sign(): -1 | 0 | 1 {
		if (this.isZero()) return 0;
		return this.isNegative() ? -1 : 1;
	}

	// ── Min / Max ──────────────────────────────────────────────────

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Conversion ─────────────────────────────────────────────────

	/** May lose precision. Use for display and metrics only. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	/**
	 * Plain notation with trailing zeros stripped.
	 * @example Decimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Serializes as the plain decimal string. */
	toJSON(): string {
		return this.toString();
	}
}
