/**
 * Fraction — exact rational trade amount.
 *
 * Numerator and denominator are unsigned 64-bit integers held as bigint, so
 * amounts survive untouched down to on-chain token precision. Fractions are
 * not reduced: 2/4 and 1/2 are different values that happen to be equivalent.
 *
 * A zero denominator is representable. Configuration does not validate it,
 * so neither does the constructor; rendering such a fraction as a decimal
 * fails, and `toNumber()` follows IEEE-754 division.
 */

import { LibDecimal } from "../lib/decimal/index.js";

export const U64_MAX = 2n ** 64n - 1n;

/** Anything that can stand for an unsigned integer at a boundary. */
export type U64Like = number | bigint | string;

const DIGITS = /^\d+$/;

/**
 * Normalize a u64-like value.
 * @throws RangeError for negatives, fractions, non-digit strings or values above u64 max
 */
export function toU64(value: U64Like, label = "value"): bigint {
	let parsed: bigint;
	if (typeof value === "bigint") {
		parsed = value;
	} else if (typeof value === "number") {
		if (!Number.isSafeInteger(value)) {
			throw new RangeError(`${label} must be a safe integer, got ${value}`);
		}
		parsed = BigInt(value);
	} else {
		const trimmed = value.trim();
		if (!DIGITS.test(trimmed)) {
			throw new RangeError(`${label} must be a decimal digit string, got "${value}"`);
		}
		parsed = BigInt(trimmed);
	}
	if (parsed < 0n || parsed > U64_MAX) {
		throw new RangeError(`${label} is outside the u64 range: ${parsed}`);
	}
	return parsed;
}

export class Fraction {
	readonly numerator: bigint;
	readonly denominator: bigint;

	private constructor(numerator: bigint, denominator: bigint) {
		this.numerator = numerator;
		this.denominator = denominator;
	}

	/** Whole amount: `Fraction.of(5)` is 5/1. */
	static of(amount: U64Like): Fraction {
		return new Fraction(toU64(amount, "amount"), 1n);
	}

	static from(numerator: U64Like, denominator: U64Like): Fraction {
		return new Fraction(toU64(numerator, "numerator"), toU64(denominator, "denominator"));
	}

	/** Same numerator and same denominator. */
	equals(other: Fraction): boolean {
		return this.numerator === other.numerator && this.denominator === other.denominator;
	}

	/** Same rational value (1/2 ~ 2/4). Falls back to `equals` when a denominator is zero. */
	isEquivalent(other: Fraction): boolean {
		if (this.denominator === 0n || other.denominator === 0n) {
			return this.equals(other);
		}
		return this.numerator * other.denominator === other.numerator * this.denominator;
	}

	isWhole(): boolean {
		return this.denominator === 1n;
	}

	/** Lossy float view, for logging and comparisons against prices. */
	toNumber(): number {
		return Number(this.numerator) / Number(this.denominator);
	}

	/**
	 * Exact decimal rendering, rounded half up.
	 * @throws Error when the denominator is zero
	 */
	toDecimalString(places: number): string {
		return LibDecimal.fromBigInt(this.numerator)
			.div(LibDecimal.fromBigInt(this.denominator))
			.toFixed(places);
	}

	/** "5" for whole amounts, "5/3" otherwise. */
	toString(): string {
		return this.isWhole() ? this.numerator.toString() : `${this.numerator}/${this.denominator}`;
	}

	/** bigint does not serialize; pino and JSON.stringify get strings instead. */
	toJSON(): { numerator: string; denominator: string } {
		return { numerator: this.numerator.toString(), denominator: this.denominator.toString() };
	}
}
