/**
 * LibDecimal — thin wrapper around decimal.js-light.
 *
 * Used only where an exact amount has to be rendered as a decimal string
 * (fraction display, paper-trade notionals). Domain code goes through this
 * module, never through decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

// u64 numerators carry up to 20 significant digits; leave room for the product with a price.
DecimalLight.set({ precision: 60 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	/**
	 * @throws Error for non-finite numbers and empty strings
	 * @example LibDecimal.from("18446744073709551615")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static fromBigInt(value: bigint): LibDecimal {
		return new LibDecimal(new DecimalLight(value.toString()));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** @throws Error when dividing by zero */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	/** Fixed-point rendering, rounding half up. */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Plain notation with trailing zeros removed: "1.500" → "1.5". */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (!fixed.includes(".")) return fixed;
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}
}
