import { describe, expect, it } from "vitest";
import { NullStrategy } from "./null-strategy.js";

describe("NullStrategy", () => {
	it("never trades, however often it is called", () => {
		const strategy = new NullStrategy();
		for (const price of [0, -1, 1e308, Number.NaN, Number.POSITIVE_INFINITY, 100, 100]) {
			expect(strategy.trade({ priceLossy: price })).toBeNull();
		}
	});

	it("has no observable state", () => {
		const strategy = new NullStrategy();
		strategy.trade({ priceLossy: 10 });
		expect(Object.keys(strategy)).toEqual(["name"]);
		expect(strategy.name).toBe("Null");
	});
});
