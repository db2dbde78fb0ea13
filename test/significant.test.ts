import { describe, expect, it } from "vitest";
import { formatRounded, roundSignificant } from "../src/math/significant.js";

/** Significant digits in the shortest decimal form of a value */
function significantDigitsOf(value: number): number {
	const [mantissa = ""] = Math.abs(value).toExponential().split("e");
	return mantissa.replace(".", "").replace(/0+$/, "").length;
}

describe("Significant figures", () => {
	describe("roundSignificant", () => {
		it("rounds large values to tens and hundreds", () => {
			expect(roundSignificant(1234.5, 2)).toBe(1200);
			expect(roundSignificant(1234.5, 3)).toBe(1230);
			expect(roundSignificant(-98765, 3)).toBe(-98800);
		});

		it("rounds small values to decimal places", () => {
			expect(roundSignificant(0.012345, 3)).toBe(0.0123);
			expect(roundSignificant(3.14159265, 5)).toBe(3.1416);
		});

		it("returns exactly zero for zero", () => {
			expect(roundSignificant(0, 1)).toBe(0);
			expect(roundSignificant(0, 7)).toBe(0);
		});

		it("rounds exact ties away from zero", () => {
			expect(roundSignificant(2.5, 1)).toBe(3);
			expect(roundSignificant(-2.5, 1)).toBe(-3);
			expect(roundSignificant(1250, 2)).toBe(1300);
		});

		it("carries into the next magnitude", () => {
			expect(roundSignificant(999.5, 3)).toBe(1000);
			expect(roundSignificant(999.96, 3)).toBe(1000);
		});

		it("keeps values that already have fewer digits", () => {
			expect(roundSignificant(123.456, 10)).toBe(123.456);
			expect(roundSignificant(7, 3)).toBe(7);
		});

		it("never keeps more digits than requested", () => {
			const values = [
				1234.5, 0.012345, -98765.4321, 3.14159265, 1.6e-19, 7, 999.96,
				271828.1828, -0.000456789, 1.23456e25, 1.234567e-120, -9.87654e200,
			];
			for (const value of values) {
				for (let digits = 1; digits <= 6; digits++) {
					const rounded = roundSignificant(value, digits);
					expect(significantDigitsOf(rounded)).toBeLessThanOrEqual(digits);
				}
			}
		});

		it("rounds at very large and very small magnitudes", () => {
			expect(roundSignificant(1.23456e25, 3)).toBe(1.23e25);
			expect(String(roundSignificant(1.23456e25, 3))).toBe("1.23e+25");
			expect(roundSignificant(1.234567e-120, 3)).toBe(1.23e-120);
			expect(String(roundSignificant(1.234567e-120, 3))).toBe("1.23e-120");
		});

		it("passes non-finite values through", () => {
			expect(roundSignificant(Number.POSITIVE_INFINITY, 2)).toBe(
				Number.POSITIVE_INFINITY,
			);
		});
	});

	describe("formatRounded", () => {
		it("writes zero as 0.0", () => {
			expect(formatRounded(0)).toBe("0.0");
			expect(formatRounded(-0)).toBe("0.0");
		});

		it("writes other values in shortest form", () => {
			expect(formatRounded(1200)).toBe("1200");
			expect(formatRounded(0.0123)).toBe("0.0123");
			expect(formatRounded(-4.57)).toBe("-4.57");
		});
	});
});
