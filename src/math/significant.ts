/**
 * Significant-figure rounding for numerical table cells.
 *
 * Ties round half away from zero on the exact value of the double, which is
 * what `Number.prototype.toPrecision` does at any magnitude. `2.5` to one
 * figure is `3`, `-2.5` is `-3`, while `0.15` (stored as 0.1499999...) to one
 * figure is `0.1`.
 */

/** Largest precision `toPrecision` accepts */
const MAX_PRECISION = 100;

/**
 * Round `value` to `digits` significant figures.
 *
 * @param value - Value to round
 * @param digits - Significant figures to keep, at least 1
 * @returns The rounded value; zero stays exactly zero
 *
 * @example
 * roundSignificant(1234.5, 2); // 1200
 * roundSignificant(0.012345, 3); // 0.0123
 */
export function roundSignificant(value: number, digits: number): number {
	if (value === 0) return 0;
	if (!Number.isFinite(value)) return value;
	return Number(value.toPrecision(Math.min(digits, MAX_PRECISION)));
}

/**
 * Text of a rounded cell value. Zero is written `0.0`; everything else uses
 * the shortest decimal form that reads back as the same double.
 */
export function formatRounded(value: number): string {
	if (value === 0) return "0.0";
	return String(value);
}
