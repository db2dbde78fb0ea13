/**
 * Decimal formats for parsing numerical CSV fields.
 *
 * A format is resolved once from a locale identifier and then passed
 * explicitly to every parse call; no process-wide locale is touched.
 */

import { ConfigurationError } from "./errors.js";

export interface NumberFormat {
	/** Character between the integer and the fractional part */
	decimalSeparator: string;
	/** Thousands separator; empty when the format has no grouping */
	groupSeparator: string;
}

export interface SeparatorOverrides {
	decimalSeparator?: string | undefined;
	groupSeparator?: string | undefined;
}

/** Format of the POSIX "C" locale */
export const POSIX_NUMBER_FORMAT: NumberFormat = Object.freeze({
	decimalSeparator: ".",
	groupSeparator: "",
});

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Turn a POSIX locale name (`de_DE.UTF-8`, `sr_RS@latin`) into a BCP 47
 * language tag. BCP 47 tags pass through unchanged.
 *
 * @param locale - Locale identifier as given on the command line
 * @returns Language tag, or `undefined` for the C/POSIX locale
 */
export function toLanguageTag(locale: string): string | undefined {
	const base = locale.trim().split(/[.@]/)[0] ?? "";
	if (base === "C" || base === "POSIX") return undefined;
	return base.replaceAll("_", "-");
}

/**
 * Resolve the decimal and grouping separators of a locale.
 *
 * @param locale - POSIX locale name or BCP 47 tag
 * @throws ConfigurationError if the identifier is not a valid locale
 */
export function resolveNumberFormat(locale: string): NumberFormat {
	const tag = toLanguageTag(locale);
	if (tag === undefined) return { ...POSIX_NUMBER_FORMAT };

	let canonical: string;
	try {
		const [first] = Intl.getCanonicalLocales(tag);
		if (first === undefined) throw new RangeError("empty locale");
		canonical = first;
	} catch (err) {
		throw new ConfigurationError(`Invalid locale "${locale}"`, {
			cause: err,
		});
	}

	const parts = new Intl.NumberFormat(canonical, {
		useGrouping: true,
	}).formatToParts(1234567.5);

	return {
		decimalSeparator:
			parts.find((p) => p.type === "decimal")?.value ??
			POSIX_NUMBER_FORMAT.decimalSeparator,
		groupSeparator: parts.find((p) => p.type === "group")?.value ?? "",
	};
}

/**
 * Apply explicit separators on top of a resolved format.
 *
 * @throws ConfigurationError if the decimal separator is not a single
 * character or both separators are equal
 */
export function withSeparators(
	format: NumberFormat,
	overrides: SeparatorOverrides,
): NumberFormat {
	const result: NumberFormat = {
		decimalSeparator: overrides.decimalSeparator ?? format.decimalSeparator,
		groupSeparator: overrides.groupSeparator ?? format.groupSeparator,
	};

	if (result.decimalSeparator.length !== 1) {
		throw new ConfigurationError(
			`Decimal separator must be a single character, got "${result.decimalSeparator}"`,
		);
	}
	if (result.groupSeparator === result.decimalSeparator) {
		throw new ConfigurationError(
			`Decimal and group separator must differ, both are "${result.decimalSeparator}"`,
		);
	}
	return result;
}

/**
 * Parse a number written in the given format.
 *
 * Surrounding whitespace is ignored and grouping separators are dropped
 * wherever they occur. When the grouping separator is a space character,
 * any whitespace inside the number counts as grouping.
 *
 * @param raw - Field text
 * @param format - Separators to apply
 * @returns The parsed value, or `undefined` if `raw` is not a finite number
 *
 * @example
 * parseLocaleNumber("1.234,5", { decimalSeparator: ",", groupSeparator: "." }); // 1234.5
 */
export function parseLocaleNumber(
	raw: string,
	format: NumberFormat,
): number | undefined {
	let text = raw.trim().replace(/^−/, "-");

	const group = format.groupSeparator;
	if (group !== "") {
		text = /^\s$/.test(group)
			? text.replace(/\s/g, "")
			: text.replaceAll(group, "");
	}
	if (format.decimalSeparator !== ".") {
		text = text.replace(format.decimalSeparator, ".");
	}

	if (!NUMBER_PATTERN.test(text)) return undefined;
	const value = Number(text);
	return Number.isFinite(value) ? value : undefined;
}
