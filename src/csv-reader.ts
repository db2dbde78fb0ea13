/**
 * CSV ingestion for the table renderer.
 *
 * The whole file is read and decoded up front; tables are expected to be
 * small and local.
 */

import * as fs from "node:fs/promises";
import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { TextDecoder } from "node:util";
import { errorMessage, IoError, StructuralError } from "./errors.js";

export interface CsvReadOptions {
	/** WHATWG encoding label, e.g. "utf-8", "latin1", "windows-1252" */
	encoding: string;
	/** Field delimiter */
	delimiter: string;
	/** Quote character */
	quoteChar: string;
	/** Drop the first record */
	skipHeader: boolean;
}

export const DEFAULT_CSV_OPTIONS: CsvReadOptions = Object.freeze({
	encoding: "utf-8",
	delimiter: ";",
	quoteChar: '"',
	skipHeader: false,
});

/**
 * Decode raw file bytes with the given encoding. Invalid byte sequences are
 * an error rather than being replaced.
 */
function decode(bytes: Uint8Array, encoding: string, filePath: string): string {
	let decoder: TextDecoder;
	try {
		decoder = new TextDecoder(encoding, { fatal: true });
	} catch (err) {
		throw new IoError(`Unsupported encoding "${encoding}"`, filePath, {
			cause: err,
		});
	}

	try {
		return decoder.decode(bytes);
	} catch (err) {
		throw new IoError(
			`Cannot decode ${filePath} as ${decoder.encoding}: ${errorMessage(err)}`,
			filePath,
			{ cause: err },
		);
	}
}

/**
 * Fields of each parsed record. A line with no characters at all becomes an
 * empty record, unlike a line holding one empty quoted field.
 */
function toRecords(parsed: unknown): string[][] {
	if (!Array.isArray(parsed)) return [];
	return parsed.map((entry: unknown) => {
		if (
			typeof entry !== "object" ||
			entry === null ||
			!("record" in entry) ||
			!Array.isArray(entry.record)
		) {
			return [];
		}
		if ("raw" in entry && typeof entry.raw === "string") {
			if (entry.raw.replace(/[\r\n]/g, "") === "") return [];
		}
		return entry.record.map((field: unknown) => String(field));
	});
}

/**
 * Split decoded CSV text into records.
 *
 * @param content - CSV text
 * @param options - Delimiter and quote character
 * @param filePath - Source path, for error messages
 * @returns Records as arrays of raw field strings; a blank line is an empty
 * record, a blank line at the end of the text is no record
 * @throws StructuralError if the text is not well-formed CSV
 */
export function parseCsvRecords(
	content: string,
	options: Pick<CsvReadOptions, "delimiter" | "quoteChar">,
	filePath: string,
): string[][] {
	try {
		const parsed: unknown = parse(content, {
			delimiter: options.delimiter,
			quote: options.quoteChar,
			relax_column_count: true,
			relax_quotes: true,
			raw: true,
		});
		return toRecords(parsed);
	} catch (err) {
		if (err instanceof CsvError) {
			const line = typeof err["lines"] === "number" ? err["lines"] : undefined;
			throw new StructuralError(
				`Malformed CSV in ${filePath}${line !== undefined ? ` at line ${line}` : ""}: ${err.message}`,
				filePath,
				undefined,
				undefined,
				{ cause: err },
			);
		}
		throw err;
	}
}

/**
 * Read all records of a CSV file.
 *
 * @param filePath - Path of the CSV file
 * @param options - Decoding and parsing options
 * @returns Data records, without the header record when `skipHeader` is set
 * @throws IoError if the file cannot be read or decoded
 * @throws StructuralError if the file is not well-formed CSV
 */
export async function readCsvRecords(
	filePath: string,
	options: CsvReadOptions,
): Promise<string[][]> {
	let bytes: Uint8Array;
	try {
		bytes = await fs.readFile(filePath);
	} catch (err) {
		throw new IoError(
			`Cannot read CSV file ${filePath}: ${errorMessage(err)}`,
			filePath,
			{ cause: err },
		);
	}

	const content = decode(bytes, options.encoding, filePath);
	const records = parseCsvRecords(content, options, filePath);
	return options.skipHeader ? records.slice(1) : records;
}
