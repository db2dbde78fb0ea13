/**
 * Table renderer: one table description plus its CSV in, one LaTeX table
 * fragment out.
 */

import { type CsvReadOptions, readCsvRecords } from "./csv-reader.js";
import type { ColumnDescription } from "./definition/column.js";
import {
	renderedColumns,
	type TableDescription,
	tableCaption,
	tableLabel,
} from "./definition/table.js";
import { ConversionError, StructuralError } from "./errors.js";
import { buildAlignment, buildLatexTable } from "./formatters/latex.js";
import { formatRounded, roundSignificant } from "./math/significant.js";
import { type NumberFormat, parseLocaleNumber } from "./number-format.js";

export interface RenderOptions extends CsvReadOptions {
	/** Separators used to parse numerical fields */
	numberFormat: NumberFormat;
}

/**
 * Convert one field according to its column. Numerical fields are parsed and
 * rounded; an empty numerical field is zero.
 *
 * @throws ConversionError if a numerical field cannot be parsed
 */
export function convertCell(
	raw: string,
	column: ColumnDescription,
	numberFormat: NumberFormat,
	position: { filePath: string; rowIndex: number; columnIndex: number },
): string {
	if (!column.numerical) return raw;
	if (raw === "") return formatRounded(0);

	const value = parseLocaleNumber(raw, numberFormat);
	if (value === undefined) {
		throw new ConversionError(
			`Cannot convert "${raw}" to a number in column ${position.columnIndex} on line ${position.rowIndex} in file ${position.filePath}`,
			raw,
			position.filePath,
			position.rowIndex,
			position.columnIndex,
		);
	}
	return formatRounded(roundSignificant(value, column.significantDigits));
}

/**
 * Render the cells of one CSV record. Every declared column must have a
 * field, rendered or not.
 *
 * @throws StructuralError if the record is shorter than the column list
 * @throws ConversionError if a numerical field cannot be parsed
 */
export function renderRecord(
	record: readonly string[],
	rowIndex: number,
	table: TableDescription,
	numberFormat: NumberFormat,
): string[] {
	const cells: string[] = [];

	table.columnDescriptions.forEach((column, columnIndex) => {
		const raw = record[columnIndex];
		if (raw === undefined) {
			throw new StructuralError(
				`Column Nr. ${columnIndex} doesn't exist on line ${rowIndex} in file ${table.path}`,
				table.path,
				rowIndex,
				columnIndex,
			);
		}
		if (!column.render) return;

		cells.push(
			convertCell(raw, column, numberFormat, {
				filePath: table.path,
				rowIndex,
				columnIndex,
			}),
		);
	});

	return cells;
}

/**
 * Render already-read CSV records as a LaTeX table fragment.
 */
export function renderRecords(
	table: TableDescription,
	records: readonly (readonly string[])[],
	numberFormat: NumberFormat,
): string {
	const columns = renderedColumns(table);
	const rows = records.map((record, rowIndex) =>
		renderRecord(record, rowIndex, table, numberFormat),
	);

	return buildLatexTable({
		alignment: buildAlignment(columns.length, table.border),
		header: columns.map((c) => c.label),
		rows,
		caption: tableCaption(table),
		label: tableLabel(table),
		border: table.border,
		headerHline: table.headerHline,
		rowHline: table.rowHline,
	});
}

/**
 * Read the table's CSV and render it as a LaTeX table fragment.
 *
 * @param table - Table to render
 * @param options - CSV parsing options and decimal format
 * @returns The fragment; nothing is written
 * @throws IoError if the CSV cannot be read or decoded
 * @throws StructuralError on malformed CSV or short records
 * @throws ConversionError if a numerical field cannot be parsed
 */
export async function renderTable(
	table: TableDescription,
	options: RenderOptions,
): Promise<string> {
	const records = await readCsvRecords(table.path, options);
	return renderRecords(table, records, options.numberFormat);
}
