import * as path from "node:path";
import type { ColumnDescription } from "./column.js";

/**
 * One CSV source plus the rules for its columns and rule lines.
 */
export interface TableDescription {
	/** Path of the CSV file (workdir joined with the file name) */
	readonly path: string;
	/** File name as written in the description, relative to workdir */
	readonly fileName: string;
	/** Full grid: vertical rules around every column plus outer rules @default true */
	readonly border: boolean;
	/** Rule line after the header row @default true */
	readonly headerHline: boolean;
	/** Rule line after every data row @default false */
	readonly rowHline: boolean;
	/** One entry per CSV field position, in field order */
	readonly columnDescriptions: readonly ColumnDescription[];
}

export interface TableOptions {
	border?: boolean | undefined;
	headerHline?: boolean | undefined;
	rowHline?: boolean | undefined;
}

/**
 * Build a table description for `fileName` under `workdir`.
 */
export function createTableDescription(
	workdir: string,
	fileName: string,
	columnDescriptions: readonly ColumnDescription[],
	options: TableOptions = {},
): TableDescription {
	return {
		path: path.join(workdir, fileName),
		fileName,
		border: options.border ?? true,
		headerHline: options.headerHline ?? true,
		rowHline: options.rowHline ?? false,
		columnDescriptions,
	};
}

/** Number of declared columns, rendered or not */
export function colCount(table: TableDescription): number {
	return table.columnDescriptions.length;
}

/** Columns that appear in the output, in field order */
export function renderedColumns(
	table: TableDescription,
): ColumnDescription[] {
	return table.columnDescriptions.filter((c) => c.render);
}

/**
 * Caption text: the file stem with underscores shown as spaces.
 */
export function tableCaption(table: TableDescription): string {
	const base = path.basename(table.path);
	const stem = base.slice(0, base.length - path.extname(base).length);
	return stem.replaceAll("_", " ");
}

/**
 * Anchor for `\label`: the file name with its extension.
 */
export function tableLabel(table: TableDescription): string {
	return `table:${path.basename(table.path)}`;
}
