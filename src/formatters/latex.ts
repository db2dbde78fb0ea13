/**
 * LaTeX markup for rendered tables.
 *
 * Cells are written verbatim; escaping LaTeX special characters is left to
 * whoever writes the CSV.
 *
 * Output layout:
 *   \begin{table}[H]
 *       \centering
 *       \begin{tabular}{|l|l|}
 *           \hline
 *           A & B \\
 *           \hline
 *           1200 & hello \\
 *           \hline
 *       \end{tabular}
 *       \caption{data}
 *       \label{table:data.csv}
 *   \end{table}
 */

const INDENT = "    ";
const HLINE = "\\hline";

export interface LatexTableParts {
	/** Column alignment, e.g. `|l|l|` */
	alignment: string;
	/** Header cells */
	header: string[];
	/** Data rows (each row is an array of cell strings) */
	rows: string[][];
	caption: string;
	label: string;
	/** Outer rules above the header and below the last row */
	border: boolean;
	/** Rule after the header row */
	headerHline: boolean;
	/** Rule after every data row */
	rowHline: boolean;
}

/**
 * Alignment string for `count` left-aligned columns.
 *
 * @param count - Number of rendered columns
 * @param border - Put a vertical rule before every column and after the last
 * @returns e.g. `|l|l|l|` or `lll`
 */
export function buildAlignment(count: number, border: boolean): string {
	return border ? `${"|l".repeat(count)}|` : "l".repeat(count);
}

/**
 * One tabular row, terminated by the row-end marker.
 */
export function buildRow(cells: string[]): string {
	return `${cells.join(" & ")} \\\\`;
}

/**
 * Assemble the body lines of a tabular environment: header, rules and data
 * rows. When every row already ends in a rule, no second closing rule is
 * added.
 */
export function buildTabularBody(parts: LatexTableParts): string[] {
	const lines: string[] = [];

	if (parts.border) lines.push(HLINE);
	lines.push(buildRow(parts.header));
	if (parts.headerHline) lines.push(HLINE);

	for (const row of parts.rows) {
		lines.push(buildRow(row));
		if (parts.rowHline) lines.push(HLINE);
	}

	const endsWithRule = parts.rowHline && parts.rows.length > 0;
	if (parts.border && !endsWithRule) lines.push(HLINE);

	return lines;
}

/**
 * Wrap a tabular body in a floating `table` environment.
 *
 * @param parts - Alignment, cells, caption and rule options
 * @returns The complete fragment, ending with a newline
 */
export function buildLatexTable(parts: LatexTableParts): string {
	const body = buildTabularBody(parts).map((line) => `${INDENT}${INDENT}${line}`);

	return [
		"\\begin{table}[H]",
		`${INDENT}\\centering`,
		`${INDENT}\\begin{tabular}{${parts.alignment}}`,
		...body,
		`${INDENT}\\end{tabular}`,
		`${INDENT}\\caption{${parts.caption}}`,
		`${INDENT}\\label{${parts.label}}`,
		"\\end{table}",
		"",
	].join("\n");
}
