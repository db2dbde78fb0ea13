/**
 * YAML formatter for table descriptions.
 *
 * Used by `--describe` to show the model the loader built from a conversion
 * description. Uses js-yaml for serialization.
 */

import yaml from "js-yaml";
import { colCount, type TableDescription } from "../definition/table.js";

/**
 * Serialize a plain object as a YAML document.
 *
 * @param data - Object to serialize
 * @returns YAML string
 */
export function toYaml(data: Record<string, unknown>): string {
	return yaml.dump(data, {
		indent: 2,
		lineWidth: 120,
		noRefs: true,
		sortKeys: false,
	});
}

/**
 * Plain-object view of a table description, keyed the way the description
 * file spells its options.
 */
function describeTable(table: TableDescription): Record<string, unknown> {
	return {
		path: table.path,
		border: table.border,
		header_hline: table.headerHline,
		row_hline: table.rowHline,
		col_count: colCount(table),
		columns: table.columnDescriptions.map((c) => ({
			label: c.label,
			numerical: c.numerical,
			significant_digits: c.significantDigits,
			convert: c.convert,
			render: c.render,
		})),
	};
}

/**
 * Render table descriptions as one YAML document.
 *
 * @param tables - Descriptions in processing order
 * @returns YAML with a `tables` list
 */
export function describeTables(tables: readonly TableDescription[]): string {
	return toYaml({ tables: tables.map(describeTable) });
}
