/**
 * Configuration loader: turns a YAML conversion description into table
 * descriptions.
 *
 * Description format:
 *   workdir: ./data
 *   tables:
 *     - results_2024.csv:
 *         row_hline: true
 *         columns:
 *           - label: Sample
 *             numerical: false
 *           - label: Mass (g)
 *             significant_digits: 4
 *     - summary.csv:
 *         columns: [...]
 */

import * as fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { createColumnDescription } from "./definition/column.js";
import {
	createTableDescription,
	type TableDescription,
} from "./definition/table.js";
import { ConfigurationError, errorMessage, IoError } from "./errors.js";
import { type Logger, silentLogger } from "./log.js";

/**
 * Header text. An unquoted numeric label is read as a YAML number and shown
 * in its shortest form (`1.50` becomes `1.5`, `1e3` becomes `1000`); quote
 * it to keep the text as written.
 */
const LabelSchema = z
	.union([z.string(), z.number()])
	.transform((value) => String(value));

/** Recognized column options; any other key is rejected */
export const ColumnOptionsSchema = z
	.object({
		label: LabelSchema.optional(),
		numerical: z.boolean().optional(),
		significant_digits: z.number().int().positive().optional(),
		convert: z.boolean().optional(),
		render: z.boolean().optional(),
	})
	.strict();

/** Options of one table entry */
export const TableOptionsSchema = z
	.object({
		columns: z.array(ColumnOptionsSchema),
		border: z.boolean().optional(),
		header_hline: z.boolean().optional(),
		row_hline: z.boolean().optional(),
	})
	.strict();

export const ConversionDescriptionSchema = z.object({
	workdir: z.string(),
	tables: z.array(z.record(z.string(), z.unknown())),
});

function formatIssue(issue: z.ZodIssue): string {
	const where = issue.path.join(".");
	if (
		issue.code === z.ZodIssueCode.invalid_type &&
		issue.received === z.ZodParsedType.undefined
	) {
		return `missing required key "${where}"`;
	}
	return where ? `${where}: ${issue.message}` : issue.message;
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map(formatIssue).join("; ");
}

/**
 * Build the table description for one `tables` entry.
 */
function parseTableEntry(
	workdir: string,
	entry: Record<string, unknown>,
	index: number,
): TableDescription {
	const entries = Object.entries(entry);
	const [first] = entries;
	if (entries.length !== 1 || first === undefined) {
		throw new ConfigurationError(
			`Table entry ${index} must map exactly one file name to its options, found ${entries.length} keys`,
		);
	}

	const [fileName, rawOptions] = first;
	if (fileName.trim() === "") {
		throw new ConfigurationError(`Table entry ${index} has an empty file name`);
	}

	const parsed = TableOptionsSchema.safeParse(rawOptions);
	if (!parsed.success) {
		throw new ConfigurationError(
			`Invalid table "${fileName}": ${formatIssues(parsed.error)}`,
		);
	}

	const options = parsed.data;
	const columns = options.columns.map((column) =>
		createColumnDescription({
			label: column.label,
			numerical: column.numerical,
			significantDigits: column.significant_digits,
			convert: column.convert,
			render: column.render,
		}),
	);

	return createTableDescription(workdir, fileName, columns, {
		border: options.border,
		headerHline: options.header_hline,
		rowHline: options.row_hline,
	});
}

/**
 * Build table descriptions from an already-parsed description document.
 *
 * @param document - Parsed YAML (or equivalent) mapping
 * @param logger - Receives one info line per table
 * @returns Table descriptions in the order they are listed
 * @throws ConfigurationError if the document does not have the expected shape
 */
export function parseConversionDescription(
	document: unknown,
	logger: Logger = silentLogger,
): TableDescription[] {
	const result = ConversionDescriptionSchema.safeParse(document);
	if (!result.success) {
		throw new ConfigurationError(
			`Invalid conversion description: ${formatIssues(result.error)}`,
		);
	}

	const { workdir, tables } = result.data;
	const descriptions: TableDescription[] = [];
	tables.forEach((entry, index) => {
		const table = parseTableEntry(workdir, entry, index);
		logger.info(`[Parsing table] => ${table.fileName}`);
		descriptions.push(table);
	});
	return descriptions;
}

/**
 * Read and parse a YAML conversion description file.
 *
 * @param filePath - Path of the description file
 * @param logger - Receives one info line per table
 * @throws IoError if the file cannot be read
 * @throws ConfigurationError if it is not valid YAML or has the wrong shape
 */
export async function loadConversionDescription(
	filePath: string,
	logger: Logger = silentLogger,
): Promise<TableDescription[]> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err) {
		throw new IoError(
			`Cannot read conversion description ${filePath}: ${errorMessage(err)}`,
			filePath,
			{ cause: err },
		);
	}

	let document: unknown;
	try {
		document = yaml.load(content, { filename: filePath });
	} catch (err) {
		throw new ConfigurationError(
			`Invalid YAML in ${filePath}: ${errorMessage(err)}`,
			{ cause: err },
		);
	}

	return parseConversionDescription(document, logger);
}
