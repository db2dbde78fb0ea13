/**
 * Conversion pipeline: description file → table descriptions → fragments.
 *
 * Tables are processed one after another, in the order they are listed; the
 * first failure aborts the run before any later table is read.
 */

import { loadConversionDescription } from "./config-loader.js";
import { renderedColumns } from "./definition/table.js";
import { type Logger, type LogStream, silentLogger } from "./log.js";
import { outputPathFor, writeFragment } from "./output.js";
import { type RenderOptions, renderTable } from "./renderer.js";

export interface ConversionOptions extends RenderOptions {
	/** Output directory; fragments are printed when absent */
	outDir?: string | undefined;
}

export interface ConversionSummary {
	/** Number of tables rendered */
	tableCount: number;
	/** Files written, in table order; empty when printing */
	written: string[];
}

/**
 * Render every table of a conversion description.
 *
 * @param descriptionPath - Path of the YAML conversion description
 * @param options - CSV, decimal-format and output options
 * @param stdout - Receives the fragments when no output directory is set
 * @param logger - Progress and warnings
 * @returns What was rendered and written
 */
export async function convertDescription(
	descriptionPath: string,
	options: ConversionOptions,
	stdout: LogStream,
	logger: Logger = silentLogger,
): Promise<ConversionSummary> {
	const tables = await loadConversionDescription(descriptionPath, logger);
	const written: string[] = [];

	for (const table of tables) {
		if (renderedColumns(table).length === 0) {
			logger.warn(`Table "${table.fileName}" has no rendered columns`);
		}

		const fragment = await renderTable(table, options);

		if (options.outDir === undefined) {
			stdout.write(`${fragment}\n`);
			continue;
		}

		const outPath = outputPathFor(options.outDir, table);
		logger.info(`Writing to: ${outPath}`);
		await writeFragment(outPath, fragment);
		written.push(outPath);
	}

	return { tableCount: tables.length, written };
}
