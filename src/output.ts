/**
 * Output writer for rendered fragments.
 *
 * A table listed as `sub/results.csv` under `tables` is written to
 * `<outDir>/sub/results.tex`, whatever the `workdir`.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { TableDescription } from "./definition/table.js";
import { ConfigurationError, errorMessage, IoError } from "./errors.js";

/**
 * Path of the `.tex` file for a table.
 *
 * @param outDir - Output directory
 * @param table - Rendered table
 * @returns `outDir` joined with the table's file name, extension replaced
 * by `.tex`
 * @throws ConfigurationError if the result would land outside `outDir`
 */
export function outputPathFor(outDir: string, table: TableDescription): string {
	const name = table.fileName;
	const texName = `${name.slice(0, name.length - path.extname(name).length)}.tex`;

	const root = path.resolve(outDir);
	const target = path.resolve(root, texName);
	const relative = path.relative(root, target);
	if (
		path.isAbsolute(texName) ||
		relative === "" ||
		relative === ".." ||
		relative.startsWith(`..${path.sep}`) ||
		path.isAbsolute(relative)
	) {
		throw new ConfigurationError(
			`Output for "${name}" would be written outside ${outDir}`,
		);
	}

	return path.join(outDir, texName);
}

/**
 * Write a fragment to a file, creating parent directories.
 *
 * @throws IoError if the file cannot be written
 */
export async function writeFragment(
	outPath: string,
	fragment: string,
): Promise<void> {
	try {
		await fs.mkdir(path.dirname(outPath), { recursive: true });
		await fs.writeFile(outPath, fragment, "utf8");
	} catch (err) {
		throw new IoError(
			`Cannot write ${outPath}: ${errorMessage(err)}`,
			outPath,
			{ cause: err },
		);
	}
}
