import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach } from "vitest";
import type { LogStream } from "../../src/log.js";
import type { NumberFormat } from "../../src/number-format.js";
import type { RenderOptions } from "../../src/renderer.js";

export const EN_FORMAT: NumberFormat = {
	decimalSeparator: ".",
	groupSeparator: ",",
};

export const DE_FORMAT: NumberFormat = {
	decimalSeparator: ",",
	groupSeparator: ".",
};

/**
 * Render options matching the CLI defaults, with `.` as decimal separator.
 */
export function renderOptions(
	overrides: Partial<RenderOptions> = {},
): RenderOptions {
	return {
		encoding: "utf-8",
		delimiter: ";",
		quoteChar: '"',
		skipHeader: false,
		numberFormat: EN_FORMAT,
		...overrides,
	};
}

const tempDirs: string[] = [];

afterEach(async () => {
	const dirs = tempDirs.splice(0);
	await Promise.all(
		dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })),
	);
});

/**
 * Create a temporary directory, removed again after the current test.
 */
export async function makeTempDir(): Promise<string> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "csvtex-"));
	tempDirs.push(dir);
	return dir;
}

/**
 * Write files below `dir`, creating sub-directories as needed.
 */
export async function writeFiles(
	dir: string,
	files: Record<string, string | Uint8Array>,
): Promise<void> {
	for (const [name, content] of Object.entries(files)) {
		const filePath = path.join(dir, name);
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, content);
	}
}

/**
 * In-memory stream collecting everything written to it.
 */
export function captureStream(): LogStream & { text(): string } {
	const chunks: string[] = [];
	return {
		write(chunk: string) {
			chunks.push(chunk);
			return true;
		},
		text() {
			return chunks.join("");
		},
	};
}
