/**
 * Command-line front end.
 *
 * Options are read from:
 * 1. CLI arguments
 * 2. Environment variables (CSVTEX_ENCODING, CSVTEX_LOCALE)
 * 3. Built-in defaults
 */

import { loadConversionDescription } from "./config-loader.js";
import { convertDescription } from "./convert.js";
import { DEFAULT_CSV_OPTIONS } from "./csv-reader.js";
import { CliUsageError, ConversionError, errorMessage } from "./errors.js";
import { describeTables } from "./formatters/yaml-formatter.js";
import { createLogger, type LogStream } from "./log.js";
import { resolveNumberFormat, withSeparators } from "./number-format.js";

export const DEFAULT_LOCALE = "de_DE.UTF-8";

export const USAGE = `Usage: csvtex <file> [outpath] [options]

Generate LaTeX tables from CSV files described in a YAML file.

Arguments:
  file                        Path to the conversion description
  outpath                     Output directory; fragments are printed when omitted

Options:
  --encoding <name>           CSV encoding (default: utf-8)
  --delimiter <char>          CSV delimiter (default: ;)
  --quote-char <char>         CSV quote character (default: ")
  --skip-header               Skip the first record of every CSV file
  --locale <name>             Locale for numerical fields (default: ${DEFAULT_LOCALE})
  --decimal-separator <char>  Override the locale's decimal separator
  --group-separator <char>    Override the locale's grouping separator
  --describe                  Print the parsed table descriptions and exit
  --verbose                   Log progress to stderr
  -h, --help                  Show this help
`;

export interface CliOptions {
	file: string;
	outDir: string | undefined;
	encoding: string;
	delimiter: string;
	quoteChar: string;
	skipHeader: boolean;
	locale: string;
	decimalSeparator: string | undefined;
	groupSeparator: string | undefined;
	describe: boolean;
	verbose: boolean;
}

export type ParsedCommandLine =
	| { kind: "help" }
	| { kind: "run"; options: CliOptions };

export type Environment = Record<string, string | undefined>;

const VALUE_OPTIONS = [
	"--encoding",
	"--delimiter",
	"--quote-char",
	"--locale",
	"--decimal-separator",
	"--group-separator",
] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
	return VALUE_OPTIONS.some((option) => option === name);
}

function requireSingleChar(option: string, value: string): string {
	if (value.length !== 1) {
		throw new CliUsageError(
			`${option} must be a single character, got "${value}"`,
		);
	}
	return value;
}

/**
 * Parse command-line arguments.
 *
 * @param args - Arguments after the program name
 * @param env - Environment used for fallbacks (default: process.env)
 * @returns Help request or resolved options
 * @throws CliUsageError on unknown options, missing values or a missing file
 */
export function parseCliArgs(
	args: readonly string[],
	env: Environment = process.env,
): ParsedCommandLine {
	const values = new Map<ValueOption, string>();
	const positionals: string[] = [];
	let skipHeader = false;
	let describe = false;
	let verbose = false;
	let optionsEnded = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) continue;

		if (optionsEnded || !arg.startsWith("-") || arg === "-") {
			positionals.push(arg);
			continue;
		}

		if (arg === "--") {
			optionsEnded = true;
		} else if (arg === "-h" || arg === "--help") {
			return { kind: "help" };
		} else if (arg === "--skip-header") {
			skipHeader = true;
		} else if (arg === "--describe") {
			describe = true;
		} else if (arg === "--verbose") {
			verbose = true;
		} else {
			const eq = arg.indexOf("=");
			const name = eq >= 0 ? arg.slice(0, eq) : arg;
			if (!isValueOption(name)) {
				throw new CliUsageError(`Unknown option ${name}`);
			}

			if (eq >= 0) {
				values.set(name, arg.slice(eq + 1));
			} else {
				const value = args[i + 1];
				if (value === undefined) {
					throw new CliUsageError(`Missing value for ${name}`);
				}
				values.set(name, value);
				i++;
			}
		}
	}

	const [file, outDir, ...extra] = positionals;
	if (file === undefined) {
		throw new CliUsageError("Missing conversion description file");
	}
	if (extra.length > 0) {
		throw new CliUsageError(`Unexpected argument ${extra[0]}`);
	}

	const delimiter = requireSingleChar(
		"--delimiter",
		values.get("--delimiter") ?? DEFAULT_CSV_OPTIONS.delimiter,
	);
	const quoteChar = requireSingleChar(
		"--quote-char",
		values.get("--quote-char") ?? DEFAULT_CSV_OPTIONS.quoteChar,
	);
	if (delimiter === quoteChar) {
		throw new CliUsageError(
			`Delimiter and quote character must differ, both are "${delimiter}"`,
		);
	}

	return {
		kind: "run",
		options: {
			file,
			outDir,
			encoding:
				values.get("--encoding") ??
				env["CSVTEX_ENCODING"] ??
				DEFAULT_CSV_OPTIONS.encoding,
			delimiter,
			quoteChar,
			skipHeader,
			locale: values.get("--locale") ?? env["CSVTEX_LOCALE"] ?? DEFAULT_LOCALE,
			decimalSeparator: values.get("--decimal-separator"),
			groupSeparator: values.get("--group-separator"),
			describe,
			verbose,
		},
	};
}

export interface CliIo {
	stdout: LogStream;
	stderr: LogStream;
	env: Environment;
}

/**
 * Run the command line to completion.
 *
 * @param args - Arguments after the program name
 * @param io - Output streams and environment
 * @returns Process exit code: 0 on success, 1 on a conversion failure,
 * 2 on a usage error
 */
export async function runCli(
	args: readonly string[],
	io: CliIo = {
		stdout: process.stdout,
		stderr: process.stderr,
		env: process.env,
	},
): Promise<number> {
	let parsed: ParsedCommandLine;
	try {
		parsed = parseCliArgs(args, io.env);
	} catch (err) {
		if (!(err instanceof CliUsageError)) throw err;
		io.stderr.write(`Error: ${err.message}\n\n${USAGE}`);
		return 2;
	}

	if (parsed.kind === "help") {
		io.stdout.write(USAGE);
		return 0;
	}

	const { options } = parsed;
	const logger = createLogger(io.stderr, options.verbose);

	try {
		if (options.describe) {
			const tables = await loadConversionDescription(options.file, logger);
			io.stdout.write(describeTables(tables));
			return 0;
		}

		const numberFormat = withSeparators(resolveNumberFormat(options.locale), {
			decimalSeparator: options.decimalSeparator,
			groupSeparator: options.groupSeparator,
		});

		await convertDescription(
			options.file,
			{
				encoding: options.encoding,
				delimiter: options.delimiter,
				quoteChar: options.quoteChar,
				skipHeader: options.skipHeader,
				numberFormat,
				outDir: options.outDir,
			},
			io.stdout,
			logger,
		);
		return 0;
	} catch (err) {
		if (err instanceof ConversionError) {
			io.stderr.write(`Offending value: ${err.rawValue}\n`);
		}
		logger.error(errorMessage(err));
		return 1;
	}
}
