/**
 * Error types raised by the conversion pipeline.
 *
 * Every error is fatal to the run; the CLI is the only place that catches
 * them and turns them into an exit status.
 */

export class CsvTexError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "CsvTexError";
	}
}

/**
 * Missing or malformed keys in the conversion description, or invalid
 * decimal-format settings.
 */
export class ConfigurationError extends CsvTexError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

/**
 * A description, CSV or output file could not be read, decoded or written.
 */
export class IoError extends CsvTexError {
	constructor(
		message: string,
		public readonly filePath: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "IoError";
	}
}

/**
 * A CSV record is shorter than the table's column list, or the CSV itself
 * is malformed.
 */
export class StructuralError extends CsvTexError {
	constructor(
		message: string,
		public readonly filePath: string,
		public readonly rowIndex: number | undefined,
		public readonly columnIndex: number | undefined,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "StructuralError";
	}
}

/**
 * A field of a numerical column cannot be parsed with the active decimal
 * format.
 */
export class ConversionError extends CsvTexError {
	constructor(
		message: string,
		public readonly rawValue: string,
		public readonly filePath: string,
		public readonly rowIndex: number,
		public readonly columnIndex: number,
	) {
		super(message);
		this.name = "ConversionError";
	}
}

/** Bad command line */
export class CliUsageError extends CsvTexError {
	constructor(message: string) {
		super(message);
		this.name = "CliUsageError";
	}
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
