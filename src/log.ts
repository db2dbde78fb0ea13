/**
 * Diagnostics go to stderr so that fragments printed to stdout stay clean.
 */

export interface Logger {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export interface LogStream {
	write(chunk: string): unknown;
}

/**
 * Create a logger writing one line per message.
 *
 * @param stream - Destination (default: process.stderr)
 * @param verbose - Emit info lines; warnings and errors are always written
 */
export function createLogger(
	stream: LogStream = process.stderr,
	verbose = false,
): Logger {
	return {
		info(message) {
			if (verbose) stream.write(`${message}\n`);
		},
		warn(message) {
			stream.write(`Warning: ${message}\n`);
		},
		error(message) {
			stream.write(`Error: ${message}\n`);
		},
	};
}

/** Logger that drops everything */
export const silentLogger: Logger = {
	info() {},
	warn() {},
	error() {},
};
