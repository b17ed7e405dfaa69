export interface Logger {
	error(message: string): void
	trace(message: string): void
	warn(message: string): void
}

/** Diagnostics go to `write` (stderr in the CLI), one prefixed line each. */
export function createLogger(
	write: (line: string) => void,
	prefix = 'axml-decode',
	verbose = false
): Logger {
	return {
		error: message => write(`${prefix}: ${message}`),
		warn: message => write(`${prefix}: warning: ${message}`),
		trace: message => {
			if (verbose) write(message)
		}
	}
}
