/**
 * Console-backed diagnostics for the CLI.
 *
 * Command results go to stdout with console.log; everything here goes to
 * stderr so `--json` output stays parseable.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Suppress info and warnings */
  quiet?: boolean;
  /** Show debug lines */
  verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (options.verbose && !options.quiet) console.error(`debug: ${message}`);
    },
    info(message) {
      if (!options.quiet) console.error(message);
    },
    warn(message) {
      if (!options.quiet) console.error(`Warning: ${message}`);
    },
    error(message) {
      console.error(`Error: ${message}`);
    },
  };
}
