/**
 * Console reporting for CLI commands.
 *
 * Command results go to stdout; diagnostics go to stderr so that piped output
 * stays machine-readable.
 */

/** The subset of `Console` the CLI writes through. */
export interface OutputConsole {
  log(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export interface ReporterOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

export interface Reporter {
  /** Command result on stdout, always shown. */
  readonly print: (this: void, message: string) => void;
  /** Informational line on stderr, hidden by `--quiet`. */
  readonly info: (this: void, message: string) => void;
  /** Extra detail on stderr, shown only with `--verbose`. */
  readonly detail: (this: void, message: string) => void;
  readonly warn: (this: void, message: string) => void;
  readonly error: (this: void, message: string) => void;
}

export function createReporter(output: OutputConsole, options: ReporterOptions = {}): Reporter {
  const verbose = options.verbose === true && options.quiet !== true;
  const quiet = options.quiet === true;

  return {
    print: (message) => output.log(message),
    info: (message) => {
      if (!quiet) {
        output.error(message);
      }
    },
    detail: (message) => {
      if (verbose) {
        output.error(message);
      }
    },
    warn: (message) => output.error(`warning: ${message}`),
    error: (message) => output.error(`error: ${message}`),
  };
}
