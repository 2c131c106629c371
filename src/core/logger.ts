/**
 * Tagged console logging.
 *
 * Every line is prefixed with `[monadplay]`; debug lines are only written in
 * verbose mode.
 */

export interface Logger {
  readonly info: (message: string) => void;
  readonly debug: (message: string) => void;
  readonly error: (message: string) => void;
}

export interface LoggerOptions {
  readonly verbose: boolean;
  readonly tag?: string;
  /** Writer for info and debug lines (default: console.log) */
  readonly out?: (line: string) => void;
  /** Writer for error lines (default: console.error) */
  readonly err?: (line: string) => void;
}

export function createLogger(options: LoggerOptions): Logger {
  const tag = options.tag ?? "monadplay";
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  return {
    info: (message) => out(`[${tag}] ${message}`),
    debug: (message) => {
      if (options.verbose) out(`[${tag}] ${message}`);
    },
    error: (message) => err(`[${tag}] ${message}`),
  };
}
