/**
 * Error Types
 *
 * Failed law or arithmetic checks are reported as text, never thrown. These
 * classes cover invalid input to the program itself; the CLI turns them into
 * an error message and an exit code.
 */

/**
 * Process exit code
 */
export type ExitCode = 0 | 1;

export const ExitSuccess: ExitCode = 0;
export const ExitFailure: ExitCode = 1;

/**
 * Base class for errors the CLI reports instead of crashing on.
 */
export class MonadplayError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitFailure,
  ) {
    super(message);
    this.name = "MonadplayError";
  }
}

/**
 * Thrown when a configuration value is missing its expected shape.
 */
export class ConfigError extends MonadplayError {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Thrown for unknown command-line options or malformed option values.
 */
export class UsageError extends MonadplayError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
