/**
 * Error types for CLI commands
 */

/**
 * Base error class for failures a command reports and exits on.
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
    Object.setPrototypeOf(this, CliError.prototype);
  }
}

/**
 * Error thrown when a log file can't be read.
 */
export class LogFileNotFoundError extends CliError {
  readonly path: string;

  constructor(path: string, reason = "no such file") {
    super(`cannot read log ${path}: ${reason}`);
    this.name = "LogFileNotFoundError";
    this.path = path;
    Object.setPrototypeOf(this, LogFileNotFoundError.prototype);
  }
}

/**
 * Error thrown when the update script exits with a non-zero code.
 */
export class UpdaterFailedError extends CliError {
  readonly exitCode: number;
  readonly stderr: readonly string[];

  constructor(script: string, exitCode: number, stderr: readonly string[]) {
    const details =
      stderr.length > 0 ? `\nStandard error output:\n${stderr.join("\n")}` : "";
    super(`${script} exited with error code ${exitCode}${details}`);
    this.name = "UpdaterFailedError";
    this.exitCode = exitCode;
    this.stderr = stderr;
    Object.setPrototypeOf(this, UpdaterFailedError.prototype);
  }
}

/**
 * Error thrown when a config value is rejected.
 */
export class ConfigError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
