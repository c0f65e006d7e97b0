/**
 * Update log writer.
 * Writes every updater line to the run's log file in the marker format
 * and echoes it to the terminal.
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { formatLogLine, type LogLevel, logFileName } from "./log-format.js";

/**
 * Receives each formatted line.
 */
export type LogSink = (line: string, level: LogLevel) => void;

/**
 * Echo sink: INFO to stdout, ERROR to stderr.
 */
export const consoleSink: LogSink = (line, level) => {
  if (level === "ERROR") {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Sink appending lines to a file.
 */
export const fileSink =
  (path: string): LogSink =>
  (line) => {
    appendFileSync(path, `${line}\n`);
  };

export class UpdateLog {
  private readonly sinks: readonly LogSink[];
  private readonly clock: () => Date;
  readonly path: string;

  constructor(
    path: string,
    sinks: readonly LogSink[],
    clock: () => Date = () => new Date()
  ) {
    this.path = path;
    this.sinks = sinks;
    this.clock = clock;
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  private write(level: LogLevel, message: string): void {
    const line = formatLogLine(level, message, this.clock());
    for (const sink of this.sinks) {
      sink(line, level);
    }
  }
}

/**
 * Create the log file for a run in logDir and return a writer for it.
 */
export const openUpdateLog = (
  logDir: string,
  options: { readonly echo?: boolean; readonly now?: Date } = {}
): UpdateLog => {
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true, mode: 0o755 });
  }

  const path = join(logDir, logFileName(options.now ?? new Date()));
  // Create the file up front so a silent run still leaves a log
  appendFileSync(path, "");
  const sinks: LogSink[] = [fileSink(path)];
  if (options.echo ?? true) {
    sinks.push(consoleSink);
  }

  return new UpdateLog(path, sinks);
};
