/**
 * Debug logger for per-run troubleshooting.
 * Stores debug logs in ~/.emergelog/debug/<run-id>.log
 *
 * Features:
 * - Per-run log files (no overwriting)
 * - Timestamped entries and phase timing
 * - Automatic log rotation (keeps last 10 logs)
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { getEmergelogDir } from "../lib/config.js";
import { isValidRunID } from "./run-id.js";

const DEBUG_DIR_NAME = "debug";
const MAX_LOG_FILES = 10;

/**
 * Per-run debug logger that writes to ~/.emergelog/debug/<run-id>.log
 */
export class DebugLogger {
  private readonly logPath: string;
  private readonly runID: string;
  private closed = false;
  private readonly phaseStartTimes = new Map<string, number>();

  constructor(
    runID: string,
    debugDir = join(getEmergelogDir(), DEBUG_DIR_NAME)
  ) {
    if (!isValidRunID(runID)) {
      throw new Error(`invalid run ID: ${runID}`);
    }
    this.runID = runID;
    this.logPath = this.initializeLogFile(runID, debugDir);
    this.log("DebugLogger initialized");
  }

  /**
   * Initializes the log file and ensures the debug directory exists.
   * Performs log rotation to keep only the most recent logs.
   */
  private initializeLogFile(runID: string, debugDir: string): string {
    if (!existsSync(debugDir)) {
      mkdirSync(debugDir, { recursive: true, mode: 0o700 });
    }

    this.rotateLogs(debugDir);

    const logPath = join(debugDir, `${runID}.log`);
    const header = `${"=".repeat(80)}\nemergelog Debug Log\nRun ID: ${runID}\nStarted: ${formatTimestamp(new Date())}\n${"=".repeat(80)}\n\n`;
    writeFileSync(logPath, header, { mode: 0o600 });

    return logPath;
  }

  /**
   * Rotates log files, keeping only the MAX_LOG_FILES most recent.
   */
  private rotateLogs(debugDir: string): void {
    try {
      const logFiles = readdirSync(debugDir)
        .filter((file) => file.endsWith(".log"))
        .map((file) => {
          const filePath = join(debugDir, file);
          return { path: filePath, mtime: statSync(filePath).mtime.getTime() };
        })
        .sort((a, b) => b.mtime - a.mtime);

      if (logFiles.length >= MAX_LOG_FILES) {
        // Keep space for the new log
        for (const log of logFiles.slice(MAX_LOG_FILES - 1)) {
          unlinkSync(log.path);
        }
      }
    } catch (error) {
      // Best effort
      process.emitWarning(
        `debug log rotation failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Logs a message with timestamp.
   */
  log(message: string): void {
    if (this.closed) {
      return;
    }
    this.append(`${formatTimestamp(new Date())} ${message}\n`);
  }

  /**
   * Logs a phase transition (e.g., "[Parse] 12 records").
   */
  logPhase(phase: string, message: string): void {
    this.log(`[${phase}] ${message}`);
  }

  /**
   * Logs raw updater output without an extra timestamp.
   */
  logOutput(output: string): void {
    if (this.closed) {
      return;
    }
    this.append(output);
  }

  /**
   * Logs an error with stack trace.
   */
  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}Error: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  /**
   * Logs a section separator with title.
   */
  logSection(title: string): void {
    this.log("");
    this.log("=".repeat(80));
    this.log(title);
    this.log("=".repeat(80));
    this.log("");
  }

  /**
   * Starts timing a phase.
   */
  startPhase(phase: string): void {
    this.phaseStartTimes.set(phase, Date.now());
    this.logPhase(phase, "Starting");
  }

  /**
   * Ends timing a phase and logs the duration.
   */
  endPhase(phase: string): void {
    const start = this.phaseStartTimes.get(phase);
    if (start !== undefined) {
      this.logPhase(phase, `Completed in ${Date.now() - start}ms`);
      this.phaseStartTimes.delete(phase);
    }
  }

  /**
   * Closes the logger.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.log("DebugLogger closed");
    this.log(`${"=".repeat(80)}\n`);
    this.closed = true;
  }

  /**
   * Gets the absolute path to the log file.
   */
  get path(): string {
    return this.logPath;
  }

  /**
   * Gets the run ID for this logger.
   */
  get id(): string {
    return this.runID;
  }

  private append(text: string): void {
    try {
      appendFileSync(this.logPath, text);
    } catch (error) {
      // A failing debug log must not fail the command
      this.closed = true;
      process.emitWarning(
        `debug log disabled: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

/**
 * Formats a timestamp in ISO 8601 format with local timezone offset.
 */
export const formatTimestamp = (date: Date): string => {
  const offset = -date.getTimezoneOffset();
  const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
    2,
    "0"
  );
  const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
  const offsetSign = offset >= 0 ? "+" : "-";

  const iso = date.toISOString().slice(0, -1);
  return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
};

/**
 * Creates a debug logger, or undefined when the debug directory is unusable.
 */
export const createDebugLogger = (runID: string): DebugLogger | undefined => {
  try {
    return new DebugLogger(runID);
  } catch (error) {
    process.emitWarning(
      `debug logging unavailable: ${error instanceof Error ? error.message : String(error)}`
    );
    return undefined;
  }
};
