import type { Readable } from "node:stream";
import type { UpgradeMode } from "../lib/config.js";
import type { LogLevel } from "./log-format.js";

/**
 * A running update script.
 */
export interface UpdaterProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Resolves with the exit code once the process has closed */
  readonly exited: Promise<number>;
  kill(): void;
}

/**
 * Starts the update script with positional arguments.
 */
export type SpawnUpdater = (
  command: string,
  args: readonly string[]
) => UpdaterProcess;

/**
 * Result of one update script run.
 */
export interface ExecuteResult {
  readonly exitCode: number;
  readonly stderr: readonly string[];
  /** Duration in milliseconds */
  readonly duration: number;
}

/**
 * Result of a full update run.
 */
export interface RunResult {
  readonly runID: string;
  readonly logPath: string;
  readonly exitCode: number;
  readonly stderr: readonly string[];
  readonly duration: number;
  readonly cancelled: boolean;
}

/**
 * Events streamed to the update TUI.
 */
export type UpdateEvent =
  | {
      readonly type: "start";
      readonly logPath: string;
      readonly mode: UpgradeMode;
    }
  | { readonly type: "section"; readonly name: string }
  | {
      readonly type: "line";
      readonly level: LogLevel;
      readonly message: string;
    }
  | {
      readonly type: "done";
      readonly exitCode: number;
      readonly duration: number;
      readonly cancelled: boolean;
    }
  | { readonly type: "error"; readonly message: string };
