import type { Config } from "../lib/config.js";
import { UpdaterFailedError } from "../lib/errors.js";
import {
  createDebugLogger,
  type DebugLogger,
} from "../utils/debug-logger.js";
import { createRunID } from "../utils/run-id.js";
import type { UpdateEventEmitter } from "./event-emitter.js";
import { UpdaterExecutor } from "./executor.js";
import type { ExecuteResult, RunResult, SpawnUpdater } from "./types.js";
import { openUpdateLog, type UpdateLog } from "./update-log.js";

export interface UpdateRunnerOptions {
  /** Echo log lines to the terminal */
  readonly echo?: boolean;
  readonly eventEmitter?: UpdateEventEmitter;
  readonly spawn?: SpawnUpdater;
  /** Aborting it cancels the run */
  readonly signal?: AbortSignal;
  /** Opens the run's log; defaults to a new file in config.logDir */
  readonly openLog?: (config: Config, echo: boolean) => UpdateLog;
  /** Creates the debug logger; return undefined to run without one */
  readonly createDebugLogger?: (runID: string) => DebugLogger | undefined;
}

const defaultOpenLog = (config: Config, echo: boolean): UpdateLog =>
  openUpdateLog(config.logDir, { echo });

/**
 * Orchestrates one update run: log file, debug log, script execution.
 * A failing script is reported through the result's exit code.
 */
export class UpdateRunner {
  private readonly config: Config;
  private readonly options: UpdateRunnerOptions;
  private debugLogger?: DebugLogger;
  private executor?: UpdaterExecutor;
  private aborted = false;

  constructor(config: Config, options: UpdateRunnerOptions = {}) {
    this.config = config;
    this.options = options;
  }

  async run(): Promise<RunResult> {
    const runID = createRunID();
    const startTime = Date.now();
    const emitter = this.options.eventEmitter;
    const signal = this.options.signal;
    const onAbort = (): void => this.abort();

    this.debugLogger = (this.options.createDebugLogger ?? createDebugLogger)(
      runID
    );
    this.debugLogger?.logSection("UPDATE RUN");
    this.debugLogger?.log(`Updater: ${this.config.updaterScript}`);
    this.debugLogger?.log(`Mode: ${this.config.upgradeMode}`);
    this.debugLogger?.log(`Flags: ${this.config.upgradeFlags || "(none)"}`);

    try {
      signal?.addEventListener("abort", onAbort, { once: true });
      if (signal?.aborted) {
        this.abort();
      }

      const log = (this.options.openLog ?? defaultOpenLog)(
        this.config,
        this.options.echo ?? false
      );
      this.debugLogger?.log(`Log file: ${log.path}`);
      emitter?.emit({
        type: "start",
        logPath: log.path,
        mode: this.config.upgradeMode,
      });

      this.executor = new UpdaterExecutor({
        spawn: this.options.spawn,
        debugLogger: this.debugLogger,
        eventEmitter: emitter,
      });
      if (this.aborted) {
        this.executor.abort();
      }

      this.debugLogger?.startPhase("Execute");
      const result = await this.executor.execute(this.config, log);
      this.debugLogger?.endPhase("Execute");
      this.logOutcome(log, result);

      const duration = Date.now() - startTime;
      this.debugLogger?.logSection("SUMMARY");
      this.debugLogger?.log(`Exit code: ${result.exitCode}`);
      this.debugLogger?.log(`Total duration: ${duration}ms`);

      emitter?.emit({
        type: "done",
        exitCode: result.exitCode,
        duration,
        cancelled: this.aborted,
      });

      return {
        runID,
        logPath: log.path,
        exitCode: result.exitCode,
        stderr: result.stderr,
        duration,
        cancelled: this.aborted,
      };
    } catch (error) {
      this.debugLogger?.logError(error, "RunError");
      emitter?.emit({
        type: "error",
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.debugLogger?.close();
    }
  }

  private logOutcome(log: UpdateLog, result: ExecuteResult): void {
    if (this.aborted) {
      log.error("update cancelled");
    } else if (result.exitCode === 0) {
      log.info("emergelog completed its tasks");
      log.info(`log file can be found at: ${log.path}`);
    } else {
      const { message } = new UpdaterFailedError(
        this.config.updaterScript,
        result.exitCode,
        result.stderr
      );
      // one record per line keeps every line inside the current section
      for (const line of message.split("\n")) {
        log.error(line);
      }
    }
  }

  abort(): void {
    this.aborted = true;
    this.debugLogger?.log("[Runner] Abort requested");
    this.executor?.abort();
  }

  getDebugLogPath(): string | undefined {
    return this.debugLogger?.path;
  }
}
