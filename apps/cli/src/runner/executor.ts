import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { isSectionHeader } from "@emergelog/parser";
import type { Config } from "../lib/config.js";
import type { DebugLogger } from "../utils/debug-logger.js";
import type { UpdateEventEmitter } from "./event-emitter.js";
import type { ExecuteResult, SpawnUpdater, UpdaterProcess } from "./types.js";
import type { UpdateLog } from "./update-log.js";

/**
 * Exit code returned when execution is aborted.
 */
const ABORT_EXIT_CODE = 130;

/**
 * Starts the script with its output piped and no stdin.
 */
export const spawnUpdater: SpawnUpdater = (command, args) => {
  const child = spawn(command, [...args], {
    stdio: ["ignore", "pipe", "pipe"],
  });

  const exited = new Promise<number>((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code) => resolve(code ?? ABORT_EXIT_CODE));
  });

  return {
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    kill: () => {
      child.kill("SIGTERM");
    },
  };
};

const yesNo = (value: boolean): "y" | "n" => (value ? "y" : "n");

/**
 * Positional arguments of the update script, in the order it reads them.
 */
export const updaterArgs = (config: Config): string[] => [
  config.upgradeMode,
  config.upgradeFlags,
  config.configUpdateMode,
  yesNo(config.daemonRestart),
  yesNo(config.clean),
];

const forEachLine = async (
  stream: Readable,
  onLine: (line: string) => void
): Promise<void> => {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  for await (const line of lines) {
    onLine(line);
  }
};

export interface ExecutorOptions {
  readonly spawn?: SpawnUpdater;
  readonly debugLogger?: DebugLogger;
  readonly eventEmitter?: UpdateEventEmitter;
}

/**
 * Runs the update script and streams its output into the update log.
 * stdout lines are logged as INFO, stderr lines as ERROR.
 */
export class UpdaterExecutor {
  private readonly spawn: SpawnUpdater;
  private readonly debugLogger?: DebugLogger;
  private readonly eventEmitter?: UpdateEventEmitter;
  private process?: UpdaterProcess;
  private aborted = false;

  constructor(options: ExecutorOptions = {}) {
    this.spawn = options.spawn ?? spawnUpdater;
    this.debugLogger = options.debugLogger;
    this.eventEmitter = options.eventEmitter;
  }

  async execute(config: Config, log: UpdateLog): Promise<ExecuteResult> {
    if (this.aborted) {
      return { exitCode: ABORT_EXIT_CODE, stderr: [], duration: 0 };
    }

    const startTime = Date.now();
    const args = updaterArgs(config);
    this.debugLogger?.log(
      `Spawning ${config.updaterScript} ${args.map((a) => JSON.stringify(a)).join(" ")}`
    );

    const child = this.spawn(config.updaterScript, args);
    this.process = child;
    const stderr: string[] = [];

    const stdoutDone = forEachLine(child.stdout, (line) => {
      log.info(line);
      this.debugLogger?.logOutput(`${line}\n`);
      if (isSectionHeader(line)) {
        this.eventEmitter?.emit({ type: "section", name: line.trim() });
      }
      this.eventEmitter?.emit({ type: "line", level: "INFO", message: line });
    });

    const stderrDone = forEachLine(child.stderr, (line) => {
      log.error(line);
      stderr.push(line);
      this.debugLogger?.logOutput(`[stderr] ${line}\n`);
      this.eventEmitter?.emit({ type: "line", level: "ERROR", message: line });
    });

    const [exitCode] = await Promise.all([
      child.exited,
      stdoutDone,
      stderrDone,
    ]);
    this.process = undefined;

    return {
      exitCode: this.aborted ? ABORT_EXIT_CODE : exitCode,
      stderr,
      duration: Date.now() - startTime,
    };
  }

  abort(): void {
    this.aborted = true;
    this.process?.kill();
  }
}
