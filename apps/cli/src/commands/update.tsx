import { buildReport } from "@emergelog/parser";
import { defineCommand } from "citty";
import { render } from "ink";
import { type Config, isUpgradeMode, loadConfig } from "../lib/config.js";
import { ConfigError, UpdaterFailedError } from "../lib/errors.js";
import { readLogSections } from "../lib/log-file.js";
import { UpdateEventEmitter } from "../runner/event-emitter.js";
import { UpdateRunner } from "../runner/index.js";
import type { RunResult } from "../runner/types.js";
import { printHeader } from "../tui/components/index.js";
import { shouldUseTUI } from "../tui/render.js";
import { UpdateTUI } from "../tui/update-tui.js";
import { exitWithError } from "../utils/error.js";
import { formatReport } from "../utils/format.js";
import { createSignalController, SIGINT_EXIT_CODE } from "../utils/signal.js";

const runVerboseMode = async (config: Config): Promise<RunResult> => {
  const signalCtrl = createSignalController();
  const runner = new UpdateRunner(config, {
    echo: true,
    signal: signalCtrl.signal,
  });

  signalCtrl.signal.addEventListener("abort", () => {
    console.log("\nCancelling...");
  });

  try {
    const result = await runner.run();
    const debugLogPath = runner.getDebugLogPath();
    if (debugLogPath) {
      console.log(`\nDebug log: ${debugLogPath}`);
    }
    return result;
  } finally {
    signalCtrl.cleanup();
  }
};

const runTUIMode = async (config: Config): Promise<RunResult> => {
  printHeader("update");

  const signalCtrl = createSignalController();
  const eventEmitter = new UpdateEventEmitter();
  const runner = new UpdateRunner(config, {
    eventEmitter,
    signal: signalCtrl.signal,
  });

  const { waitUntilExit } = render(
    <UpdateTUI
      onCancel={() => {
        runner.abort();
      }}
      onEvent={(callback) => eventEmitter.on(callback)}
    />,
    {
      exitOnCtrlC: false,
    }
  );

  try {
    const [result] = await Promise.all([runner.run(), waitUntilExit()]);
    return result;
  } finally {
    signalCtrl.cleanup();
  }
};

const printReport = (logPath: string): void => {
  const report = buildReport(readLogSections(logPath));
  console.log();
  for (const line of formatReport(report, Boolean(process.stdout.isTTY))) {
    console.log(line);
  }
  console.log();
};

export const updateCommand = defineCommand({
  meta: {
    name: "update",
    description:
      "Run the update script, log its output, then report on the log\n\n" +
      "EXAMPLES\n" +
      "  # Full upgrade with configured settings\n" +
      "  emergelog update\n\n" +
      "  # Security upgrade, streaming raw log lines\n" +
      "  emergelog update --mode security --verbose",
  },
  args: {
    mode: {
      type: "string",
      description: "Upgrade mode: full or security (default: from config)",
    },
    flags: {
      type: "string",
      description: "Extra flags passed to emerge (default: from config)",
    },
    verbose: {
      type: "boolean",
      description: "Stream log lines instead of the live view",
      alias: "v",
      default: false,
    },
  },
  run: async ({ args }) => {
    try {
      const config = loadConfig();

      if (typeof args.mode === "string" && args.mode !== "") {
        if (!isUpgradeMode(args.mode)) {
          throw new ConfigError(
            `--mode must be one of: full, security, got: ${args.mode}`
          );
        }
        config.upgradeMode = args.mode;
      }
      if (typeof args.flags === "string") {
        config.upgradeFlags = args.flags;
      }

      const result = shouldUseTUI(Boolean(args.verbose))
        ? await runTUIMode(config)
        : await runVerboseMode(config);

      if (result.cancelled) {
        console.log("\nCancelled.");
        process.exit(SIGINT_EXIT_CODE);
      }

      printReport(result.logPath);

      if (result.exitCode !== 0) {
        throw new UpdaterFailedError(
          config.updaterScript,
          result.exitCode,
          result.stderr
        );
      }
    } catch (error) {
      exitWithError(error);
    }
  },
});
