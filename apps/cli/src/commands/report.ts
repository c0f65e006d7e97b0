import { buildReport } from "@emergelog/parser";
import { defineCommand } from "citty";
import { readLogSections } from "../lib/log-file.js";
import { exitWithError } from "../utils/error.js";
import { formatReport } from "../utils/format.js";

export const reportCommand = defineCommand({
  meta: {
    name: "report",
    description: "Summarise an update log",
  },
  args: {
    log: {
      type: "positional",
      description: "Path to the update log",
      required: true,
    },
    json: {
      type: "boolean",
      description: "Print the report as JSON",
      default: false,
    },
  },
  run: ({ args }) => {
    try {
      const report = buildReport(readLogSections(args.log));
      if (args.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      for (const line of formatReport(report, Boolean(process.stdout.isTTY))) {
        console.log(line);
      }
    } catch (error) {
      exitWithError(error);
    }
  },
});
