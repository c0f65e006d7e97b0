import { defineCommand } from "citty";
import { readLogSections } from "../lib/log-file.js";
import { exitWithError } from "../utils/error.js";
import { formatSections, sectionsToJSON } from "../utils/format.js";

export const sectionsCommand = defineCommand({
  meta: {
    name: "sections",
    description: "List the sections of an update log with their line counts",
  },
  args: {
    log: {
      type: "positional",
      description: "Path to the update log",
      required: true,
    },
    json: {
      type: "boolean",
      description: "Print the sections and their lines as JSON",
      default: false,
    },
  },
  run: ({ args }) => {
    try {
      const sections = readLogSections(args.log);
      if (args.json) {
        console.log(JSON.stringify(sectionsToJSON(sections), null, 2));
        return;
      }
      for (const line of formatSections(sections)) {
        console.log(line);
      }
    } catch (error) {
      exitWithError(error);
    }
  },
});
