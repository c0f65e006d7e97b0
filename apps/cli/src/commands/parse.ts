import {
  findUpgradeSection,
  type LogSections,
  type MalformedLineError,
  parsePackageLines,
} from "@emergelog/parser";
import { defineCommand } from "citty";
import { CliError } from "../lib/errors.js";
import { readLogSections } from "../lib/log-file.js";
import { exitWithError } from "../utils/error.js";
import { formatRecord } from "../utils/format.js";

/**
 * Pick the section to parse: the requested one, or the upgrade section.
 */
export const resolveSectionName = (
  sections: LogSections,
  requested: string | undefined
): string => {
  if (requested) {
    if (!sections.has(requested)) {
      throw new CliError(`no section named ${requested} in log`);
    }
    return requested;
  }

  const upgrade = findUpgradeSection(sections);
  if (!upgrade.name) {
    throw new CliError("no upgrade section in log, pass --section");
  }
  return upgrade.name;
};

export const parseCommand = defineCommand({
  meta: {
    name: "parse",
    description:
      "Print the package records of a log section\n\n" +
      "EXAMPLES\n" +
      "  # Packages of the upgrade section\n" +
      "  emergelog parse /var/log/emergelog/log_2026-10-19-03-00\n\n" +
      "  # Packages of another section, as JSON\n" +
      '  emergelog parse log --section "{{ CLEAN UP }}" --json',
  },
  args: {
    log: {
      type: "positional",
      description: "Path to the update log",
      required: true,
    },
    section: {
      type: "string",
      description: "Section name (default: the upgrade section)",
    },
    json: {
      type: "boolean",
      description: "Print records as JSON",
      default: false,
    },
    strict: {
      type: "boolean",
      description: "Fail on the first malformed package line",
      default: false,
    },
  },
  run: ({ args }) => {
    try {
      const sections = readLogSections(args.log);
      const requested =
        typeof args.section === "string" && args.section !== ""
          ? args.section
          : undefined;
      const section = resolveSectionName(sections, requested);
      const malformed: MalformedLineError[] = [];

      const onMalformedLine = args.strict
        ? undefined
        : (error: MalformedLineError) => {
            malformed.push(error);
          };

      const records = parsePackageLines(sections.get(section) ?? [], {
        section,
        onMalformedLine,
      });

      if (args.json) {
        console.log(JSON.stringify(records, null, 2));
      } else {
        for (const record of records) {
          console.log(formatRecord(record));
        }
      }

      for (const error of malformed) {
        console.error(`warning: ${error.message}`);
      }
    } catch (error) {
      exitWithError(error);
    }
  },
});
