import {
  AllPackageKinds,
  countPackages,
  type LogSections,
  type PackageAttributes,
  type PackageCounts,
  type PackageRecord,
  type UpdateReport,
  type UpdateStatus,
} from "@emergelog/parser";
import { type Color, colors, paint } from "../tui/styles.js";

/**
 * Formats a duration in seconds to a human-readable string.
 *
 * Examples:
 * - 45 -> "45s"
 * - 90 -> "1m 30s"
 * - 3661 -> "61m 1s" (no hours for simplicity)
 */
export const formatDuration = (seconds: number): string => {
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  return `${minutes}m ${remainingSeconds}s`;
};

/**
 * Formats a duration in milliseconds, with one decimal under a minute.
 */
export const formatDurationMs = (ms: number): string => {
  const seconds = ms / 1000;

  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);

  return `${minutes}m ${remainingSeconds}s`;
};

// ============================================================================
// Sections
// ============================================================================

/**
 * One row per section: name, then line count, aligned.
 */
export const formatSections = (sections: LogSections): string[] => {
  const width = Math.max(0, ...[...sections.keys()].map((n) => n.length));
  return [...sections].map(
    ([name, lines]) => `${name.padEnd(width)}  ${lines.length}`
  );
};

/**
 * Plain object form of sections for JSON output.
 */
export const sectionsToJSON = (
  sections: LogSections
): Record<string, readonly string[]> => Object.fromEntries(sections);

// ============================================================================
// Package Records
// ============================================================================

const STATUS_CODES: Readonly<Record<UpdateStatus, string>> = {
  NewPackage: "N",
  ReEmerge: "R",
  Update: "U",
  Undefined: "?",
};

const formatAttributes = (attributes: PackageAttributes): string =>
  Object.entries(attributes)
    .map(([key, values]) => ` ${key}="${values.join(" ")}"`)
    .join("");

/**
 * One line per record, e.g.
 * "[ebuild U] app-editors/nano 8.1 -> 8.2 ::gentoo USE="ncurses -debug"".
 */
export const formatRecord = (record: PackageRecord): string => {
  switch (record.kind) {
    case "ebuild": {
      const version =
        record.oldVersion && record.newVersion
          ? ` ${record.oldVersion} -> ${record.newVersion}`
          : record.newVersion
            ? ` ${record.newVersion}`
            : "";
      const repo = record.repo ? ` ::${record.repo}` : "";
      return `[ebuild ${STATUS_CODES[record.status]}] ${record.name}${version}${repo}${formatAttributes(record.attributes)}`;
    }
    case "blocks": {
      const blocked = record.attributes.blocked_package ?? [];
      return `[blocks] ${record.name} blocks ${blocked.join(" ")}`;
    }
    case "uninstall": {
      const repo = record.repo ? ` ::${record.repo}` : "";
      return `[uninstall] ${record.name}${repo}`;
    }
  }
};

/**
 * Summary of record counts, e.g.
 * "6 packages (4 ebuild, 1 blocks, 1 uninstall); 2 updated, 1 new, 1 re-emerged".
 */
export const formatCounts = (counts: PackageCounts): string => {
  const noun = counts.total === 1 ? "package" : "packages";
  const kinds = AllPackageKinds.map(
    (kind) => `${counts.byKind[kind]} ${kind}`
  ).join(", ");
  const statuses = `${counts.byStatus.Update} updated, ${counts.byStatus.NewPackage} new, ${counts.byStatus.ReEmerge} re-emerged`;
  return `${counts.total} ${noun} (${kinds}); ${statuses}`;
};

// ============================================================================
// Report
// ============================================================================

const outcomeColor = (outcome: string): Color => {
  switch (outcome) {
    case "passed":
    case "successful":
    case "applied":
    case "no-affected":
      return colors.success;
    case "failed":
    case "incomplete":
      return colors.error;
    default:
      return colors.muted;
  }
};

/**
 * Human-readable report of an update run.
 */
export const formatReport = (report: UpdateReport, color = false): string[] => {
  const lines: string[] = [];
  const section = report.upgradeSection ? ` ${report.upgradeSection}` : "";

  lines.push(`Upgrade: ${report.upgradeMode}${section}`);
  if (report.upgradeMode === "security") {
    lines.push(
      `Security: ${paint(report.security, outcomeColor(report.security), color)}`
    );
  } else {
    lines.push(
      `Pretend: ${paint(report.pretend, outcomeColor(report.pretend), color)}`
    );
  }

  if (report.update !== "not-reported") {
    lines.push(
      `Update: ${paint(report.update, outcomeColor(report.update), color)}`
    );
  }

  lines.push(`Packages: ${formatCounts(countPackages(report.packages))}`);
  for (const record of report.packages) {
    lines.push(`  ${formatRecord(record)}`);
  }

  if (report.malformed.length > 0) {
    lines.push(
      paint(`Malformed lines: ${report.malformed.length}`, colors.warn, color)
    );
    for (const message of report.malformed) {
      lines.push(`  ${message}`);
    }
  }

  lines.push(`Elogs: ${report.elogs.length}`);
  for (const elog of report.elogs) {
    lines.push(`  ${elog.file} (${elog.lines.length} lines)`);
  }

  lines.push(`News: ${report.news.length} lines`);

  if (report.trailer !== undefined) {
    lines.push(paint(`Last output: ${report.trailer}`, colors.muted, color));
  }

  return lines;
};
