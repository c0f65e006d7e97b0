/**
 * Run report.
 * Summarises the sections written by the update script into one value:
 * which upgrade ran, how it went, which packages it touched, and the
 * elog and news output that followed.
 */

import { parsePackageLines } from "./package-parser.js";
import { FINAL_SECTION, sectionLines } from "./sections.js";
import type {
  LogSections,
  PackageKind,
  PackageRecord,
  UpdateStatus,
} from "./types.js";
import { isEbuildRecord, UpdateStatuses } from "./types.js";

// ============================================================================
// Section Names
// ============================================================================

export const SectionNames = {
  SyncTree: "{{ SYNC PORTAGE TREE }}",
  SystemUpgrade: "{{ SYSTEM UPGRADE }}",
  SecurityUpgrades: "{{ SECURITY UPGRADES }}",
  ConfigFiles: "{{ UPDATE SYSTEM CONFIGURATION FILES }}",
  CleanUp: "{{ CLEAN UP }}",
  RestartServices: "{{ RESTART SERVICES }}",
  ReadElogs: "{{ READ ELOGS }}",
  ReadNews: "{{ READ NEWS }}",
  /** Written by older versions of the update script */
  LegacyPretend: "{{ PRETEND EMERGE }}",
  /** Written by older versions of the update script */
  LegacyUpdate: "{{ UPDATE SYSTEM }}",
} as const;

const PRETEND_PASSED = [
  "emerge pretend was successful, upgrading...",
  "emerge pretend was successful, updating...",
];
const PRETEND_FAILED = "emerge pretend has failed, not upgrading";

const LEGACY_FULL_TYPE = "@world";
const LEGACY_SECURITY_TYPE = "GLSA";
const LEGACY_FULL_SUCCESS = "update was successful";
const LEGACY_SECURITY_SUCCESS = "glsa update was successful";

const GLSA_NONE = "No affected GLSAs found.";
const GLSA_FOUND = "Affected GLSAs found. Applying updates...";
const GLSA_APPLIED = "Updates applied.";

const ELOG_FILENAME_PREFIX = ">>> Log filename: ";
const ELOG_START = ">>> Log start <<<";
const ELOG_END = ">>> Log end <<<";

// ============================================================================
// Types
// ============================================================================

export type UpgradeMode = "full" | "security" | "unknown";

export type PretendOutcome = "passed" | "failed" | "not-run";

/** Only older logs state whether the update itself went through */
export type UpdateOutcome = "successful" | "failed" | "not-reported";

export type SecurityOutcome =
  | "no-affected"
  | "applied"
  | "incomplete"
  | "not-run";

/**
 * One elog file printed by the update script.
 */
export interface ElogEntry {
  readonly file: string;
  readonly lines: readonly string[];
}

/**
 * UpdateReport summarises one update run.
 */
export interface UpdateReport {
  readonly upgradeMode: UpgradeMode;
  /** Name of the section the packages were read from, if any */
  readonly upgradeSection?: string;
  readonly pretend: PretendOutcome;
  readonly security: SecurityOutcome;
  readonly update: UpdateOutcome;
  readonly packages: readonly PackageRecord[];
  /** Messages of package lines that couldn't be parsed */
  readonly malformed: readonly string[];
  readonly elogs: readonly ElogEntry[];
  readonly news: readonly string[];
  /** Last line without the log marker */
  readonly trailer?: string;
}

/**
 * Record counts by kind, plus ebuild counts by status.
 */
export interface PackageCounts {
  readonly total: number;
  readonly byKind: Readonly<Record<PackageKind, number>>;
  readonly byStatus: Readonly<Record<UpdateStatus, number>>;
}

// ============================================================================
// Section Summaries
// ============================================================================

/**
 * Mode of an older log, named by the second token of the update section's
 * second line ("emerge @world" or "glsa-check GLSA ...").
 */
export const legacyUpgradeMode = (lines: readonly string[]): UpgradeMode => {
  const type = lines[1]?.split(/\s+/)[1];
  if (type === LEGACY_FULL_TYPE) {
    return "full";
  }
  if (type === LEGACY_SECURITY_TYPE) {
    return "security";
  }
  return "unknown";
};

/**
 * Find the section holding the upgrade output.
 */
export const findUpgradeSection = (
  sections: LogSections
): { readonly mode: UpgradeMode; readonly name?: string } => {
  if (sections.has(SectionNames.SystemUpgrade)) {
    return { mode: "full", name: SectionNames.SystemUpgrade };
  }
  if (sections.has(SectionNames.SecurityUpgrades)) {
    return { mode: "security", name: SectionNames.SecurityUpgrades };
  }
  if (sections.has(SectionNames.LegacyUpdate)) {
    const lines = sectionLines(sections, SectionNames.LegacyUpdate);
    return { mode: legacyUpgradeMode(lines), name: SectionNames.LegacyUpdate };
  }
  return { mode: "unknown" };
};

/**
 * Outcome of the "emerge --pretend" check that precedes a full upgrade.
 */
export const pretendOutcome = (lines: readonly string[]): PretendOutcome => {
  if (lines.some((line) => PRETEND_PASSED.includes(line))) {
    return "passed";
  }
  if (lines.includes(PRETEND_FAILED)) {
    return "failed";
  }
  return "not-run";
};

/**
 * Outcome of the update in an older log's UPDATE SYSTEM section.
 */
export const legacyUpdateOutcome = (
  mode: UpgradeMode,
  lines: readonly string[]
): UpdateOutcome => {
  switch (mode) {
    case "full":
      return lines.includes(LEGACY_FULL_SUCCESS) ? "successful" : "failed";
    case "security":
      return lines.includes(LEGACY_SECURITY_SUCCESS) ? "successful" : "failed";
    default:
      return "not-reported";
  }
};

const reportPretend = (
  sections: LogSections,
  mode: UpgradeMode,
  upgradeLines: readonly string[]
): PretendOutcome => {
  // older logs give the pretend run its own section; no verdict is a failure
  if (sections.has(SectionNames.LegacyPretend)) {
    const lines = sectionLines(sections, SectionNames.LegacyPretend);
    return pretendOutcome(lines) === "passed" ? "passed" : "failed";
  }
  return mode === "security" ? "not-run" : pretendOutcome(upgradeLines);
};

/**
 * Outcome of a GLSA security upgrade.
 */
export const securityOutcome = (lines: readonly string[]): SecurityOutcome => {
  if (lines.includes(GLSA_NONE)) {
    return "no-affected";
  }
  if (lines.includes(GLSA_APPLIED)) {
    return "applied";
  }
  if (lines.includes(GLSA_FOUND)) {
    return "incomplete";
  }
  return "not-run";
};

/**
 * Collect the elog files printed in the READ ELOGS section.
 * An entry missing its end marker runs to the end of the section.
 */
export const parseElogs = (lines: readonly string[]): ElogEntry[] => {
  const entries: ElogEntry[] = [];
  let file: string | undefined;
  let body: string[] | undefined;

  const flush = (): void => {
    if (file !== undefined && body !== undefined) {
      entries.push({ file, lines: body });
    }
    file = undefined;
    body = undefined;
  };

  for (const line of lines) {
    if (line.startsWith(ELOG_FILENAME_PREFIX)) {
      flush();
      file = line.slice(ELOG_FILENAME_PREFIX.length).trim();
    } else if (line === ELOG_START && file !== undefined) {
      body = [];
    } else if (line === ELOG_END) {
      flush();
    } else if (body !== undefined) {
      body.push(line);
    }
  }
  flush();

  return entries;
};

// ============================================================================
// Report
// ============================================================================

/**
 * Build the report of an update run from its sections.
 * Malformed package lines are listed in `malformed` and skipped.
 */
export const buildReport = (sections: LogSections): UpdateReport => {
  const upgrade = findUpgradeSection(sections);
  const upgradeLines = upgrade.name
    ? sectionLines(sections, upgrade.name)
    : [];
  const malformed: string[] = [];

  const packages = parsePackageLines(upgradeLines, {
    section: upgrade.name,
    onMalformedLine: (error) => malformed.push(error.message),
  });

  const trailer = sections.get(FINAL_SECTION)?.[0];

  return {
    upgradeMode: upgrade.mode,
    ...(upgrade.name ? { upgradeSection: upgrade.name } : {}),
    pretend: reportPretend(sections, upgrade.mode, upgradeLines),
    security:
      upgrade.mode === "security" ? securityOutcome(upgradeLines) : "not-run",
    update:
      upgrade.name === SectionNames.LegacyUpdate
        ? legacyUpdateOutcome(upgrade.mode, upgradeLines)
        : "not-reported",
    packages,
    malformed,
    elogs: parseElogs(sectionLines(sections, SectionNames.ReadElogs)),
    news: sectionLines(sections, SectionNames.ReadNews),
    ...(trailer === undefined ? {} : { trailer }),
  };
};

/**
 * Count records by kind and ebuild records by status.
 */
export const countPackages = (
  records: readonly PackageRecord[]
): PackageCounts => {
  const byKind: Record<PackageKind, number> = {
    ebuild: 0,
    blocks: 0,
    uninstall: 0,
  };
  const byStatus: Record<UpdateStatus, number> = {
    [UpdateStatuses.NewPackage]: 0,
    [UpdateStatuses.ReEmerge]: 0,
    [UpdateStatuses.Update]: 0,
    [UpdateStatuses.Undefined]: 0,
  };

  for (const record of records) {
    byKind[record.kind]++;
    if (isEbuildRecord(record)) {
      byStatus[record.status]++;
    }
  }

  return { total: records.length, byKind, byStatus };
};
