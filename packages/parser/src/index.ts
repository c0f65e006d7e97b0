/**
 * @emergelog/parser - update log parsing library
 *
 * Architecture:
 * - sections   : splits a log into named sections by its " ::: " marker
 * - tokenizer  : quote/bracket-aware split of package lines
 * - classify   : status token → update status and line variant
 * - builders/  : one record builder per line variant (ebuild, blocks, uninstall)
 * - report     : run-level summary of the update script's sections
 */

// ============================================================================
// Sections
// ============================================================================

export {
  BEGINNING_SECTION,
  extractPayload,
  FINAL_SECTION,
  isSectionHeader,
  LINE_MARKER,
  sectionLines,
  splitLogText,
  splitSections,
} from "./sections.js";

// ============================================================================
// Package Lines
// ============================================================================

export type { ParsePackageOptions } from "./package-parser.js";
export {
  isPackageLine,
  parsePackageLine,
  parsePackageLines,
} from "./package-parser.js";
export { tokenize } from "./tokenizer.js";
export { classifyStatus, classifyVariant } from "./classify.js";
export {
  buildBlocksRecord,
  buildEbuildRecord,
  buildUninstallRecord,
  isVersionPart,
  parseAttributes,
  parseOldVersion,
  splitNameVersion,
  splitRepo,
} from "./builders/index.js";

// ============================================================================
// Report
// ============================================================================

export type {
  ElogEntry,
  PackageCounts,
  PretendOutcome,
  SecurityOutcome,
  UpdateOutcome,
  UpdateReport,
  UpgradeMode,
} from "./report.js";
export {
  buildReport,
  countPackages,
  findUpgradeSection,
  legacyUpdateOutcome,
  legacyUpgradeMode,
  parseElogs,
  pretendOutcome,
  SectionNames,
  securityOutcome,
} from "./report.js";

// ============================================================================
// Core Types
// ============================================================================

export type {
  BlocksRecord,
  EbuildRecord,
  LogSections,
  PackageAttributes,
  PackageKind,
  PackageRecord,
  PackageVariant,
  UninstallRecord,
  UpdateStatus,
} from "./types.js";
export { AllPackageKinds, isEbuildRecord, UpdateStatuses } from "./types.js";

export { MalformedLineError } from "./errors.js";
