/**
 * Core types for parsed update logs.
 */

// ============================================================================
// Sections
// ============================================================================

/**
 * Section name → ordered payload lines, in the order sections first appear.
 */
export type LogSections = ReadonlyMap<string, readonly string[]>;

// ============================================================================
// Update Status
// ============================================================================

/**
 * UpdateStatus is the coarse classification of an ebuild line's status flags.
 */
export type UpdateStatus = "NewPackage" | "ReEmerge" | "Update" | "Undefined";

export const UpdateStatuses = {
  NewPackage: "NewPackage" as const,
  ReEmerge: "ReEmerge" as const,
  Update: "Update" as const,
  Undefined: "Undefined" as const,
};

// ============================================================================
// Package Kinds
// ============================================================================

/**
 * PackageKind is the action family named by a line's bracketed status token.
 */
export type PackageKind = "ebuild" | "blocks" | "uninstall";

/**
 * All package kinds, in dispatch order.
 */
export const AllPackageKinds: readonly PackageKind[] = [
  "ebuild",
  "blocks",
  "uninstall",
] as const;

/**
 * Variant of a package line; "unknown" lines are skipped by the parser.
 */
export type PackageVariant = PackageKind | "unknown";

// ============================================================================
// Package Records
// ============================================================================

/**
 * Attribute key → ordered values, e.g. USE → ["X", "-doc"].
 */
export type PackageAttributes = Record<string, string[]>;

interface PackageRecordBase {
  /** Package identifier in category/name form */
  readonly name: string;
  readonly attributes: PackageAttributes;
}

/**
 * An install, upgrade or rebuild of one package.
 */
export interface EbuildRecord extends PackageRecordBase {
  readonly kind: "ebuild";
  readonly status: UpdateStatus;
  readonly newVersion?: string;
  /** Only present when the line shows the installed version */
  readonly oldVersion?: string;
  readonly repo?: string;
}

/**
 * A conflict where one package blocks another.
 */
export interface BlocksRecord extends PackageRecordBase {
  readonly kind: "blocks";
  /** Raw status token, e.g. "[blocks b      ]" */
  readonly status: string;
}

/**
 * Removal of a package.
 */
export interface UninstallRecord extends PackageRecordBase {
  readonly kind: "uninstall";
  /** Raw status token, e.g. "[uninstall     ]" */
  readonly status: string;
  readonly repo?: string;
}

/**
 * PackageRecord is one parsed package action.
 */
export type PackageRecord = EbuildRecord | BlocksRecord | UninstallRecord;

/**
 * Check if a record is an ebuild record.
 */
export const isEbuildRecord = (record: PackageRecord): record is EbuildRecord =>
  record.kind === "ebuild";
