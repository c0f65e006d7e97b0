/**
 * Package line parser.
 * Turns the lines of one log section into package records.
 */

import {
  buildBlocksRecord,
  buildEbuildRecord,
  buildUninstallRecord,
} from "./builders/index.js";
import { classifyVariant } from "./classify.js";
import { MalformedLineError } from "./errors.js";
import { tokenize } from "./tokenizer.js";
import type { PackageKind, PackageRecord } from "./types.js";

// ============================================================================
// Constants
// ============================================================================

/** Lines describing a package action carry a bracketed status token */
const BRACKET_CONTENT_REGEX = /\[(.+?)\]/;

/** Status marker printed for finished side tasks, not a package action */
const OK_MARKER_LINE = "[ ok ]";

type RecordBuilder = (tokens: readonly string[]) => PackageRecord;

const builders: Readonly<Record<PackageKind, RecordBuilder>> = {
  ebuild: buildEbuildRecord,
  blocks: buildBlocksRecord,
  uninstall: buildUninstallRecord,
};

// ============================================================================
// Options
// ============================================================================

/**
 * Options for parsing package lines.
 */
export interface ParsePackageOptions {
  /** Section name reported in MalformedLineError */
  readonly section?: string;
  /**
   * Called for each malformed line, which is then skipped.
   * Without it the first MalformedLineError is thrown.
   */
  readonly onMalformedLine?: (error: MalformedLineError) => void;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Check if a line looks like a package action line.
 */
export const isPackageLine = (line: string): boolean =>
  BRACKET_CONTENT_REGEX.test(line) && line !== OK_MARKER_LINE;

/**
 * Parse a single package line.
 * Returns undefined for lines whose status token names no known variant.
 */
export const parsePackageLine = (line: string): PackageRecord | undefined => {
  const tokens = tokenize(line);
  const variant = classifyVariant(tokens[0] ?? "");
  if (variant === "unknown") {
    return undefined;
  }
  try {
    return builders[variant](tokens);
  } catch (error) {
    if (error instanceof MalformedLineError) {
      throw new MalformedLineError(error.reason, line);
    }
    throw error;
  }
};

/**
 * Parse the package records of a section, in line order.
 * Lines that aren't package lines, and unknown variants, are skipped.
 */
export const parsePackageLines = (
  lines: readonly string[],
  options: ParsePackageOptions = {}
): PackageRecord[] => {
  const records: PackageRecord[] = [];

  for (const [index, line] of lines.entries()) {
    if (!isPackageLine(line)) {
      continue;
    }

    let record: PackageRecord | undefined;
    try {
      record = parsePackageLine(line);
    } catch (error) {
      if (!(error instanceof MalformedLineError)) {
        throw error;
      }
      const located = error.locate(options.section ?? "", index);
      if (!options.onMalformedLine) {
        throw located;
      }
      options.onMalformedLine(located);
      continue;
    }

    if (record) {
      records.push(record);
    }
  }

  return records;
};
