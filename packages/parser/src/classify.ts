/**
 * Classification of package line status tokens.
 */

import type { PackageVariant, UpdateStatus } from "./types.js";
import { UpdateStatuses } from "./types.js";

/**
 * Flag letter → status, in precedence order.
 * First match wins, so "[ebuild  NR   ]" is a NewPackage.
 */
const statusFlags: readonly (readonly [string, UpdateStatus])[] = [
  ["N", UpdateStatuses.NewPackage],
  ["R", UpdateStatuses.ReEmerge],
  ["U", UpdateStatuses.Update],
];

/**
 * Reduce an ebuild status token like "[ebuild     U  ]" to an UpdateStatus.
 */
export const classifyStatus = (flags: string): UpdateStatus => {
  for (const [letter, status] of statusFlags) {
    if (flags.includes(letter)) {
      return status;
    }
  }
  return UpdateStatuses.Undefined;
};

/**
 * Determine which record builder handles a line from its first token.
 */
export const classifyVariant = (firstToken: string): PackageVariant => {
  if (firstToken.includes("ebuild")) {
    return "ebuild";
  }
  if (firstToken.includes("blocks")) {
    return "blocks";
  }
  if (firstToken.includes("uninstall")) {
    return "uninstall";
  }
  return "unknown";
};
