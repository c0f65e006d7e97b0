/**
 * Builder for blocks lines.
 *
 * Example tokens:
 *   ['[blocks b      ]', '<perl-core/Compress-Raw-Zlib-2.204.1_rc',
 *    '("<perl-core/Compress-Raw-Zlib-2.204.1_rc"', 'is', 'soft',
 *    'blocking', 'virtual/perl-Compress-Raw-Zlib-2.204.1_rc)']
 */

import type { BlocksRecord } from "../types.js";
import { requireName, requireToken } from "./shared.js";

/**
 * Build a blocks record from a tokenized line.
 * The name drops the block relation character ("<", ">", "!" ...).
 */
export const buildBlocksRecord = (tokens: readonly string[]): BlocksRecord => {
  const status = requireToken(tokens, 0, "status token");
  const name = requireToken(tokens, 1, "blocker atom").slice(1);
  const last = requireToken(tokens, tokens.length - 1, "blocked package");
  const blocked = last.endsWith(")") ? last.slice(0, -1) : last;

  return {
    kind: "blocks",
    name: requireName(name, tokens),
    status,
    attributes: { blocked_package: [blocked] },
  };
};
