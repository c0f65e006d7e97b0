/**
 * Builder for ebuild lines.
 *
 * Example tokens:
 *   ['[ebuild     U  ]', 'sys-devel/gnuconfig-20230731::gentoo',
 *    '[20230121::gentoo]', '72', 'KiB']
 */

import { classifyStatus } from "../classify.js";
import type { EbuildRecord } from "../types.js";
import {
  parseAttributes,
  requireName,
  requireToken,
  splitRepo,
} from "./shared.js";

const NUMERIC_REGEX = /^\p{N}+$/u;
const REVISION_REGEX = /^r\p{N}$/u;
const TRAILING_BRACKET_REGEX = /\]$/;

/**
 * Check if a hyphen-delimited part of "name-version" belongs to the version.
 * Best effort: names with numeric or dotted parts are misread.
 */
export const isVersionPart = (part: string): boolean =>
  NUMERIC_REGEX.test(part) ||
  part.includes(".") ||
  part.includes(":") ||
  REVISION_REGEX.test(part);

/**
 * Split "category/name-version" into name and version.
 */
export const splitNameVersion = (
  atom: string
): { readonly name: string; readonly version: string } => {
  let prefix = "";
  for (const part of atom.split("-")) {
    if (!isVersionPart(part)) {
      prefix += `${part}-`;
    }
  }

  const version = atom.startsWith(prefix) ? atom.slice(prefix.length) : atom;
  return { name: prefix.slice(0, -1), version };
};

/**
 * Extract the installed version from a token like "[20230121::gentoo]".
 * Tokens that aren't bracketed (a new package has none) yield undefined.
 */
export const parseOldVersion = (
  token: string | undefined
): string | undefined => {
  if (!token?.startsWith("[")) {
    return undefined;
  }
  const body = token.slice(1);
  const idx = body.indexOf("::");
  const version =
    idx === -1 ? body.replace(TRAILING_BRACKET_REGEX, "") : body.slice(0, idx);
  return version === "" ? undefined : version;
};

/**
 * Build an ebuild record from a tokenized line.
 */
export const buildEbuildRecord = (tokens: readonly string[]): EbuildRecord => {
  const status = classifyStatus(requireToken(tokens, 0, "status token"));
  const { atom, repo } = splitRepo(requireToken(tokens, 1, "package atom"));
  const { name, version } = splitNameVersion(atom);
  const oldVersion = parseOldVersion(tokens[2]);

  return {
    kind: "ebuild",
    name: requireName(name, tokens),
    status,
    ...(version ? { newVersion: version } : {}),
    ...(oldVersion ? { oldVersion } : {}),
    ...(repo ? { repo } : {}),
    attributes: parseAttributes(tokens.slice(1)),
  };
};
