/**
 * Helpers shared by the record builders.
 */

import { MalformedLineError } from "../errors.js";
import type { PackageAttributes } from "../types.js";

/** Separates a package atom from its repository */
export const REPO_SEPARATOR = "::";

const ATTRIBUTE_MARKER = '="';

/**
 * Get a token by index, or throw when the line is too short.
 */
export const requireToken = (
  tokens: readonly string[],
  index: number,
  what: string
): string => {
  const token = tokens[index];
  if (token === undefined) {
    throw new MalformedLineError(`missing ${what}`, tokens.join(" "));
  }
  return token;
};

/**
 * Return a package name, or throw when it came out empty or hyphen-bounded.
 */
export const requireName = (
  name: string,
  tokens: readonly string[]
): string => {
  if (name === "") {
    throw new MalformedLineError("no package name", tokens.join(" "));
  }
  if (name.startsWith("-") || name.endsWith("-")) {
    throw new MalformedLineError(
      `package name "${name}" starts or ends with a hyphen`,
      tokens.join(" ")
    );
  }
  return name;
};

/**
 * Split "atom::repo" into the atom and the repository.
 * The repository is undefined when the separator is absent.
 */
export const splitRepo = (
  value: string
): { readonly atom: string; readonly repo?: string } => {
  const idx = value.indexOf(REPO_SEPARATOR);
  if (idx === -1) {
    return { atom: value };
  }
  const rest = value.slice(idx + REPO_SEPARATOR.length);
  const end = rest.indexOf(REPO_SEPARATOR);
  const repo = end === -1 ? rest : rest.slice(0, end);
  return repo === ""
    ? { atom: value.slice(0, idx) }
    : { atom: value.slice(0, idx), repo };
};

const stripQuotes = (value: string): string => {
  let start = 0;
  let end = value.length;
  if (value.startsWith('"')) {
    start = 1;
  }
  if (end > start && value.endsWith('"')) {
    end -= 1;
  }
  return value.slice(start, end);
};

/**
 * Collect KEY="v1 v2" tokens into attributes.
 * A repeated key keeps its last value list.
 */
export const parseAttributes = (
  tokens: readonly string[]
): PackageAttributes => {
  const attributes: PackageAttributes = {};
  for (const token of tokens) {
    if (!token.includes(ATTRIBUTE_MARKER)) {
      continue;
    }
    const eq = token.indexOf("=");
    const key = token.slice(0, eq);
    if (key === "") {
      continue;
    }
    const values = stripQuotes(token.slice(eq + 1))
      .split(" ")
      .filter((v) => v !== "");
    attributes[key] = values;
  }
  return attributes;
};
