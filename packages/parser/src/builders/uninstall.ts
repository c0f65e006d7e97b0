import type { UninstallRecord } from "../types.js";
import { requireName, requireToken, splitRepo } from "./shared.js";

/**
 * Build an uninstall record from tokens like
 * ['[uninstall     ]', 'perl-core/Compress-Raw-Zlib-2.202.0::gentoo'].
 * The name keeps its version: uninstall lines don't split it off.
 */
export const buildUninstallRecord = (
  tokens: readonly string[]
): UninstallRecord => {
  const status = requireToken(tokens, 0, "status token");
  const { atom, repo } = splitRepo(requireToken(tokens, 1, "package atom"));

  return {
    kind: "uninstall",
    name: requireName(atom, tokens),
    status,
    ...(repo ? { repo } : {}),
    attributes: { uninstalled_package: [atom] },
  };
};
