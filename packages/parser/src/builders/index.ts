// biome-ignore-all lint/performance/noBarrelFile: This is the builders module's public API

/**
 * Record builders, one per package line variant.
 */

export { buildBlocksRecord } from "./blocks.js";
export {
  buildEbuildRecord,
  isVersionPart,
  parseOldVersion,
  splitNameVersion,
} from "./ebuild.js";
export { parseAttributes, splitRepo } from "./shared.js";
export { buildUninstallRecord } from "./uninstall.js";
