import type { StoredConfig } from "../../lib/config.js";

export const CONFIG_KEYS = [
  "logDir",
  "updaterScript",
  "upgradeMode",
  "upgradeFlags",
  "configUpdateMode",
  "daemonRestart",
  "clean",
] as const satisfies readonly (keyof StoredConfig)[];

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export const isConfigKey = (key: string): key is ConfigKey =>
  CONFIG_KEYS.some((known) => known === key);
