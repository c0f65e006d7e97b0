import { defineCommand } from "citty";
import {
  isConfigUpdateMode,
  isUpgradeMode,
  loadConfigSafe,
  type StoredConfig,
  saveConfig,
  validateConfig,
} from "../../lib/config.js";
import { ConfigError } from "../../lib/errors.js";
import { exitWithError } from "../../utils/error.js";
import { CONFIG_KEYS, type ConfigKey, isConfigKey } from "./constants.js";

const TRUE_VALUES = ["true", "yes", "y", "1"];
const FALSE_VALUES = ["false", "no", "n", "0"];

const parseBoolean = (key: ConfigKey, value: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new ConfigError(`${key} must be true or false, got: ${value}`);
};

/**
 * Returns the stored config with one key set from its string form.
 */
export const applyConfigValue = (
  config: StoredConfig,
  key: ConfigKey,
  value: string
): StoredConfig => {
  switch (key) {
    case "logDir":
      return { ...config, logDir: value };
    case "updaterScript":
      return { ...config, updaterScript: value };
    case "upgradeFlags":
      return { ...config, upgradeFlags: value };
    case "upgradeMode":
      if (!isUpgradeMode(value)) {
        throw new ConfigError(
          `upgradeMode must be one of: full, security, got: ${value}`
        );
      }
      return { ...config, upgradeMode: value };
    case "configUpdateMode":
      if (!isConfigUpdateMode(value)) {
        throw new ConfigError(
          `configUpdateMode must be one of: merge, interactive, dispatch, ignore, got: ${value}`
        );
      }
      return { ...config, configUpdateMode: value };
    case "daemonRestart":
      return { ...config, daemonRestart: parseBoolean(key, value) };
    case "clean":
      return { ...config, clean: parseBoolean(key, value) };
  }
};

export const configSetCommand = defineCommand({
  meta: {
    name: "set",
    description: "Set a configuration value",
  },
  args: {
    key: {
      type: "positional",
      description: `Configuration key (${CONFIG_KEYS.join(", ")})`,
      required: true,
    },
    value: {
      type: "positional",
      description: "Value to set",
      required: true,
    },
  },
  run: ({ args }) => {
    try {
      const key = args.key;
      if (!isConfigKey(key)) {
        throw new ConfigError(
          `unknown key: ${key} (valid keys: ${CONFIG_KEYS.join(", ")})`
        );
      }

      const loaded = loadConfigSafe();
      if (loaded.error) {
        throw new ConfigError(loaded.error);
      }

      const updated = applyConfigValue(loaded.config, key, args.value);
      const validation = validateConfig(updated);
      if (!validation.valid) {
        throw new ConfigError(validation.error ?? `invalid value for ${key}`);
      }

      saveConfig(updated);
      console.log(`${key} = ${String(updated[key])}`);
    } catch (error) {
      exitWithError(error);
    }
  },
});
