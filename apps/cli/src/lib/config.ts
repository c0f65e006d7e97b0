/**
 * Config management for the emergelog CLI
 *
 * Sources, later ones win:
 * - Built-in defaults
 * - ~/.emergelog/config.json (home overridable with EMERGELOG_HOME)
 * - EMERGELOG_LOG_DIR and EMERGELOG_UPDATER environment variables
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

// ============================================================================
// Types
// ============================================================================

export type UpgradeMode = "full" | "security";

export type ConfigUpdateMode = "merge" | "interactive" | "dispatch" | "ignore";

/**
 * StoredConfig is the raw structure that gets persisted to disk
 */
export interface StoredConfig {
  logDir?: string;
  updaterScript?: string;
  upgradeMode?: UpgradeMode;
  upgradeFlags?: string;
  configUpdateMode?: ConfigUpdateMode;
  daemonRestart?: boolean;
  clean?: boolean;
}

/**
 * Config is the merged, resolved config used by the application
 */
export interface Config {
  logDir: string;
  updaterScript: string;
  upgradeMode: UpgradeMode;
  upgradeFlags: string;
  configUpdateMode: ConfigUpdateMode;
  daemonRestart: boolean;
  clean: boolean;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export interface ConfigLoadResult {
  config: StoredConfig;
  error?: string;
}

// ============================================================================
// Constants
// ============================================================================

const EMERGELOG_DIR_NAME = ".emergelog";
const CONFIG_FILE = "config.json";

export const DEFAULT_LOG_DIR = "/var/log/emergelog";
export const DEFAULT_UPDATER_SCRIPT = "updater.sh";

const UPGRADE_MODES: readonly UpgradeMode[] = ["full", "security"];
const CONFIG_UPDATE_MODES: readonly ConfigUpdateMode[] = [
  "merge",
  "interactive",
  "dispatch",
  "ignore",
];

const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:\\/;

// ============================================================================
// Path Helpers
// ============================================================================

const validateOverridePath = (path: string): string | null => {
  if (path.includes("..")) {
    return null;
  }
  if (!(path.startsWith("/") || WINDOWS_DRIVE_PATTERN.test(path))) {
    return null;
  }
  return path;
};

/**
 * Gets the emergelog home directory (~/.emergelog)
 * Holds the config file and debug logs
 */
export const getEmergelogDir = (): string => {
  const override = process.env.EMERGELOG_HOME;
  if (override) {
    const validated = validateOverridePath(override);
    if (validated) {
      return validated;
    }
  }
  return join(homedir(), EMERGELOG_DIR_NAME);
};

/**
 * Gets the path to the config file
 */
export const getConfigPath = (): string =>
  join(getEmergelogDir(), CONFIG_FILE);

// ============================================================================
// Validation
// ============================================================================

export const isUpgradeMode = (value: unknown): value is UpgradeMode =>
  UPGRADE_MODES.some((mode) => mode === value);

export const isConfigUpdateMode = (
  value: unknown
): value is ConfigUpdateMode =>
  CONFIG_UPDATE_MODES.some((mode) => mode === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Validates a raw config value, reporting the first offending field.
 */
export const validateConfig = (value: unknown): ValidationResult => {
  if (!isRecord(value)) {
    return { valid: false, error: "config must be a JSON object" };
  }

  for (const key of ["logDir", "updaterScript", "upgradeFlags"] as const) {
    const field = value[key];
    if (field !== undefined && typeof field !== "string") {
      return { valid: false, error: `${key} must be a string` };
    }
  }

  for (const key of ["daemonRestart", "clean"] as const) {
    const field = value[key];
    if (field !== undefined && typeof field !== "boolean") {
      return { valid: false, error: `${key} must be a boolean` };
    }
  }

  if (value.upgradeMode !== undefined && !isUpgradeMode(value.upgradeMode)) {
    return {
      valid: false,
      error: `upgradeMode must be one of: ${UPGRADE_MODES.join(", ")}`,
    };
  }

  if (
    value.configUpdateMode !== undefined &&
    !isConfigUpdateMode(value.configUpdateMode)
  ) {
    return {
      valid: false,
      error: `configUpdateMode must be one of: ${CONFIG_UPDATE_MODES.join(", ")}`,
    };
  }

  if (typeof value.logDir === "string" && value.logDir.trim() === "") {
    return { valid: false, error: "logDir must not be empty" };
  }

  return { valid: true };
};

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const optionalBoolean = (value: unknown): boolean | undefined =>
  typeof value === "boolean" ? value : undefined;

/**
 * Narrows a validated raw value to StoredConfig.
 */
const toStoredConfig = (value: Record<string, unknown>): StoredConfig => ({
  logDir: optionalString(value.logDir),
  updaterScript: optionalString(value.updaterScript),
  upgradeMode: isUpgradeMode(value.upgradeMode) ? value.upgradeMode : undefined,
  upgradeFlags: optionalString(value.upgradeFlags),
  configUpdateMode: isConfigUpdateMode(value.configUpdateMode)
    ? value.configUpdateMode
    : undefined,
  daemonRestart: optionalBoolean(value.daemonRestart),
  clean: optionalBoolean(value.clean),
});

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Loads the stored config with detailed error information.
 * Missing or empty files yield an empty config; never throws.
 */
export const loadConfigSafe = (): ConfigLoadResult => {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return { config: {} };
  }

  let parsed: unknown;
  try {
    const data = readFileSync(configPath, "utf-8");
    if (!data.trim()) {
      return { config: {} };
    }
    parsed = JSON.parse(data);
  } catch (err) {
    if (err instanceof SyntaxError) {
      return {
        config: {},
        error: `config file is corrupted: ${configPath} (invalid JSON)`,
      };
    }

    const code =
      err instanceof Error && "code" in err ? String(err.code) : undefined;

    if (code === "EACCES") {
      return {
        config: {},
        error: `cannot read config at ${configPath}: permission denied`,
      };
    }

    if (code === "EISDIR") {
      return {
        config: {},
        error: `config path is a directory: ${configPath}`,
      };
    }

    return {
      config: {},
      error: `failed to load config: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const validation = validateConfig(parsed);
  if (!(validation.valid && isRecord(parsed))) {
    return {
      config: {},
      error: `invalid config at ${configPath}: ${validation.error ?? "unknown error"}`,
    };
  }

  return { config: toStoredConfig(parsed) };
};

/**
 * Merges defaults, a stored config and environment overrides.
 */
export const resolveConfig = (
  stored: StoredConfig,
  env: NodeJS.ProcessEnv = process.env
): Config => ({
  logDir: env.EMERGELOG_LOG_DIR || stored.logDir || DEFAULT_LOG_DIR,
  updaterScript:
    env.EMERGELOG_UPDATER || stored.updaterScript || DEFAULT_UPDATER_SCRIPT,
  upgradeMode: stored.upgradeMode ?? "full",
  upgradeFlags: stored.upgradeFlags ?? "",
  configUpdateMode: stored.configUpdateMode ?? "ignore",
  daemonRestart: stored.daemonRestart ?? false,
  clean: stored.clean ?? false,
});

/**
 * Loads the resolved config, warning on stderr when the file is unusable.
 */
export const loadConfig = (): Config => {
  const result = loadConfigSafe();
  if (result.error) {
    console.error(`warning: ${result.error}`);
  }
  return resolveConfig(result.config);
};

// ============================================================================
// Config Saving
// ============================================================================

/**
 * Saves config to ~/.emergelog/config.json
 */
export const saveConfig = (config: StoredConfig): void => {
  const dir = getEmergelogDir();

  if (!existsSync(dir)) {
    mkdirSync(dir, { mode: 0o700, recursive: true });
  }

  const data = `${JSON.stringify(config, null, 2)}\n`;
  writeFileSync(join(dir, CONFIG_FILE), data, { mode: 0o600 });
};
