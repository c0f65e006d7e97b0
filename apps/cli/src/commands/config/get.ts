import { defineCommand } from "citty";
import { loadConfig } from "../../lib/config.js";
import { ConfigError } from "../../lib/errors.js";
import { exitWithError } from "../../utils/error.js";
import { CONFIG_KEYS, isConfigKey } from "./constants.js";

export const configGetCommand = defineCommand({
  meta: {
    name: "get",
    description: "Print the resolved value of a configuration key",
  },
  args: {
    key: {
      type: "positional",
      description: `Configuration key (${CONFIG_KEYS.join(", ")})`,
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
      console.log(String(loadConfig()[key]));
    } catch (error) {
      exitWithError(error);
    }
  },
});
