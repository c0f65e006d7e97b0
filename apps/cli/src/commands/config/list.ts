import { defineCommand } from "citty";
import { getConfigPath, loadConfig } from "../../lib/config.js";
import { printHeader } from "../../tui/components/index.js";
import { CONFIG_KEYS } from "./constants.js";

export const configListCommand = defineCommand({
  meta: {
    name: "list",
    description: "List all resolved configuration values",
  },
  run: () => {
    const config = loadConfig();
    const width = Math.max(...CONFIG_KEYS.map((key) => key.length));

    printHeader("config list");

    console.log(`Config file: ${getConfigPath()}`);
    console.log();
    for (const key of CONFIG_KEYS) {
      const value = String(config[key]);
      console.log(`${key.padEnd(width)}  ${value === "" ? "(empty)" : value}`);
    }
    console.log();
  },
});
