import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "emergelog",
    version: getVersion(),
    description: "Run system updates and read their emerge logs",
  },
  subCommands: {
    sections: () => import("./sections.js").then((m) => m.sectionsCommand),
    parse: () => import("./parse.js").then((m) => m.parseCommand),
    report: () => import("./report.js").then((m) => m.reportCommand),
    update: () => import("./update.js").then((m) => m.updateCommand),
    config: () => import("./config/index.js").then((m) => m.configCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
