import { describe, expect, it } from "vitest";
import { ConfigError } from "../../lib/errors.js";
import { isConfigKey } from "./constants.js";
import { applyConfigValue } from "./set.js";

describe("isConfigKey", () => {
  it("accepts stored config keys only", () => {
    expect(isConfigKey("upgradeMode")).toBe(true);
    expect(isConfigKey("apiKey")).toBe(false);
  });
});

describe("applyConfigValue", () => {
  it("sets string keys verbatim", () => {
    expect(applyConfigValue({ clean: true }, "upgradeFlags", "--quiet")).toEqual(
      { clean: true, upgradeFlags: "--quiet" }
    );
  });

  it("parses boolean spellings", () => {
    expect(applyConfigValue({}, "daemonRestart", "y")).toEqual({
      daemonRestart: true,
    });
    expect(applyConfigValue({}, "clean", "False")).toEqual({ clean: false });
  });

  it("rejects values outside a key's choices", () => {
    expect(() => applyConfigValue({}, "upgradeMode", "partial")).toThrow(
      ConfigError
    );
    expect(() => applyConfigValue({}, "clean", "maybe")).toThrow(
      "clean must be true or false, got: maybe"
    );
  });

  it("accepts every config update mode", () => {
    for (const mode of ["merge", "interactive", "dispatch", "ignore"]) {
      expect(applyConfigValue({}, "configUpdateMode", mode)).toEqual({
        configUpdateMode: mode,
      });
    }
  });
});
