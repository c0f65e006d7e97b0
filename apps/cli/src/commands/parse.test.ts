import { describe, expect, it } from "vitest";
import { CliError } from "../lib/errors.js";
import { resolveSectionName } from "./parse.js";

const sections = new Map<string, string[]>([
  ["beginning", []],
  ["{{ SYNC PORTAGE TREE }}", ["Syncing"]],
  ["{{ SECURITY UPGRADES }}", ["No affected GLSAs found."]],
]);

describe("resolveSectionName", () => {
  it("defaults to the upgrade section", () => {
    expect(resolveSectionName(sections, undefined)).toBe(
      "{{ SECURITY UPGRADES }}"
    );
  });

  it("returns a requested section that exists", () => {
    expect(resolveSectionName(sections, "{{ SYNC PORTAGE TREE }}")).toBe(
      "{{ SYNC PORTAGE TREE }}"
    );
  });

  it("rejects a missing section", () => {
    expect(() => resolveSectionName(sections, "{{ CLEAN UP }}")).toThrow(
      "no section named {{ CLEAN UP }} in log"
    );
  });

  it("asks for --section when the log has no upgrade section", () => {
    expect(() =>
      resolveSectionName(new Map([["beginning", []]]), undefined)
    ).toThrow(CliError);
  });
});
