import { fs, vol } from "memfs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { LogFileNotFoundError } from "./errors.js";
import { readLogSections } from "./log-file.js";

vi.mock("node:fs", () => fs);

describe("readLogSections", () => {
  afterEach(() => {
    vol.reset();
  });

  it("splits the file's lines into sections", () => {
    vol.fromJSON({
      "/logs/log_2026-10-19-03-00": [
        "[19-Oct-26 03:00:01 INFO] ::: starting",
        "[19-Oct-26 03:00:02 INFO] ::: {{ CLEAN UP }}",
        "[19-Oct-26 03:00:03 INFO] ::: removing kernels",
        "",
      ].join("\n"),
    });

    const sections = readLogSections("/logs/log_2026-10-19-03-00");

    expect([...sections.entries()]).toEqual([
      ["beginning", ["starting"]],
      ["{{ CLEAN UP }}", ["removing kernels"]],
    ]);
  });

  it("throws LogFileNotFoundError for a missing file", () => {
    expect(() => readLogSections("/logs/missing")).toThrow(
      LogFileNotFoundError
    );
    expect(() => readLogSections("/logs/missing")).toThrow(
      "cannot read log /logs/missing: no such file"
    );
  });

  it("reports a directory", () => {
    vol.fromJSON({ "/logs/nested/file": "" });

    expect(() => readLogSections("/logs/nested")).toThrow(
      "cannot read log /logs/nested: is a directory"
    );
  });
});
