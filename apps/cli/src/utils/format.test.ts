import {
  buildReport,
  countPackages,
  type PackageRecord,
  parsePackageLine,
  splitSections,
} from "@emergelog/parser";
import { describe, expect, it } from "vitest";
import {
  formatCounts,
  formatDuration,
  formatDurationMs,
  formatRecord,
  formatReport,
  formatSections,
  sectionsToJSON,
} from "./format.js";

const record = (line: string): PackageRecord => {
  const parsed = parsePackageLine(line);
  if (!parsed) {
    throw new Error(`not a package line: ${line}`);
  }
  return parsed;
};

const UPDATE_LINE =
  '[ebuild     U  ] app-editors/nano-8.2::gentoo [8.1::gentoo] USE="ncurses -debug" 1,612 KiB';
const NEW_LINE = "[ebuild  N     ] dev-libs/foo-1.0::gentoo 100 KiB";
const BLOCKS_LINE = "[blocks B      ] !a/b c/d";
const UNINSTALL_LINE = "[uninstall     ] perl-core/Compress-Raw-Zlib-2.202.0::gentoo";

describe("formatDuration", () => {
  it("formats seconds under 60", () => {
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(59)).toBe("59s");
  });

  it("formats minutes and seconds", () => {
    expect(formatDuration(90)).toBe("1m 30s");
    expect(formatDuration(3661)).toBe("61m 1s");
  });
});

describe("formatDurationMs", () => {
  it("formats milliseconds under 60 seconds with decimal", () => {
    expect(formatDurationMs(1500)).toBe("1.5s");
  });

  it("formats minutes and seconds without decimal", () => {
    expect(formatDurationMs(90_000)).toBe("1m 30s");
  });
});

describe("formatSections", () => {
  it("aligns line counts after the longest name", () => {
    const sections = new Map<string, string[]>([
      ["beginning", ["a", "b"]],
      ["{{ CLEAN UP }}", []],
    ]);

    expect(formatSections(sections)).toEqual([
      "beginning       2",
      "{{ CLEAN UP }}  0",
    ]);
  });

  it("converts to a plain object in section order", () => {
    const sections = new Map<string, string[]>([
      ["beginning", ["a"]],
      ["final", ["Killed"]],
    ]);

    expect(sectionsToJSON(sections)).toEqual({
      beginning: ["a"],
      final: ["Killed"],
    });
  });
});

describe("formatRecord", () => {
  it("shows both versions, repo and attributes of an update", () => {
    expect(formatRecord(record(UPDATE_LINE))).toBe(
      '[ebuild U] app-editors/nano 8.1 -> 8.2 ::gentoo USE="ncurses -debug"'
    );
  });

  it("shows only the new version of a new package", () => {
    expect(formatRecord(record(NEW_LINE))).toBe(
      "[ebuild N] dev-libs/foo 1.0 ::gentoo"
    );
  });

  it("shows the blocked package of a blocker", () => {
    expect(formatRecord(record(BLOCKS_LINE))).toBe("[blocks] a/b blocks c/d");
  });

  it("shows the atom of an uninstall", () => {
    expect(formatRecord(record(UNINSTALL_LINE))).toBe(
      "[uninstall] perl-core/Compress-Raw-Zlib-2.202.0 ::gentoo"
    );
  });
});

describe("formatCounts", () => {
  it("summarises kinds and statuses", () => {
    const counts = countPackages([
      record(UPDATE_LINE),
      record(NEW_LINE),
      record(BLOCKS_LINE),
    ]);

    expect(formatCounts(counts)).toBe(
      "3 packages (2 ebuild, 1 blocks, 0 uninstall); 1 updated, 1 new, 0 re-emerged"
    );
  });

  it("uses the singular for one package", () => {
    expect(formatCounts(countPackages([record(NEW_LINE)]))).toBe(
      "1 package (1 ebuild, 0 blocks, 0 uninstall); 0 updated, 1 new, 0 re-emerged"
    );
  });
});

describe("formatReport", () => {
  const marked = (payload: string): string =>
    `[19-Oct-26 03:00:01 INFO] ::: ${payload}`;

  it("lists outcome, packages, elogs and news without color", () => {
    const report = buildReport(
      splitSections([
        marked("{{ SYSTEM UPGRADE }}"),
        marked("emerge pretend was successful, upgrading..."),
        marked(UPDATE_LINE),
        marked("{{ READ ELOGS }}"),
        marked(">>> Log filename: app-editors:nano-8.2:20261019-030101.log"),
        marked(">>> Log start <<<"),
        marked("INFO: postinst"),
        marked(">>> Log end <<<"),
        marked("{{ READ NEWS }}"),
        marked("No news is good news."),
      ])
    );

    expect(formatReport(report)).toEqual([
      "Upgrade: full {{ SYSTEM UPGRADE }}",
      "Pretend: passed",
      "Packages: 1 package (1 ebuild, 0 blocks, 0 uninstall); 1 updated, 0 new, 0 re-emerged",
      '  [ebuild U] app-editors/nano 8.1 -> 8.2 ::gentoo USE="ncurses -debug"',
      "Elogs: 1",
      "  app-editors:nano-8.2:20261019-030101.log (1 lines)",
      "News: 1 lines",
    ]);
  });

  it("shows the security outcome, malformed lines and the trailer", () => {
    const report = buildReport(
      splitSections([
        marked("{{ SECURITY UPGRADES }}"),
        marked("No affected GLSAs found."),
        marked("[uninstall     ]"),
        "Terminated",
      ])
    );

    expect(formatReport(report)).toEqual([
      "Upgrade: security {{ SECURITY UPGRADES }}",
      "Security: no-affected",
      "Packages: 0 packages (0 ebuild, 0 blocks, 0 uninstall); 0 updated, 0 new, 0 re-emerged",
      "Malformed lines: 1",
      "  malformed package line (section {{ SECURITY UPGRADES }}, line 1): missing package atom: [uninstall     ]",
      "Elogs: 0",
      "News: 0 lines",
      "Last output: Terminated",
    ]);
  });

  it("shows the update outcome of an older log", () => {
    const report = buildReport(
      splitSections([
        marked("{{ PRETEND EMERGE }}"),
        marked("emerge pretend was successful, updating..."),
        marked("{{ UPDATE SYSTEM }}"),
        marked("Running update"),
        marked("emerge @world"),
        marked("update was successful"),
      ])
    );

    expect(formatReport(report).slice(0, 3)).toEqual([
      "Upgrade: full {{ UPDATE SYSTEM }}",
      "Pretend: passed",
      "Update: successful",
    ]);
  });

  it("colors the outcome when enabled", () => {
    const report = buildReport(
      splitSections([
        marked("{{ SYSTEM UPGRADE }}"),
        marked("emerge pretend has failed, not upgrading"),
      ])
    );

    expect(formatReport(report, true)[1]).toBe(
      "Pretend: \x1b[38;2;255;95;95mfailed\x1b[0m"
    );
  });
});
