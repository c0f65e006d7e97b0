/**
 * Tests for the run report.
 */

import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import {
  buildReport,
  countPackages,
  findUpgradeSection,
  legacyUpdateOutcome,
  legacyUpgradeMode,
  parseElogs,
  pretendOutcome,
  securityOutcome,
} from "../report.js";
import { splitLogText, splitSections } from "../sections.js";

// ============================================================================
// Test Helpers
// ============================================================================

const readFixture = (name: string): string =>
  readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");

const logged = (payload: string): string =>
  `[19-Oct-26 10:00:00 INFO] ::: ${payload}`;

// ============================================================================
// Test Suites
// ============================================================================

describe("buildReport", () => {
  const sections = splitSections(splitLogText(readFixture("full-upgrade.log")));
  const report = buildReport(sections);

  it("splits the fixture into the update script's sections", () => {
    expect([...sections.keys()]).toEqual([
      "beginning",
      "{{ SYNC PORTAGE TREE }}",
      "{{ SYSTEM UPGRADE }}",
      "{{ UPDATE SYSTEM CONFIGURATION FILES }}",
      "{{ CLEAN UP }}",
      "{{ RESTART SERVICES }}",
      "{{ READ ELOGS }}",
      "{{ READ NEWS }}",
      "final",
    ]);
  });

  it("summarises a full upgrade", () => {
    expect(report.upgradeMode).toBe("full");
    expect(report.upgradeSection).toBe("{{ SYSTEM UPGRADE }}");
    expect(report.pretend).toBe("passed");
    expect(report.security).toBe("not-run");
    expect(report.update).toBe("not-reported");
    expect(report.malformed).toEqual([]);
    expect(report.trailer).toBe("updater exited before writing its summary");
  });

  it("parses every package line of the upgrade section", () => {
    expect(report.packages.map((p) => [p.kind, p.name])).toEqual([
      ["ebuild", "sys-devel/gnuconfig"],
      ["ebuild", "dev-lang/perl"],
      ["ebuild", "dev-perl/Example-Module"],
      ["ebuild", "media-libs/libpng"],
      ["uninstall", "perl-core/Compress-Raw-Zlib-2.202.0"],
      ["blocks", "perl-core/Compress-Raw-Zlib-2.204.1_rc"],
    ]);
    expect(report.packages[1]).toEqual({
      kind: "ebuild",
      name: "dev-lang/perl",
      status: "Update",
      newVersion: "5.38.2-r1",
      oldVersion: "5.36.1-r3",
      repo: "gentoo",
      attributes: { USE: ["gdbm", "-berkdb", "-debug", "-doc"] },
    });
    expect(report.packages[3]).toEqual({
      kind: "ebuild",
      name: "media-libs/libpng",
      status: "ReEmerge",
      newVersion: "1.6.43",
      repo: "gentoo",
      attributes: {
        USE: ["-apng", "(-static-libs)"],
        ABI_X86: ["(64)", "-32"],
      },
    });
  });

  it("collects elogs and news", () => {
    expect(report.elogs).toEqual([
      {
        file: "/var/log/portage/elog/dev-lang:perl-5.38.2-r1:20261019-031002.log",
        lines: [
          "INFO: postinst",
          "Run perl-cleaner to rebuild modules for the new version.",
        ],
      },
    ]);
    expect(report.news).toEqual([
      "",
      "Getting important news",
      "No news is good news.",
      "emergelog completed its tasks",
    ]);
  });

  it("lists malformed package lines instead of failing", () => {
    const broken = buildReport(
      splitSections([
        logged("{{ SYSTEM UPGRADE }}"),
        logged("Running Upgrade: Check Pretend First"),
        logged("[ebuild     U  ]"),
        logged("emerge pretend has failed, not upgrading"),
      ])
    );

    expect(broken.pretend).toBe("failed");
    expect(broken.packages).toEqual([]);
    expect(broken.malformed).toEqual([
      "malformed package line (section {{ SYSTEM UPGRADE }}, line 1): missing package atom: [ebuild     U  ]",
    ]);
  });

  it("summarises a security upgrade", () => {
    const security = buildReport(
      splitSections([
        logged("{{ SECURITY UPGRADES }}"),
        logged(""),
        logged("Affected GLSAs found. Applying updates..."),
        logged("Updates applied."),
      ])
    );

    expect(security.upgradeMode).toBe("security");
    expect(security.security).toBe("applied");
    expect(security.pretend).toBe("not-run");
  });

  it("summarises an older full update log", () => {
    const legacy = buildReport(
      splitSections([
        logged("{{ PRETEND EMERGE }}"),
        logged("emerge pretend was successful, updating..."),
        logged("{{ UPDATE SYSTEM }}"),
        logged("Running update"),
        logged("emerge @world"),
        logged("update was successful"),
      ])
    );

    expect(legacy.upgradeMode).toBe("full");
    expect(legacy.upgradeSection).toBe("{{ UPDATE SYSTEM }}");
    expect(legacy.pretend).toBe("passed");
    expect(legacy.security).toBe("not-run");
    expect(legacy.update).toBe("successful");
  });

  it("summarises an older security update that failed", () => {
    const legacy = buildReport(
      splitSections([
        logged("{{ PRETEND EMERGE }}"),
        logged("Checking pretend"),
        logged("{{ UPDATE SYSTEM }}"),
        logged("Running update"),
        logged("glsa-check GLSA --fix affected"),
        logged("glsa-check exited with errors"),
      ])
    );

    expect(legacy.upgradeMode).toBe("security");
    expect(legacy.pretend).toBe("failed");
    expect(legacy.update).toBe("failed");
  });

  it("reports an unknown mode for a log without an upgrade section", () => {
    const empty = buildReport(splitSections([logged("hello")]));

    expect(empty.upgradeMode).toBe("unknown");
    expect(empty.upgradeSection).toBeUndefined();
    expect(empty.packages).toEqual([]);
    expect(empty.trailer).toBeUndefined();
  });
});

describe("findUpgradeSection", () => {
  it("falls back to the legacy update section", () => {
    const sections = splitSections([logged("{{ UPDATE SYSTEM }}")]);

    expect(findUpgradeSection(sections)).toEqual({
      mode: "unknown",
      name: "{{ UPDATE SYSTEM }}",
    });
  });

  it("reads the mode of the legacy update section", () => {
    const sections = splitSections([
      logged("{{ UPDATE SYSTEM }}"),
      logged("Running update"),
      logged("emerge @world"),
    ]);

    expect(findUpgradeSection(sections)).toEqual({
      mode: "full",
      name: "{{ UPDATE SYSTEM }}",
    });
  });
});

describe("legacyUpgradeMode", () => {
  it("maps the update type token", () => {
    expect(legacyUpgradeMode(["Running update", "emerge @world"])).toBe("full");
    expect(legacyUpgradeMode(["Running update", "glsa-check GLSA"])).toBe(
      "security"
    );
    expect(legacyUpgradeMode(["Running update", "emerge @system"])).toBe(
      "unknown"
    );
    expect(legacyUpgradeMode(["Running update"])).toBe("unknown");
  });
});

describe("legacyUpdateOutcome", () => {
  it("looks for the success line of the mode", () => {
    expect(legacyUpdateOutcome("full", ["update was successful"])).toBe(
      "successful"
    );
    expect(legacyUpdateOutcome("full", ["glsa update was successful"])).toBe(
      "failed"
    );
    expect(
      legacyUpdateOutcome("security", ["glsa update was successful"])
    ).toBe("successful");
    expect(legacyUpdateOutcome("unknown", ["update was successful"])).toBe(
      "not-reported"
    );
  });
});

describe("pretendOutcome", () => {
  it("accepts both wordings of success", () => {
    expect(pretendOutcome(["emerge pretend was successful, updating..."])).toBe(
      "passed"
    );
    expect(pretendOutcome(["emerge pretend was successful, upgrading..."])).toBe(
      "passed"
    );
  });

  it("returns not-run without a verdict line", () => {
    expect(pretendOutcome(["Running Upgrade: Check Pretend First"])).toBe(
      "not-run"
    );
  });
});

describe("securityOutcome", () => {
  it("classifies GLSA output", () => {
    expect(securityOutcome(["No affected GLSAs found."])).toBe("no-affected");
    expect(
      securityOutcome(["Affected GLSAs found. Applying updates..."])
    ).toBe("incomplete");
    expect(securityOutcome([])).toBe("not-run");
  });
});

describe("parseElogs", () => {
  it("runs an unterminated entry to the end of the section", () => {
    expect(
      parseElogs([
        "stray line",
        ">>> Log filename: /a.log",
        ">>> Log start <<<",
        "one",
        ">>> Log filename: /b.log",
        ">>> Log start <<<",
        "two",
      ])
    ).toEqual([
      { file: "/a.log", lines: ["one"] },
      { file: "/b.log", lines: ["two"] },
    ]);
  });

  it("skips a filename that never starts a body", () => {
    expect(parseElogs([">>> Log filename: /a.log", ">>> Log end <<<"])).toEqual(
      []
    );
  });
});

describe("countPackages", () => {
  it("counts records by kind and ebuild status", () => {
    const sections = splitSections(
      splitLogText(readFixture("full-upgrade.log"))
    );

    expect(countPackages(buildReport(sections).packages)).toEqual({
      total: 6,
      byKind: { ebuild: 4, blocks: 1, uninstall: 1 },
      byStatus: { NewPackage: 1, ReEmerge: 1, Update: 2, Undefined: 0 },
    });
  });
});
