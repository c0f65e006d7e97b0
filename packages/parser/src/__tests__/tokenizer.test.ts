import { describe, expect, it } from "vitest";
import { tokenize } from "../tokenizer.js";

describe("tokenize", () => {
  it("keeps bracketed status tokens whole", () => {
    expect(
      tokenize(
        "[ebuild     U  ] sys-devel/gnuconfig-20230731::gentoo [20230121::gentoo] 72 KiB"
      )
    ).toEqual([
      "[ebuild     U  ]",
      "sys-devel/gnuconfig-20230731::gentoo",
      "[20230121::gentoo]",
      "72",
      "KiB",
    ]);
  });

  it("keeps quoted values whole", () => {
    expect(
      tokenize(
        '[ebuild  N     ] dev-libs/foo-1.0::gentoo  USE="X -doc" 100 KiB'
      )
    ).toEqual([
      "[ebuild  N     ]",
      "dev-libs/foo-1.0::gentoo",
      'USE="X -doc"',
      "100",
      "KiB",
    ]);
  });

  it("keeps a quoted span that opens mid-token", () => {
    expect(
      tokenize(
        '[blocks b      ] <a/b-1 ("<a/b-1" is soft blocking c/d-2)'
      )
    ).toEqual([
      "[blocks b      ]",
      "<a/b-1",
      '("<a/b-1"',
      "is",
      "soft",
      "blocking",
      "c/d-2)",
    ]);
  });

  it("collapses runs of spaces outside quotes and brackets", () => {
    expect(tokenize("  a   b  ")).toEqual(["a", "b"]);
  });

  it("returns no tokens for an empty line", () => {
    expect(tokenize("")).toEqual([]);
    expect(tokenize("   ")).toEqual([]);
  });

  it("returns a single token unchanged", () => {
    expect(tokenize("sys-devel/gcc")).toEqual(["sys-devel/gcc"]);
    expect(tokenize(tokenize("sys-devel/gcc")[0] ?? "")).toEqual([
      "sys-devel/gcc",
    ]);
  });

  it("reproduces a balanced line when tokens are re-joined", () => {
    const line =
      '[ebuild   R    ] media-libs/libpng-1.6.43::gentoo USE="-apng (-static-libs)" 0 KiB';

    expect(tokenize(line).join(" ")).toBe(line);
  });

  // Unbalanced input is not rejected: the rest of the line becomes one token
  it("swallows the rest of the line after an unclosed quote", () => {
    expect(tokenize('a "b c d')).toEqual(["a", '"b c d']);
  });

  it("swallows the rest of the line after an unclosed bracket", () => {
    expect(tokenize("[ebuild x y")).toEqual(["[ebuild x y"]);
  });

  it("splits again once a stray closing bracket is rebalanced", () => {
    // depth goes to -1 at "]" and back to 0 at "["
    expect(tokenize("a] b [c d")).toEqual(["a] b [c", "d"]);
  });
});
