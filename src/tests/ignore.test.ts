import {
  collectIgnoreOption,
  createIgnorer,
  isHiddenName,
  normalizeIgnorePatterns,
} from "../ignore.js";

describe("createIgnorer", () => {
  test("no rules ignore nothing", () => {
    const ig = createIgnorer();
    expect(ig.ignoresFile("a.tmp")).toBe(false);
    expect(ig.ignoresDir("cache")).toBe(false);
  });

  test("gitignore semantics for files and directories", () => {
    const ig = createIgnorer(["*.tmp", "build/", "/top-only.txt"]);
    expect(ig.ignoresFile("x.tmp")).toBe(true);
    expect(ig.ignoresFile("deep/down/x.tmp")).toBe(true);
    expect(ig.ignoresFile("x.txt")).toBe(false);
    expect(ig.ignoresDir("build")).toBe(true);
    expect(ig.ignoresDir("sub/build")).toBe(true);
    expect(ig.ignoresFile("build")).toBe(false);
    expect(ig.ignoresFile("top-only.txt")).toBe(true);
    expect(ig.ignoresFile("sub/top-only.txt")).toBe(false);
  });

  test("the root itself is never ignored", () => {
    const ig = createIgnorer(["*"]);
    expect(ig.ignoresDir("")).toBe(false);
    expect(ig.ignoresFile("anything")).toBe(true);
  });
});

describe("ignore option helpers", () => {
  test("patterns are trimmed and deduplicated", () => {
    expect(normalizeIgnorePatterns([" *.tmp ", "", "*.tmp", "a\\b"])).toEqual([
      "*.tmp",
      "a/b",
    ]);
  });

  test("collectIgnoreOption splits on commas", () => {
    expect(collectIgnoreOption("a, b,,c", ["x"])).toEqual(["x", "a", "b", "c"]);
  });

  test("dot names are hidden", () => {
    expect(isHiddenName(".env")).toBe(true);
    expect(isHiddenName("env")).toBe(false);
  });
});
