import { describe, expect, test } from "vitest";

import { parsePatchSet, unquotePath } from "./diff";
import { DiffParseError } from "./errors";

const QUOTED_NON_ASCII = [
  'diff --git "a/wiki/Caf\\303\\251/fr.md" "b/wiki/Caf\\303\\251/fr.md"',
  "index 3b18e51..a9f2c3d 100644",
  '--- "a/wiki/Caf\\303\\251/fr.md"',
  '+++ "b/wiki/Caf\\303\\251/fr.md"',
  "@@ -1 +1 @@",
  "-Ancien",
  "+Nouveau",
  "diff --git a/guide/en.md b/guide/en.md",
  "--- a/guide/en.md",
  "+++ b/guide/en.md",
  "@@ -1 +1 @@",
  "-old",
  "+new",
].join("\n");

const MODIFIED_AND_ADDED = [
  "diff --git a/guide/en.md b/guide/en.md",
  "index 3b18e51..a9f2c3d 100644",
  "--- a/guide/en.md",
  "+++ b/guide/en.md",
  "@@ -1,3 +1,4 @@",
  " # Guide",
  "+A new paragraph.",
  "--- a removed markdown rule line",
  "diff --git a/guide/es.md b/guide/es.md",
  "new file mode 100644",
  "index 0000000..e69de29",
  "--- /dev/null",
  "+++ b/guide/es.md",
  "@@ -0,0 +1 @@",
  "+# Guía",
  "",
].join("\n");

describe("parsePatchSet", () => {
  test("returns no files for blank input", () => {
    expect(parsePatchSet("")).toEqual({ files: [] });
    expect(parsePatchSet("\n  \n")).toEqual({ files: [] });
  });

  test("parses modified and added files in order", () => {
    const patchSet = parsePatchSet(MODIFIED_AND_ADDED);

    expect(patchSet.files).toEqual([
      {
        sourceFile: "a/guide/en.md",
        targetFile: "b/guide/en.md",
        path: "guide/en.md",
        isBinary: false,
        hunks: ["@@ -1,3 +1,4 @@"],
      },
      {
        sourceFile: "/dev/null",
        targetFile: "b/guide/es.md",
        path: "guide/es.md",
        isBinary: false,
        hunks: ["@@ -0,0 +1 @@"],
      },
    ]);
  });

  test("points deleted files at /dev/null and keeps their path", () => {
    const patchSet = parsePatchSet(
      [
        "diff --git a/old/fr.md b/old/fr.md",
        "deleted file mode 100644",
        "index e69de29..0000000",
        "--- a/old/fr.md",
        "+++ /dev/null",
        "@@ -1 +0,0 @@",
        "-# Ancien",
      ].join("\n"),
    );

    expect(patchSet.files[0]!.targetFile).toBe("/dev/null");
    expect(patchSet.files[0]!.path).toBe("old/fr.md");
  });

  test("uses rename headers when no content changed", () => {
    const patchSet = parsePatchSet(
      [
        "diff --git a/wiki/Old/en.md b/wiki/New/en.md",
        "similarity index 100%",
        "rename from wiki/Old/en.md",
        "rename to wiki/New/en.md",
      ].join("\n"),
    );

    expect(patchSet.files[0]!.sourceFile).toBe("a/wiki/Old/en.md");
    expect(patchSet.files[0]!.targetFile).toBe("b/wiki/New/en.md");
    expect(patchSet.files[0]!.path).toBe("wiki/New/en.md");
  });

  test("marks binary files", () => {
    const patchSet = parsePatchSet(
      [
        "diff --git a/img/logo.png b/img/logo.png",
        "index 1111111..2222222 100644",
        "Binary files a/img/logo.png and b/img/logo.png differ",
      ].join("\n"),
    );

    expect(patchSet.files[0]!.isBinary).toBe(true);
    expect(patchSet.files[0]!.hunks).toEqual([]);
  });

  test("rejects text that is not a git diff", () => {
    expect(() => parsePatchSet("<!DOCTYPE html><html></html>")).toThrow(DiffParseError);
  });

  test("rejects a malformed hunk header with its line number", () => {
    let thrownError: unknown;
    try {
      parsePatchSet(
        ["diff --git a/guide/en.md b/guide/en.md", "--- a/guide/en.md", "+++ b/guide/en.md", "@@ broken @@"].join(
          "\n",
        ),
      );
    } catch (error) {
      thrownError = error;
    }

    expect(thrownError).toBeInstanceOf(DiffParseError);
    expect((thrownError as DiffParseError).lineNumber).toBe(4);
  });

  test("rejects a malformed file header", () => {
    expect(() => parsePatchSet("diff --git guide/en.md")).toThrow(DiffParseError);
  });

  test("decodes git-quoted paths with octal UTF-8 escapes", () => {
    const patchSet = parsePatchSet(QUOTED_NON_ASCII);

    expect(patchSet.files.map((file) => [file.sourceFile, file.targetFile, file.path])).toEqual([
      ["a/wiki/Café/fr.md", "b/wiki/Café/fr.md", "wiki/Café/fr.md"],
      ["a/guide/en.md", "b/guide/en.md", "guide/en.md"],
    ]);
  });

  test("accepts a header with only one side quoted and quoted rename lines", () => {
    const patchSet = parsePatchSet(
      [
        'diff --git a/wiki/Old/en.md "b/wiki/Caf\\303\\251/en.md"',
        "similarity index 100%",
        "rename from wiki/Old/en.md",
        'rename to "wiki/Caf\\303\\251/en.md"',
      ].join("\n"),
    );

    expect(patchSet.files[0]!.sourceFile).toBe("a/wiki/Old/en.md");
    expect(patchSet.files[0]!.targetFile).toBe("b/wiki/Caf\u00e9/en.md");
  });
});

describe("unquotePath", () => {
  test("returns bare paths unchanged", () => {
    expect(unquotePath("a/guide/en.md")).toBe("a/guide/en.md");
  });

  test("decodes C escapes", () => {
    expect(unquotePath('"a/notes/tab\\there \\"x\\" \\\\.md"')).toBe('a/notes/tab\there "x" \\.md');
  });
});
