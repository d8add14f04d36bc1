import type { PatchedFile, PatchSet } from "@docwatch/shared-types";

import { DiffParseError } from "./errors";

const DEV_NULL = "/dev/null";
const QUOTED_PATH = String.raw`"(?:[^"\\]|\\.)*"`;
// Either side may be C-quoted by git when the path holds special bytes.
const FILE_HEADER_PATTERN = new RegExp(
  `^diff --git (${QUOTED_PATH}|a/.+?) (${QUOTED_PATH}|b/.+)$`,
);
const C_ESCAPES: Readonly<Record<string, number>> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  "\\": 0x5c,
};
const HUNK_HEADER_PATTERN = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/;

type FileSection = {
  sourceFile: string;
  targetFile: string;
  isBinary: boolean;
  inHunks: boolean;
  hunks: string[];
};

/**
 * Parses the git unified diff GitHub serves for a pull request.
 *
 * @remarks
 * Only the file-level structure is kept: paths, binary marker and hunk
 * headers. Hunk bodies are skipped, but a line beginning with `@@` must be a
 * well-formed hunk header.
 *
 * @param diffText - Raw `.diff` response body.
 * @returns Changed files in diff order. Blank input yields no files.
 * @throws {@link DiffParseError} when the text is not a git unified diff.
 */
export function parsePatchSet(diffText: string): PatchSet {
  if (!diffText.trim()) {
    return { files: [] };
  }

  const files: PatchedFile[] = [];
  const lines = diffText.split(/\r?\n/);
  let current: FileSection | null = null;

  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;

    if (line.startsWith("diff --git ")) {
      if (current) {
        files.push(toPatchedFile(current));
      }
      current = startSection(line, lineNumber);
      continue;
    }

    if (!current) {
      if (line.trim()) {
        throw new DiffParseError(lineNumber, "expected a `diff --git` file header");
      }
      continue;
    }

    if (line.startsWith("@@")) {
      if (!HUNK_HEADER_PATTERN.test(line)) {
        throw new DiffParseError(lineNumber, `malformed hunk header "${line}"`);
      }
      current.inHunks = true;
      current.hunks.push(line);
      continue;
    }

    if (current.inHunks) {
      continue;
    }

    applyExtendedHeader(current, line);
  }

  if (current) {
    files.push(toPatchedFile(current));
  }

  return { files };
}

function startSection(line: string, lineNumber: number): FileSection {
  const match = FILE_HEADER_PATTERN.exec(line);
  const sourceFile = match?.[1] === undefined ? null : unquotePath(match[1]);
  const targetFile = match?.[2] === undefined ? null : unquotePath(match[2]);
  if (!sourceFile?.startsWith("a/") || !targetFile?.startsWith("b/")) {
    throw new DiffParseError(lineNumber, `malformed file header "${line}"`);
  }

  return {
    sourceFile,
    targetFile,
    isBinary: false,
    inHunks: false,
    hunks: [],
  };
}

function applyExtendedHeader(section: FileSection, line: string): void {
  if (line.startsWith("new file mode")) {
    section.sourceFile = DEV_NULL;
  } else if (line.startsWith("deleted file mode")) {
    section.targetFile = DEV_NULL;
  } else if (line.startsWith("rename from ")) {
    section.sourceFile = `a/${unquotePath(line.slice("rename from ".length))}`;
  } else if (line.startsWith("rename to ")) {
    section.targetFile = `b/${unquotePath(line.slice("rename to ".length))}`;
  } else if (line.startsWith("--- ")) {
    section.sourceFile = unquotePath(stripTimestamp(line.slice("--- ".length)));
  } else if (line.startsWith("+++ ")) {
    section.targetFile = unquotePath(stripTimestamp(line.slice("+++ ".length)));
  } else if (line.startsWith("Binary files ") || line === "GIT binary patch") {
    section.isBinary = true;
  }
}

function toPatchedFile(section: FileSection): PatchedFile {
  const livePath =
    section.targetFile === DEV_NULL ? section.sourceFile : section.targetFile;

  return {
    sourceFile: section.sourceFile,
    targetFile: section.targetFile,
    path: stripSidePrefix(livePath),
    isBinary: section.isBinary,
    hunks: section.hunks,
  };
}

function stripTimestamp(value: string): string {
  const tabIndex = value.indexOf("\t");
  return tabIndex === -1 ? value : value.slice(0, tabIndex);
}

function stripSidePrefix(value: string): string {
  return value.startsWith("a/") || value.startsWith("b/") ? value.slice(2) : value;
}

/**
 * Decodes a path git wrapped in double quotes. Octal escapes are raw bytes
 * of the UTF-8 encoded name. Unquoted values are returned as they are.
 */
export function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }

  const bytes: number[] = [];
  const chars = [...value.slice(1, -1)];
  for (let index = 0; index < chars.length; index += 1) {
    const char = chars[index] ?? "";
    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      continue;
    }

    const octal = /^[0-7]{1,3}/.exec(chars.slice(index + 1, index + 4).join(""))?.[0];
    if (octal) {
      bytes.push(Number.parseInt(octal, 8) & 0xff);
      index += octal.length;
      continue;
    }

    const escaped = chars[index + 1];
    if (escaped === undefined) {
      bytes.push(0x5c);
      continue;
    }
    bytes.push(C_ESCAPES[escaped] ?? escaped.charCodeAt(0));
    index += 1;
  }

  return Buffer.from(bytes).toString("utf8");
}
