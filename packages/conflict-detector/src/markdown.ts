import type { Conflict, ConflictType } from "@docwatch/shared-types";

/**
 * Number of files listed in a comment before the list is replaced by a
 * count notice.
 */
export const DEFAULT_MAX_LISTED_FILES = 10;

/**
 * Explanation paragraph for each conflict kind.
 */
export const CONFLICT_TEMPLATES: Readonly<Record<ConflictType, string>> = {
  ExistingChange:
    "Another open pull request already changes the same article files. " +
    "Please coordinate with its author and review the overlap before either change is merged.",
  NewOriginalChange:
    "A newer pull request changes the original version of articles this pull request translates. " +
    "Once it is merged, please update the translation to match.",
  ExistingOriginalChange:
    "The original version of articles translated here is being changed by another open pull request. " +
    "Please follow it and bring this translation up to date once it is merged.",
};

const HEADER_TITLES: Readonly<Record<ConflictType, string>> = {
  ExistingChange: "Edit conflict",
  NewOriginalChange: "Original article changed",
  ExistingOriginalChange: "Original article is being changed",
};

/**
 * Options for comment rendering.
 */
export interface RenderConflictCommentOptions {
  /**
   * Files listed before switching to a count notice.
   *
   * @defaultValue `10`
   */
  readonly maxListedFiles?: number;
}

/**
 * Renders the comment header: a hidden marker identifying the conflict and
 * a heading naming the referenced pull request.
 */
export function renderCommentHeader(conflict: Conflict): string {
  const marker = `<!-- docwatch:${conflict.kind}:${conflict.original} -->`;
  return `${marker}\n### ${HEADER_TITLES[conflict.kind]} (#${conflict.original})`;
}

/**
 * Renders the markdown body posted on the `trigger` pull request.
 *
 * @param conflict - Conflict to describe.
 * @param options - Rendering options.
 * @returns Markdown comment body.
 */
export function renderConflictComment(
  conflict: Conflict,
  options: RenderConflictCommentOptions = {},
): string {
  const maxListedFiles = options.maxListedFiles ?? DEFAULT_MAX_LISTED_FILES;
  const lines = [renderCommentHeader(conflict), "", CONFLICT_TEMPLATES[conflict.kind], ""];

  if (conflict.fileSet.length > maxListedFiles) {
    lines.push(`- ${conflict.referenceUrl} (>${maxListedFiles} files)`);
  } else {
    const indent = "  ";
    lines.push(`- ${conflict.referenceUrl}, files:`);
    lines.push(`${indent}\`\`\``);
    for (const filePath of conflict.fileSet) {
      lines.push(`${indent}${filePath}`);
    }
    lines.push(`${indent}\`\`\``);
  }

  return lines.join("\n");
}
