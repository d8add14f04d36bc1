import type { GitHubPullRequest } from "./github";

/**
 * Kinds of article-level conflict between two pull requests.
 *
 * @remarks
 * Declaration order is significant: it is the first key of the conflict
 * ordering used for deterministic output.
 *
 * - `ExistingChange`: both pulls modify the same localized file.
 *   Trigger is the new pull, original is the existing pull.
 * - `NewOriginalChange`: the new pull changes an original whose translation
 *   is open in the existing pull. Trigger is the existing (translation) pull,
 *   original is the new pull.
 * - `ExistingOriginalChange`: the new pull changes a translation whose
 *   original is being changed by the existing pull. Trigger is the new pull,
 *   original is the existing pull.
 */
export const CONFLICT_TYPES = [
  "ExistingChange",
  "NewOriginalChange",
  "ExistingOriginalChange",
] as const;

/**
 * Closed set of conflict kinds.
 */
export type ConflictType = (typeof CONFLICT_TYPES)[number];

/**
 * A detected overlap between two pull requests.
 *
 * All fields are readonly; conflicts are values.
 */
export interface Conflict {
  /** Kind of conflict. */
  readonly kind: ConflictType;
  /** Pull request that gets notified and is expected to adjust. */
  readonly trigger: number;
  /** Pull request considered authoritative. */
  readonly original: number;
  /** Web URL of the `original` pull request. */
  readonly referenceUrl: string;
  /** Sorted, unique article file paths involved in the conflict. */
  readonly fileSet: readonly string[];
}

/**
 * One changed file from a parsed unified diff.
 */
export interface PatchedFile {
  /** Raw `---` side, e.g. `a/guide/en.md` or `/dev/null`. */
  readonly sourceFile: string;
  /** Raw `+++` side, e.g. `b/guide/en.md` or `/dev/null`. */
  readonly targetFile: string;
  /** Repository-relative path with the `a/`/`b/` prefix removed. */
  readonly path: string;
  /** Whether git reported the file as binary. */
  readonly isBinary: boolean;
  /** Hunk headers in diff order. */
  readonly hunks: readonly string[];
}

/**
 * Parsed unified diff of a whole pull request.
 */
export interface PatchSet {
  readonly files: readonly PatchedFile[];
}

/**
 * Pull request with its diff attached out of band.
 *
 * `diff` is `null` until fetched; conflict detection requires it.
 */
export interface DiffedPullRequest extends GitHubPullRequest {
  diff: PatchSet | null;
}
