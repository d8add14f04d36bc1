import {
  CONFLICT_TYPES,
  type Conflict,
  type DiffedPullRequest,
  type PatchSet,
} from "@docwatch/shared-types";

import {
  Article,
  compareStrings,
  DEFAULT_ARTICLE_EXTENSION,
  type ArticleOptions,
} from "./article";
import { MissingDiffError } from "./errors";

/**
 * Compares two pull requests and classifies their article-level overlaps.
 *
 * @remarks
 * `newPull` is the pull request that triggered the check; `otherPull` is an
 * already open one. At most one conflict per kind is returned, sorted with
 * {@link compareConflicts}. Files outside an article directory or without
 * the article extension never take part.
 *
 * The function is pure, so comparisons of different pairs may run
 * concurrently.
 *
 * @param newPull - Pull request being checked, with its diff attached.
 * @param otherPull - Other open pull request, with its diff attached.
 * @param options - Article naming conventions.
 * @returns Conflicts in deterministic order, empty when nothing overlaps.
 * @throws {@link MissingDiffError} when either pull has no diff.
 * @throws {@link MalformedPathError} when an article file has no stem.
 */
export function comparePullRequests(
  newPull: DiffedPullRequest,
  otherPull: DiffedPullRequest,
  options: ArticleOptions = {},
): Conflict[] {
  const incomingArticles = collectArticles(requireDiff(newPull), options);
  const otherArticlesByDirectory = groupByDirectory(
    collectArticles(requireDiff(otherPull), options),
  );

  const overlaps = new Set<string>();
  const originals = new Set<string>();
  const translations = new Set<string>();

  for (const incoming of incomingArticles) {
    const candidates = otherArticlesByDirectory.get(incoming.path) ?? [];

    for (const other of candidates) {
      if (incoming.equals(other)) {
        overlaps.add(incoming.filePath());
      } else if (incoming.isOriginal() && other.isTranslation()) {
        originals.add(incoming.filePath());
      } else if (incoming.isTranslation() && other.isOriginal()) {
        translations.add(incoming.filePath());
      }
    }
  }

  const conflicts: Conflict[] = [];
  if (overlaps.size > 0) {
    conflicts.push({
      kind: "ExistingChange",
      trigger: newPull.number,
      original: otherPull.number,
      referenceUrl: otherPull.html_url,
      fileSet: sortPaths(overlaps),
    });
  }
  if (originals.size > 0) {
    conflicts.push({
      kind: "NewOriginalChange",
      trigger: otherPull.number,
      original: newPull.number,
      referenceUrl: newPull.html_url,
      fileSet: sortPaths(originals),
    });
  }
  if (translations.size > 0) {
    conflicts.push({
      kind: "ExistingOriginalChange",
      trigger: newPull.number,
      original: otherPull.number,
      referenceUrl: otherPull.html_url,
      fileSet: sortPaths(translations),
    });
  }

  return conflicts.sort(compareConflicts);
}

/**
 * Total order over conflicts: kind (declaration order), trigger, original,
 * reference URL, then file set element by element.
 */
export function compareConflicts(left: Conflict, right: Conflict): number {
  return (
    CONFLICT_TYPES.indexOf(left.kind) - CONFLICT_TYPES.indexOf(right.kind) ||
    left.trigger - right.trigger ||
    left.original - right.original ||
    compareStrings(left.referenceUrl, right.referenceUrl) ||
    compareFileSets(left.fileSet, right.fileSet)
  );
}

/**
 * Whether a changed path can name an article file.
 *
 * @param filePath - Repository-relative path.
 * @param extension - Article extension including the dot.
 */
export function isArticleFile(
  filePath: string,
  extension: string = DEFAULT_ARTICLE_EXTENSION,
): boolean {
  return filePath.endsWith(extension) && filePath.indexOf("/") > 0;
}

function requireDiff(pullRequest: DiffedPullRequest): PatchSet {
  if (!pullRequest.diff) {
    throw new MissingDiffError(pullRequest.number);
  }
  return pullRequest.diff;
}

function collectArticles(diff: PatchSet, options: ArticleOptions): Article[] {
  const extension = options.extension ?? DEFAULT_ARTICLE_EXTENSION;

  return diff.files
    .filter((file) => file.targetFile.endsWith(extension) && isArticleFile(file.path, extension))
    .map((file) => Article.fromPath(file.path, options));
}

function groupByDirectory(articles: readonly Article[]): Map<string, Article[]> {
  const groups = new Map<string, Article[]>();
  for (const article of articles) {
    const group = groups.get(article.path);
    if (group) {
      group.push(article);
    } else {
      groups.set(article.path, [article]);
    }
  }
  return groups;
}

function sortPaths(paths: ReadonlySet<string>): string[] {
  return [...paths].sort(compareStrings);
}

function compareFileSets(left: readonly string[], right: readonly string[]): number {
  const sharedLength = Math.min(left.length, right.length);
  for (let index = 0; index < sharedLength; index += 1) {
    const order = compareStrings(left[index] ?? "", right[index] ?? "");
    if (order !== 0) {
      return order;
    }
  }
  return left.length - right.length;
}
