/**
 * Error raised when a changed file path cannot be read as an article.
 */
export class MalformedPathError extends Error {
  /**
   * Offending repository-relative path.
   */
  public readonly filePath: string;

  /**
   * @param filePath - Path that failed to parse.
   * @param details - What is missing from the path.
   */
  public constructor(filePath: string, details: string) {
    super(`Malformed article path "${filePath}": ${details}`);
    this.name = "MalformedPathError";
    this.filePath = filePath;
  }
}

/**
 * Error raised when diff text is not a git unified diff.
 */
export class DiffParseError extends Error {
  /**
   * One-indexed line number where parsing stopped.
   */
  public readonly lineNumber: number;

  /**
   * @param lineNumber - One-indexed line number in the diff text.
   * @param details - Parse failure details.
   */
  public constructor(lineNumber: number, details: string) {
    super(`Invalid unified diff at line ${lineNumber}: ${details}`);
    this.name = "DiffParseError";
    this.lineNumber = lineNumber;
  }
}

/**
 * Error raised when a pull request reaches conflict detection without its
 * diff attached.
 *
 * @remarks
 * Callers fetch diffs before comparing, so this signals a programming error
 * rather than a recoverable condition.
 */
export class MissingDiffError extends Error {
  /**
   * Number of the pull request lacking a diff.
   */
  public readonly pullRequestNumber: number;

  public constructor(pullRequestNumber: number) {
    super(`Pull request #${pullRequestNumber} has no diff attached`);
    this.name = "MissingDiffError";
    this.pullRequestNumber = pullRequestNumber;
  }
}
