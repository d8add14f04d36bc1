import { MalformedPathError } from "./errors";

/**
 * Language code of original (untranslated) articles.
 */
export const DEFAULT_SOURCE_LANGUAGE = "en";

/**
 * File extension shared by every article file.
 */
export const DEFAULT_ARTICLE_EXTENSION = ".md";

/**
 * Article naming conventions of the watched repository.
 */
export interface ArticleOptions {
  /**
   * Language code of originals.
   *
   * @defaultValue `"en"`
   */
  readonly sourceLanguage?: string;
  /**
   * Extension of article files, including the leading dot.
   *
   * @defaultValue `".md"`
   */
  readonly extension?: string;
}

/**
 * One localized version of an article.
 *
 * @remarks
 * The article identity is its directory; the file stem is the language code,
 * so `wiki/Guide/es.md` is the Spanish translation of `wiki/Guide`.
 */
export class Article {
  /** Article directory, e.g. `wiki/Guide`. */
  public readonly path: string;
  /** Language code taken from the file stem, e.g. `es`. */
  public readonly language: string;

  private readonly sourceLanguage: string;
  private readonly extension: string;

  public constructor(path: string, language: string, options: ArticleOptions = {}) {
    this.path = path;
    this.language = language;
    this.sourceLanguage = options.sourceLanguage ?? DEFAULT_SOURCE_LANGUAGE;
    this.extension = options.extension ?? DEFAULT_ARTICLE_EXTENSION;
  }

  /**
   * Parses a repository-relative file path into an article.
   *
   * @param filePath - Path such as `docs/intro/en.md`.
   * @param options - Naming conventions.
   * @throws {@link MalformedPathError} when the path has no parent directory
   * or no file stem.
   */
  public static fromPath(filePath: string, options: ArticleOptions = {}): Article {
    if (!filePath) {
      throw new MalformedPathError(filePath, "path is empty");
    }

    const separatorIndex = filePath.lastIndexOf("/");
    if (separatorIndex <= 0) {
      throw new MalformedPathError(filePath, "no parent directory");
    }

    const directory = filePath.slice(0, separatorIndex);
    const fileName = filePath.slice(separatorIndex + 1);
    const extensionIndex = fileName.lastIndexOf(".");
    const stem = extensionIndex > 0 ? fileName.slice(0, extensionIndex) : fileName;
    // `.md` on its own has an extension and nothing in front of it.
    if (!stem || extensionIndex === 0) {
      throw new MalformedPathError(filePath, "no file stem");
    }

    return new Article(directory, stem, options);
  }

  /**
   * Reconstructs the article file path.
   */
  public filePath(): string {
    return `${this.path}/${this.language}${this.extension}`;
  }

  public isOriginal(): boolean {
    return this.language === this.sourceLanguage;
  }

  public isTranslation(): boolean {
    return !this.isOriginal();
  }

  /**
   * Two articles are equal when both directory and language match.
   */
  public equals(other: Article): boolean {
    return this.path === other.path && this.language === other.language;
  }

  /**
   * Orders by directory, then language.
   */
  public compare(other: Article): number {
    return compareStrings(this.path, other.path) || compareStrings(this.language, other.language);
  }
}

/**
 * Code-unit string comparison, independent of the host locale.
 */
export function compareStrings(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}
