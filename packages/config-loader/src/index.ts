import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { parseDocument } from "yaml";

/**
 * Filename used for docwatch configuration.
 */
export const DEFAULT_CONFIG_FILE_NAME = ".docwatch.yml";

/**
 * Article naming conventions of the watched repository.
 */
export interface DocwatchArticlesConfig {
  /**
   * Language code of original articles.
   */
  sourceLanguage: string;
  /**
   * Article file extension, including the leading dot.
   */
  extension: string;
}

/**
 * Conflict comment settings.
 */
export interface DocwatchCommentsConfig {
  /**
   * Files listed in a comment before the list collapses to a count notice.
   */
  maxListedFiles: number;
}

/**
 * Normalized docwatch configuration.
 */
export interface DocwatchConfig {
  articles: DocwatchArticlesConfig;
  comments: DocwatchCommentsConfig;
}

/**
 * Optional loader arguments for resolving config location.
 */
export interface LoadDocwatchConfigOptions {
  /**
   * Base directory where `.docwatch.yml` is resolved.
   */
  workingDirectory?: string;
  /**
   * Override for config filename.
   */
  fileName?: string;
}

/**
 * Error raised when reading the config file fails.
 */
export class DocwatchConfigReadError extends Error {
  /**
   * Absolute path to the config file.
   */
  filePath: string;

  /**
   * Creates a read error with location context.
   *
   * @param filePath - Absolute path to config file.
   * @param details - Read failure details.
   * @param cause - Optional underlying error.
   */
  constructor(filePath: string, details: string, cause?: unknown) {
    super(`Unable to read docwatch config in ${filePath}: ${details}`, { cause });
    this.name = "DocwatchConfigReadError";
    this.filePath = filePath;
  }
}

/**
 * Error raised when YAML parsing fails.
 */
export class DocwatchConfigParseError extends Error {
  /**
   * Absolute path to the config file.
   */
  filePath: string;

  constructor(filePath: string, details: string) {
    super(`Invalid docwatch YAML in ${filePath}: ${details}`);
    this.name = "DocwatchConfigParseError";
    this.filePath = filePath;
  }
}

/**
 * Error raised when parsed config does not satisfy schema constraints.
 */
export class DocwatchConfigValidationError extends Error {
  /**
   * Absolute path to the config file.
   */
  filePath: string;

  constructor(filePath: string, details: string) {
    super(`Invalid docwatch config in ${filePath}: ${details}`);
    this.name = "DocwatchConfigValidationError";
    this.filePath = filePath;
  }
}

/**
 * Configuration applied when the file is missing or fields are omitted.
 */
export const DEFAULT_DOCWATCH_CONFIG: DocwatchConfig = {
  articles: {
    sourceLanguage: "en",
    extension: ".md",
  },
  comments: {
    maxListedFiles: 10,
  },
};

type RawDocwatchConfig = {
  articles?: unknown;
  comments?: unknown;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cloneDefaults(): DocwatchConfig {
  return {
    articles: { ...DEFAULT_DOCWATCH_CONFIG.articles },
    comments: { ...DEFAULT_DOCWATCH_CONFIG.comments },
  };
}

function applyArticles(
  rawConfig: RawDocwatchConfig,
  normalizedConfig: DocwatchConfig,
  filePath: string,
): void {
  if (rawConfig.articles === undefined) {
    return;
  }

  if (!isPlainObject(rawConfig.articles)) {
    throw new DocwatchConfigValidationError(filePath, "articles must be an object");
  }

  const sourceLanguage = rawConfig.articles.sourceLanguage;
  if (sourceLanguage !== undefined) {
    if (typeof sourceLanguage !== "string" || !sourceLanguage.trim()) {
      throw new DocwatchConfigValidationError(
        filePath,
        "articles.sourceLanguage must be a non-empty string",
      );
    }

    normalizedConfig.articles.sourceLanguage = sourceLanguage.trim();
  }

  const extension = rawConfig.articles.extension;
  if (extension !== undefined) {
    if (typeof extension !== "string" || !/^\.[^./\s]+$/.test(extension)) {
      throw new DocwatchConfigValidationError(
        filePath,
        'articles.extension must be a file extension such as ".md"',
      );
    }

    normalizedConfig.articles.extension = extension;
  }
}

function applyComments(
  rawConfig: RawDocwatchConfig,
  normalizedConfig: DocwatchConfig,
  filePath: string,
): void {
  if (rawConfig.comments === undefined) {
    return;
  }

  if (!isPlainObject(rawConfig.comments)) {
    throw new DocwatchConfigValidationError(filePath, "comments must be an object");
  }

  const maxListedFiles = rawConfig.comments.maxListedFiles;
  if (maxListedFiles !== undefined) {
    if (
      typeof maxListedFiles !== "number" ||
      !Number.isInteger(maxListedFiles) ||
      maxListedFiles < 1
    ) {
      throw new DocwatchConfigValidationError(
        filePath,
        "comments.maxListedFiles must be an integer greater than or equal to 1",
      );
    }

    normalizedConfig.comments.maxListedFiles = maxListedFiles;
  }
}

function parseRawConfig(filePath: string): unknown {
  let rawYaml = "";
  try {
    rawYaml = readFileSync(filePath, "utf8");
  } catch (caughtError) {
    const details =
      caughtError instanceof Error ? caughtError.message : String(caughtError);
    throw new DocwatchConfigReadError(filePath, details, caughtError);
  }

  const yamlDocument = parseDocument(rawYaml);

  if (yamlDocument.errors.length > 0) {
    const details = yamlDocument.errors.map((yamlError) => yamlError.message).join("; ");
    throw new DocwatchConfigParseError(filePath, details);
  }

  return yamlDocument.toJSON();
}

function normalizeConfig(rawValue: unknown, filePath: string): DocwatchConfig {
  // An empty file parses to null.
  if (rawValue === null) {
    return cloneDefaults();
  }

  if (!isPlainObject(rawValue)) {
    throw new DocwatchConfigValidationError(filePath, "top-level config must be an object");
  }

  const rawConfig: RawDocwatchConfig = rawValue;
  const normalizedConfig = cloneDefaults();

  applyArticles(rawConfig, normalizedConfig, filePath);
  applyComments(rawConfig, normalizedConfig, filePath);

  return normalizedConfig;
}

/**
 * Loads and validates `.docwatch.yml` from disk.
 *
 * @remarks
 * When the config file does not exist, defaults are returned.
 * Parse and schema errors throw explicit typed errors.
 *
 * @param options - Optional location overrides.
 * @returns Normalized config with defaults applied.
 */
export function loadDocwatchConfig(
  options: LoadDocwatchConfigOptions = {},
): DocwatchConfig {
  const workingDirectory = options.workingDirectory ?? process.cwd();
  const fileName = options.fileName ?? DEFAULT_CONFIG_FILE_NAME;
  const filePath = resolve(workingDirectory, fileName);

  if (!existsSync(filePath)) {
    return cloneDefaults();
  }

  const rawConfig = parseRawConfig(filePath);
  return normalizeConfig(rawConfig, filePath);
}
