import { describe, expect, test } from "vitest";

import { Article } from "./article";
import { MalformedPathError } from "./errors";

describe("Article.fromPath", () => {
  test("parses an original article path", () => {
    const article = Article.fromPath("docs/intro/en.md");

    expect(article.path).toBe("docs/intro");
    expect(article.language).toBe("en");
    expect(article.isOriginal()).toBe(true);
    expect(article.isTranslation()).toBe(false);
    expect(article.filePath()).toBe("docs/intro/en.md");
  });

  test("parses a translation path", () => {
    const article = Article.fromPath("docs/intro/es.md");

    expect(article.language).toBe("es");
    expect(article.isTranslation()).toBe(true);
    expect(article.filePath()).toBe("docs/intro/es.md");
  });

  test("keeps region-qualified language codes", () => {
    const article = Article.fromPath("wiki/Guide/pt-br.md");

    expect(article.path).toBe("wiki/Guide");
    expect(article.language).toBe("pt-br");
  });

  test("honours a custom source language", () => {
    const article = Article.fromPath("docs/intro/de.md", { sourceLanguage: "de" });

    expect(article.isOriginal()).toBe(true);
  });

  test.each([
    ["", "path is empty"],
    ["en.md", "no parent directory"],
    ["/en.md", "no parent directory"],
    ["guide/", "no file stem"],
    ["guide/.md", "no file stem"],
  ])("rejects %j", (filePath, details) => {
    let thrownError: unknown;
    try {
      Article.fromPath(filePath);
    } catch (error) {
      thrownError = error;
    }

    expect(thrownError).toBeInstanceOf(MalformedPathError);
    expect((thrownError as MalformedPathError).message).toContain(details);
    expect((thrownError as MalformedPathError).filePath).toBe(filePath);
  });
});

describe("Article equality", () => {
  test("requires matching directory and language", () => {
    const english = Article.fromPath("guide/en.md");

    expect(english.equals(Article.fromPath("guide/en.md"))).toBe(true);
    expect(english.equals(Article.fromPath("guide/es.md"))).toBe(false);
    expect(english.equals(Article.fromPath("other/en.md"))).toBe(false);
  });

  test("orders by directory then language", () => {
    const articles = [
      Article.fromPath("b/en.md"),
      Article.fromPath("a/fr.md"),
      Article.fromPath("a/de.md"),
    ].sort((left, right) => left.compare(right));

    expect(articles.map((article) => article.filePath())).toEqual([
      "a/de.md",
      "a/fr.md",
      "b/en.md",
    ]);
  });
});
