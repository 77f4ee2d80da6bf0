import { describe, it, expect } from "vitest";
import { structureArticle } from "./structure-article";

describe("structureArticle", () => {
  it("uses a leading h1 as the title and marks the preamble", () => {
    const result = structureArticle("<h1>Hello</h1>\n<p>Intro text</p>\n", "");
    expect(result).toEqual({
      html: '<h1>Hello</h1>\n<p class="article_preamble">Intro text</p>\n',
      title: "Hello",
      description: "Intro text",
      warnings: [],
    });
  });

  it("warns when the leading h1 differs from the known title", () => {
    const result = structureArticle("<h1>Hello</h1>", "Other");
    expect(result.title).toBe("Hello");
    expect(result.warnings).toEqual([
      { reason: "duplicate-title", details: "Hello" },
    ]);
  });

  it("does not warn when the leading h1 repeats the known title", () => {
    const result = structureArticle("<h1>Hello</h1>", "Hello");
    expect(result.warnings).toEqual([]);
  });

  it("inserts the known title when there is no h1", () => {
    const result = structureArticle("<p>Body</p>", "Title");
    expect(result.html).toBe(
      '<h1>Title</h1>\n<p class="article_preamble">Body</p>',
    );
    expect(result.title).toBe("Title");
  });

  it("reports a missing title", () => {
    const result = structureArticle("<p>Body</p>", "");
    expect(result.title).toBe("");
    expect(result.warnings).toEqual([{ reason: "no-title" }]);
  });

  it("puts the known title above a late h1", () => {
    const result = structureArticle("<p>Intro</p>\n<h1>Late</h1>", "Known");
    expect(result.html).toBe(
      '<h1>Known</h1>\n<p class="article_preamble">Intro</p>\n<h1>Late</h1>',
    );
    expect(result.title).toBe("Known");
    expect(result.warnings).toEqual([{ reason: "late-title", details: "Late" }]);
  });

  it("uses the trimmed text of the first paragraph as description", () => {
    const result = structureArticle(
      "<h1>T</h1><p>  Some <em>rich</em> text </p><p>Second</p>",
      "",
    );
    expect(result.description).toBe("Some rich text");
  });

  it("leaves the description empty without a paragraph", () => {
    const result = structureArticle("<h1>T</h1><ul><li>item</li></ul>", "");
    expect(result.description).toBe("");
  });
});
