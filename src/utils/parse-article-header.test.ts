import { describe, it, expect } from "vitest";
import { parseArticleHeader } from "./parse-article-header";

describe("parseArticleHeader", () => {
  // ==========================================================================
  // Title line
  // ==========================================================================
  describe("title line", () => {
    it("takes a lone first line followed by a blank line as the title", () => {
      const result = parseArticleHeader("My Title\n\nBody text");
      expect(result).toEqual({ title: "My Title", metadata: {}, body: "Body text" });
    });

    it("strips leading hashes from the title line", () => {
      const result = parseArticleHeader("## Hello world  \n\nBody");
      expect(result.title).toBe("Hello world");
      expect(result.body).toBe("Body");
    });

    it("ignores a first line that is not followed by a blank line", () => {
      const result = parseArticleHeader("Not a title\nsecond line");
      expect(result.title).toBe("");
      expect(result.body).toBe("Not a title\nsecond line");
    });

    it("does not take a thematic break for a title", () => {
      const result = parseArticleHeader("* * *\n\nText");
      expect(result.title).toBe("");
      expect(result.body).toBe("* * *\n\nText");
    });

    it("ignores a single-line file", () => {
      const result = parseArticleHeader("Just text");
      expect(result).toEqual({ title: "", metadata: {}, body: "Just text" });
    });

    it("normalizes CRLF line endings and drops a BOM", () => {
      const result = parseArticleHeader("\uFEFFTitle\r\n\r\nBody");
      expect(result.title).toBe("Title");
      expect(result.body).toBe("Body");
    });
  });

  // ==========================================================================
  // Metadata block
  // ==========================================================================
  describe("metadata block", () => {
    it("reads Key: value lines after the title", () => {
      const result = parseArticleHeader(
        "# Hello world\n\nDate: 2024-03-01\nTags: one\n    two\n\nText",
      );
      expect(result).toEqual({
        title: "Hello world",
        metadata: { date: "2024-03-01", tags: ["one", "two"] },
        body: "Text",
      });
    });

    it("does not treat a first line with a colon as a title", () => {
      const result = parseArticleHeader("Title: Custom\nAuthor: Me\n\nBody");
      expect(result).toEqual({
        title: "Custom",
        metadata: { title: "Custom", author: "Me" },
        body: "Body",
      });
    });

    it("lets a title field override the title line", () => {
      const result = parseArticleHeader("Lone\n\ntitle: Better\n\nBody");
      expect(result.title).toBe("Better");
      expect(result.body).toBe("Body");
    });

    it("stops at the first line that is not metadata", () => {
      const result = parseArticleHeader("Hidden: yes\nPlain prose here");
      expect(result.metadata).toEqual({ hidden: "yes" });
      expect(result.body).toBe("Plain prose here");
    });
  });

  // ==========================================================================
  // Front matter
  // ==========================================================================
  describe("front matter", () => {
    it("reads YAML front matter", () => {
      const result = parseArticleHeader(
        "---\ntitle: Front\nhidden: true\n---\n\nBody\n",
      );
      expect(result.title).toBe("Front");
      expect(result.metadata).toEqual({ title: "Front", hidden: true });
      expect(result.body).toBe("Body\n");
    });

    it("reads an opening rule without a closing one as markdown", () => {
      const result = parseArticleHeader("---\n\nSome prose after a rule.\n");
      expect(result).toEqual({
        title: "",
        metadata: {},
        body: "---\n\nSome prose after a rule.\n",
      });
    });

    it("reads a block between two rules that is not YAML as markdown", () => {
      const source = "---\n\nIntro: text here, and: more\n\n---\n\nBody\n";
      expect(parseArticleHeader(source)).toEqual({
        title: "",
        metadata: {},
        body: source,
      });
    });

    it("reads a block between two rules that is not a mapping as markdown", () => {
      const source = "---\n- first\n- second\n---\n\nBody\n";
      expect(parseArticleHeader(source)).toEqual({
        title: "",
        metadata: {},
        body: source,
      });
    });
  });
});
