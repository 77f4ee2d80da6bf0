import { describe, it, expect } from "vitest";
import { createMarkdownRenderer } from "./index";
import { highlightCode } from "./highlight";
import type { MarkdownConfig } from "../types";

const defaults: MarkdownConfig = {
  gfm: true,
  breaks: false,
  highlight: true,
  guessLanguage: false,
};

describe("createMarkdownRenderer", () => {
  it("renders headings and paragraphs", async () => {
    const { render } = createMarkdownRenderer(defaults);
    expect(await render("# Hi\n\nSome text")).toBe(
      "<h1>Hi</h1>\n<p>Some text</p>\n",
    );
  });

  it("highlights fenced code in a known language", async () => {
    const { render } = createMarkdownRenderer(defaults);
    const html = await render("```js\nconst a = 1;\n```");
    expect(html.startsWith('<pre><code class="hljs language-js">')).toBe(true);
    expect(html).toContain('<span class="hljs-keyword">const</span>');
  });

  it("keeps the plain rendering for unknown languages", async () => {
    const { render } = createMarkdownRenderer(defaults);
    expect(await render("```nosuchlang\n<b>\n```")).toBe(
      '<pre><code class="language-nosuchlang">&lt;b&gt;\n</code></pre>\n',
    );
  });

  it("skips highlighting when disabled", async () => {
    const { render } = createMarkdownRenderer({ ...defaults, highlight: false });
    expect(await render("```js\nconst a = 1;\n```")).toBe(
      '<pre><code class="language-js">const a = 1;\n</code></pre>\n',
    );
  });

  it("detects the language of unlabelled code when guessing", async () => {
    const code = "```\nfunction greet(name) {\n  return `Hello ${name}`;\n}\n```";

    const guessed = await createMarkdownRenderer({
      ...defaults,
      guessLanguage: true,
    }).render(code);
    expect(guessed.startsWith('<pre><code class="hljs language-')).toBe(true);

    const plain = await createMarkdownRenderer(defaults).render(code);
    expect(plain.startsWith("<pre><code>function greet(name) {")).toBe(true);
  });

  it("turns single newlines into breaks when configured", async () => {
    const { render } = createMarkdownRenderer({ ...defaults, breaks: true });
    expect(await render("a\nb")).toBe("<p>a<br>b</p>\n");
  });
});

describe("highlightCode", () => {
  it("returns null for unknown languages", () => {
    expect(highlightCode("x", "nosuchlang", false)).toBeNull();
  });

  it("returns null for unlabelled code without guessing", () => {
    expect(highlightCode("x = 1", undefined, false)).toBeNull();
  });

  it("reads the language from the first word of the info string", () => {
    expect(highlightCode("let x", "js title=x", false)?.language).toBe("js");
  });
});
