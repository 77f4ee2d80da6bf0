/**
 * Markdown Renderer
 * Sets up marked with GFM and highlight.js code blocks
 */

import { Marked, type MarkedExtension } from "marked";
import type { MarkdownConfig } from "../types";
import { highlightCode } from "./highlight";

export interface MarkdownRenderer {
  render(markdown: string): Promise<string>;
}

function codeHighlighting(config: MarkdownConfig): MarkedExtension {
  return {
    renderer: {
      code({ text, lang }) {
        const highlighted = highlightCode(text, lang, config.guessLanguage);
        if (!highlighted) return false; // Fall back to marked's default rendering

        return `<pre><code class="hljs language-${highlighted.language}">${highlighted.html}</code></pre>\n`;
      },
    },
  };
}

export function createMarkdownRenderer(
  config: MarkdownConfig,
): MarkdownRenderer {
  const marked = new Marked({ gfm: config.gfm, breaks: config.breaks });

  if (config.highlight) {
    marked.use(codeHighlighting(config));
  }

  return {
    render: (markdown) => marked.parse(markdown, { async: true }),
  };
}
