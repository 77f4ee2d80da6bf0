import hljs from "highlight.js";

export interface HighlightedCode {
  language: string;
  html: string;
}

/**
 * Highlight a fenced code block
 * Returns null when the language is unknown (and guessing is off), so the
 * caller can keep the plain rendering
 */
export function highlightCode(
  code: string,
  lang: string | undefined,
  guessLanguage: boolean,
): HighlightedCode | null {
  // Info strings may carry extra words after the language ("js title=x")
  const language = lang?.trim().split(/\s+/)[0] ?? "";

  if (language && hljs.getLanguage(language)) {
    const { value } = hljs.highlight(code, { language, ignoreIllegals: true });
    return { language, html: value };
  }

  if (!language && guessLanguage) {
    const result = hljs.highlightAuto(code);
    if (result.language) {
      return { language: result.language, html: result.value };
    }
  }

  return null;
}
