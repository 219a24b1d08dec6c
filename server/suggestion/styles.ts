import { loadStyleFile } from '../parser/data';
import { titleCase } from '../parser/classification';

export const STYLE_SUGGESTION_LIMIT = 10;

/**
 * Prefix lookup over the style vocabulary. The vocabulary is kept in relevance
 * order and results follow it, so "mod" lists "Modern" before "Modernist".
 */
export class StyleSuggester {
  private readonly styleTerms: readonly string[];

  constructor(styles: readonly string[] = loadStyleFile().styles, private readonly limit = STYLE_SUGGESTION_LIMIT) {
    const seen = new Set<string>();
    this.styleTerms = styles
      .map((style) => style.toLowerCase().trim())
      .filter((style) => {
        if (!style || seen.has(style)) return false;
        seen.add(style);
        return true;
      });
  }

  extractStyles(text: string): string[] {
    const prefix = text.toLowerCase().trim();
    return this.styleTerms
      .filter((style) => style.startsWith(prefix))
      .slice(0, this.limit)
      .map(titleCase);
  }
}
