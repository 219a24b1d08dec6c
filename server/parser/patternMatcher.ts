/**
 * Contextual Pattern Matcher
 *
 * Catches features the window scan misses: phrasing variants ("l-shaped",
 * "pull out bed") and common misspellings of anchor words, which are corrected
 * one occurrence at a time before the feature patterns are tried again.
 */

import { loadFeaturePatternFile, type FeaturePatternFile } from './data';
import type { Lexicon } from './lexicon';

export interface FeaturePattern {
  pattern: RegExp;
  feature: string;
}

export interface CorrectionPattern {
  pattern: RegExp;
  correction: string;
}

export interface PatternTables {
  direct: readonly FeaturePattern[];
  corrections: readonly CorrectionPattern[];
}

export function compilePatternTables(file: FeaturePatternFile): PatternTables {
  return {
    direct: file.direct.map(({ pattern, feature }) => ({ pattern: new RegExp(pattern, 'i'), feature })),
    corrections: file.corrections.map(({ pattern, correction }) => ({ pattern: new RegExp(pattern, 'gi'), correction })),
  };
}

export class ContextualPatternMatcher {
  constructor(
    private readonly lexicon: Lexicon,
    private readonly tables: PatternTables = compilePatternTables(loadFeaturePatternFile()),
  ) {}

  extractFromPatterns(text: string): string[] {
    const detected: string[] = [];

    this.collectDirect(text, detected);

    for (const { pattern, correction } of this.tables.corrections) {
      for (const match of text.matchAll(pattern)) {
        const index = match.index ?? 0;
        const corrected = text.slice(0, index) + correction + text.slice(index + match[0].length);
        this.collectDirect(corrected, detected);
      }
    }

    return detected;
  }

  private collectDirect(text: string, detected: string[]): void {
    for (const { pattern, feature } of this.tables.direct) {
      if (!pattern.test(text)) continue;

      const canonical = this.lexicon.canonical(feature);
      if (canonical !== null && !detected.includes(canonical)) {
        detected.push(canonical);
      }
    }
  }
}
