import { loadStyleFile, type StyleFile } from './data';
import type { ClassificationSource, ClassificationSummary } from './types';

/** "mid-century modern" → "Mid-Century Modern" */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface Term {
  label: string;
  order: number;
  pattern: RegExp;
}

function compileTerms(vocabulary: readonly string[]): Term[] {
  return vocabulary
    .map((label, order) => ({
      label,
      order,
      pattern: new RegExp(`(?<![a-z0-9])${escapeRegex(label.toLowerCase()).replace(/\s+/g, '\\s+')}(?![a-z0-9])`, 'i'),
    }))
    // Longer terms claim their span first, so "mid-century modern" is not also "modern".
    .sort((a, b) => b.label.length - a.label.length);
}

function findTerms(text: string, terms: readonly Term[]): string[] {
  const claimed: Array<[number, number]> = [];
  const hits: Term[] = [];

  for (const term of terms) {
    const match = term.pattern.exec(text);
    if (!match) continue;
    const start = match.index;
    const end = start + match[0].length;
    if (claimed.some(([from, to]) => start < to && end > from)) continue;
    claimed.push([start, end]);
    hits.push(term);
  }

  return hits.sort((a, b) => a.order - b.order).map((term) => titleCase(term.label));
}

/**
 * Style, room and colour keywords found in the query, each list in vocabulary
 * order.
 */
export class StyleClassifier implements ClassificationSource {
  private readonly styles: Term[];
  private readonly rooms: Term[];
  private readonly colors: Term[];

  constructor(vocabulary: StyleFile = loadStyleFile()) {
    this.styles = compileTerms(vocabulary.styles);
    this.rooms = compileTerms(vocabulary.rooms);
    this.colors = compileTerms(vocabulary.colors);
  }

  extractClassification(query: string): ClassificationSummary {
    return {
      styles: findTerms(query, this.styles),
      rooms: findTerms(query, this.rooms),
      colors: findTerms(query, this.colors),
    };
  }
}
