import { loadLexiconFile } from './data';

export const DEFAULT_CATEGORY = 'Other';

/**
 * Canonical feature → category mapping. Built once and never mutated, so a
 * single instance can be shared by every request.
 */
export class Lexicon {
  private readonly canonicalByKey: ReadonlyMap<string, string>;
  private readonly categoryByFeature: ReadonlyMap<string, string>;
  readonly vocabulary: readonly string[];

  constructor(entries: Record<string, string>) {
    const canonicalByKey = new Map<string, string>();
    const categoryByFeature = new Map<string, string>();

    for (const [feature, category] of Object.entries(entries)) {
      const key = feature.toLowerCase().trim();
      if (!key || canonicalByKey.has(key)) continue;
      canonicalByKey.set(key, feature);
      categoryByFeature.set(feature, category.trim() || DEFAULT_CATEGORY);
    }

    this.canonicalByKey = canonicalByKey;
    this.categoryByFeature = categoryByFeature;
    this.vocabulary = Object.freeze(Array.from(canonicalByKey.keys()));
    Object.freeze(this);
  }

  static fromDataFile(): Lexicon {
    return new Lexicon(loadLexiconFile().features);
  }

  get size(): number {
    return this.canonicalByKey.size;
  }

  has(phrase: string): boolean {
    return this.canonicalByKey.has(phrase.toLowerCase().trim());
  }

  /** Canonical spelling for a phrase, or null when it is not a known feature. */
  canonical(phrase: string): string | null {
    return this.canonicalByKey.get(phrase.toLowerCase().trim()) ?? null;
  }

  categoryOf(feature: string): string | null {
    const canonical = this.canonical(feature);
    if (canonical === null) return null;
    return this.categoryByFeature.get(canonical) ?? DEFAULT_CATEGORY;
  }
}

let sharedLexicon: Lexicon | null = null;

export function getLexicon(): Lexicon {
  if (!sharedLexicon) {
    sharedLexicon = Lexicon.fromDataFile();
  }
  return sharedLexicon;
}
