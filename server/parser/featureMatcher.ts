/**
 * Windowed Feature Matcher
 *
 * Greedy longest-match-first scan over the query tokens. Windows of 4, 3, 2
 * and 1 tokens are tried left to right; a window is only tested while none of
 * its tokens have been claimed by an earlier (longer) accepted match, so
 * "l shape" wins over a bare "shape" and no token feeds two features.
 */

import { logDebug } from '../log';
import type { Lexicon } from './lexicon';
import { hasContextualSupport, CONTEXT_RULES, type ContextRule } from './rules';
import { closeMatches, similarityRatio, type SimilarityScorer } from './similarity';

export const WINDOW_SIZES = [4, 3, 2, 1] as const;

// Empirically tuned; "detail" and "metal" phrases produce near-misses at the
// regular threshold and need the stricter bar.
export const FUZZY_MIN_PHRASE_LENGTH = 6;
export const FUZZY_THRESHOLD = 0.93;
export const STRICT_FUZZY_THRESHOLD = 0.96;
export const STRICT_FUZZY_TERMS = ['detail', 'metal'] as const;

export type MatchKind = 'exact' | 'fuzzy';

export interface FeatureMatch {
  feature: string;
  phrase: string;
  kind: MatchKind;
  start: number;
  size: number;
}

export interface FeatureMatcherOptions {
  scorer?: SimilarityScorer;
  contextRules?: readonly ContextRule[];
  fuzzyThreshold?: number;
  strictFuzzyThreshold?: number;
  fuzzyMinPhraseLength?: number;
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export class WindowedFeatureMatcher {
  private readonly scorer: SimilarityScorer;
  private readonly contextRules: readonly ContextRule[];
  private readonly fuzzyThreshold: number;
  private readonly strictFuzzyThreshold: number;
  private readonly fuzzyMinPhraseLength: number;

  constructor(private readonly lexicon: Lexicon, options: FeatureMatcherOptions = {}) {
    this.scorer = options.scorer ?? similarityRatio;
    this.contextRules = options.contextRules ?? CONTEXT_RULES;
    this.fuzzyThreshold = options.fuzzyThreshold ?? FUZZY_THRESHOLD;
    this.strictFuzzyThreshold = options.strictFuzzyThreshold ?? STRICT_FUZZY_THRESHOLD;
    this.fuzzyMinPhraseLength = options.fuzzyMinPhraseLength ?? FUZZY_MIN_PHRASE_LENGTH;
  }

  /** Canonical features in the order they were accepted. */
  extract(text: string): string[] {
    return this.match(text).map((match) => match.feature);
  }

  match(text: string): FeatureMatch[] {
    const tokens = tokenize(text);
    if (tokens.length === 0) return [];

    // One slot per token, set once a window containing it is accepted.
    const consumed = new Uint8Array(tokens.length);
    const detected = new Set<string>();
    const matches: FeatureMatch[] = [];

    logDebug(`Extracting from "${text}" (${tokens.length} tokens)`, 'FeatureMatcher');

    for (const size of WINDOW_SIZES) {
      for (let start = 0; start + size <= tokens.length; start++) {
        if (!isAvailable(consumed, start, size)) continue;

        const phrase = tokens.slice(start, start + size).join(' ');
        const candidate = this.resolve(phrase);
        if (!candidate) continue;

        if (!hasContextualSupport(phrase, tokens, start, this.contextRules)) {
          logDebug(`Rejected "${phrase}" -> ${candidate.feature}: no supporting context`, 'FeatureMatcher');
          continue;
        }
        if (detected.has(candidate.feature)) continue;

        detected.add(candidate.feature);
        consumed.fill(1, start, start + size);
        matches.push({ feature: candidate.feature, phrase, kind: candidate.kind, start, size });
        logDebug(`${candidate.kind.toUpperCase()} match "${phrase}" -> ${candidate.feature} [${start}..${start + size - 1}]`, 'FeatureMatcher');
      }
    }

    return matches;
  }

  thresholdFor(phrase: string): number {
    return STRICT_FUZZY_TERMS.some((term) => phrase.includes(term))
      ? this.strictFuzzyThreshold
      : this.fuzzyThreshold;
  }

  private resolve(phrase: string): { feature: string; kind: MatchKind } | null {
    const exact = this.lexicon.canonical(phrase);
    if (exact !== null) {
      return { feature: exact, kind: 'exact' };
    }

    if (phrase.length <= this.fuzzyMinPhraseLength) return null;

    const [best] = closeMatches(phrase, this.lexicon.vocabulary, this.thresholdFor(phrase), 1, this.scorer);
    if (!best) return null;

    const feature = this.lexicon.canonical(best.candidate);
    return feature === null ? null : { feature, kind: 'fuzzy' };
  }
}

function isAvailable(consumed: Uint8Array, start: number, size: number): boolean {
  for (let i = start; i < start + size; i++) {
    if (consumed[i] === 1) return false;
  }
  return true;
}
