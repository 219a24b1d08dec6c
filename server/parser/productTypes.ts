/**
 * Product Type Classifier
 *
 * Dictionary lookup of product keywords ("coffee table", "couch") with a light
 * spelling pass: unknown words are compared against the single-word keywords
 * and rewritten in the corrected query when they are close enough.
 */

import { logDebug } from '../log';
import { loadProductTypeFile } from './data';
import { closeMatches, similarityRatio, type SimilarityScorer } from './similarity';
import {
  UNKNOWN_PRODUCT_TYPE,
  type ProductTypeClassification,
  type ProductTypeSource,
} from './types';

export const PRODUCT_TYPE_CORRECTION_THRESHOLD = 0.8;
export const MIN_CORRECTABLE_LENGTH = 4;
const MAX_KEYWORD_WORDS = 3;

interface Token {
  start: number;
  end: number;
  word: string;
  /** Similarity of the spelling correction, or 1 when the word was left as typed. */
  score: number;
}

function singularize(word: string): string {
  if (word.length > 4 && /(?:ches|shes|sses|xes)$/.test(word)) return word.slice(0, -2);
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

export class ProductTypeClassifier implements ProductTypeSource {
  private readonly typeByKeyword = new Map<string, string>();
  private readonly knownWords = new Set<string>();
  private readonly correctionVocabulary: string[];

  constructor(
    dictionary: Record<string, string[]> = loadProductTypeFile().productTypes,
    private readonly scorer: SimilarityScorer = similarityRatio,
    private readonly threshold = PRODUCT_TYPE_CORRECTION_THRESHOLD,
  ) {
    for (const [productType, keywords] of Object.entries(dictionary)) {
      for (const keyword of keywords) {
        const normalized = keyword.toLowerCase().trim().split(/\s+/).join(' ');
        if (!this.typeByKeyword.has(normalized)) {
          this.typeByKeyword.set(normalized, productType);
        }
        normalized.split(' ').forEach((word) => this.knownWords.add(word));
      }
    }
    this.correctionVocabulary = Array.from(this.typeByKeyword.keys()).filter((keyword) => !keyword.includes(' '));
  }

  classifyProductType(query: string): ProductTypeClassification {
    const tokens = this.tokenize(query);

    let correctedQuery = '';
    let cursor = 0;
    for (const token of tokens) {
      correctedQuery += query.slice(cursor, token.start) + token.word;
      cursor = token.end;
    }
    correctedQuery = tokens.length > 0 ? correctedQuery + query.slice(cursor) : query;

    const found = this.findProductTypes(tokens);
    if (found.length === 0) {
      return { productTypes: [UNKNOWN_PRODUCT_TYPE], confidences: [], correctedQuery };
    }

    logDebug(`Product types for "${query}": ${found.map((f) => f.productType).join(', ')}`, 'ProductType');
    return {
      productTypes: found.map((f) => f.productType),
      confidences: found.map((f) => f.confidence),
      correctedQuery,
    };
  }

  // Only the alphanumeric core of each whitespace token is looked at; the
  // surrounding punctuation stays where it was.
  private tokenize(query: string): Token[] {
    const tokens: Token[] = [];
    for (const match of query.matchAll(/[a-z0-9]+(?:['-][a-z0-9]+)*/gi)) {
      const start = match.index ?? 0;
      const original = match[0];
      const lower = original.toLowerCase();
      const correction = this.correct(lower);
      tokens.push({
        start,
        end: start + original.length,
        word: correction ? correction.word : original,
        score: correction ? correction.score : 1,
      });
    }
    return tokens;
  }

  private correct(word: string): { word: string; score: number } | null {
    if (word.length < MIN_CORRECTABLE_LENGTH || /\d/.test(word)) return null;
    if (this.knownWords.has(word) || this.knownWords.has(singularize(word))) return null;

    const [best] = closeMatches(word, this.correctionVocabulary, this.threshold, 1, this.scorer);
    return best ? { word: best.candidate, score: best.score } : null;
  }

  private lookup(phrase: string): string | undefined {
    const exact = this.typeByKeyword.get(phrase);
    if (exact) return exact;

    const words = phrase.split(' ');
    words[words.length - 1] = singularize(words[words.length - 1]);
    return this.typeByKeyword.get(words.join(' '));
  }

  private findProductTypes(tokens: Token[]): Array<{ productType: string; confidence: number }> {
    const words = tokens.map((token) => token.word.toLowerCase());
    const consumed = new Uint8Array(words.length);
    const hits: Array<{ start: number; productType: string; confidence: number }> = [];

    for (let size = MAX_KEYWORD_WORDS; size >= 1; size--) {
      for (let start = 0; start + size <= words.length; start++) {
        if (consumed.subarray(start, start + size).some((slot) => slot === 1)) continue;

        const productType = this.lookup(words.slice(start, start + size).join(' '));
        if (!productType) continue;

        consumed.fill(1, start, start + size);
        const confidence = Math.min(...tokens.slice(start, start + size).map((token) => token.score));
        hits.push({ start, productType, confidence });
      }
    }

    hits.sort((a, b) => a.start - b.start);

    const seen = new Set<string>();
    return hits.filter((hit) => {
      if (seen.has(hit.productType)) return false;
      seen.add(hit.productType);
      return true;
    });
  }
}
