/**
 * Price Extractor
 *
 * Pulls a budget out of phrasings like "under €800", "between 200 and 500
 * euros" or "$1.2k". Plain numbers without a price cue ("3 seater", "2 drawer")
 * are never treated as prices.
 */

import type { PriceRange, PriceSource } from './types';

export const DEFAULT_CURRENCY = 'EUR';

export const RANGE_CONFIDENCE = 0.9;
export const BOUND_CONFIDENCE = 0.8;
export const BARE_AMOUNT_CONFIDENCE = 0.6;

const CURRENCY_MARKERS: Array<{ pattern: RegExp; currency: string }> = [
  { pattern: /€|\beur\b|\beuros?\b/i, currency: 'EUR' },
  { pattern: /\$|\busd\b|\bdollars?\b/i, currency: 'USD' },
  { pattern: /£|\bgbp\b|\bpounds?\b/i, currency: 'GBP' },
];

const SYMBOL = '[€$£]';
const SUFFIX = '(?:€|\\$|£|(?:eur|euros?|usd|dollars?|gbp|pounds?)\\b)';
const NUMBER = '\\d[\\d.,]*(?:\\s*k\\b)?';
const AMOUNT = `(?:${SYMBOL}\\s*)?${NUMBER}(?:\\s*${SUFFIX})?`;
const MARKED_AMOUNT = `(?:${SYMBOL}\\s*${NUMBER}(?:\\s*${SUFFIX})?|${NUMBER}\\s*${SUFFIX})`;

const BETWEEN_PATTERN = new RegExp(`\\bbetween\\s+(${AMOUNT})\\s+and\\s+(${AMOUNT})`, 'i');
const FROM_TO_PATTERN = new RegExp(`\\bfrom\\s+(${AMOUNT})\\s+to\\s+(${AMOUNT})`, 'i');
// A bare "A - B" needs a currency on one side, otherwise "2-3 seater" would qualify.
const DASH_RANGE_PATTERNS = [
  new RegExp(`(${MARKED_AMOUNT})\\s*(?:-|–|to)\\s*(${AMOUNT})`, 'i'),
  new RegExp(`(?<![\\d.,])(${NUMBER})\\s*(?:-|–|to)\\s*(${MARKED_AMOUNT})`, 'i'),
];
const UPPER_BOUND_PATTERN = new RegExp(
  `\\b(?:under|below|less\\s+than|up\\s+to|no\\s+more\\s+than|max(?:imum)?|cheaper\\s+than|within)\\s+(${AMOUNT})`,
  'i',
);
// A bare "from" needs a currency, otherwise "from 2019 collection" would qualify.
const LOWER_BOUND_PATTERNS = [
  new RegExp(`\\b(?:over|above|more\\s+than|at\\s+least|min(?:imum)?|starting\\s+(?:at|from))\\s+(${AMOUNT})`, 'i'),
  new RegExp(`\\bfrom\\s+(${MARKED_AMOUNT})`, 'i'),
];
const BARE_AMOUNT_PATTERN = new RegExp(`(?<![\\w.,])${MARKED_AMOUNT}`, 'i');

export function detectCurrency(text: string): string | null {
  for (const { pattern, currency } of CURRENCY_MARKERS) {
    if (pattern.test(text)) return currency;
  }
  return null;
}

/** Parses "1,200", "1.200", "799.99", "1.200,50", "1,5k" and friends. */
export function parseAmount(raw: string): number | null {
  const match = /(\d[\d.,]*)(\s*k\b)?/i.exec(raw);
  if (!match) return null;

  let digits = match[1].replace(/[.,]+$/, '');
  const lastDot = digits.lastIndexOf('.');
  const lastComma = digits.lastIndexOf(',');
  if (lastDot >= 0 && lastComma >= 0) {
    // Both marks present: the last one is the decimal mark.
    const [thousands, decimal] = lastDot > lastComma ? [',', '.'] : ['.', ','];
    digits = digits.split(thousands).join('').replace(decimal, '.');
  } else if (/^\d{1,3}(?:[.,]\d{3})+$/.test(digits)) {
    digits = digits.replace(/[.,]/g, '');
  } else {
    digits = digits.replace(',', '.');
  }

  const value = Number.parseFloat(digits);
  if (!Number.isFinite(value)) return null;
  return match[2] ? value * 1000 : value;
}

export class PriceExtractor implements PriceSource {
  constructor(private readonly defaultCurrency = DEFAULT_CURRENCY) {}

  extractPriceRange(query: string): PriceRange | null {
    const text = query.toLowerCase();

    for (const pattern of [BETWEEN_PATTERN, FROM_TO_PATTERN, ...DASH_RANGE_PATTERNS]) {
      const match = pattern.exec(text);
      if (!match) continue;
      const low = parseAmount(match[1]);
      const high = parseAmount(match[2]);
      if (low === null || high === null) continue;
      return this.build(Math.min(low, high), Math.max(low, high), match[0], text, RANGE_CONFIDENCE);
    }

    const upper = UPPER_BOUND_PATTERN.exec(text);
    if (upper) {
      const max = parseAmount(upper[1]);
      if (max !== null) return this.build(null, max, upper[0], text, BOUND_CONFIDENCE);
    }

    for (const pattern of LOWER_BOUND_PATTERNS) {
      const lower = pattern.exec(text);
      if (!lower) continue;
      const min = parseAmount(lower[1]);
      if (min !== null) return this.build(min, null, lower[0], text, BOUND_CONFIDENCE);
    }

    const bare = BARE_AMOUNT_PATTERN.exec(text);
    if (bare) {
      const max = parseAmount(bare[0]);
      if (max !== null) return this.build(null, max, bare[0], text, BARE_AMOUNT_CONFIDENCE);
    }

    return null;
  }

  private build(
    min: number | null,
    max: number | null,
    matched: string,
    text: string,
    confidence: number,
  ): PriceRange {
    const currency = detectCurrency(matched) ?? detectCurrency(text) ?? this.defaultCurrency;
    return { min, max, currency, confidence };
  }
}
