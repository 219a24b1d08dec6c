import { describe, it, expect } from 'vitest';
import { Lexicon, getLexicon } from '../server/parser/lexicon';
import {
  FUZZY_THRESHOLD,
  STRICT_FUZZY_THRESHOLD,
  WindowedFeatureMatcher,
  tokenize,
  type FeatureMatch,
} from '../server/parser/featureMatcher';

function overlaps(matches: FeatureMatch[]): boolean {
  const seen = new Set<number>();
  for (const match of matches) {
    for (let i = match.start; i < match.start + match.size; i++) {
      if (seen.has(i)) return true;
      seen.add(i);
    }
  }
  return false;
}

describe('tokenize', () => {
  it('splits on any run of whitespace', () => {
    expect(tokenize('  l  shape\tsofa\n')).toEqual(['l', 'shape', 'sofa']);
  });
});

describe('WindowedFeatureMatcher', () => {
  const matcher = new WindowedFeatureMatcher(getLexicon());

  it('returns nothing for empty text', () => {
    expect(matcher.extract('')).toEqual([]);
    expect(matcher.extract('   ')).toEqual([]);
  });

  it('matches multi-word features before their parts', () => {
    expect(matcher.match('l shape sofa with metal legs')).toEqual([
      { feature: 'l shape', phrase: 'l shape', kind: 'exact', start: 0, size: 2 },
      { feature: 'metal legs', phrase: 'metal legs', kind: 'exact', start: 4, size: 2 },
    ]);
  });

  it('does not re-match a shorter window inside an accepted one', () => {
    expect(matcher.extract('faux leather sofa')).toEqual(['faux leather']);
  });

  it('never lets two matches share a token', () => {
    for (const text of [
      'faux leather sofa with button tufted back',
      'l shape sofa with metal legs and storage',
      'genuine leather recliner with cup holders',
    ]) {
      expect(overlaps(matcher.match(text))).toBe(false);
    }
  });

  it('gives the same result on repeated calls', () => {
    const text = 'modular sofa bed with storage and wooden legs';
    expect(matcher.extract(text)).toEqual(matcher.extract(text));
  });

  it('fuzzy matches misspelled phrases longer than six characters', () => {
    expect(matcher.match('grey reclner')).toEqual([
      { feature: 'recliner', phrase: 'reclner', kind: 'fuzzy', start: 1, size: 1 },
    ]);
  });

  it('does not add the same feature twice', () => {
    expect(matcher.extract('recliner recliner')).toEqual(['recliner']);
  });

  describe('leather context', () => {
    it('rejects leather without a furniture part nearby', () => {
      expect(matcher.extract('leather wallet')).toEqual([]);
    });

    it('accepts leather next to a furniture part', () => {
      expect(matcher.extract('leather sofa cushion')).toEqual(['leather']);
      expect(matcher.extract('sofa soft leather')).toEqual(['leather']);
    });

    it('only looks two tokens either side of the phrase start', () => {
      expect(matcher.extract('sofa in soft leather')).toEqual([]);
      expect(matcher.extract('leather brown tan dark sofa')).toEqual([]);
    });

    it('leaves the tokens of a rejected phrase free for shorter windows', () => {
      const local = new WindowedFeatureMatcher(new Lexicon({ 'leather wallet': 'Accessory', wallet: 'Accessory' }));
      expect(local.extract('leather wallet')).toEqual(['wallet']);
    });
  });

  describe('fuzzy thresholds', () => {
    const scoresJustBelowStrict = () => 0.94;

    it('uses the strict threshold for metal and detail phrases', () => {
      expect(matcher.thresholdFor('brushed metal')).toBe(STRICT_FUZZY_THRESHOLD);
      expect(matcher.thresholdFor('gold details')).toBe(STRICT_FUZZY_THRESHOLD);
      expect(matcher.thresholdFor('brushed steel')).toBe(FUZZY_THRESHOLD);
    });

    it('rejects a metal phrase scoring 0.94', () => {
      const local = new WindowedFeatureMatcher(new Lexicon({ 'metal frame': 'Material' }), {
        scorer: scoresJustBelowStrict,
      });
      expect(local.extract('metal framed')).toEqual([]);
    });

    it('accepts the same phrase without metal at 0.94', () => {
      const local = new WindowedFeatureMatcher(new Lexicon({ 'steel frame': 'Material' }), {
        scorer: scoresJustBelowStrict,
      });
      expect(local.match('steel framed')).toEqual([
        { feature: 'steel frame', phrase: 'steel framed', kind: 'fuzzy', start: 0, size: 2 },
      ]);
    });

    it('skips fuzzy lookup for phrases of six characters or fewer', () => {
      const local = new WindowedFeatureMatcher(new Lexicon({ swivel: 'Function' }), { scorer: () => 1 });
      expect(local.extract('swivl')).toEqual([]);
    });
  });
});
