import { describe, it, expect } from 'vitest';
import { getLexicon } from '../server/parser/lexicon';
import { ContextualPatternMatcher, compilePatternTables } from '../server/parser/patternMatcher';

describe('ContextualPatternMatcher', () => {
  const matcher = new ContextualPatternMatcher(getLexicon());

  it('matches phrasing variants the lexicon does not spell out', () => {
    expect(matcher.extractFromPatterns('L-Shaped sofa with pull out bed')).toEqual(['l shape', 'sofa bed']);
    expect(matcher.extractFromPatterns('c-shaped sectional')).toEqual(['c shape']);
  });

  it('reports features in pattern table order', () => {
    expect(matcher.extractFromPatterns('USB CHARGING recliner')).toEqual(['recliner', 'usb charging']);
  });

  it('retries the patterns after correcting a misspelled anchor word', () => {
    expect(matcher.extractFromPatterns('corner couch with stroage')).toEqual(['corner unit', 'storage']);
    expect(matcher.extractFromPatterns('L Shpae sofa with metl legs')).toEqual(['l shape', 'metal legs']);
  });

  it('corrects each occurrence of a misspelling on its own', () => {
    expect(matcher.extractFromPatterns('l shap or c shap sofa')).toEqual(['l shape', 'c shape']);
  });

  it('does not report a plain recliner inside a power recliner', () => {
    expect(matcher.extractFromPatterns('power reclining sofa')).toEqual(['power recline']);
    expect(matcher.extractFromPatterns('power sofa and a reclining chair')).toEqual(['recliner']);
  });

  it('returns nothing when no pattern applies', () => {
    expect(matcher.extractFromPatterns('grey sofa')).toEqual([]);
    expect(matcher.extractFromPatterns('')).toEqual([]);
  });

  it('drops pattern features that are missing from the lexicon', () => {
    const local = new ContextualPatternMatcher(
      getLexicon(),
      compilePatternTables({
        direct: [{ pattern: '\\bhidden\\s+ottoman\\b', feature: 'hidden ottoman' }],
        corrections: [],
      }),
    );
    expect(local.extractFromPatterns('sofa with hidden ottoman')).toEqual([]);
  });

  it('returns the lexicon spelling of a pattern feature', () => {
    const local = new ContextualPatternMatcher(
      getLexicon(),
      compilePatternTables({ direct: [{ pattern: '\\bflips\\b', feature: 'Reversible Chaise' }], corrections: [] }),
    );
    expect(local.extractFromPatterns('chaise that flips')).toEqual(['reversible chaise']);
  });
});
