import { describe, it, expect } from 'vitest';
import { DEFAULT_CATEGORY, Lexicon, getLexicon } from '../server/parser/lexicon';

describe('Lexicon', () => {
  const lexicon = new Lexicon({
    'L Shape': 'Shape',
    leather: 'Upholstery',
    Leather: 'Duplicate',
    piping: '',
  });

  it('looks features up case-insensitively', () => {
    expect(lexicon.has('l shape')).toBe(true);
    expect(lexicon.canonical('L SHAPE ')).toBe('L Shape');
    expect(lexicon.canonical('velvet')).toBeNull();
  });

  it('keeps the first spelling when keys collide', () => {
    expect(lexicon.size).toBe(3);
    expect(lexicon.categoryOf('LEATHER')).toBe('Upholstery');
  });

  it('falls back to the default category for blank categories', () => {
    expect(lexicon.categoryOf('piping')).toBe(DEFAULT_CATEGORY);
    expect(lexicon.categoryOf('velvet')).toBeNull();
  });

  it('exposes a lowercase vocabulary and cannot be modified', () => {
    expect(lexicon.vocabulary).toEqual(['l shape', 'leather', 'piping']);
    expect(Object.isFrozen(lexicon)).toBe(true);
    expect(Object.isFrozen(lexicon.vocabulary)).toBe(true);
  });

  it('loads the shared instance from the data file once', () => {
    const shared = getLexicon();
    expect(getLexicon()).toBe(shared);
    expect(shared.categoryOf('metal legs')).toBe('Material');
    expect(shared.has('c shape')).toBe(true);
  });
});
