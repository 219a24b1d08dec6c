import { describe, it, expect } from 'vitest';
import { ProductTypeClassifier } from '../server/parser/productTypes';

describe('ProductTypeClassifier', () => {
  const classifier = new ProductTypeClassifier();

  it('corrects a misspelled keyword and reports its similarity as confidence', () => {
    const result = classifier.classifyProductType('grey l shape sofaa with metal legs');
    expect(result.productTypes).toEqual(['Sofa']);
    expect(result.confidences[0]).toBeCloseTo(8 / 9, 10);
    expect(result.correctedQuery).toBe('grey l shape sofa with metal legs');
  });

  it('matches multi-word keywords after correction', () => {
    expect(classifier.classifyProductType('Coffee Tabel')).toEqual({
      productTypes: ['Coffee Table'],
      confidences: [0.8],
      correctedQuery: 'Coffee table',
    });
  });

  it('returns Unknown and the unchanged query when nothing matches', () => {
    expect(classifier.classifyProductType('something nice')).toEqual({
      productTypes: ['Unknown'],
      confidences: [],
      correctedQuery: 'something nice',
    });
  });

  it('accepts plurals and lists types in query order', () => {
    expect(classifier.classifyProductType('two sofas and a dining tables')).toEqual({
      productTypes: ['Sofa', 'Dining Table'],
      confidences: [1, 1],
      correctedQuery: 'two sofas and a dining tables',
    });
  });

  it('lists each product type once', () => {
    expect(classifier.classifyProductType('sofa and couch').productTypes).toEqual(['Sofa']);
  });

  it('prefers the longer keyword', () => {
    expect(classifier.classifyProductType('oak dining table').productTypes).toEqual(['Dining Table']);
  });

  it('keeps punctuation around corrected words', () => {
    expect(classifier.classifyProductType('sofaa, please').correctedQuery).toBe('sofa, please');
  });

  it('accepts a custom dictionary', () => {
    const local = new ProductTypeClassifier({ Lamp: ['lamp', 'floor lamp'] });
    expect(local.classifyProductType('floor lamp').productTypes).toEqual(['Lamp']);
    expect(local.classifyProductType('sofa').productTypes).toEqual(['Unknown']);
  });
});
