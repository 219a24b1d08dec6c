/**
 * Query Suggestion
 *
 * Autocomplete data for a partially typed query: product names, brand names
 * and styles that start with it. Product and brand lookups are bounded by the
 * catalogue source and are not trimmed again here.
 */

import type { NamedRecord, SuggestionPayload, SuggestionResult } from '@shared/schema';
import type { CatalogueSource } from '../db';
import { errorMessage, log } from '../log';
import { StyleSuggester } from './styles';

async function orEmpty(source: string, lookup: () => Promise<NamedRecord[]>): Promise<NamedRecord[]> {
  try {
    return await lookup();
  } catch (error) {
    console.error(`[QuerySuggestion] ${source} lookup failed: ${errorMessage(error)}`);
    return [];
  }
}

export class QuerySuggestion {
  constructor(
    private readonly catalogue: CatalogueSource,
    private readonly styles: StyleSuggester = new StyleSuggester(),
  ) {}

  async suggestsQuery(query: string): Promise<SuggestionResult> {
    log(`Suggestion for ${query}`, 'QuerySuggestion');

    const [productName, brandName] = await Promise.all([
      orEmpty('product', () => this.catalogue.fetchProductNames(query)),
      orEmpty('brand', () => this.catalogue.fetchBrandNames(query)),
    ]);

    return {
      productName,
      brandName,
      styles: this.styles.extractStyles(query),
    };
  }

  async suggestQueryResults(query: string): Promise<SuggestionPayload> {
    const result = await this.suggestsQuery(query);

    return {
      product_name: result.productName,
      brand_name: result.brandName,
      styles: result.styles,
    };
  }
}
