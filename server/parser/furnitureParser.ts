/**
 * Furniture Parser
 *
 * Turns a free-text furniture query into product types, features, price range
 * and style classification. Every stage runs on every call; a stage that throws
 * is logged and contributes its empty default instead of failing the parse.
 *
 * Features are read from the spelling-corrected query. Classification and price
 * use the query exactly as typed.
 */

import { errorMessage, log } from '../log';
import { StyleClassifier } from './classification';
import { FeatureExtractor } from './featureExtractor';
import { PriceExtractor } from './price';
import { ProductTypeClassifier } from './productTypes';
import {
  UNKNOWN_PRODUCT_TYPE,
  type ClassificationSource,
  type ClassificationSummary,
  type FeatureSource,
  type ParserResult,
  type PriceRange,
  type PriceSource,
  type ProductTypeClassification,
  type ProductTypeSource,
} from './types';

export interface FurnitureParserDeps {
  productTypes?: ProductTypeSource;
  features?: FeatureSource;
  classification?: ClassificationSource;
  price?: PriceSource;
}

export interface ParserResultPayload {
  product_type: string[];
  features: string[];
  price_range: ParserResult['priceRange'];
  location: string;
  classification_summary: ParserResult['classificationSummary'];
  extras: string[];
  confidence_score: number;
  original_query: string;
  suggested_query: string | null;
}

function runStage<T>(stage: string, fallback: T, run: () => T): T {
  try {
    return run();
  } catch (error) {
    console.error(`[FurnitureParser] ${stage} failed, using default: ${errorMessage(error)}`);
    return fallback;
  }
}

export class FurnitureParser {
  private readonly productTypes: ProductTypeSource;
  private readonly features: FeatureSource;
  private readonly classification: ClassificationSource;
  private readonly price: PriceSource;

  constructor(deps: FurnitureParserDeps = {}) {
    this.productTypes = deps.productTypes ?? new ProductTypeClassifier();
    this.features = deps.features ?? new FeatureExtractor();
    this.classification = deps.classification ?? new StyleClassifier();
    this.price = deps.price ?? new PriceExtractor();
  }

  parse(query: string): ParserResult {
    log(`Parsing query: ${query}`, 'FurnitureParser');

    const unclassified: ProductTypeClassification = {
      productTypes: [UNKNOWN_PRODUCT_TYPE],
      confidences: [],
      correctedQuery: query,
    };
    const { productTypes, confidences, correctedQuery } = runStage('product type classification', unclassified, () =>
      this.productTypes.classifyProductType(query),
    );

    const features = runStage<string[]>('feature extraction', [], () => this.features.extractFeatures(correctedQuery));
    const classificationSummary = runStage<ClassificationSummary>('classification', {}, () => this.classification.extractClassification(query));
    const priceRange = runStage<PriceRange | null>('price extraction', null, () => this.price.extractPriceRange(query));

    const isUnknown = productTypes.length === 1 && productTypes[0] === UNKNOWN_PRODUCT_TYPE;

    return {
      productType: isUnknown ? [] : productTypes,
      features,
      priceRange,
      location: '',
      classificationSummary,
      extras: [],
      confidenceScore: confidences[0] ?? 0,
      originalQuery: query,
      suggestedQuery: correctedQuery !== query ? correctedQuery : null,
    };
  }

  analyzeQueryText(query: string): ParserResultPayload {
    const result = this.parse(query);

    return {
      product_type: result.productType,
      features: result.features,
      price_range: result.priceRange,
      location: result.location,
      classification_summary: result.classificationSummary,
      extras: result.extras,
      confidence_score: result.confidenceScore,
      original_query: result.originalQuery,
      suggested_query: result.suggestedQuery,
    };
  }
}
