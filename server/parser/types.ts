export interface PriceRange {
  min: number | null;
  max: number | null;
  currency: string;
  confidence: number;
}

export const UNKNOWN_PRODUCT_TYPE = 'Unknown';

export interface ProductTypeClassification {
  productTypes: string[];
  confidences: number[];
  correctedQuery: string;
}

export type ClassificationSummary = Record<string, unknown>;

export interface ProductTypeSource {
  classifyProductType(query: string): ProductTypeClassification;
}

export interface FeatureSource {
  extractFeatures(text: string): string[];
}

export interface PriceSource {
  extractPriceRange(query: string): PriceRange | null;
}

export interface ClassificationSource {
  extractClassification(query: string): ClassificationSummary;
}

export interface ParserResult {
  productType: string[];
  features: string[];
  priceRange: PriceRange | null;
  location: string;
  classificationSummary: ClassificationSummary;
  extras: string[];
  confidenceScore: number;
  originalQuery: string;
  suggestedQuery: string | null;
}
