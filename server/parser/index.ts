/**
 * Query Parser Module Index
 *
 * Structure:
 * - lexicon.ts: canonical feature → category map
 * - similarity.ts: gestalt string similarity and close-match lookup
 * - rules.ts: contextual acceptance and mutual exclusion tables
 * - featureMatcher.ts: greedy windowed feature scan
 * - patternMatcher.ts: regex and typo-correcting feature patterns
 * - featureExtractor.ts: union of both matchers plus disambiguation
 * - productTypes.ts, price.ts, classification.ts: sibling extractors
 * - furnitureParser.ts: orchestration into one result
 */

export * from './types';
export * from './lexicon';
export * from './similarity';
export * from './rules';
export * from './featureMatcher';
export * from './patternMatcher';
export * from './featureExtractor';
export * from './productTypes';
export * from './price';
export * from './classification';
export * from './furnitureParser';
