import { logDebug } from '../log';
import { getLexicon, type Lexicon } from './lexicon';
import { WindowedFeatureMatcher } from './featureMatcher';
import { ContextualPatternMatcher } from './patternMatcher';
import { EXCLUSION_RULES, resolveExclusions, type ExclusionRule } from './rules';

export interface FeatureExtractorDeps {
  lexicon?: Lexicon;
  windowMatcher?: WindowedFeatureMatcher;
  patternMatcher?: ContextualPatternMatcher;
  exclusionRules?: readonly ExclusionRule[];
}

/**
 * Runs the window scan and the pattern pass, unions their results (window
 * matches first) and resolves mutually exclusive features.
 */
export class FeatureExtractor {
  readonly lexicon: Lexicon;
  private readonly windowMatcher: WindowedFeatureMatcher;
  private readonly patternMatcher: ContextualPatternMatcher;
  private readonly exclusionRules: readonly ExclusionRule[];

  constructor(deps: FeatureExtractorDeps = {}) {
    this.lexicon = deps.lexicon ?? getLexicon();
    this.windowMatcher = deps.windowMatcher ?? new WindowedFeatureMatcher(this.lexicon);
    this.patternMatcher = deps.patternMatcher ?? new ContextualPatternMatcher(this.lexicon);
    this.exclusionRules = deps.exclusionRules ?? EXCLUSION_RULES;
  }

  extractFeatures(text: string): string[] {
    const normalized = text.toLowerCase().trim();

    const features = this.windowMatcher.extract(normalized);
    for (const feature of this.patternMatcher.extractFromPatterns(text)) {
      if (!features.includes(feature)) {
        features.push(feature);
      }
    }

    const resolved = resolveExclusions(features, normalized, this.exclusionRules);
    logDebug(`Features for "${text}": ${JSON.stringify(resolved)}`, 'FeatureExtractor');
    return resolved;
  }
}
