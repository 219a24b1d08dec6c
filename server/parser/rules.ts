/**
 * Matching rules kept as data: contextual acceptance for ambiguous phrases and
 * mutual exclusions between features. New ambiguous terms get a new row here.
 */

export interface ContextRule {
  name: string;
  /** The rule applies to any phrase containing this substring. */
  trigger: string;
  /** Tokens inspected before the phrase start. */
  before: number;
  /** Tokens inspected after the phrase start. */
  after: number;
  /** At least one must occur in the joined context window. */
  requiredTerms: readonly string[];
}

export interface ExclusionRule {
  keep: string;
  drop: string;
  /** Whole-word signals in the text that favour `keep`. */
  keepSignals: readonly string[];
  /** Whole-word signals in the text that favour `drop`. */
  dropSignals: readonly string[];
}

export const FURNITURE_PART_TERMS = ['sofa', 'chair', 'back', 'seat', 'arm', 'cushion'] as const;

export const CONTEXT_RULES: readonly ContextRule[] = [
  {
    name: 'leather-needs-furniture-part',
    trigger: 'leather',
    before: 2,
    after: 2,
    requiredTerms: FURNITURE_PART_TERMS,
  },
];

const L_SHAPE_SIGNALS = ['l', 'l-shape', 'l-shaped', 'lshape', 'lshaped'] as const;
const C_SHAPE_SIGNALS = ['c', 'c-shape', 'c-shaped', 'cshape', 'cshaped'] as const;

// Read in both directions: the first row favours "l shape", the second "c shape".
export const EXCLUSION_RULES: readonly ExclusionRule[] = [
  { keep: 'l shape', drop: 'c shape', keepSignals: L_SHAPE_SIGNALS, dropSignals: C_SHAPE_SIGNALS },
  { keep: 'c shape', drop: 'l shape', keepSignals: C_SHAPE_SIGNALS, dropSignals: L_SHAPE_SIGNALS },
];

/**
 * Decide whether a candidate phrase found at `position` is backed by its
 * surrounding tokens. Phrases that match no rule are always accepted.
 */
export function hasContextualSupport(
  phrase: string,
  tokens: readonly string[],
  position: number,
  rules: readonly ContextRule[] = CONTEXT_RULES,
): boolean {
  for (const rule of rules) {
    if (!phrase.includes(rule.trigger)) continue;

    const from = Math.max(0, position - rule.before);
    const to = Math.min(tokens.length, position + rule.after + 1);
    const context = tokens.slice(from, to).join(' ').toLowerCase();
    if (!rule.requiredTerms.some((term) => context.includes(term))) {
      return false;
    }
  }
  return true;
}

function signalTokens(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9-]+/)
      .filter((token) => token.length > 0),
  );
}

/**
 * Remove one side of each mutually exclusive pair when the text clearly
 * favours the other. When both or neither side is signalled, both stay.
 */
export function resolveExclusions(
  features: readonly string[],
  text: string,
  rules: readonly ExclusionRule[] = EXCLUSION_RULES,
): string[] {
  let resolved = [...features];
  const tokens = signalTokens(text);

  for (const rule of rules) {
    if (!resolved.includes(rule.keep) || !resolved.includes(rule.drop)) continue;

    const keepSignalled = rule.keepSignals.some((signal) => tokens.has(signal));
    const dropSignalled = rule.dropSignals.some((signal) => tokens.has(signal));
    if (keepSignalled && !dropSignalled) {
      resolved = resolved.filter((feature) => feature !== rule.drop);
    }
  }

  return resolved;
}
