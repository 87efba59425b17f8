import { categoryOf, isOtherCategory, type OtherCategory } from './unicode.js';

export interface PolicyConfig {
  readonly keepFormatMarks: boolean;
  readonly keepNoBreakSpace: boolean;
}

export type Classification =
  | { disposition: 'keep' }
  | { disposition: 'replace-with-space' }
  | { disposition: 'delete'; category: OtherCategory };

export type Disposition = Classification['disposition'];

export const CR = '\r';
export const LF = '\n';
export const NBSP = '\u00A0';
export const NNBSP = '\u202F';

export const DEFAULT_POLICY: PolicyConfig = Object.freeze({
  keepFormatMarks: false,
  keepNoBreakSpace: false,
});

export function createPolicy(overrides: Partial<PolicyConfig> = {}): PolicyConfig {
  return Object.freeze({
    keepFormatMarks: overrides.keepFormatMarks ?? DEFAULT_POLICY.keepFormatMarks,
    keepNoBreakSpace: overrides.keepNoBreakSpace ?? DEFAULT_POLICY.keepNoBreakSpace,
  });
}

const ALWAYS_DELETED: readonly OtherCategory[] = ['Control', 'Surrogate', 'PrivateUse', 'Unassigned'];
const DELETE_ALL: ReadonlySet<OtherCategory> = new Set<OtherCategory>([...ALWAYS_DELETED, 'Format']);
const DELETE_KEEPING_FORMAT: ReadonlySet<OtherCategory> = new Set<OtherCategory>(ALWAYS_DELETED);

export function deletionSet(policy: PolicyConfig): ReadonlySet<OtherCategory> {
  return policy.keepFormatMarks ? DELETE_KEEPING_FORMAT : DELETE_ALL;
}

export function isNoBreakSpace(char: string): boolean {
  return char === NBSP || char === NNBSP;
}

const KEEP: Classification = { disposition: 'keep' };
const REPLACE: Classification = { disposition: 'replace-with-space' };

/**
 * Decide what happens to one code point.
 *
 * CR and LF always survive, even though they are Control characters.
 * No-break spaces are normalized unless the policy keeps them. Anything
 * whose category cannot be determined is kept.
 */
export function classify(char: string, policy: PolicyConfig): Classification {
  if (char === CR || char === LF) return KEEP;

  if (isNoBreakSpace(char)) {
    return policy.keepNoBreakSpace ? KEEP : REPLACE;
  }

  const category = categoryOf(char);
  if (category === undefined || !isOtherCategory(category)) return KEEP;
  if (!deletionSet(policy).has(category)) return KEEP;

  return { disposition: 'delete', category };
}
