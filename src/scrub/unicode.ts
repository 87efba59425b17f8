export type GeneralCategory =
  | 'UppercaseLetter' | 'LowercaseLetter' | 'TitlecaseLetter' | 'ModifierLetter' | 'OtherLetter'
  | 'NonspacingMark' | 'SpacingMark' | 'EnclosingMark'
  | 'DecimalNumber' | 'LetterNumber' | 'OtherNumber'
  | 'ConnectorPunctuation' | 'DashPunctuation' | 'OpenPunctuation' | 'ClosePunctuation'
  | 'InitialPunctuation' | 'FinalPunctuation' | 'OtherPunctuation'
  | 'MathSymbol' | 'CurrencySymbol' | 'ModifierSymbol' | 'OtherSymbol'
  | 'SpaceSeparator' | 'LineSeparator' | 'ParagraphSeparator'
  | 'Control' | 'Format' | 'Surrogate' | 'PrivateUse' | 'Unassigned';

export type OtherCategory = Extract<
  GeneralCategory,
  'Control' | 'Format' | 'Surrogate' | 'PrivateUse' | 'Unassigned'
>;

// Unicode version of the engine's property tables (Node.js 20 ships 15.1)
export const UNICODE_VERSION: string = process.versions.unicode ?? 'unknown';

// Categories are disjoint; category C is listed first
const CATEGORY_PATTERNS: ReadonlyArray<readonly [GeneralCategory, RegExp]> = [
  ['Control', /^\p{gc=Cc}$/u],
  ['Format', /^\p{gc=Cf}$/u],
  ['Surrogate', /^\p{gc=Cs}$/u],
  ['PrivateUse', /^\p{gc=Co}$/u],
  ['Unassigned', /^\p{gc=Cn}$/u],
  ['LowercaseLetter', /^\p{gc=Ll}$/u],
  ['UppercaseLetter', /^\p{gc=Lu}$/u],
  ['OtherLetter', /^\p{gc=Lo}$/u],
  ['DecimalNumber', /^\p{gc=Nd}$/u],
  ['SpaceSeparator', /^\p{gc=Zs}$/u],
  ['OtherPunctuation', /^\p{gc=Po}$/u],
  ['TitlecaseLetter', /^\p{gc=Lt}$/u],
  ['ModifierLetter', /^\p{gc=Lm}$/u],
  ['NonspacingMark', /^\p{gc=Mn}$/u],
  ['SpacingMark', /^\p{gc=Mc}$/u],
  ['EnclosingMark', /^\p{gc=Me}$/u],
  ['LetterNumber', /^\p{gc=Nl}$/u],
  ['OtherNumber', /^\p{gc=No}$/u],
  ['ConnectorPunctuation', /^\p{gc=Pc}$/u],
  ['DashPunctuation', /^\p{gc=Pd}$/u],
  ['OpenPunctuation', /^\p{gc=Ps}$/u],
  ['ClosePunctuation', /^\p{gc=Pe}$/u],
  ['InitialPunctuation', /^\p{gc=Pi}$/u],
  ['FinalPunctuation', /^\p{gc=Pf}$/u],
  ['MathSymbol', /^\p{gc=Sm}$/u],
  ['CurrencySymbol', /^\p{gc=Sc}$/u],
  ['ModifierSymbol', /^\p{gc=Sk}$/u],
  ['OtherSymbol', /^\p{gc=So}$/u],
  ['LineSeparator', /^\p{gc=Zl}$/u],
  ['ParagraphSeparator', /^\p{gc=Zp}$/u],
];

/**
 * General category of a single code point, or undefined when `char` is not
 * exactly one code point. A lone surrogate counts as one code point.
 */
export function categoryOf(char: string): GeneralCategory | undefined {
  for (const [category, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(char)) return category;
  }
  return undefined;
}

// Sorted by name
export const OTHER_CATEGORIES: readonly OtherCategory[] = ['Control', 'Format', 'PrivateUse', 'Surrogate', 'Unassigned'];

export function isOtherCategory(category: string): category is OtherCategory {
  return OTHER_CATEGORIES.some(c => c === category);
}
