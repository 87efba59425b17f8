import { classify, isNoBreakSpace, type PolicyConfig } from './classify.js';
import { OTHER_CATEGORIES, type OtherCategory } from './unicode.js';

export type Histogram = Readonly<Partial<Record<OtherCategory, number>>>;

export interface ScrubResult {
  readonly cleanedText: string;
  readonly originalLength: number;
  readonly cleanedLength: number;
  readonly removedCount: number;
  readonly nbspNormalized: boolean;
  readonly histogram: Histogram;
}

interface NormalizeResult {
  text: string;
  originalLength: number;
  nbspNormalized: boolean;
}

// Pass 1: no-break spaces become plain spaces before anything is deleted
function normalizeSpaces(text: string, policy: PolicyConfig): NormalizeResult {
  const out: string[] = [];
  let nbspNormalized = false;

  for (const char of text) {
    if (isNoBreakSpace(char) && classify(char, policy).disposition === 'replace-with-space') {
      out.push(' ');
      nbspNormalized = true;
    } else {
      out.push(char);
    }
  }

  return { text: out.join(''), originalLength: out.length, nbspNormalized };
}

function sortHistogram(counts: Map<OtherCategory, number>): Histogram {
  const sorted: Partial<Record<OtherCategory, number>> = {};
  for (const category of OTHER_CATEGORIES) {
    const count = counts.get(category);
    if (count !== undefined) sorted[category] = count;
  }
  return Object.freeze(sorted);
}

/**
 * Remove invisible and non-printing code points from `rawText`.
 *
 * Runs in two passes: no-break space normalization first, then deletion of
 * the categories in the policy's deletion set. Iteration is by code point,
 * so surrogate pairs are classified whole and a lone surrogate is one
 * `Surrogate` removal. Lengths in the result are code point counts.
 */
export function scrub(rawText: string, policy: PolicyConfig): ScrubResult {
  const normalized = normalizeSpaces(rawText, policy);

  // Pass 2
  const kept: string[] = [];
  const counts = new Map<OtherCategory, number>();
  for (const char of normalized.text) {
    const verdict = classify(char, policy);
    if (verdict.disposition === 'delete') {
      counts.set(verdict.category, (counts.get(verdict.category) ?? 0) + 1);
    } else {
      kept.push(char);
    }
  }

  return Object.freeze({
    cleanedText: kept.join(''),
    originalLength: normalized.originalLength,
    cleanedLength: kept.length,
    removedCount: normalized.originalLength - kept.length,
    nbspNormalized: normalized.nbspNormalized,
    histogram: sortHistogram(counts),
  });
}
