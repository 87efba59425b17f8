import type { Histogram, ScrubResult } from './pipeline.js';
import { OTHER_CATEGORIES, type OtherCategory } from './unicode.js';

export function hasChanges(result: ScrubResult): boolean {
  return result.removedCount > 0 || result.nbspNormalized;
}

export function histogramEntries(histogram: Histogram): Array<[OtherCategory, number]> {
  const entries: Array<[OtherCategory, number]> = [];
  for (const category of OTHER_CATEGORIES) {
    const count = histogram[category] ?? 0;
    if (count > 0) entries.push([category, count]);
  }
  return entries;
}

/**
 * Multi-line summary of a scrub. Log writers and notifications depend on
 * this text being stable for a given result.
 */
export function formatReport(result: ScrubResult): string {
  const lines = [
    `Scrubbed: ${result.originalLength} → ${result.cleanedLength} code points, stripped ${result.removedCount}`,
  ];
  if (result.nbspNormalized) lines.push('NBSP normalized');

  const breakdown = histogramEntries(result.histogram);
  if (breakdown.length > 0) {
    lines.push('Category breakdown:');
    for (const [category, count] of breakdown) {
      lines.push(`  ${category}: ${count}`);
    }
  }
  return lines.join('\n');
}

export function summarizeResult(result: ScrubResult): string {
  const noun = result.removedCount === 1 ? 'character' : 'characters';
  return `Removed ${result.removedCount} invisible ${noun}; NBSP normalized: ${result.nbspNormalized ? 'yes' : 'no'}`;
}
