import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, statSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { ScrubResult } from './scrub/pipeline.js';
import { summarizeResult } from './scrub/report.js';
import { UNICODE_VERSION } from './scrub/unicode.js';

export const AUDIT_EVENT_ID = 63301;

export type AuditSource = 'clipboard' | 'stdin' | 'mcp';

const HistogramSchema = z.object({
  Control: z.number().int().nonnegative(),
  Format: z.number().int().nonnegative(),
  PrivateUse: z.number().int().nonnegative(),
  Surrogate: z.number().int().nonnegative(),
  Unassigned: z.number().int().nonnegative(),
}).partial();

const AuditEntrySchema = z.object({
  timestamp: z.string(),
  eventId: z.number().int(),
  source: z.enum(['clipboard', 'stdin', 'mcp']),
  message: z.string(),
  originalLength: z.number(),
  cleanedLength: z.number(),
  removedCount: z.number(),
  nbspNormalized: z.boolean(),
  histogram: HistogramSchema,
  durationMs: z.number(),
  unicodeVersion: z.string(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export function buildAuditEntry(source: AuditSource, result: ScrubResult, durationMs: number): AuditEntry {
  return {
    timestamp: new Date().toISOString(),
    eventId: AUDIT_EVENT_ID,
    source,
    message: summarizeResult(result),
    originalLength: result.originalLength,
    cleanedLength: result.cleanedLength,
    removedCount: result.removedCount,
    nbspNormalized: result.nbspNormalized,
    histogram: { ...result.histogram },
    durationMs,
    unicodeVersion: UNICODE_VERSION,
  };
}

function rotateIfNeeded(logFile: string, maxBytes: number): void {
  try {
    const size = statSync(logFile).size;
    if (size >= maxBytes) {
      renameSync(logFile, logFile + '.old');
    }
  } catch {
    // File doesn't exist yet, nothing to rotate
  }
}

export function auditLog(logFile: string, maxBytes: number, entry: AuditEntry): void {
  try {
    mkdirSync(dirname(logFile), { recursive: true });
    rotateIfNeeded(logFile, maxBytes);
    appendFileSync(logFile, JSON.stringify(entry) + '\n', 'utf-8');
  } catch {
    console.error(`[clip-scrub] Failed to write audit log to ${logFile}`);
  }
}

/** Entries from `logFile`, oldest first. Lines that don't parse are skipped. */
export function readAuditLog(logFile: string): AuditEntry[] {
  if (!existsSync(logFile)) return [];

  const entries: AuditEntry[] = [];
  for (const line of readFileSync(logFile, 'utf-8').split('\n')) {
    if (!line.trim()) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = AuditEntrySchema.safeParse(raw);
    if (parsed.success) entries.push(parsed.data);
  }
  return entries;
}
