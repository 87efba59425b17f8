import type { Clipboard } from './clipboard.js';
import { policyOf, type ScrubConfig } from './config.js';
import { auditLog, buildAuditEntry, type AuditSource } from './logger.js';
import { scrub, type ScrubResult } from './scrub/pipeline.js';
import { hasChanges } from './scrub/report.js';

export interface CycleResult {
  result: ScrubResult;
  written: boolean;
  durationMs: number;
}

export function recordAudit(config: ScrubConfig, source: AuditSource, result: ScrubResult, durationMs: number): void {
  if (config.writeAuditLog && hasChanges(result)) {
    auditLog(config.logFile, config.logMaxBytes, buildAuditEntry(source, result, durationMs));
  }
}

/**
 * Read the clipboard, scrub it, and write it back when something changed.
 * NoTextAvailableError from the read propagates to the caller.
 */
export async function scrubClipboard(
  clipboard: Clipboard,
  config: ScrubConfig,
  source: AuditSource,
  dryRun = false,
): Promise<CycleResult> {
  const raw = await clipboard.read();
  const startTime = Date.now();
  const result = scrub(raw, policyOf(config));

  const written = !dryRun && result.cleanedText !== raw;
  if (written) {
    await clipboard.write(result.cleanedText);
  }
  const durationMs = Date.now() - startTime;

  recordAudit(config, source, result, durationMs);
  return { result, written, durationMs };
}

/** Runs tasks one at a time, in submission order. */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
