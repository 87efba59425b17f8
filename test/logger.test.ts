import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { AUDIT_EVENT_ID, auditLog, buildAuditEntry, readAuditLog } from '../src/logger.js';
import { scrub } from '../src/scrub/pipeline.js';
import { DEFAULT_POLICY } from '../src/scrub/classify.js';
import { UNICODE_VERSION } from '../src/scrub/unicode.js';

const TMP_DIR = join(tmpdir(), 'clip-scrub-logger-test-' + Date.now());

const result = scrub('foo\u00A0bar\u202Fbaz\u200Bqux\r\nend', DEFAULT_POLICY);

beforeAll(() => {
  mkdirSync(TMP_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TMP_DIR, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildAuditEntry', () => {
  it('captures the scrub result under the fixed event id', () => {
    const entry = buildAuditEntry('clipboard', result, 3);
    expect(entry).toEqual({
      timestamp: expect.any(String),
      eventId: 63301,
      source: 'clipboard',
      message: 'Removed 1 invisible character; NBSP normalized: yes',
      originalLength: 20,
      cleanedLength: 19,
      removedCount: 1,
      nbspNormalized: true,
      histogram: { Format: 1 },
      durationMs: 3,
      unicodeVersion: UNICODE_VERSION,
    });
    expect(AUDIT_EVENT_ID).toBe(63301);
  });
});

describe('auditLog', () => {
  it('appends one JSON line per entry and reads them back', () => {
    const logFile = join(TMP_DIR, 'nested', 'audit.log');
    auditLog(logFile, 1024 * 1024, buildAuditEntry('clipboard', result, 1));
    auditLog(logFile, 1024 * 1024, buildAuditEntry('stdin', result, 2));

    const lines = readFileSync(logFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);

    const entries = readAuditLog(logFile);
    expect(entries.map(e => e.source)).toEqual(['clipboard', 'stdin']);
    expect(entries[1].histogram).toEqual({ Format: 1 });
  });

  it('rotates the log once it reaches the size limit', () => {
    const logFile = join(TMP_DIR, 'rotate.log');
    auditLog(logFile, 10, buildAuditEntry('clipboard', result, 1));
    auditLog(logFile, 10, buildAuditEntry('mcp', result, 1));

    expect(existsSync(logFile + '.old')).toBe(true);
    expect(readAuditLog(logFile).map(e => e.source)).toEqual(['mcp']);
    expect(readAuditLog(logFile + '.old').map(e => e.source)).toEqual(['clipboard']);
  });

  it('warns instead of throwing when the log cannot be written', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = join(TMP_DIR, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const logFile = join(blocker, 'audit.log');

    expect(() => auditLog(logFile, 1024, buildAuditEntry('clipboard', result, 1))).not.toThrow();
    expect(errorSpy).toHaveBeenCalledWith(`[clip-scrub] Failed to write audit log to ${logFile}`);
  });
});

describe('readAuditLog', () => {
  it('returns nothing for a missing file', () => {
    expect(readAuditLog(join(TMP_DIR, 'absent.log'))).toEqual([]);
  });

  it('skips lines that are not audit entries', () => {
    const logFile = join(TMP_DIR, 'mixed.log');
    const good = JSON.stringify(buildAuditEntry('stdin', result, 1));
    writeFileSync(logFile, ['garbage', good, JSON.stringify({ eventId: 1 }), ''].join('\n'));
    expect(readAuditLog(logFile)).toHaveLength(1);
  });
});
