import { systemClipboard, NoTextAvailableError, type Clipboard } from './clipboard.js';
import { applyFlags, loadConfig, policyOf, type ScrubConfig } from './config.js';
import { recordAudit, scrubClipboard } from './cycle.js';
import { readAuditLog } from './logger.js';
import { createNotifier, terminalChannels, type NotificationChannels } from './notify.js';
import { scrub } from './scrub/pipeline.js';
import { formatReport, hasChanges, histogramEntries } from './scrub/report.js';
import { OTHER_CATEGORIES, UNICODE_VERSION, type OtherCategory } from './scrub/unicode.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOTHING_TO_DO = 2;

export interface CliDeps {
  clipboard: Clipboard;
  channels: NotificationChannels;
  loadConfig: () => ScrubConfig;
  readInput: () => Promise<string>;
  writeOutput: (text: string) => void;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export const defaultDeps: CliDeps = {
  clipboard: systemClipboard,
  channels: terminalChannels,
  loadConfig: () => loadConfig(),
  readInput: readStdin,
  writeOutput: (text) => {
    process.stdout.write(text);
  },
};

export const USAGE = `Usage: clip-scrub [command] [options]

Commands:
  scrub (default)  Clean the clipboard text in place
  check            Clean stdin and write the result to stdout
  stats            Summarize the audit log
  serve            Start the MCP server on stdio

Options:
  --keep-format    Keep format marks (ZWJ, ZWNJ, soft hyphen, ...)
  --keep-nbsp      Keep non-breaking spaces unchanged
  --silent         No terminal bell
  --no-toast       No notification line
  --log            Append an audit log entry when something changed
  --dry-run        Report without writing the clipboard (scrub only)
  -h, --help       Show this help`;

function printReport(report: string): void {
  for (const line of report.split('\n')) {
    console.error(`[clip-scrub] ${line}`);
  }
}

export async function runScrub(args: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const config = applyFlags(deps.loadConfig(), args);
  const dryRun = args.includes('--dry-run');

  try {
    const { result, written } = await scrubClipboard(deps.clipboard, config, 'clipboard', dryRun);
    printReport(formatReport(result));
    if (dryRun && hasChanges(result)) {
      console.error('[clip-scrub] Dry run: clipboard left unchanged');
    } else if (!written) {
      console.error('[clip-scrub] Clipboard already clean');
    }
    createNotifier(config, deps.channels).notify(result);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof NoTextAvailableError) {
      console.error(`[clip-scrub] Warning: ${error.message}, nothing to do`);
      return EXIT_NOTHING_TO_DO;
    }
    throw error;
  }
}

export async function runCheck(args: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const config = applyFlags(deps.loadConfig(), args);
  const raw = await deps.readInput();

  const startTime = Date.now();
  const result = scrub(raw, policyOf(config));
  const durationMs = Date.now() - startTime;

  recordAudit(config, 'stdin', result, durationMs);
  printReport(formatReport(result));
  deps.writeOutput(result.cleanedText);
  return EXIT_OK;
}

export function runStats(deps: CliDeps = defaultDeps): number {
  const config = deps.loadConfig();
  const entries = readAuditLog(config.logFile);

  if (entries.length === 0) {
    console.log('No audit log entries found.');
    console.log(`Expected log file: ${config.logFile}`);
    console.log('Enable logging: pass --log or set "writeAuditLog": true in .clip-scrub.json');
    return EXIT_OK;
  }

  const totalRemoved = entries.reduce((s, e) => s + e.removedCount, 0);
  const nbspRuns = entries.filter(e => e.nbspNormalized).length;
  const avgMs = Math.round(entries.reduce((s, e) => s + e.durationMs, 0) / entries.length);

  const byCategory = new Map<OtherCategory, number>();
  for (const entry of entries) {
    for (const [category, count] of histogramEntries(entry.histogram)) {
      byCategory.set(category, (byCategory.get(category) ?? 0) + count);
    }
  }

  console.log(`\n  clip-scrub stats (${entries.length} runs, Unicode ${UNICODE_VERSION})\n`);
  console.log(`  Removed:         ${totalRemoved}`);
  console.log(`  NBSP normalized: ${nbspRuns} runs`);
  console.log(`  Avg duration:    ${avgMs}ms\n`);

  if (byCategory.size > 0) {
    console.log('  By category:');
    for (const category of OTHER_CATEGORIES) {
      const count = byCategory.get(category);
      if (count !== undefined) console.log(`    ${category}: ${count}`);
    }
    console.log();
  }

  console.log('  Recent:');
  for (const e of entries.slice(-5)) {
    console.log(`    ${e.timestamp.slice(0, 19).replace('T', ' ')}  [${e.source}] ${e.message}`);
  }
  console.log();
  return EXIT_OK;
}

export async function runCli(command: string, args: string[], deps: CliDeps = defaultDeps): Promise<number> {
  try {
    if (command === 'check') return await runCheck(args, deps);
    if (command === 'stats') return runStats(deps);
    return await runScrub(args, deps);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    return EXIT_FAILURE;
  }
}
