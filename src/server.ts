import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { systemClipboard, NoTextAvailableError, type Clipboard } from './clipboard.js';
import { loadConfig, policyOf, type ScrubConfig } from './config.js';
import { recordAudit, scrubClipboard, SerialQueue } from './cycle.js';
import { scrub, type ScrubResult } from './scrub/pipeline.js';
import { formatReport, hasChanges, histogramEntries } from './scrub/report.js';
import { OTHER_CATEGORIES, UNICODE_VERSION, type OtherCategory } from './scrub/unicode.js';

export const SERVER_VERSION = '0.1.0';

interface SessionStats {
  totalRequests: number;
  changedRequests: number;
  totalRemoved: number;
  nbspRuns: number;
  byCategory: Record<OtherCategory, number>;
}

export interface ServerDeps {
  clipboard: Clipboard;
}

function updateSessionStats(session: SessionStats, result: ScrubResult): void {
  session.totalRequests++;
  if (hasChanges(result)) session.changedRequests++;
  session.totalRemoved += result.removedCount;
  if (result.nbspNormalized) session.nbspRuns++;
  for (const [category, count] of histogramEntries(result.histogram)) {
    session.byCategory[category] += count;
  }
}

function withOverrides(config: ScrubConfig, keepFormatMarks?: boolean, keepNoBreakSpace?: boolean): ScrubConfig {
  return {
    ...config,
    keepFormatMarks: keepFormatMarks ?? config.keepFormatMarks,
    keepNoBreakSpace: keepNoBreakSpace ?? config.keepNoBreakSpace,
  };
}

const policyInput = {
  keep_format_marks: z.boolean().optional().describe('Keep format marks such as ZWJ and soft hyphens'),
  keep_no_break_space: z.boolean().optional().describe('Leave U+00A0 and U+202F unchanged instead of turning them into spaces'),
};

export function createServer(config: ScrubConfig, deps: ServerDeps = { clipboard: systemClipboard }): McpServer {
  const session: SessionStats = {
    totalRequests: 0,
    changedRequests: 0,
    totalRemoved: 0,
    nbspRuns: 0,
    byCategory: { Control: 0, Format: 0, PrivateUse: 0, Surrogate: 0, Unassigned: 0 },
  };
  // One clipboard cycle at a time
  const clipboardQueue = new SerialQueue();

  const server = new McpServer({
    name: 'clip-scrub',
    version: SERVER_VERSION,
  });

  // ── scrub_text ──────────────────────────────────────────────

  server.registerTool(
    'scrub_text',
    {
      description: 'Remove invisible Unicode control, format, private-use, surrogate and unassigned code points from text and normalize non-breaking spaces. Returns a report header followed by the cleaned text.',
      inputSchema: {
        text: z.string().describe('Text to clean'),
        ...policyInput,
      },
    },
    async ({ text, keep_format_marks, keep_no_break_space }) => {
      const effective = withOverrides(config, keep_format_marks, keep_no_break_space);
      const startTime = Date.now();
      const result = scrub(text, policyOf(effective));
      const durationMs = Date.now() - startTime;

      updateSessionStats(session, result);
      recordAudit(effective, 'mcp', result, durationMs);

      return {
        content: [{ type: 'text' as const, text: `[clip-scrub] ${formatReport(result)}\n\n${result.cleanedText}` }],
      };
    },
  );

  // ── scrub_clipboard ─────────────────────────────────────────

  server.registerTool(
    'scrub_clipboard',
    {
      description: 'Clean the system clipboard text in place and report what was removed.',
      inputSchema: {
        ...policyInput,
        dry_run: z.boolean().optional().describe('Report without writing the clipboard'),
      },
    },
    async ({ keep_format_marks, keep_no_break_space, dry_run }) => {
      const effective = withOverrides(config, keep_format_marks, keep_no_break_space);
      try {
        const { result, written } = await clipboardQueue.run(() =>
          scrubClipboard(deps.clipboard, effective, 'mcp', dry_run ?? false),
        );
        updateSessionStats(session, result);

        const status = written ? 'Clipboard updated' : dry_run ? 'Dry run, clipboard unchanged' : 'Clipboard already clean';
        return {
          content: [{ type: 'text' as const, text: `[clip-scrub] ${status}\n${formatReport(result)}` }],
        };
      } catch (error) {
        if (error instanceof NoTextAvailableError) {
          return {
            content: [{ type: 'text' as const, text: `[clip-scrub] ${error.message}, nothing to do` }],
            isError: true,
          };
        }
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{ type: 'text' as const, text: `[clip-scrub] Error scrubbing clipboard: ${message}` }],
          isError: true,
        };
      }
    },
  );

  // ── scrub_stats ─────────────────────────────────────────────

  server.registerTool(
    'scrub_stats',
    {
      description: 'Show scrub statistics for the current session',
      inputSchema: {},
    },
    async () => {
      const lines = [
        `Session stats (${session.totalRequests} requests, ${session.changedRequests} changed, Unicode ${UNICODE_VERSION}):`,
        `  Code points removed: ${session.totalRemoved}`,
        `  NBSP normalized: ${session.nbspRuns} requests`,
      ];
      for (const category of OTHER_CATEGORIES) {
        if (session.byCategory[category] > 0) lines.push(`  ${category}: ${session.byCategory[category]}`);
      }

      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );

  return server;
}

export async function startServer(): Promise<void> {
  const server = createServer(loadConfig());
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[clip-scrub] MCP server running on stdio');
}
