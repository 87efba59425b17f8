import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createPolicy, type PolicyConfig } from './scrub/classify.js';

export interface ScrubConfig extends PolicyConfig {
  suppressAudibleCue: boolean;
  suppressToast: boolean;
  writeAuditLog: boolean;
  logFile: string;
  logMaxBytes: number;
}

export const CONFIG_FILE_NAME = '.clip-scrub.json';

export const DEFAULT_CONFIG: ScrubConfig = {
  keepFormatMarks: false,
  keepNoBreakSpace: false,
  suppressAudibleCue: false,
  suppressToast: false,
  writeAuditLog: false,
  logFile: join(process.env.HOME || '', '.clip-scrub', 'audit.log'),
  logMaxBytes: 10 * 1024 * 1024, // 10MB
};

const ConfigFileSchema = z.object({
  keepFormatMarks: z.boolean(),
  keepNoBreakSpace: z.boolean(),
  suppressAudibleCue: z.boolean(),
  suppressToast: z.boolean(),
  writeAuditLog: z.boolean(),
  logFile: z.string().min(1),
  logMaxBytes: z.number().int().positive(),
}).partial().strict();

export function defaultConfigPaths(): string[] {
  return [
    join(process.cwd(), CONFIG_FILE_NAME),
    join(process.env.HOME || '', CONFIG_FILE_NAME),
  ];
}

export function loadConfig(paths: string[] = defaultConfigPaths()): ScrubConfig {
  for (const configPath of paths) {
    if (!existsSync(configPath)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[clip-scrub] Ignoring unreadable config ${configPath}: ${message}`);
      continue;
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      console.error(`[clip-scrub] Ignoring invalid config ${configPath}: ${issues}`);
      continue;
    }
    return { ...DEFAULT_CONFIG, ...parsed.data };
  }

  return { ...DEFAULT_CONFIG };
}

/** CLI flags win over the config file. */
export function applyFlags(config: ScrubConfig, args: string[]): ScrubConfig {
  return {
    ...config,
    keepFormatMarks: config.keepFormatMarks || args.includes('--keep-format'),
    keepNoBreakSpace: config.keepNoBreakSpace || args.includes('--keep-nbsp'),
    suppressAudibleCue: config.suppressAudibleCue || args.includes('--silent'),
    suppressToast: config.suppressToast || args.includes('--no-toast'),
    writeAuditLog: config.writeAuditLog || args.includes('--log'),
  };
}

export function policyOf(config: ScrubConfig): PolicyConfig {
  return createPolicy({
    keepFormatMarks: config.keepFormatMarks,
    keepNoBreakSpace: config.keepNoBreakSpace,
  });
}
