import type { ScrubResult } from './scrub/pipeline.js';
import { hasChanges, summarizeResult } from './scrub/report.js';

export interface NotifyOptions {
  suppressAudibleCue: boolean;
  suppressToast: boolean;
}

export interface NotificationChannels {
  bell(): void;
  toast(message: string): void;
}

export interface Notifier {
  notify(result: ScrubResult): void;
}

export const terminalChannels: NotificationChannels = {
  bell() {
    process.stderr.write('\x07');
  },
  toast(message) {
    console.error(`[clip-scrub] ${message}`);
  },
};

function attempt(channel: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    if (process.env.CLIP_SCRUB_DEBUG) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[clip-scrub] ${channel} unavailable: ${message}`);
    }
  }
}

/**
 * Best-effort notification once a scrub changed something. A failing
 * channel is skipped and never affects the caller.
 */
export function createNotifier(options: NotifyOptions, channels: NotificationChannels = terminalChannels): Notifier {
  return {
    notify(result) {
      if (!hasChanges(result)) return;
      if (!options.suppressAudibleCue) attempt('bell', () => channels.bell());
      if (!options.suppressToast) attempt('toast', () => channels.toast(summarizeResult(result)));
    },
  };
}
