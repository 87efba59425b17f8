import { describe, it, expect, vi, type Mock } from 'vitest';
import { createNotifier, type NotificationChannels } from '../src/notify.js';
import { scrub } from '../src/scrub/pipeline.js';
import { DEFAULT_POLICY } from '../src/scrub/classify.js';

interface FakeChannels extends NotificationChannels {
  bell: Mock<() => void>;
  toast: Mock<(message: string) => void>;
}

function fakeChannels(): FakeChannels {
  return { bell: vi.fn<() => void>(), toast: vi.fn<(message: string) => void>() };
}

const changed = scrub('a\u200Bb', DEFAULT_POLICY);
const unchanged = scrub('ab', DEFAULT_POLICY);

describe('createNotifier', () => {
  it('rings and shows a summary when something changed', () => {
    const channels = fakeChannels();
    createNotifier({ suppressAudibleCue: false, suppressToast: false }, channels).notify(changed);
    expect(channels.bell).toHaveBeenCalledTimes(1);
    expect(channels.toast).toHaveBeenCalledWith('Removed 1 invisible character; NBSP normalized: no');
  });

  it('stays quiet when nothing changed', () => {
    const channels = fakeChannels();
    createNotifier({ suppressAudibleCue: false, suppressToast: false }, channels).notify(unchanged);
    expect(channels.bell).not.toHaveBeenCalled();
    expect(channels.toast).not.toHaveBeenCalled();
  });

  it('notifies when only no-break spaces were normalized', () => {
    const channels = fakeChannels();
    createNotifier({ suppressAudibleCue: true, suppressToast: false }, channels).notify(scrub('a\u00A0b', DEFAULT_POLICY));
    expect(channels.toast).toHaveBeenCalledWith('Removed 0 invisible characters; NBSP normalized: yes');
  });

  it('honours the suppression options', () => {
    const channels = fakeChannels();
    createNotifier({ suppressAudibleCue: true, suppressToast: true }, channels).notify(changed);
    expect(channels.bell).not.toHaveBeenCalled();
    expect(channels.toast).not.toHaveBeenCalled();
  });

  it('keeps going when a channel fails', () => {
    const channels = fakeChannels();
    channels.bell.mockImplementation(() => {
      throw new Error('no audio device');
    });
    const notifier = createNotifier({ suppressAudibleCue: false, suppressToast: false }, channels);
    expect(() => notifier.notify(changed)).not.toThrow();
    expect(channels.toast).toHaveBeenCalledTimes(1);
  });
});
