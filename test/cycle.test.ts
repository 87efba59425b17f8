import { describe, it, expect } from 'vitest';
import { scrubClipboard, SerialQueue } from '../src/cycle.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import { NoTextAvailableError } from '../src/clipboard.js';
import { FakeClipboard } from './fake-clipboard.js';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('scrubClipboard', () => {
  it('writes back only when the text changed', async () => {
    const dirty = new FakeClipboard('x\u200By');
    const cycle = await scrubClipboard(dirty, DEFAULT_CONFIG, 'clipboard');
    expect(cycle.written).toBe(true);
    expect(dirty.writes).toEqual(['xy']);

    const clean = new FakeClipboard('xy');
    expect((await scrubClipboard(clean, DEFAULT_CONFIG, 'clipboard')).written).toBe(false);
    expect(clean.writes).toEqual([]);
  });

  it('skips the write on a dry run', async () => {
    const clipboard = new FakeClipboard('x\u200By');
    const cycle = await scrubClipboard(clipboard, DEFAULT_CONFIG, 'clipboard', true);
    expect(cycle.written).toBe(false);
    expect(cycle.result.cleanedText).toBe('xy');
    expect(clipboard.writes).toEqual([]);
  });

  it('propagates NoTextAvailableError', async () => {
    await expect(scrubClipboard(new FakeClipboard(undefined), DEFAULT_CONFIG, 'clipboard'))
      .rejects.toBeInstanceOf(NoTextAvailableError);
  });
});

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run(task('a', 20)), queue.run(task('b', 1))]);
    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('keeps running after a task fails', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
