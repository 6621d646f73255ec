import { afterEach, describe, expect, it, vi } from 'vitest';
import { createPolicy } from '../resilience/index.js';
import { FakeChat } from '../testing/fakeChat.js';
import type { ConversationId, MessageId } from '../chat/types.js';
import { ProgressReporter } from './reporter.js';

const sendPolicy = createPolicy(
  'chat',
  () => ({ kind: 'fatal' }),
  { maxAttempts: 1, initialDelay: 0, maxDelay: 0, backoffMultiplier: 1 }
);

function setup(options: { enabled?: boolean; minEditIntervalMs?: number } = {}) {
  const chat = new FakeChat();
  const recorded: Array<[ConversationId, MessageId]> = [];
  let clock = 0;
  const reporter = new ProgressReporter(
    chat,
    { record: async (conversation, id) => { recorded.push([conversation, id]); } },
    { minEditIntervalMs: 1000, sendPolicy, now: () => clock, ...options }
  );
  return {
    chat,
    recorded,
    reporter,
    advance: (ms: number) => { clock += ms; },
  };
}

describe('ProgressReporter', () => {
  it('sends the initial message and records it for auto-clear', async () => {
    const { chat, recorded, reporter } = setup();

    const handle = await reporter.begin(7, 'Searching...', { replyTo: 3 });

    expect(handle.messageId).toBe(100);
    expect(chat.sent[0]?.content).toEqual({ kind: 'text', text: 'Searching...' });
    expect(chat.sent[0]?.options).toEqual({ replyTo: 3 });
    expect(recorded).toEqual([[7, 100]]);
  });

  it('applies the first update and holds later ones inside the interval', async () => {
    const { chat, reporter, advance } = setup();
    const handle = await reporter.begin(7, 'start');

    expect(await reporter.update(handle, 'step 1')).toBe(true);
    advance(200);
    expect(await reporter.update(handle, 'step 2')).toBe(false);
    advance(200);
    expect(await reporter.update(handle, 'step 3')).toBe(false);
    await reporter.finish(handle, 'done');

    expect(chat.edits.map((edit) => edit.text)).toEqual(['step 1', 'done']);
  });

  it('edits again once the interval has elapsed since the last edit', async () => {
    const { chat, reporter, advance } = setup();
    const handle = await reporter.begin(7, 'start');

    await reporter.update(handle, 'a');
    advance(1000);
    expect(await reporter.update(handle, 'b')).toBe(true);

    expect(chat.edits.map((edit) => edit.text)).toEqual(['a', 'b']);
  });

  it('skips edits that would not change the text', async () => {
    const { chat, reporter } = setup();
    const handle = await reporter.begin(7, 'same');

    expect(await reporter.update(handle, 'same')).toBe(false);
    expect(chat.edits).toEqual([]);
  });

  it('treats a failed edit as a dropped update', async () => {
    const { chat, reporter } = setup();
    const handle = await reporter.begin(7, 'start');
    chat.editFailures.push(new Error('Too Many Requests'));

    expect(await reporter.update(handle, 'lost')).toBe(false);
    expect(await reporter.update(handle, 'kept')).toBe(true);
    expect(chat.edits.map((edit) => edit.text)).toEqual(['kept']);
  });

  it('ignores updates after finish', async () => {
    const { chat, reporter, advance } = setup();
    const handle = await reporter.begin(7, 'start');

    await reporter.finish(handle, 'done');
    advance(5000);
    expect(await reporter.update(handle, 'late')).toBe(false);
    await reporter.finish(handle, 'again');

    expect(chat.edits.map((edit) => edit.text)).toEqual(['done']);
    expect(handle.terminal).toBe(true);
  });

  it('sends the latest text that arrived while an edit was in flight', async () => {
    const { chat, reporter } = setup({ minEditIntervalMs: 0 });
    const handle = await reporter.begin(7, 'start');

    const first = reporter.update(handle, 'Downloading');
    const held = [reporter.update(handle, 'Converting'), reporter.update(handle, 'Tagging')];
    expect(await Promise.all(held)).toEqual([false, false]);
    await first;

    expect(chat.edits.map((edit) => edit.text)).toEqual(['Downloading', 'Tagging']);
  });

  it('sends the final text as a new message when the status message is gone', async () => {
    const { chat, recorded, reporter } = setup();
    const handle = await reporter.begin(7, 'start', { replyTo: 9 });
    chat.editFailures.push(new Error('message to edit not found'));

    await reporter.finish(handle, 'done');

    expect(chat.sent).toHaveLength(2);
    expect(chat.sent[1]?.content).toEqual({ kind: 'text', text: 'done' });
    expect(chat.sent[1]?.options).toEqual({ replyTo: 9 });
    expect(recorded).toEqual([[7, 100], [7, 101]]);
  });

  it('proceeds without a status message when the initial send fails', async () => {
    const { chat, reporter } = setup();
    chat.sendFailures.push(new Error('Forbidden'));

    const handle = await reporter.begin(7, 'start');
    expect(handle.messageId).toBeNull();
    expect(await reporter.update(handle, 'progress')).toBe(false);

    await reporter.finish(handle, 'result');
    expect(chat.sent.map((message) => message.content)).toEqual([{ kind: 'text', text: 'result' }]);
  });

  it('only posts the outcome when progress messages are disabled', async () => {
    const { chat, reporter } = setup({ enabled: false });

    const handle = await reporter.begin(7, 'start');
    await reporter.update(handle, 'progress');
    await reporter.finish(handle, 'result');

    expect(chat.sent.map((message) => message.content)).toEqual([{ kind: 'text', text: 'result' }]);
    expect(chat.edits).toEqual([]);
  });

  describe('trailing edit', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    function timedReporter(chat: FakeChat) {
      return new ProgressReporter(chat, { record: async () => {} }, { minEditIntervalMs: 50, sendPolicy });
    }

    it('delivers the newest held text when the interval ends', async () => {
      vi.useFakeTimers();
      const chat = new FakeChat();
      const reporter = timedReporter(chat);
      const handle = await reporter.begin(7, 'start');

      expect(await reporter.update(handle, 'Downloading')).toBe(true);
      await vi.advanceTimersByTimeAsync(10);
      expect(await reporter.update(handle, 'Converting')).toBe(false);
      expect(await reporter.update(handle, 'Tagging')).toBe(false);
      expect(chat.edits.map((edit) => edit.text)).toEqual(['Downloading']);

      await vi.advanceTimersByTimeAsync(40);
      expect(chat.edits.map((edit) => edit.text)).toEqual(['Downloading', 'Tagging']);

      await vi.advanceTimersByTimeAsync(5000);
      expect(chat.edits.map((edit) => edit.text)).toEqual(['Downloading', 'Tagging']);
      expect(handle.trailingTimer).toBeNull();
    });

    it('drops the held text when finish comes first', async () => {
      vi.useFakeTimers();
      const chat = new FakeChat();
      const reporter = timedReporter(chat);
      const handle = await reporter.begin(7, 'start');

      await reporter.update(handle, 'Downloading');
      await vi.advanceTimersByTimeAsync(10);
      await reporter.update(handle, 'Tagging');
      await reporter.finish(handle, 'done');
      await vi.advanceTimersByTimeAsync(5000);

      expect(chat.edits.map((edit) => edit.text)).toEqual(['Downloading', 'done']);
      expect(handle.trailingTimer).toBeNull();
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
