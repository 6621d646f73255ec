/**
 * Progress Reporter
 *
 * Keeps one editable status message per Operation alive in the chat without
 * exceeding the platform's edit-rate tolerance.
 *
 * - `begin` sends the message (through the call wrapper) and records it for auto-clear
 * - `update` edits at most once per interval. Text arriving sooner, or while
 *   an edit is in flight, is held and the latest of it goes out in one
 *   trailing edit when the interval ends
 * - `finish` always applies, cancels any trailing edit and makes the handle terminal
 */

import type { Logger } from '@tunegrab/utils';
import { resilientCall, type CallPolicy } from '../resilience/index.js';
import type { ChatClient, ConversationId, MessageId, SendOptions } from '../chat/types.js';

export interface ProgressReporterOptions {
  minEditIntervalMs: number;
  sendPolicy: CallPolicy;
  /** When false no status message is sent; `finish` still posts the outcome */
  enabled?: boolean;
  now?: () => number;
  logger?: Logger;
}

export interface MessageRecorder {
  record(conversation: ConversationId, messageId: MessageId): Promise<void>;
}

export class StatusMessage {
  messageId: MessageId | null = null;
  renderedText: string | null = null;
  lastEditAt: number | null = null;
  terminal = false;
  inFlight: Promise<void> | null = null;
  /** Latest text held back by the throttle */
  pendingText: string | null = null;
  trailingTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly conversationId: ConversationId,
    readonly replyTo?: MessageId,
  ) {}
}

export class ProgressReporter {
  private readonly enabled: boolean;
  private readonly now: () => number;

  constructor(
    private readonly chat: ChatClient,
    private readonly recorder: MessageRecorder,
    private readonly options: ProgressReporterOptions,
  ) {
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
  }

  async begin(conversation: ConversationId, initialText: string, options: SendOptions = {}): Promise<StatusMessage> {
    const handle = new StatusMessage(conversation, options.replyTo);
    if (!this.enabled) {
      return handle;
    }

    try {
      handle.messageId = await resilientCall(
        () => this.chat.send(conversation, { kind: 'text', text: initialText }, options),
        this.options.sendPolicy,
      );
      handle.renderedText = initialText;
      await this.recorder.record(conversation, handle.messageId);
    } catch (error) {
      this.options.logger?.warn({ err: error, conversation }, 'Could not send status message, continuing without progress');
    }

    return handle;
  }

  /**
   * Returns true when this text reached the platform right away; false when
   * it was held for the trailing edit or nothing needed changing
   */
  async update(handle: StatusMessage, text: string): Promise<boolean> {
    if (handle.terminal || handle.messageId === null) {
      return false;
    }
    if (handle.inFlight) {
      // picked up once the running edit settles
      handle.pendingText = text;
      return false;
    }
    const wait = this.remainingInterval(handle);
    if (wait > 0) {
      handle.pendingText = text;
      this.scheduleTrailing(handle, wait);
      return false;
    }
    handle.pendingText = null;
    if (text === handle.renderedText) {
      return false;
    }

    const messageId = handle.messageId;
    let applied = false;
    handle.inFlight = this.chat.edit(handle.conversationId, messageId, text).then(
      () => {
        applied = true;
        handle.renderedText = text;
        handle.lastEditAt = this.now();
      },
      (error: unknown) => {
        this.options.logger?.debug({ err: error, messageId }, 'Progress edit failed, dropping update');
      },
    );

    try {
      await handle.inFlight;
    } finally {
      handle.inFlight = null;
    }
    await this.flushPending(handle);
    return applied;
  }

  private remainingInterval(handle: StatusMessage): number {
    if (handle.lastEditAt === null) {
      return 0;
    }
    return this.options.minEditIntervalMs - (this.now() - handle.lastEditAt);
  }

  private scheduleTrailing(handle: StatusMessage, wait: number): void {
    if (handle.trailingTimer !== null) {
      return;
    }
    handle.trailingTimer = setTimeout(() => {
      handle.trailingTimer = null;
      this.flushPending(handle).catch((error: unknown) => {
        this.options.logger?.debug({ err: error }, 'Trailing progress edit failed');
      });
    }, wait);
  }

  private async flushPending(handle: StatusMessage): Promise<void> {
    const text = handle.pendingText;
    if (text === null || handle.terminal || handle.trailingTimer !== null) {
      return;
    }
    handle.pendingText = null;
    await this.update(handle, text);
  }

  async finish(handle: StatusMessage, finalText: string): Promise<void> {
    if (handle.terminal) {
      return;
    }
    handle.terminal = true;
    handle.pendingText = null;
    if (handle.trailingTimer !== null) {
      clearTimeout(handle.trailingTimer);
      handle.trailingTimer = null;
    }

    if (handle.inFlight) {
      await handle.inFlight;
    }

    const messageId = handle.messageId;
    if (messageId !== null) {
      if (finalText === handle.renderedText) {
        return;
      }
      try {
        await resilientCall(
          () => this.chat.edit(handle.conversationId, messageId, finalText),
          this.options.sendPolicy,
        );
        handle.renderedText = finalText;
        handle.lastEditAt = this.now();
        return;
      } catch (error) {
        this.options.logger?.warn({ err: error, messageId }, 'Final status edit failed, sending a new message');
      }
    }

    try {
      const sentId = await resilientCall(
        () => this.chat.send(
          handle.conversationId,
          { kind: 'text', text: finalText },
          handle.replyTo !== undefined ? { replyTo: handle.replyTo } : {},
        ),
        this.options.sendPolicy,
      );
      handle.messageId = sentId;
      handle.renderedText = finalText;
      await this.recorder.record(handle.conversationId, sentId);
    } catch (error) {
      this.options.logger?.error({ err: error, conversation: handle.conversationId }, 'Could not deliver final status');
    }
  }
}
