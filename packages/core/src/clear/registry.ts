/**
 * Auto-Clear Registry
 *
 * Tracks the messages the bot authored in each conversation so they can be
 * deleted in bulk. Each conversation has its own log and its own serial
 * queue: a record that arrives while a clear is running waits for the clear
 * to finish and then lands in the fresh log, so it is neither lost nor
 * deleted twice. Conversations never wait on each other.
 */

import { KeyedQueue, type Logger } from '@tunegrab/utils';
import type { ChatClient, ConversationId, DeleteOutcome, MessageId } from '../chat/types.js';
import { describeError } from '../errors/index.js';
import { resilientCall, type CallPolicy } from '../resilience/index.js';

export interface ClearRegistryOptions {
  /** Oldest entries are dropped once a conversation tracks more than this */
  maxTracked: number;
  /** Largest id batch the platform accepts in one delete call */
  batchSize?: number;
  /** Retry policy for each delete batch; rate limits are waited out */
  deletePolicy?: CallPolicy;
  logger?: Logger;
}

export interface ClearSummary {
  conversation: ConversationId;
  requested: number;
  deleted: number;
  skipped: number;
}

class ConversationClearLog {
  private ids: MessageId[] = [];
  private members = new Set<MessageId>();

  append(messageId: MessageId, cap: number): number {
    if (this.members.has(messageId)) {
      return 0;
    }
    this.ids.push(messageId);
    this.members.add(messageId);

    let dropped = 0;
    while (this.ids.length > cap) {
      const oldest = this.ids.shift();
      if (oldest !== undefined) {
        this.members.delete(oldest);
        dropped++;
      }
    }
    return dropped;
  }

  drain(): MessageId[] {
    const drained = this.ids;
    this.ids = [];
    this.members.clear();
    return drained;
  }

  snapshot(): readonly MessageId[] {
    return [...this.ids];
  }
}

export class ClearRegistry {
  private logs = new Map<ConversationId, ConversationClearLog>();
  private queue = new KeyedQueue<ConversationId>();
  private readonly batchSize: number;

  constructor(
    private readonly chat: Pick<ChatClient, 'delete'>,
    private readonly options: ClearRegistryOptions,
  ) {
    this.batchSize = options.batchSize ?? 100;
  }

  record(conversation: ConversationId, messageId: MessageId): Promise<void> {
    return this.queue.run(conversation, async () => {
      let log = this.logs.get(conversation);
      if (!log) {
        log = new ConversationClearLog();
        this.logs.set(conversation, log);
      }
      const dropped = log.append(messageId, this.options.maxTracked);
      if (dropped > 0) {
        this.options.logger?.debug({ conversation, dropped }, 'Trimmed oldest tracked messages');
      }
    });
  }

  /**
   * Delete every tracked message, then forget all of them whatever the outcome
   */
  clear(conversation: ConversationId): Promise<ClearSummary> {
    return this.queue.run(conversation, async () => {
      const ids = this.logs.get(conversation)?.drain() ?? [];
      const summary: ClearSummary = { conversation, requested: ids.length, deleted: 0, skipped: 0 };
      if (ids.length === 0) {
        return summary;
      }

      for (let start = 0; start < ids.length; start += this.batchSize) {
        const batch = ids.slice(start, start + this.batchSize);
        let outcomes: DeleteOutcome[];
        try {
          outcomes = await this.deleteBatch(conversation, batch);
        } catch (error) {
          const reason = describeError(error);
          outcomes = batch.map((messageId) => ({ messageId, ok: false, error: reason }));
        }

        for (const outcome of outcomes) {
          if (outcome.ok) {
            summary.deleted++;
          } else {
            summary.skipped++;
            this.options.logger?.debug({ conversation, messageId: outcome.messageId, reason: outcome.error }, 'Skipped message during clear');
          }
        }
      }

      this.options.logger?.info(summary, 'Cleared previous bot messages');
      return summary;
    });
  }

  private deleteBatch(conversation: ConversationId, batch: MessageId[]): Promise<DeleteOutcome[]> {
    const policy = this.options.deletePolicy;
    if (!policy) {
      return this.chat.delete(conversation, batch);
    }
    return resilientCall(() => this.chat.delete(conversation, batch), policy);
  }

  tracked(conversation: ConversationId): readonly MessageId[] {
    return this.logs.get(conversation)?.snapshot() ?? [];
  }
}
