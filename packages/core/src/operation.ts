/**
 * Operation
 *
 * One user-invoked command. Owns its logger context and a wall-clock budget:
 * once the budget runs out the Operation is marked cancelled and `run`
 * rejects with OperationCancelledError. Work already in flight is not
 * aborted; whatever it returns later is discarded, and code that checks
 * `throwIfCancelled` between steps unwinds through its own cleanup.
 */

import { randomUUID } from 'node:crypto';
import { createLogger, formatInterval, type Logger } from '@tunegrab/utils';
import { OperationCancelledError } from './errors/index.js';
import type { ConversationId, MessageId } from './chat/types.js';

export interface OperationInit {
  conversation: ConversationId;
  messageId: MessageId;
  command: string;
  args: string[];
}

export class Operation {
  readonly id: string;
  readonly conversation: ConversationId;
  readonly messageId: MessageId;
  readonly command: string;
  readonly args: readonly string[];
  readonly startedAt: Date;
  readonly logger: Logger;
  private cancelReason: string | null = null;

  constructor(init: OperationInit, parentLogger?: Logger) {
    this.id = randomUUID();
    this.conversation = init.conversation;
    this.messageId = init.messageId;
    this.command = init.command;
    this.args = [...init.args];
    this.startedAt = new Date();

    const context = { operationId: this.id, conversationId: this.conversation, command: this.command };
    this.logger = parentLogger ? parentLogger.child(context) : createLogger(context);
  }

  get cancelled(): boolean {
    return this.cancelReason !== null;
  }

  cancel(reason: string): void {
    if (this.cancelReason === null) {
      this.cancelReason = reason;
      this.logger.warn({ reason }, 'Operation cancelled');
    }
  }

  throwIfCancelled(): void {
    if (this.cancelReason !== null) {
      throw new OperationCancelledError(this.id, this.cancelReason);
    }
  }

  /**
   * Run `task` under a wall-clock timeout. A timeout of zero or less disables it.
   */
  run<T>(task: (operation: Operation) => Promise<T>, timeoutMs: number): Promise<T> {
    const work = task(this);
    if (timeoutMs <= 0) {
      return work;
    }

    return new Promise<T>((resolve, reject) => {
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        this.cancel(`timed out after ${formatInterval(timeoutMs)}`);
        reject(new OperationCancelledError(this.id, this.cancelReason ?? 'timed out'));
      }, timeoutMs);

      work.then(
        (value) => {
          clearTimeout(timer);
          if (timedOut) {
            this.logger.debug('Discarding result of cancelled operation');
            return;
          }
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (timedOut) {
            this.logger.debug({ err: error }, 'Cancelled operation finished with an error');
            return;
          }
          reject(error);
        },
      );
    });
  }

  elapsedMs(now: number = Date.now()): number {
    return now - this.startedAt.getTime();
  }
}
