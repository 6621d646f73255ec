/**
 * Command Dispatcher
 *
 * Turns one incoming command message into an Operation:
 * 1. delete the command message (best effort)
 * 2. auto-clear earlier bot output for commands on the auto-clear list
 * 3. open a status message, run the handler under the operation timeout
 * 4. finish the status message with the handler's result or the failure
 *
 * Handlers run detached from the update loop so a long download does not
 * hold up the next command. `drain` waits for whatever is still running.
 */

import {
  Operation,
  StatusMessage,
  resilientCall,
  toOperationFailure,
  type AudioContent,
  type ClearSummary,
  type ConversationId,
  type MessageId,
  type OutgoingContent,
} from '@tunegrab/core';
import type { BotServices } from './services.js';
import { formatFailure } from './format.js';
import { escapeHtml, parseCommand, splitMessage } from './text.js';

export interface IncomingCommand {
  conversation: ConversationId;
  messageId: MessageId;
  text: string;
}

export interface CommandContext {
  readonly operation: Operation;
  readonly services: BotServices;
  readonly args: readonly string[];
  /** Raw text after the command */
  readonly rest: string;
  /** Outcome of the auto-clear that ran before this command, if any */
  readonly autoCleared: ClearSummary | null;
  /** Throttled status update; one that comes too soon is held for a trailing edit */
  progress(text: string): Promise<boolean>;
  /** Send an extra message and track it for auto-clear */
  reply(text: string): Promise<MessageId>;
  sendAudio(content: AudioContent): Promise<MessageId>;
}

/** Returns the HTML the status message ends on */
export type CommandHandler = (ctx: CommandContext) => Promise<string>;

export interface CommandDefinition {
  name: string;
  aliases?: string[];
  usage: string;
  description: string;
  /** Text of the status message while the handler runs; absent means none */
  working?: string;
  handler: CommandHandler;
}

export const AUTO_CLEAR_COMMANDS: ReadonlySet<string> = new Set([
  'search', 'see', 'dl', 'download', 'last', 'lyrics', 'help', 'clear',
  'rec', 'recommendations', 'alast', 'likes',
]);

export class Dispatcher {
  private readonly commands = new Map<string, CommandDefinition>();
  private readonly tasks = new Set<Promise<void>>();

  constructor(
    private readonly services: BotServices,
    definitions: readonly CommandDefinition[],
  ) {
    for (const definition of definitions) {
      for (const name of [definition.name, ...(definition.aliases ?? [])]) {
        this.commands.set(name, definition);
      }
    }
  }

  get pending(): number {
    return this.tasks.size;
  }

  /**
   * Start handling `message` without waiting for it
   */
  submit(message: IncomingCommand): void {
    const task: Promise<void> = this.handle(message)
      .catch((error: unknown) => {
        this.services.logger.error({ err: error, conversation: message.conversation }, 'Command handling crashed');
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  async handle(message: IncomingCommand): Promise<void> {
    const parsed = parseCommand(message.text);
    if (!parsed) {
      return;
    }

    const { chat, config, registry, reporter, logger } = this.services;
    const definition = this.commands.get(parsed.name);
    if (!definition) {
      await this.send(message.conversation, `Unknown command /${escapeHtml(parsed.name)}. Send /help for the list.`);
      return;
    }

    const operation = new Operation(
      { conversation: message.conversation, messageId: message.messageId, command: definition.name, args: parsed.args },
      logger,
    );
    operation.logger.info({ args: parsed.args }, 'Command received');

    try {
      await chat.delete(message.conversation, [message.messageId]);
    } catch (error) {
      operation.logger.debug({ err: error }, 'Could not delete command message');
    }

    const autoCleared = config.features.autoClear && AUTO_CLEAR_COMMANDS.has(parsed.name)
      ? await registry.clear(message.conversation)
      : null;

    const status = definition.working
      ? await reporter.begin(message.conversation, definition.working)
      : new StatusMessage(message.conversation);

    const context: CommandContext = {
      operation,
      services: this.services,
      args: parsed.args,
      rest: parsed.rest,
      autoCleared,
      progress: (text) => reporter.update(status, text),
      reply: (text) => this.send(message.conversation, text),
      sendAudio: (content) => this.deliver(message.conversation, content),
    };

    let text: string;
    try {
      text = await operation.run(() => definition.handler(context), config.timing.operationTimeoutMs);
      operation.logger.info({ elapsedMs: operation.elapsedMs() }, 'Command finished');
    } catch (error) {
      const failure = toOperationFailure(error);
      operation.logger.warn({ err: error, kind: failure.kind, elapsedMs: operation.elapsedMs() }, 'Command failed');
      text = formatFailure(failure);
    }

    const [first = '', ...rest] = splitMessage(text);
    await reporter.finish(status, first);
    for (const part of rest) {
      await this.sendQuietly(message.conversation, part, operation);
    }
  }

  private send(conversation: ConversationId, text: string): Promise<MessageId> {
    return this.deliver(conversation, { kind: 'text', text });
  }

  private async deliver(conversation: ConversationId, content: OutgoingContent): Promise<MessageId> {
    const messageId = await resilientCall(
      () => this.services.chat.send(conversation, content),
      this.services.sendPolicy,
    );
    await this.services.registry.record(conversation, messageId);
    return messageId;
  }

  private async sendQuietly(conversation: ConversationId, text: string, operation: Operation): Promise<void> {
    try {
      await this.send(conversation, text);
    } catch (error) {
      operation.logger.error({ err: error }, 'Could not send reply part');
    }
  }
}
