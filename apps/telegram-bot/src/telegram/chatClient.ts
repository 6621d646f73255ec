/**
 * Telegram Chat Client
 *
 * Implements the core chat port on top of the Bot API. Every text goes out
 * as HTML with link previews off, so callers escape what they interpolate.
 */

import { InputFile } from 'grammy';
import {
  describeError,
  type ChatClient,
  type ConversationId,
  type DeleteOutcome,
  type MessageId,
  type OutgoingContent,
  type SendOptions,
} from '@tunegrab/core';
import type { Logger } from '@tunegrab/utils';
import { isNotModifiedError } from './errors.js';

interface SentMessage {
  message_id: number;
}

interface TextOptions {
  parse_mode?: 'HTML';
  link_preview_options?: { is_disabled: boolean };
  reply_parameters?: { message_id: number; allow_sending_without_reply?: boolean };
}

interface AudioOptions {
  title?: string;
  performer?: string;
  duration?: number;
  thumbnail?: InputFile;
  caption?: string;
  parse_mode?: 'HTML';
  reply_parameters?: { message_id: number; allow_sending_without_reply?: boolean };
}

interface DocumentOptions {
  caption?: string;
  parse_mode?: 'HTML';
  reply_parameters?: { message_id: number; allow_sending_without_reply?: boolean };
}

/**
 * The slice of grammy's `bot.api` the client calls
 */
export interface TelegramTransport {
  sendMessage(chatId: number, text: string, other?: TextOptions): Promise<SentMessage>;
  sendAudio(chatId: number, audio: InputFile, other?: AudioOptions): Promise<SentMessage>;
  sendDocument(chatId: number, document: InputFile, other?: DocumentOptions): Promise<SentMessage>;
  editMessageText(chatId: number, messageId: number, text: string, other?: TextOptions): Promise<unknown>;
  deleteMessage(chatId: number, messageId: number): Promise<unknown>;
  deleteMessages(chatId: number, messageIds: number[]): Promise<unknown>;
}

function replyParameters(options: SendOptions | undefined) {
  return options?.replyTo !== undefined
    ? { reply_parameters: { message_id: options.replyTo, allow_sending_without_reply: true } }
    : {};
}

export class TelegramChatClient implements ChatClient {
  constructor(
    private readonly api: TelegramTransport,
    private readonly logger?: Logger,
  ) {}

  async send(conversation: ConversationId, content: OutgoingContent, options?: SendOptions): Promise<MessageId> {
    switch (content.kind) {
      case 'text': {
        const sent = await this.api.sendMessage(conversation, content.text, {
          parse_mode: 'HTML',
          link_preview_options: { is_disabled: true },
          ...replyParameters(options),
        });
        return sent.message_id;
      }
      case 'audio': {
        const sent = await this.api.sendAudio(conversation, new InputFile(content.path), {
          title: content.title,
          performer: content.performer,
          ...(content.durationSeconds !== undefined ? { duration: Math.round(content.durationSeconds) } : {}),
          ...(content.thumbnailPath ? { thumbnail: new InputFile(content.thumbnailPath) } : {}),
          ...(content.caption ? { caption: content.caption, parse_mode: 'HTML' as const } : {}),
          ...replyParameters(options),
        });
        return sent.message_id;
      }
      case 'document': {
        const sent = await this.api.sendDocument(conversation, new InputFile(content.path, content.fileName), {
          ...(content.caption ? { caption: content.caption, parse_mode: 'HTML' as const } : {}),
          ...replyParameters(options),
        });
        return sent.message_id;
      }
    }
  }

  async edit(conversation: ConversationId, messageId: MessageId, text: string): Promise<void> {
    try {
      await this.api.editMessageText(conversation, messageId, text, {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: true },
      });
    } catch (error) {
      if (isNotModifiedError(error)) {
        return;
      }
      throw error;
    }
  }

  /**
   * One bulk call; when Telegram refuses the batch each id is retried alone
   * so the caller learns which ones are gone for good
   */
  async delete(conversation: ConversationId, messageIds: readonly MessageId[]): Promise<DeleteOutcome[]> {
    if (messageIds.length === 0) {
      return [];
    }

    try {
      await this.api.deleteMessages(conversation, [...messageIds]);
      return messageIds.map((messageId) => ({ messageId, ok: true }));
    } catch (error) {
      this.logger?.debug({ err: error, conversation, count: messageIds.length }, 'Bulk delete refused, deleting one by one');
    }

    const outcomes: DeleteOutcome[] = [];
    for (const messageId of messageIds) {
      try {
        await this.api.deleteMessage(conversation, messageId);
        outcomes.push({ messageId, ok: true });
      } catch (error) {
        outcomes.push({ messageId, ok: false, error: describeError(error) });
      }
    }
    return outcomes;
  }
}
