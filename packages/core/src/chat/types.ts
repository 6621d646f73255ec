/**
 * Chat Platform Port
 *
 * The narrow surface the core needs from a chat platform. The Telegram app
 * implements it; tests substitute in-memory fakes.
 */

export type ConversationId = number;
export type MessageId = number;

export interface TextContent {
  kind: 'text';
  text: string;
}

export interface AudioContent {
  kind: 'audio';
  path: string;
  title: string;
  performer: string;
  durationSeconds?: number;
  thumbnailPath?: string;
  caption?: string;
}

export interface DocumentContent {
  kind: 'document';
  path: string;
  fileName?: string;
  caption?: string;
}

export type OutgoingContent = TextContent | AudioContent | DocumentContent;

export interface SendOptions {
  replyTo?: MessageId;
}

export interface DeleteOutcome {
  messageId: MessageId;
  ok: boolean;
  error?: string;
}

export interface ChatClient {
  send(conversation: ConversationId, content: OutgoingContent, options?: SendOptions): Promise<MessageId>;
  edit(conversation: ConversationId, messageId: MessageId, text: string): Promise<void>;
  delete(conversation: ConversationId, messageIds: readonly MessageId[]): Promise<DeleteOutcome[]>;
}
