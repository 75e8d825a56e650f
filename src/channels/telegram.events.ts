import { GrammyError, HttpError } from 'grammy';
import type { Context } from 'grammy';
import { TransportError, errorMessage } from '../common/errors';
import type { MessageKind } from '../types/relay.types';
import type { InboundCommand, InboundEvent } from './channel.types';

export type TelegramMessage = NonNullable<Context['message']>;

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

export const parseCommand = (text: string): InboundCommand | null => {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match || !match[1]) {
    return null;
  }
  return { name: match[1].toLowerCase(), payload: (match[2] ?? '').trim() };
};

const kindOf = (message: TelegramMessage): MessageKind => {
  if (message.text !== undefined) return 'text';
  if (message.photo !== undefined) return 'photo';
  if (message.document !== undefined) return 'document';
  return 'other';
};

const placeholderFor = (kind: MessageKind): string => {
  switch (kind) {
    case 'photo':
      return '[photo]';
    case 'document':
      return '[document]';
    case 'text':
    case 'other':
      return '[unsupported message]';
  }
};

const fileIdOf = (message: TelegramMessage): string | null =>
  message.photo?.at(-1)?.file_id ?? message.document?.file_id ?? null;

const displayName = (message: TelegramMessage): string => {
  const from = message.from;
  if (!from) {
    return 'Unknown';
  }
  return [from.first_name, from.last_name].filter(Boolean).join(' ') || from.username || String(from.id);
};

// Flattens a Telegram message into the transport-neutral event the dispatcher consumes
export const toInboundEvent = (message: TelegramMessage): InboundEvent => {
  const kind = kindOf(message);
  const text = message.text ?? message.caption ?? placeholderFor(kind);

  return {
    chatId: message.chat.id,
    senderId: message.from?.id ?? message.chat.id,
    senderName: displayName(message),
    senderUsername: message.from?.username ?? null,
    text,
    kind,
    fileId: fileIdOf(message),
    messageId: message.message_id,
    replyToMessageId: message.reply_to_message?.message_id ?? null,
    command: kind === 'text' ? parseCommand(text) : null
  };
};

/**
 * Classifies a grammy failure. 401/404 mean the token is unusable, 403 means
 * the counterpart blocked the bot.
 */
export const toTransportError = (error: unknown): TransportError => {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof GrammyError) {
    switch (error.error_code) {
      case 401:
      case 404:
        return new TransportError('InvalidCredential', error.description, { cause: error });
      case 403:
        return new TransportError('Blocked', error.description, { cause: error });
      case 429:
        return new TransportError('RateLimited', error.description, { cause: error });
      default:
        return new TransportError('Unreachable', error.description, { cause: error });
    }
  }
  if (error instanceof HttpError) {
    return new TransportError('Unreachable', error.message, { cause: error });
  }
  return new TransportError('Unreachable', errorMessage(error), { cause: error });
};
