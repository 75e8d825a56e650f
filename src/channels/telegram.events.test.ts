import { GrammyError, HttpError } from 'grammy';
import { describe, expect, it } from 'vitest';
import { TransportError } from '../common/errors';
import { parseCommand, toInboundEvent, toTransportError } from './telegram.events';
import type { TelegramMessage } from './telegram.events';

const base = {
  message_id: 42,
  date: 1773136800,
  chat: { id: 500, type: 'private' as const, first_name: 'Ada' },
  from: { id: 500, is_bot: false, first_name: 'Ada', last_name: 'Lovelace', username: 'ada' }
};

const grammyError = (code: number, description: string) =>
  new GrammyError(`Call to 'sendMessage' failed! (${code}: ${description})`, { ok: false, error_code: code, description }, 'sendMessage', {});

describe('parseCommand', () => {
  it('splits the command name from its payload', () => {
    expect(parseCommand('/start owner_20')).toEqual({ name: 'start', payload: 'owner_20' });
  });

  it('drops a bot mention and lower-cases the name', () => {
    expect(parseCommand('/Start@RelayBot')).toEqual({ name: 'start', payload: '' });
  });

  it('ignores text that is not a command', () => {
    expect(parseCommand('hello /start')).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('toInboundEvent', () => {
  it('flattens a text message', () => {
    const message: TelegramMessage = {
      ...base,
      text: 'hello',
      reply_to_message: { ...base, message_id: 7, text: 'earlier', reply_to_message: undefined }
    };

    expect(toInboundEvent(message)).toEqual({
      chatId: 500,
      senderId: 500,
      senderName: 'Ada Lovelace',
      senderUsername: 'ada',
      text: 'hello',
      kind: 'text',
      fileId: null,
      messageId: 42,
      replyToMessageId: 7,
      command: null
    });
  });

  it('parses commands in text messages', () => {
    const message: TelegramMessage = { ...base, text: '/start owner_20' };
    expect(toInboundEvent(message).command).toEqual({ name: 'start', payload: 'owner_20' });
  });

  it('uses the caption of a photo and never reads it as a command', () => {
    const message: TelegramMessage = {
      ...base,
      photo: [{ file_id: 'photo-1', file_unique_id: 'u1', width: 90, height: 90 }],
      caption: '/start owner_20'
    };

    const event = toInboundEvent(message);
    expect([event.kind, event.text, event.command]).toEqual(['photo', '/start owner_20', null]);
  });

  it('keeps the largest photo size as the file id', () => {
    const message: TelegramMessage = {
      ...base,
      photo: [
        { file_id: 'photo-small', file_unique_id: 'u1', width: 90, height: 90 },
        { file_id: 'photo-large', file_unique_id: 'u3', width: 800, height: 800 }
      ]
    };
    expect(toInboundEvent(message).fileId).toBe('photo-large');
  });

  it('falls back to a placeholder when there is no text', () => {
    const message: TelegramMessage = { ...base, document: { file_id: 'doc-1', file_unique_id: 'u2' } };
    expect([toInboundEvent(message).text, toInboundEvent(message).fileId]).toEqual(['[document]', 'doc-1']);
  });

  it('names a sender without a first name by username', () => {
    const message: TelegramMessage = {
      ...base,
      from: { id: 501, is_bot: false, first_name: '', username: 'nameless' },
      text: 'hi'
    };
    expect(toInboundEvent(message).senderName).toBe('nameless');
  });
});

describe('toTransportError', () => {
  it.each([
    [401, 'InvalidCredential'],
    [404, 'InvalidCredential'],
    [403, 'Blocked'],
    [429, 'RateLimited'],
    [400, 'Unreachable']
  ])('maps Bot API error %i to %s', (code, kind) => {
    const error = toTransportError(grammyError(code, 'Some description'));
    expect([error.kind, error.message]).toEqual([kind, 'Some description']);
  });

  it('treats network failures as unreachable', () => {
    expect(toTransportError(new HttpError('Network request failed', new Error('ECONNRESET'))).kind).toBe('Unreachable');
  });

  it('passes through errors that are already classified', () => {
    const error = new TransportError('Blocked', 'blocked');
    expect(toTransportError(error)).toBe(error);
  });
});
