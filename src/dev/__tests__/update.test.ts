import { describe, it, expect } from 'vitest';
import { generateUpdate } from '../update.js';
import { normalizeUpdate, parseUpdate } from '../../telegram/inbound.js';

describe('generateUpdate', () => {
  it('builds a private-chat message update by default', () => {
    const event = generateUpdate({ date: 1_700_000_000 });

    expect(event.kind).toBe('message');
    expect(event.payload).toEqual({
      update_id: 1,
      message: {
        message_id: 1,
        date: 1_700_000_000,
        chat: { id: 100200300, type: 'private', username: 'test_user' },
        text: '# Hello\nThis is **bold** and https://example.com.',
      },
    });
    expect(event.description).toBe('Telegram message update for chat 100200300');
  });

  it('uses a channel chat for channel posts', () => {
    const event = generateUpdate({ kind: 'edited_channel_post', text: 'news', date: 1 });

    expect(event.payload).toEqual({
      update_id: 1,
      edited_channel_post: {
        message_id: 1,
        date: 1,
        chat: { id: -1001234567890, type: 'channel', title: 'Test Channel' },
        text: 'news',
      },
    });
  });

  it('can carry the text as a caption', () => {
    const event = generateUpdate({ text: 'photo', asCaption: true, chatId: 5, updateId: 9, date: 1 });

    expect(event.payload.message).toEqual({
      message_id: 1,
      date: 1,
      chat: { id: 5, type: 'private', username: 'test_user' },
      caption: 'photo',
    });
    expect(event.payload.update_id).toBe(9);
    expect(event.description).toBe('Telegram message update for chat 5 (caption)');
  });

  it('sets the JSON and secret-token headers', () => {
    expect(generateUpdate().headers).toEqual({
      'Content-Type': 'application/json',
      'x-telegram-bot-api-secret-token': 'test-secret',
    });
    expect(generateUpdate({ secret: 'other-secret' }).headers['x-telegram-bot-api-secret-token']).toBe('other-secret');
  });

  it('produces updates the inbound parser accepts', () => {
    const { payload } = generateUpdate({ kind: 'channel_post', text: 'hi', chatId: -7 });

    const update = parseUpdate(JSON.parse(JSON.stringify(payload)));
    expect(update).not.toBeNull();
    expect(update && normalizeUpdate(update)).toEqual({
      chatId: -7,
      text: 'hi',
      source: 'channel_post',
      messageId: 1,
    });
  });
});
