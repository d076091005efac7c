import { describe, it, expect, vi } from 'vitest';

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

import { TelegramApiError } from '../client.js';
import { deliverFormatted } from '../outbound.js';
import type { MessageSender } from '../types.js';

function fakeSender(impl: MessageSender['sendMessage']) {
  return { sendMessage: vi.fn(impl) };
}

describe('deliverFormatted', () => {
  it('sends with MarkdownV2 and reports the message id', async () => {
    const sender = fakeSender(async () => ({ message_id: 11 }));

    const result = await deliverFormatted(sender, 42, '*hi*');

    expect(result).toEqual({ success: true, messageId: 11 });
    expect(sender.sendMessage).toHaveBeenCalledWith(42, '*hi*', { parseMode: 'MarkdownV2' });
  });

  it('passes send options through but keeps MarkdownV2', async () => {
    const sender = fakeSender(async () => ({ message_id: 1 }));

    await deliverFormatted(sender, 42, 'x', { disableLinkPreview: true });

    expect(sender.sendMessage).toHaveBeenCalledWith(42, 'x', {
      disableLinkPreview: true,
      parseMode: 'MarkdownV2',
    });
  });

  it('turns an API rejection into a failed result with its code', async () => {
    const sender = fakeSender(async () => {
      throw new TelegramApiError("sendMessage failed: Bad Request: can't parse entities", 'API_ERROR', 'sendMessage', 400);
    });

    const result = await deliverFormatted(sender, 42, 'x');

    expect(result).toEqual({
      success: false,
      error: "sendMessage failed: Bad Request: can't parse entities",
      errorCode: 400,
    });
    expect(sender.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('reports other errors without a code', async () => {
    const sender = fakeSender(async () => {
      throw new Error('socket hang up');
    });

    expect(await deliverFormatted(sender, 42, 'x')).toEqual({ success: false, error: 'socket hang up' });
  });
});
