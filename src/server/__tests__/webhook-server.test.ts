import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

import { WebhookServer, isAuthorized } from '../webhook-server.js';
import type { TelegramUpdate } from '../../telegram/types.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

const SECRET = 'test-secret';

const mockOnUpdate = vi.fn<(update: TelegramUpdate) => Promise<unknown>>();

let server: WebhookServer;
let baseUrl: string;

function postUpdate(body: string, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(`${baseUrl}/telegram/webhook`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'X-Telegram-Bot-Api-Secret-Token': SECRET,
      ...headers,
    },
    body,
  });
}

beforeEach(async () => {
  mockOnUpdate.mockReset();
  mockOnUpdate.mockResolvedValue(undefined);
  server = new WebhookServer({ secret: SECRET, maxBodyBytes: 1024, onUpdate: mockOnUpdate });
  const address = await server.listen(0, '127.0.0.1');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await server.close();
});

// ============================================================================
// HEALTH
// ============================================================================

describe('GET /healthz', () => {
  it('returns ok', async () => {
    const res = await fetch(`${baseUrl}/healthz`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('rejects other methods', async () => {
    const res = await fetch(`${baseUrl}/healthz`, { method: 'POST' });

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET, HEAD');
  });
});

// ============================================================================
// WEBHOOK
// ============================================================================

describe('POST /telegram/webhook', () => {
  const update = { update_id: 1, message: { chat: { id: 42 }, text: 'hi' } };

  it('acknowledges and hands the update to the forwarder', async () => {
    const res = await postUpdate(JSON.stringify(update));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });

    await server.drain();
    expect(mockOnUpdate).toHaveBeenCalledWith(update);
  });

  it('returns 403 for a missing secret', async () => {
    const res = await fetch(`${baseUrl}/telegram/webhook`, {
      method: 'POST',
      body: JSON.stringify(update),
    });

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ detail: 'Forbidden' });
    expect(mockOnUpdate).not.toHaveBeenCalled();
  });

  it('returns 403 for a wrong secret', async () => {
    const res = await postUpdate(JSON.stringify(update), { 'X-Telegram-Bot-Api-Secret-Token': 'wrong-secret' });

    expect(res.status).toBe(403);
    expect(mockOnUpdate).not.toHaveBeenCalled();
  });

  it('returns 400 for invalid JSON', async () => {
    const res = await postUpdate('{not json');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: 'Invalid JSON' });
    expect(mockOnUpdate).not.toHaveBeenCalled();
  });

  it('returns 413 for a body over the limit', async () => {
    const text = 'x'.repeat(2048);
    const res = await postUpdate(JSON.stringify({ message: { chat: { id: 1 }, text } }));

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ detail: 'Payload Too Large' });
    expect(mockOnUpdate).not.toHaveBeenCalled();
  });

  it('acknowledges but ignores a body that is not an update', async () => {
    const res = await postUpdate('[1, 2, 3]');

    expect(res.status).toBe(200);
    await server.drain();
    expect(mockOnUpdate).not.toHaveBeenCalled();
  });

  it('replies before forwarding finishes', async () => {
    let finish: () => void = () => undefined;
    mockOnUpdate.mockReturnValue(new Promise<void>((resolve) => {
      finish = resolve;
    }));

    const res = await postUpdate(JSON.stringify(update));

    expect(res.status).toBe(200);
    expect(server.pending).toBe(1);

    finish();
    await server.drain();
    expect(server.pending).toBe(0);
  });

  it('keeps serving after a forward fails', async () => {
    mockOnUpdate.mockRejectedValueOnce(new Error('boom'));

    await postUpdate(JSON.stringify(update));
    await server.drain();

    const res = await fetch(`${baseUrl}/healthz`);
    expect(res.status).toBe(200);
  });

  it('rejects GET', async () => {
    const res = await fetch(`${baseUrl}/telegram/webhook`);

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('POST');
  });
});

describe('unknown routes', () => {
  it('returns 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Not Found' });
  });
});

// ============================================================================
// close()
// ============================================================================

describe('close()', () => {
  it('waits for in-flight forwards', async () => {
    let finished = false;
    mockOnUpdate.mockImplementation(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      finished = true;
    });

    await postUpdate(JSON.stringify({ message: { chat: { id: 1 }, text: 'hi' } }));
    await server.close();

    expect(finished).toBe(true);
  });
});

// ============================================================================
// isAuthorized
// ============================================================================

describe('isAuthorized', () => {
  it('accepts the exact secret', () => {
    expect(isAuthorized('test-secret', 'test-secret')).toBe(true);
  });

  it('rejects a different secret of the same length', () => {
    expect(isAuthorized('test-secreX', 'test-secret')).toBe(false);
  });

  it('rejects a missing, repeated or differently sized header', () => {
    expect(isAuthorized(undefined, 'test-secret')).toBe(false);
    expect(isAuthorized(['test-secret', 'test-secret'], 'test-secret')).toBe(false);
    expect(isAuthorized('test', 'test-secret')).toBe(false);
  });
});
