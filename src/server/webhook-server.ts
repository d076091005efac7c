/**
 * tg-relay — Webhook Server
 *
 * Routes:
 *   GET  /healthz           → 200 {"status":"ok"}
 *   POST /telegram/webhook  → 200 {"ok":true}, forwarding runs afterwards
 *
 * Telegram echoes the secret given to setWebhook in a header on every
 * delivery; requests without it get 403 before the body is read. The reply
 * goes out before forwarding starts so slow Bot API calls never make
 * Telegram time out and redeliver.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { timingSafeEqual } from 'node:crypto';
import { HEALTH_PATH, SECRET_HEADER, WEBHOOK_PATH } from '../config/defaults.js';
import { describeUpdate } from '../relay/forwarder.js';
import { parseUpdate } from '../telegram/inbound.js';
import type { TelegramUpdate } from '../telegram/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Webhook');

export interface WebhookServerOptions {
  /** Expected value of the X-Telegram-Bot-Api-Secret-Token header. */
  secret: string;
  maxBodyBytes: number;
  /** Runs after the reply is sent. Rejections are logged, not rethrown. */
  onUpdate: (update: TelegramUpdate) => Promise<unknown>;
}

export class WebhookServer {
  private readonly server: Server;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: WebhookServerOptions) {
    this.server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        log.error('Request handler failed', error instanceof Error ? error : { error: String(error) });
        if (!res.headersSent) {
          sendJson(res, 500, { detail: 'Internal Server Error' });
        }
      });
    });
  }

  /** Number of forwards still running. */
  get pending(): number {
    return this.inFlight.size;
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new Error(`Failed to start webhook server: ${err.message}`));
      };
      this.server.once('error', onError);

      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (!address || typeof address === 'string') {
          reject(new Error('Failed to get server address'));
          return;
        }
        log.info('Listening', { host: address.address, port: address.port });
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections, then wait for in-flight forwards.
   */
  async close(): Promise<void> {
    if (this.server.listening) {
      await new Promise<void>((resolve, reject) => {
        this.server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    await this.drain();
  }

  /** Resolve once every background forward has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  // ── Routing ───────────────────────────────────────────────────────────────

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url || '/', 'http://localhost');

    if (pathname === HEALTH_PATH) {
      if (req.method !== 'GET' && req.method !== 'HEAD') {
        methodNotAllowed(req, res, 'GET, HEAD');
        return;
      }
      sendJson(res, 200, { status: 'ok' });
      return;
    }

    if (pathname === WEBHOOK_PATH) {
      if (req.method !== 'POST') {
        methodNotAllowed(req, res, 'POST');
        return;
      }
      await this.handleWebhook(req, res);
      return;
    }

    req.resume();
    sendJson(res, 404, { detail: 'Not Found' });
  }

  private async handleWebhook(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!isAuthorized(req.headers[SECRET_HEADER], this.options.secret)) {
      log.warn('Rejected webhook call with a bad secret', { remote: req.socket.remoteAddress });
      req.resume();
      sendJson(res, 403, { detail: 'Forbidden' });
      return;
    }

    const { maxBodyBytes } = this.options;
    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > maxBodyBytes) {
      req.resume();
      sendJson(res, 413, { detail: 'Payload Too Large' });
      return;
    }

    const body = await readBody(req, maxBodyBytes);
    if (body === null) {
      sendJson(res, 413, { detail: 'Payload Too Large' });
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(body.toString('utf-8'));
    } catch {
      sendJson(res, 400, { detail: 'Invalid JSON' });
      return;
    }

    sendJson(res, 200, { ok: true });

    const update = parseUpdate(json);
    if (!update) return;

    log.debug('Update received', describeUpdate(update));
    this.track(this.options.onUpdate(update));
  }

  private track(task: Promise<unknown>): void {
    const tracked: Promise<void> = task
      .then(
        () => undefined,
        (error: unknown) => {
          log.error('Forwarding failed', error instanceof Error ? error : { error: String(error) });
        }
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Compare the secret header against the expected value in constant time.
 */
export function isAuthorized(provided: string | string[] | undefined, expected: string): boolean {
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/**
 * Collect the request body. Resolves null once it exceeds `limit`; the rest
 * of the stream is read and discarded so the reply can still be sent.
 */
function readBody(req: IncomingMessage, limit: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(tooLarge ? null : Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': String(Buffer.byteLength(payload)),
    ...headers,
  });
  res.end(payload);
}

function methodNotAllowed(req: IncomingMessage, res: ServerResponse, allow: string): void {
  req.resume();
  sendJson(res, 405, { detail: 'Method Not Allowed' }, { Allow: allow });
}
