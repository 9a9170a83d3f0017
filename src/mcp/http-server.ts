/**
 * HTTP surface of the bridge (node:http).
 *
 *   GET  /openapi.json   current OpenAPI document
 *   GET  /health         supervisor diagnostics, 200 only when ready
 *   POST /<tool>         forwarded to the Dynamic Router
 *   OPTIONS *            CORS preflight
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { DynamicRouter } from './dynamic-router.js';
import type { LifecycleState } from './process-supervisor.js';
import { BridgeError, HttpError, normalizeError, toErrorEnvelope } from '../utils/errors.js';
import { logDebug, logError, logInfo } from '../utils/logger.js';

export interface HealthReport {
  status: 'ok' | 'unavailable';
  state: LifecycleState;
  generation: number;
  pid: number | null;
  tools: number;
  restarts: number;
  recentStderr: string[];
}

export interface HttpServerOptions {
  host: string;
  port: number;
  bodyLimitBytes: number;
  cors: boolean;
  corsOrigins: string[];
  router: DynamicRouter;
  health: () => HealthReport;
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export class BridgeHttpServer {
  private readonly server: http.Server;

  constructor(private readonly options: HttpServerOptions) {
    this.server = http.createServer((req, res) => {
      void this.handle(req, res);
    });
  }

  /** Start listening. Rejects when the port cannot be bound. */
  async listen(): Promise<AddressInfo> {
    const { host, port } = this.options;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        resolve();
      });
    });

    const address = this.address();
    if (!address) {
      throw new Error('HTTP server is not bound to a TCP address');
    }
    logInfo(`Listening on http://${host}:${address.port}`, { component: 'HTTP' });
    logInfo(`OpenAPI document: http://${host}:${address.port}/openapi.json`, { component: 'HTTP' });
    return address;
  }

  address(): AddressInfo | null {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address : null;
  }

  /** Stop accepting connections and close idle keep-alive sockets. */
  close(): Promise<void> {
    if (!this.server.listening) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeIdleConnections();
    });
  }

  // ── Request handling ────────────────────────────────────────────────

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const cors = this.corsHeaders(req);

    let status: number;
    try {
      status = await this.route(method, url.pathname, req, res, cors);
    } catch (err) {
      const error = normalizeError(err);
      if (!(err instanceof BridgeError)) {
        logError(`Unhandled error for ${method} ${url.pathname}`, err instanceof Error ? err : { error: String(err) });
      }
      status = this.send(res, error.statusCode, toErrorEnvelope(error), cors);
    }

    logDebug(`${method} ${url.pathname} → ${status} (${Date.now() - started}ms)`, { component: 'HTTP' });
  }

  private async route(
    method: string,
    pathname: string,
    req: http.IncomingMessage,
    res: http.ServerResponse,
    cors: Record<string, string>
  ): Promise<number> {
    if (method === 'OPTIONS') {
      res.writeHead(204, { ...cors, 'Access-Control-Max-Age': '600' });
      res.end();
      return 204;
    }

    if (pathname === '/openapi.json' || pathname === '/health') {
      if (method !== 'GET' && method !== 'HEAD') {
        const error = new HttpError('method_not_allowed', 405, `${method} is not allowed on ${pathname}`);
        return this.send(res, 405, toErrorEnvelope(error), { ...cors, Allow: 'GET' });
      }
      if (pathname === '/openapi.json') {
        return this.send(res, 200, this.options.router.current.openapi, cors);
      }
      const health = this.options.health();
      return this.send(res, health.state === 'ready' ? 200 : 503, health, cors);
    }

    const body = method === 'POST' ? parseJsonBody(await this.readBody(req)) : undefined;
    const response = await this.options.router.dispatch(method, pathname, body);
    return this.send(res, response.status, response.body, { ...cors, ...response.headers });
  }

  private readBody(req: http.IncomingMessage): Promise<string> {
    const limit = this.options.bodyLimitBytes;
    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      return Promise.reject(tooLarge(limit));
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let exceeded = false;

      req.on('data', (chunk: Buffer) => {
        if (exceeded) return;
        size += chunk.length;
        if (size > limit) {
          exceeded = true;
          reject(tooLarge(limit));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (!exceeded) resolve(Buffer.concat(chunks).toString('utf8'));
      });
      req.on('error', reject);
    });
  }

  private corsHeaders(req: http.IncomingMessage): Record<string, string> {
    if (!this.options.cors) return {};

    const origins = this.options.corsOrigins;
    const origin = req.headers.origin;
    const headers: Record<string, string> = {
      'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
      'Access-Control-Allow-Headers': req.headers['access-control-request-headers'] ?? 'Content-Type',
    };

    if (origins.includes('*')) {
      headers['Access-Control-Allow-Origin'] = '*';
    } else if (origin && origins.includes(origin)) {
      headers['Access-Control-Allow-Origin'] = origin;
      headers['Vary'] = 'Origin';
    }
    return headers;
  }

  private send(res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string>): number {
    if (res.headersSent || res.destroyed) {
      logDebug(`Client went away before the ${status} response was written`, { component: 'HTTP' });
      return status;
    }
    res.writeHead(status, { ...JSON_HEADERS, ...headers });
    res.end(JSON.stringify(body ?? null));
    return status;
  }
}

function tooLarge(limit: number): HttpError {
  return new HttpError('payload_too_large', 413, `Request body exceeds ${limit} bytes`);
}

/** Empty bodies decode to undefined; anything else must be valid JSON. */
export function parseJsonBody(text: string): unknown {
  if (text.trim().length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError('bad_request', 400, 'Request body is not valid JSON');
  }
}
