// ============================================================
// API Test Kit — In-process Mock HTTP Server
// Backs the framework's own API tests; binds 127.0.0.1 on a free port
// ============================================================

import http from 'http';
import type { HttpHeaders, HttpMethod } from '../../types/index.js';

export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: HttpHeaders;
  body: string;
}

export interface MockReply {
  status: number;
  headers?: HttpHeaders;
  body?: string;
}

export interface MockRoute {
  method: HttpMethod;
  path: string | RegExp;
  reply: (req: RecordedRequest, match: RegExpMatchArray | null) => MockReply | Promise<MockReply>;
}

export interface MockServer {
  readonly url: string;
  readonly requests: readonly RecordedRequest[];
  close(): Promise<void>;
}

export function jsonReply(status: number, body: unknown, headers: HttpHeaders = {}): MockReply {
  return {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8', ...headers },
    body: JSON.stringify(body),
  };
}

function flattenHeaders(headers: http.IncomingHttpHeaders): HttpHeaders {
  const flat: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function matchRoute(route: MockRoute, method: string, path: string): RegExpMatchArray | null | false {
  if (route.method !== method) return false;
  if (typeof route.path === 'string') return route.path === path ? null : false;
  return path.match(route.path) ?? false;
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function startMockServer(routes: readonly MockRoute[]): Promise<MockServer> {
  const requests: RecordedRequest[] = [];

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const parsed = new URL(req.url ?? '/', 'http://127.0.0.1');
    const method = (req.method ?? 'GET').toUpperCase();
    const recorded: RecordedRequest = {
      method,
      path: parsed.pathname,
      query: Object.fromEntries(parsed.searchParams),
      headers: flattenHeaders(req.headers),
      body: await readBody(req),
    };
    requests.push(recorded);

    let reply = jsonReply(404, { error: 'Not Found', path: parsed.pathname });
    for (const route of routes) {
      const match = matchRoute(route, method, parsed.pathname);
      if (match !== false) {
        reply = await route.reply(recorded, match);
        break;
      }
    }

    res.writeHead(reply.status, reply.headers ?? {});
    res.end(reply.body ?? '');
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: message }));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('[MockServer] expected a TCP address');
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(err => (err ? reject(err) : resolve()));
      }),
  };
}
