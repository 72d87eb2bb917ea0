/**
 * Status HTTP Server
 *
 * Read/write surface for entity and dashboard layers that live outside
 * this process:
 *   GET  /ping                   liveness
 *   GET  /health                 connection status (503 when data is stale)
 *   GET  /api/parameters         merged snapshot
 *   GET  /api/parameters/{key}   single value
 *   POST /api/command            { "command": "key" | "key=value" }
 *   POST /api/reconnect          manual reconnect
 */

import * as http from 'http';
import { z } from 'zod';
import { HybridCoordinator } from '../coordinator/hybrid-coordinator';
import { isValidCommand } from '../protocol/parameter-codec';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('StatusServer');

const MAX_BODY_BYTES = 4096;

const commandBodySchema = z.object({
  command: z.string().trim().min(1).max(512).refine(isValidCommand),
});

export type StatusSource = Pick<
  HybridCoordinator,
  'getSnapshot' | 'getValue' | 'getConnectionStatus' | 'sendCommand' | 'reconnect'
>;

export class StatusServer {
  private server?: http.Server;
  private readonly source: StatusSource;

  constructor(source: StatusSource) {
    this.source = source;
  }

  /** Start listening; resolves with the bound port (useful with port 0) */
  start(port: number, host = '0.0.0.0'): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          log.error({ error: errorMessage(err), url: req.url }, 'Request handling failed');
          if (!res.headersSent) sendJson(res, 500, { error: 'Internal error' });
        });
      });

      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (err: Error) => {
          log.error({ error: err.message }, 'HTTP server error');
        });
        this.server = server;
        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        log.info({ port: boundPort }, 'Status server started');
        resolve(boundPort);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (method === 'GET' && pathname === '/ping') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('pong');
      return;
    }

    if (method === 'GET' && pathname === '/health') {
      const status = this.source.getConnectionStatus();
      sendJson(res, status.isDataFresh ? 200 : 503, status);
      return;
    }

    if (method === 'GET' && pathname === '/api/parameters') {
      sendJson(res, 200, this.source.getSnapshot());
      return;
    }

    if (method === 'GET' && pathname.startsWith('/api/parameters/')) {
      const key = decodePathSegment(pathname.slice('/api/parameters/'.length));
      if (key === null) {
        sendJson(res, 400, { error: 'Malformed parameter key' });
        return;
      }
      const value = this.source.getValue(key);
      if (value === undefined) {
        sendJson(res, 404, { error: `Unknown parameter: ${key}` });
      } else {
        sendJson(res, 200, { key, value });
      }
      return;
    }

    if (method === 'POST' && pathname === '/api/command') {
      const parsed = commandBodySchema.safeParse(parseJson(await readBody(req)));
      if (!parsed.success) {
        sendJson(res, 400, { error: 'Body must be JSON: { "command": "key" | "key=value" } with a single command' });
        return;
      }
      this.source.sendCommand(parsed.data.command);
      sendJson(res, 202, { accepted: true, command: parsed.data.command });
      return;
    }

    if (method === 'POST' && pathname === '/api/reconnect') {
      this.source.reconnect().catch((err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Manual reconnect failed unexpectedly');
      });
      sendJson(res, 202, { accepted: true });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body, null, 2));
}

function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}
