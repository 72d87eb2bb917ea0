/**
 * Controller Emulator
 *
 * Virtual grow controller speaking the same two protocols as the real
 * device, for --emulate runs and end-to-end tests:
 *   ws://{host}:{websocketPort}/websocket   one command per message, one reply per message
 *   http://{host}:{httpPort}/command?query=a;b;c   replies one per line
 *
 * Replies:
 *   "key"         → "key::value"
 *   "key=value"   → "key=value::value"   (value stored)
 *   unknown key   → "key::{"error":"unknown parameter"}"
 *
 * Events:
 *   'command' (command: string)   every command received, before replying
 */

import { EventEmitter } from 'events';
import * as http from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { BATCH_SEPARATOR, ParameterSnapshot, REPLY_DELIMITER, commandKey, splitLines } from '../protocol/parameter-codec';
import { DEFAULT_PARAMETERS } from '../protocol/parameters';
import { rawDataToString } from '../connection/persistent-connection';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('Emulator');

export const UNKNOWN_PARAMETER_PAYLOAD = '{"error":"unknown parameter"}';

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

export interface EmulatorOptions {
  /** Initial parameter values; defaults to every default parameter at "0" */
  values?: ParameterSnapshot;
  host?: string;
  websocketPath?: string;
}

export interface EmulatorPorts {
  websocketPort: number;
  httpPort: number;
}

function defaultValue(key: string): string {
  return key.endsWith(':voltage') ? '0.00' : '0';
}

export class DeviceEmulator extends EventEmitter {
  readonly host: string;
  readonly websocketPath: string;

  private values = new Map<string, string>();
  private wsServer?: http.Server;
  private wss?: WebSocketServer;
  private httpServer?: http.Server;
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;

  constructor(options: EmulatorOptions = {}) {
    super();
    this.host = options.host ?? '127.0.0.1';
    this.websocketPath = options.websocketPath ?? '/websocket';

    const initial = options.values ?? Object.fromEntries(DEFAULT_PARAMETERS.map((key) => [key, defaultValue(key)]));
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  /** Execute one command and return the device's reply line */
  handleCommand(command: string): string {
    const trimmed = command.trim();
    const key = commandKey(trimmed);
    this.emit('command', trimmed);

    if (!this.values.has(key)) {
      this.log('Unknown', trimmed);
      return `${key}${REPLY_DELIMITER}${UNKNOWN_PARAMETER_PAYLOAD}`;
    }

    const assignIdx = trimmed.indexOf('=');
    if (assignIdx !== -1) {
      const value = trimmed.slice(assignIdx + 1).trim();
      this.values.set(key, value);
      this.log('Write', `${key} = ${value}`);
      return `${trimmed}${REPLY_DELIMITER}${value}`;
    }

    return `${key}${REPLY_DELIMITER}${this.values.get(key) ?? ''}`;
  }

  getValue(key: string): string | undefined {
    return this.values.get(key);
  }

  /** Change a value as if the device measured it; pushes nothing */
  setValue(key: string, value: string): void {
    this.values.set(key, value);
  }

  getState(): ParameterSnapshot {
    return Object.fromEntries(this.values);
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  /** Listen on both ports; 0 picks free ports */
  async start(websocketPort = 0, httpPort = 0): Promise<EmulatorPorts> {
    const wsServer = http.createServer((_req, res) => {
      res.writeHead(426, { 'Content-Type': 'text/plain' });
      res.end('WebSocket only');
    });
    const wss = new WebSocketServer({ server: wsServer, path: this.websocketPath });
    wss.on('connection', (ws: WebSocket) => this.handleClient(ws));
    wss.on('error', (err: Error) => {
      log.error({ error: err.message }, 'WebSocket server error');
    });

    const httpServer = http.createServer((req, res) => this.handleHttp(req, res));

    this.wsServer = wsServer;
    this.wss = wss;
    this.httpServer = httpServer;

    const ports: EmulatorPorts = {
      websocketPort: await listen(wsServer, websocketPort, this.host),
      httpPort: await listen(httpServer, httpPort, this.host),
    };
    log.info({ host: this.host, ...ports }, 'Emulator listening');
    return ports;
  }

  /** Terminate every live client, as a device reboot would */
  dropClients(): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.log('Drop', 'All WebSocket clients terminated');
  }

  async stop(): Promise<void> {
    this.dropClients();
    const wss = this.wss;
    this.wss = undefined;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    await Promise.all([closeServer(this.wsServer), closeServer(this.httpServer)]);
    this.wsServer = undefined;
    this.httpServer = undefined;
  }

  private handleClient(ws: WebSocket): void {
    this.log('Connect', 'WebSocket client connected');

    ws.on('message', (data: unknown) => {
      for (const command of splitLines(rawDataToString(data))) {
        ws.send(this.handleCommand(command));
      }
    });

    ws.on('error', (err: Error) => {
      log.warn({ error: err.message }, 'Client socket error');
    });

    ws.on('close', () => this.log('Disconnect', 'WebSocket client disconnected'));
  }

  private handleHttp(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (req.method !== 'GET' || url.pathname !== '/command') {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not found');
      return;
    }

    const commands = (url.searchParams.get('query') ?? '')
      .split(BATCH_SEPARATOR)
      .map((command) => command.trim())
      .filter((command) => command.length > 0);

    const body = commands.map((command) => this.handleCommand(command)).join('\n');
    res.writeHead(200, { 'Content-Type': 'text/plain' });
    res.end(body);
  }

  private log(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    log.debug({ action }, details);
  }
}

function listen(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

function closeServer(server: http.Server | undefined): Promise<void> {
  if (!server) return Promise.resolve();
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) log.debug({ error: errorMessage(err) }, 'Server already closed');
      resolve();
    });
    server.closeAllConnections();
  });
}
