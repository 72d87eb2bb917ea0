/**
 * Persistent Connection
 *
 * Owns the single WebSocket to the grow controller. Opens it on request,
 * writes command lines, and turns incoming "key::value" lines into update
 * events. It never reconnects on its own: an unexpected close is reported
 * as 'unexpectedClose' and the ReconnectPolicy decides what happens next.
 *
 * While connected, a heartbeat pings the device every heartbeatIntervalMs.
 * A ping still unanswered at the next beat means the socket is half-open:
 * it is terminated and reported as an unexpected close. Any pong or
 * message counts as an answer.
 *
 * Events:
 *   'stateChange' (next: ConnectionState, prev: ConnectionState)
 *   'ready'                        socket open, commands can be sent
 *   'update' (update: ParameterUpdate)
 *   'unexpectedClose'              a connected socket dropped without close()
 *   'disconnected'                 any transition into 'disconnected'
 *   'transportError' (err: Error)
 */

import { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { ConnectionState } from '../health/types';
import { ParameterSnapshot, ParameterUpdate, decodeReply, splitLines } from '../protocol/parameter-codec';
import { Scheduler, TimerHandle, cancelTimer, systemScheduler } from '../scheduling/task-scheduler';
import { TransportError, errorMessage } from '../errors';
import { LiveStats, createLiveStats } from './live-stats';
import { getLogger } from '../logger';

const log = getLogger('Connection');

/** The slice of a WebSocket the connection relies on */
export interface DeviceSocket extends EventEmitter {
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(): void;
  /** Destroy the socket without a closing handshake */
  terminate(): void;
}

export type SocketFactory = (url: string) => DeviceSocket;

export const createWebSocket: SocketFactory = (url) => new WebSocket(url);

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30000;

export interface PersistentConnectionOptions {
  url: string;
  connectTimeoutMs: number;
  /** 0 disables the heartbeat */
  heartbeatIntervalMs?: number;
  scheduler?: Scheduler;
  socketFactory?: SocketFactory;
}

export interface OpenOptions {
  /** Attempt started by the reconnect policy */
  reconnecting?: boolean;
}

/** Convert a ws RawData payload (or a plain string from a mock) to text */
export function rawDataToString(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk))).toString('utf8');
  }
  return String(data);
}

export class PersistentConnection extends EventEmitter {
  readonly url: string;
  readonly stats: LiveStats;

  private readonly connectTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly scheduler: Scheduler;
  private readonly socketFactory: SocketFactory;

  private socket: DeviceSocket | null = null;
  private _state: ConnectionState = 'disconnected';
  private pendingOpen: Promise<void> | null = null;
  private abortPendingOpen: ((err: Error) => void) | null = null;
  private connectTimer: TimerHandle | null = null;
  private heartbeatTimer: TimerHandle | null = null;
  private awaitingPong = false;
  private liveValues = new Map<string, string>();

  constructor(options: PersistentConnectionOptions) {
    super();
    this.url = options.url;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.stats = createLiveStats(options.url);
  }

  get state(): ConnectionState {
    return this._state;
  }

  isConnected(): boolean {
    return this._state === 'connected' && this.socket !== null;
  }

  /** Values received over this connection, across reconnects */
  getLiveValues(): ParameterSnapshot {
    return Object.fromEntries(this.liveValues);
  }

  /**
   * Open the socket. Resolves once it is usable; rejects with a
   * TransportError if it fails, closes early or times out.
   */
  open(options: OpenOptions = {}): Promise<void> {
    if (this.isConnected()) return Promise.resolve();
    if (this.pendingOpen) return this.pendingOpen;

    this.setState(options.reconnecting ? 'reconnecting' : 'connecting');
    log.info({ url: this.url, reconnecting: options.reconnecting ?? false }, 'Opening connection');

    this.pendingOpen = new Promise<void>((resolve, reject) => {
      let settled = false;

      const fail = (err: Error): void => {
        if (settled) return;
        settled = true;
        this.abortPendingOpen = null;
        this.connectTimer = cancelTimer(this.connectTimer);
        this.stats.failedConnectAttempts++;
        this.recordError(err);
        this.dropSocket();
        this.setState('disconnected');
        this.emit('transportError', err);
        reject(err);
      };

      const succeed = (): void => {
        if (settled) return;
        settled = true;
        this.abortPendingOpen = null;
        this.connectTimer = cancelTimer(this.connectTimer);
        this.stats.successfulConnects++;
        this.stats.lastConnectedAt = this.scheduler.now();
        this.setState('connected');
        this.startHeartbeat();
        log.info({ url: this.url }, 'Connection ready');
        this.emit('ready');
        resolve();
      };

      this.abortPendingOpen = fail;

      let socket: DeviceSocket;
      try {
        socket = this.socketFactory(this.url);
      } catch (err) {
        fail(new TransportError(`Socket creation failed: ${errorMessage(err)}`, { cause: err }));
        return;
      }
      this.socket = socket;

      this.connectTimer = this.scheduler.setTimeout(() => {
        this.connectTimer = null;
        fail(new TransportError(`Connect timeout after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      socket.on('open', () => {
        if (socket === this.socket) succeed();
      });

      socket.on('message', (data: unknown) => {
        if (socket === this.socket) this.handleMessage(rawDataToString(data));
      });

      socket.on('pong', () => {
        if (socket === this.socket) this.awaitingPong = false;
      });

      socket.on('error', (err: Error) => {
        if (socket !== this.socket) return;
        if (!settled) {
          fail(new TransportError(`Connection failed: ${err.message}`, { cause: err }));
          return;
        }
        this.recordError(err);
        log.warn({ error: err.message }, 'Socket error');
        this.emit('transportError', err);
      });

      socket.on('close', () => {
        if (socket !== this.socket) return;
        if (!settled) {
          fail(new TransportError('Connection closed before it was ready'));
          return;
        }
        this.handleRemoteClose();
      });
    });

    const pending = this.pendingOpen;
    pending.then(
      () => { if (this.pendingOpen === pending) this.pendingOpen = null; },
      () => { if (this.pendingOpen === pending) this.pendingOpen = null; },
    );
    return pending;
  }

  /** Write one command line. Returns false (and drops it) when not connected. */
  send(command: string): boolean {
    const socket = this.socket;
    if (!socket || !this.isConnected()) {
      log.debug({ command }, 'Not connected, command dropped');
      return false;
    }

    try {
      socket.send(command, (err?: Error) => {
        if (err) {
          this.recordError(err);
          log.warn({ command, error: err.message }, 'Send failed');
          this.emit('transportError', err);
        }
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.recordError(error);
      log.warn({ command, error: error.message }, 'Send failed');
      this.emit('transportError', error);
      return false;
    }

    this.stats.messagesSent++;
    log.debug({ command }, '->');
    return true;
  }

  /** Deliberate shutdown. Never reported as an unexpected close. */
  close(): void {
    this.abortPendingOpen?.(new TransportError('Connection closed'));
    this.connectTimer = cancelTimer(this.connectTimer);
    this.stopHeartbeat();

    const wasDisconnected = this._state === 'disconnected' && this.socket === null;
    this.dropSocket();
    if (!wasDisconnected) {
      this.stats.lastDisconnectedAt = this.scheduler.now();
      this.setState('disconnected');
      log.info({ url: this.url }, 'Connection closed');
    }
  }

  // --- Internals ---

  private handleMessage(text: string): void {
    this.stats.lastMessageReceivedAt = this.scheduler.now();
    this.awaitingPong = false;

    for (const line of splitLines(text)) {
      this.stats.messagesReceived++;
      const update = decodeReply(line);
      if (!update) {
        this.stats.malformedLines++;
        log.debug({ line }, 'Ignoring undecodable line');
        continue;
      }
      this.liveValues.set(update.key, update.value);
      log.debug({ key: update.key, value: update.value }, '<-');
      this.emit('update', update);
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    if (this.heartbeatIntervalMs <= 0) return;
    this.heartbeatTimer = this.scheduler.setInterval(() => this.heartbeat(), this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    this.heartbeatTimer = cancelTimer(this.heartbeatTimer);
    this.awaitingPong = false;
  }

  private heartbeat(): void {
    const socket = this.socket;
    if (!socket || !this.isConnected()) {
      this.stopHeartbeat();
      return;
    }

    if (this.awaitingPong) {
      this.stats.heartbeatTimeouts++;
      this.recordError(new TransportError(`No pong within ${this.heartbeatIntervalMs}ms`));
      log.warn({ url: this.url, intervalMs: this.heartbeatIntervalMs }, 'Heartbeat timeout, terminating socket');
      this.socket = null;
      try {
        socket.terminate();
      } catch (err) {
        log.debug({ error: errorMessage(err) }, 'Error while terminating socket');
      }
      this.handleRemoteClose();
      return;
    }

    this.awaitingPong = true;
    try {
      socket.ping();
    } catch (err) {
      log.debug({ error: errorMessage(err) }, 'Heartbeat ping failed');
    }
  }

  private handleRemoteClose(): void {
    this.stopHeartbeat();
    this.socket = null;
    this.stats.lastDisconnectedAt = this.scheduler.now();
    log.warn({ url: this.url }, 'Connection dropped');
    this.setState('disconnected');
    this.emit('unexpectedClose');
  }

  /** Detach from the current socket and close it; its late events are ignored */
  private dropSocket(): void {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    try {
      socket.close();
    } catch (err) {
      log.debug({ error: errorMessage(err) }, 'Error while closing socket');
    }
  }

  private recordError(err: Error): void {
    this.stats.lastError = err.message;
    this.stats.lastErrorAt = this.scheduler.now();
  }

  private setState(next: ConnectionState): void {
    if (this._state === next) return;
    const prev = this._state;
    this._state = next;
    log.debug({ prev, next }, 'State change');
    this.emit('stateChange', next, prev);
    if (next === 'disconnected') {
      this.emit('disconnected');
    }
  }
}
