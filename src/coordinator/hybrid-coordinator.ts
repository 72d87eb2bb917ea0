/**
 * Hybrid Coordinator
 *
 * Single entry point for everything that consumes device data. Merges
 * values from the live connection and from fallback polling into one
 * snapshot, routes outbound commands to whichever channel is usable, and
 * reports connection health. Failures below this layer degrade to stale
 * data plus a status flag; nothing thrown here reaches the caller.
 *
 * Fallback interval policy (base = fallback.baseIntervalMs):
 *   live connected, data within freshness threshold   4x base
 *   live connected, no recent data                     2x base
 *   live down                                          1x base
 * A tick polls the fallback whenever live data is not recent: the socket is
 * down, or it is up but has delivered nothing within the freshness
 * threshold. While live data is recent the tick does nothing and the timer
 * keeps ticking at the adaptive interval so it can take over.
 *
 * Events:
 *   'snapshot' (event: SnapshotEvent)          at least one value changed
 *   'status' (status: ConnectionStatus)        connection state changed
 *   'commandFailed' ({ command, error })
 *   'fallbackFailed' (err: Error)
 */

import { EventEmitter } from 'events';
import { PersistentConnection } from '../connection/persistent-connection';
import { ReconnectPolicy } from '../connection/reconnect-policy';
import { RefreshScheduler } from '../connection/refresh-scheduler';
import { FallbackPoller } from '../fallback/fallback-poller';
import { FallbackChannel } from '../fallback/http-channel';
import { ConnectionState, ConnectionStatus, DataSource, createConnectionCounters } from '../health/types';
import { ParameterSnapshot, ParameterUpdate, isValidCommand } from '../protocol/parameter-codec';
import { Scheduler, TimerHandle, cancelTimer, systemScheduler } from '../scheduling/task-scheduler';
import { ParameterChange, ParameterStore, WriteStamp } from './parameter-store';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('Coordinator');

export interface SnapshotEvent {
  changes: ParameterChange[];
  snapshot: ParameterSnapshot;
}

export type SnapshotListener = (event: SnapshotEvent) => void;

export interface CommandFailure {
  command: string;
  error: string;
}

export interface HybridCoordinatorOptions {
  host: string;
  keys: readonly string[];
  baseIntervalMs: number;
  freshnessThresholdMs: number;
}

export interface HybridCoordinatorDeps {
  connection: PersistentConnection;
  reconnectPolicy: ReconnectPolicy;
  refreshScheduler: RefreshScheduler;
  fallbackPoller: FallbackPoller;
  fallbackChannel: FallbackChannel;
  scheduler?: Scheduler;
}

export class HybridCoordinator extends EventEmitter {
  readonly host: string;
  readonly keys: readonly string[];

  private readonly baseIntervalMs: number;
  private readonly freshnessThresholdMs: number;
  private readonly connection: PersistentConnection;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly refresh: RefreshScheduler;
  private readonly poller: FallbackPoller;
  private readonly fallbackChannel: FallbackChannel;
  private readonly scheduler: Scheduler;

  private readonly store = new ParameterStore();
  private readonly snapshotListeners = new Set<SnapshotListener>();
  private readonly counters = createConnectionCounters();

  private fallbackTimer: TimerHandle | null = null;
  private pollInFlight = false;
  private lastLiveDataAt: number | null = null;
  private lastFallbackDataAt: number | null = null;
  private lastFallbackError: string | null = null;
  private started = false;
  private closed = false;

  constructor(options: HybridCoordinatorOptions, deps: HybridCoordinatorDeps) {
    super();
    this.host = options.host;
    this.keys = Array.from(new Set(options.keys));
    this.baseIntervalMs = options.baseIntervalMs;
    this.freshnessThresholdMs = options.freshnessThresholdMs;
    this.connection = deps.connection;
    this.reconnectPolicy = deps.reconnectPolicy;
    this.refresh = deps.refreshScheduler;
    this.poller = deps.fallbackPoller;
    this.fallbackChannel = deps.fallbackChannel;
    this.scheduler = deps.scheduler ?? systemScheduler;

    this.connection.on('ready', () => this.onLiveReady());
    this.connection.on('update', (update: ParameterUpdate) => this.onLiveUpdate(update));
    this.connection.on('unexpectedClose', () => this.onLiveDropped());
    this.connection.on('disconnected', () => this.refresh.stop());
    this.connection.on('stateChange', () => this.emitStatus());

    this.reconnectPolicy.on('exhausted', (attempts: number) => {
      log.error({ host: this.host, attempts }, 'Live connection down, retries exhausted; serving fallback data');
      this.emitStatus();
    });
  }

  // --- Collaborator API ---

  /** Current merged view; last-known values even when every source is failing */
  getSnapshot(): ParameterSnapshot {
    return this.store.snapshot();
  }

  getValue(key: string): string | undefined {
    return this.store.get(key);
  }

  /** Receive change notifications; returns the unsubscribe function */
  subscribe(listener: SnapshotListener): () => void {
    this.snapshotListeners.add(listener);
    return () => {
      this.snapshotListeners.delete(listener);
    };
  }

  /**
   * Send a raw command ("key" or "key=value"). Goes over the live
   * connection when it is up, otherwise as a one-shot fallback request
   * whose reply is merged into the snapshot. Never throws, never retries.
   * A command that is not a single "key" or "key=value" is reported as
   * failed without being sent.
   */
  sendCommand(command: string): void {
    const trimmed = command.trim();
    if (this.closed || trimmed.length === 0) {
      log.debug({ command, closed: this.closed }, 'Command ignored');
      return;
    }

    if (!isValidCommand(trimmed)) {
      const failure: CommandFailure = { command: trimmed, error: 'Invalid command' };
      log.warn(failure, 'Command rejected');
      this.emit('commandFailed', failure);
      return;
    }

    if (this.connection.isConnected() && this.connection.send(trimmed)) {
      return;
    }

    this.sendViaFallback(trimmed).catch((err: unknown) => {
      log.error({ command: trimmed, error: errorMessage(err) }, 'Fallback command failed unexpectedly');
    });
  }

  getConnectionStatus(): ConnectionStatus {
    const now = this.scheduler.now();
    const lastDataAt = Math.max(this.lastLiveDataAt ?? -Infinity, this.lastFallbackDataAt ?? -Infinity);
    const stats = this.connection.stats;
    const liveConnected = this.connection.isConnected();

    return {
      host: this.host,
      state: this.getConnectionState(),
      liveConnected,
      activeSource: this.getActiveSource(),
      lastLiveDataAt: this.lastLiveDataAt,
      lastFallbackDataAt: this.lastFallbackDataAt,
      isDataFresh: Number.isFinite(lastDataAt) && now - lastDataAt <= this.freshnessThresholdMs,
      reconnectAttempt: this.reconnectPolicy.attempt,
      reconnectExhausted: this.reconnectPolicy.exhausted,
      pollIntervalMs: this.getAdaptiveInterval(),
      baseIntervalMs: this.baseIntervalMs,
      lastFallbackError: this.lastFallbackError,
      fallbackHealth: this.fallbackChannel.getHealth?.() ?? null,
      parameterCount: this.store.size,
      counters: {
        ...this.counters,
        successfulConnects: stats.successfulConnects,
        failedConnectAttempts: stats.failedConnectAttempts,
        messagesReceived: stats.messagesReceived,
        messagesSent: stats.messagesSent,
        malformedLines: stats.malformedLines,
        heartbeatTimeouts: stats.heartbeatTimeouts,
      },
    };
  }

  getConnectionState(): ConnectionState {
    const state = this.connection.state;
    if (state === 'disconnected' && this.reconnectPolicy.active) return 'reconnecting';
    return state;
  }

  getActiveSource(): DataSource {
    return this.connection.isConnected() ? 'live' : 'fallback';
  }

  /** Effective fallback interval for the current connection health */
  getAdaptiveInterval(): number {
    if (!this.connection.isConnected()) return this.baseIntervalMs;
    return this.isLiveRecent() ? this.baseIntervalMs * 4 : this.baseIntervalMs * 2;
  }

  // --- Lifecycle ---

  /**
   * Open the live connection and start the fallback timer. If the live
   * connection cannot be opened, reconnection starts in the background and
   * an immediate fallback round fills the snapshot. Never rejects.
   */
  async start(): Promise<void> {
    if (this.started || this.closed) return;
    this.started = true;
    log.info({ host: this.host, keys: this.keys.length }, 'Starting session');

    try {
      await this.connection.open();
    } catch (err) {
      log.warn({ host: this.host, error: errorMessage(err) }, 'Live connection unavailable, using fallback');
      this.reconnectPolicy.trigger();
      await this.runFallbackRound();
    }

    this.scheduleFallback();
  }

  /** Manual reconnect: clears exhausted retries and opens immediately */
  async reconnect(): Promise<boolean> {
    if (this.closed) return false;
    log.info({ host: this.host }, 'Manual reconnect requested');
    this.reconnectPolicy.reset();

    try {
      await this.connection.open();
      return true;
    } catch (err) {
      log.warn({ host: this.host, error: errorMessage(err) }, 'Manual reconnect failed');
      this.reconnectPolicy.trigger();
      return false;
    }
  }

  /** Stop refreshing, stop reconnecting, close the socket. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.refresh.stop();
    this.reconnectPolicy.stop();
    this.fallbackTimer = cancelTimer(this.fallbackTimer);
    this.connection.close();
    this.snapshotListeners.clear();

    log.info({ host: this.host }, 'Session closed');
  }

  // --- Live connection events ---

  private onLiveReady(): void {
    this.reconnectPolicy.markConnected();
    this.refresh.start();
  }

  private onLiveUpdate(update: ParameterUpdate): void {
    const stamp = this.store.stamp(this.scheduler.now());
    this.lastLiveDataAt = stamp.at;
    this.applyUpdates({ [update.key]: update.value }, 'live', stamp);
  }

  private onLiveDropped(): void {
    this.refresh.stop();
    if (this.closed) return;
    this.reconnectPolicy.trigger();

    // Take over straight away instead of waiting out a widened interval
    this.fallbackTimer = cancelTimer(this.fallbackTimer);
    this.fallbackTick();
  }

  // --- Fallback polling ---

  private scheduleFallback(): void {
    this.fallbackTimer = cancelTimer(this.fallbackTimer);
    if (this.closed) return;

    const delayMs = this.getAdaptiveInterval();
    this.fallbackTimer = this.scheduler.setTimeout(() => {
      this.fallbackTimer = null;
      this.fallbackTick();
    }, delayMs);
  }

  private fallbackTick(): void {
    const round = this.needsFallback() ? this.runFallbackRound() : Promise.resolve();
    round.then(
      () => this.scheduleFallback(),
      (err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Fallback tick failed');
        this.scheduleFallback();
      },
    );
  }

  private async runFallbackRound(): Promise<void> {
    if (this.pollInFlight || this.closed || this.keys.length === 0) return;
    this.pollInFlight = true;
    this.counters.fallbackRounds++;
    const stamp = this.store.stamp(this.scheduler.now());

    try {
      const round = await this.poller.poll(this.keys);
      if (this.closed) return;
      this.lastFallbackDataAt = round.completedAt;
      this.lastFallbackError = null;
      this.applyUpdates(round.values, 'fallback', stamp);
    } catch (err) {
      this.counters.fallbackFailures++;
      this.lastFallbackError = errorMessage(err);
      log.warn({ host: this.host, error: this.lastFallbackError }, 'Fallback round failed, keeping last known values');
      this.emit('fallbackFailed', err instanceof Error ? err : new Error(String(err)));
    } finally {
      this.pollInFlight = false;
    }
  }

  private async sendViaFallback(command: string): Promise<void> {
    this.counters.fallbackCommands++;
    const stamp = this.store.stamp(this.scheduler.now());

    try {
      const reply = await this.fallbackChannel.request([command]);
      if (this.closed) return;
      if (Object.keys(reply).length > 0) {
        this.lastFallbackDataAt = this.scheduler.now();
        this.applyUpdates(reply, 'fallback', stamp);
      }
      log.debug({ command }, 'Command sent via fallback');
    } catch (err) {
      const failure: CommandFailure = { command, error: errorMessage(err) };
      log.warn(failure, 'Command could not be delivered');
      this.emit('commandFailed', failure);
    }
  }

  // --- Internals ---

  private needsFallback(): boolean {
    return !this.connection.isConnected() || !this.isLiveRecent();
  }

  private isLiveRecent(): boolean {
    if (this.lastLiveDataAt === null) return false;
    return this.scheduler.now() - this.lastLiveDataAt <= this.freshnessThresholdMs;
  }

  private applyUpdates(values: ParameterSnapshot, source: DataSource, stamp: WriteStamp): void {
    const changes = this.store.apply(values, source, stamp);
    if (changes.length === 0) return;

    const event: SnapshotEvent = { changes, snapshot: this.store.snapshot() };
    this.emit('snapshot', event);
    for (const listener of this.snapshotListeners) {
      try {
        listener(event);
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Snapshot listener failed');
      }
    }
  }

  private emitStatus(): void {
    this.emit('status', this.getConnectionStatus());
  }
}
