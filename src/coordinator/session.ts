/**
 * Device session factory
 *
 * Builds one controller session from its configuration: the live
 * connection, its reconnect policy and refresh scheduler, the fallback
 * poller, and the coordinator that ties them together. Each session owns
 * its components; nothing is shared between sessions.
 */

import { SessionConfig } from '../config-schema';
import { PersistentConnection, SocketFactory } from '../connection/persistent-connection';
import { ReconnectPolicy } from '../connection/reconnect-policy';
import { RefreshScheduler } from '../connection/refresh-scheduler';
import { buildWebSocketUrl } from '../connection/live-stats';
import { FallbackPoller } from '../fallback/fallback-poller';
import { FallbackChannel, HttpFallbackChannel } from '../fallback/http-channel';
import { Scheduler, systemScheduler } from '../scheduling/task-scheduler';
import { HybridCoordinator } from './hybrid-coordinator';

export interface SessionOverrides {
  scheduler?: Scheduler;
  socketFactory?: SocketFactory;
  fallbackChannel?: FallbackChannel;
}

export interface DeviceSession {
  coordinator: HybridCoordinator;
  connection: PersistentConnection;
  reconnectPolicy: ReconnectPolicy;
  refreshScheduler: RefreshScheduler;
  fallbackPoller: FallbackPoller;
}

export function createSession(config: SessionConfig, overrides: SessionOverrides = {}): DeviceSession {
  const scheduler = overrides.scheduler ?? systemScheduler;
  const { device, refresh, reconnect, fallback } = config;

  const connection = new PersistentConnection({
    url: buildWebSocketUrl(device.host, device.websocketPort, device.websocketPath),
    connectTimeoutMs: reconnect.connectTimeoutMs,
    heartbeatIntervalMs: reconnect.heartbeatIntervalMs,
    scheduler,
    socketFactory: overrides.socketFactory,
  });

  const reconnectPolicy = new ReconnectPolicy(connection, {
    baseDelayMs: reconnect.baseDelayMs,
    maxDelayMs: reconnect.maxDelayMs,
    maxAttempts: reconnect.maxAttempts,
  }, scheduler);

  const refreshScheduler = new RefreshScheduler({
    keys: config.parameters,
    intervalMs: refresh.intervalMs,
    commandSpacingMs: refresh.commandSpacingMs,
    send: (command) => connection.send(command),
    scheduler,
  });

  const fallbackChannel = overrides.fallbackChannel ?? new HttpFallbackChannel({
    host: device.host,
    port: device.httpPort,
    requestTimeoutMs: fallback.requestTimeoutMs,
    scheduler,
  });

  const fallbackPoller = new FallbackPoller({
    channel: fallbackChannel,
    batchSize: fallback.batchSize,
    scheduler,
  });

  const coordinator = new HybridCoordinator({
    host: device.host,
    keys: config.parameters,
    baseIntervalMs: fallback.baseIntervalMs,
    freshnessThresholdMs: config.freshnessThresholdMs,
  }, {
    connection,
    reconnectPolicy,
    refreshScheduler,
    fallbackPoller,
    fallbackChannel,
    scheduler,
  });

  return { coordinator, connection, reconnectPolicy, refreshScheduler, fallbackPoller };
}
