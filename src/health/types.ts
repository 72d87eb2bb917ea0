/**
 * Connection Health Types
 *
 * Connection state machine, reconnect settings and the diagnostic status
 * the coordinator reports to its consumers.
 */

/** Live connection states */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

/** Which source the coordinator currently treats as authoritative */
export type DataSource = 'live' | 'fallback';

export interface ReconnectConfig {
  baseDelayMs: number;    // first backoff delay
  maxDelayMs: number;     // backoff cap
  maxAttempts: number;    // 0 = unlimited
}

export interface ReconnectState {
  attempt: number;
  currentDelayMs: number;
  shouldContinue: boolean;
  exhausted: boolean;
}

/** Cumulative counters, informational only */
export interface ConnectionCounters {
  successfulConnects: number;
  failedConnectAttempts: number;
  messagesReceived: number;
  messagesSent: number;
  malformedLines: number;
  heartbeatTimeouts: number;
  fallbackRounds: number;
  fallbackFailures: number;
  fallbackCommands: number;
}

/** Request health of the fallback channel */
export interface NetworkHealth {
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  totalRequests: number;
  totalTimeouts: number;
  timeoutMultiplier: number;
  /** Timeout the next request will use */
  currentTimeoutMs: number;
  /** Set after two failures in a row, cleared after three successes in a row */
  degraded: boolean;
  lastRequestAt: number | null;
  lastFailureAt: number | null;
}

export interface ConnectionStatus {
  host: string;
  state: ConnectionState;
  liveConnected: boolean;
  activeSource: DataSource;
  lastLiveDataAt: number | null;
  lastFallbackDataAt: number | null;
  isDataFresh: boolean;
  reconnectAttempt: number;
  reconnectExhausted: boolean;
  pollIntervalMs: number;
  baseIntervalMs: number;
  lastFallbackError: string | null;
  /** null when the fallback channel keeps no request health */
  fallbackHealth: NetworkHealth | null;
  parameterCount: number;
  counters: ConnectionCounters;
}

export const DEFAULT_RECONNECT: ReconnectConfig = {
  baseDelayMs: 5000,
  maxDelayMs: 300000,
  maxAttempts: 10,
};

export function createConnectionCounters(): ConnectionCounters {
  return {
    successfulConnects: 0,
    failedConnectAttempts: 0,
    messagesReceived: 0,
    messagesSent: 0,
    malformedLines: 0,
    heartbeatTimeouts: 0,
    fallbackRounds: 0,
    fallbackFailures: 0,
    fallbackCommands: 0,
  };
}
