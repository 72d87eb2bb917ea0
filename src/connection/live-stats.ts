/**
 * LiveStats — per-connection telemetry
 *
 * Updated by PersistentConnection from its own socket events.
 */

export interface LiveStats {
  url: string;
  successfulConnects: number;
  failedConnectAttempts: number;
  messagesReceived: number;
  messagesSent: number;
  malformedLines: number;
  heartbeatTimeouts: number;
  lastConnectedAt: number | null;
  lastDisconnectedAt: number | null;
  lastMessageReceivedAt: number | null;
  lastError: string | null;
  lastErrorAt: number | null;
}

export function createLiveStats(url: string): LiveStats {
  return {
    url,
    successfulConnects: 0,
    failedConnectAttempts: 0,
    messagesReceived: 0,
    messagesSent: 0,
    malformedLines: 0,
    heartbeatTimeouts: 0,
    lastConnectedAt: null,
    lastDisconnectedAt: null,
    lastMessageReceivedAt: null,
    lastError: null,
    lastErrorAt: null,
  };
}

export function buildWebSocketUrl(host: string, port: number, path: string): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `ws://${host}:${port}${normalizedPath}`;
}
