import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';
import { WebSocket, RawData } from 'ws';
import { DeviceEmulator, UNKNOWN_PARAMETER_PAYLOAD } from '../emulators/device-emulator';
import { validateAppConfig } from '../config-schema';
import { createSession, DeviceSession } from '../coordinator/session';
import { DEFAULT_PARAMETERS } from '../protocol/parameters';
import { rawDataToString } from '../connection/persistent-connection';

async function waitFor(condition: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Timed out waiting for condition');
    await delay(10);
  }
}

function nextMessage(ws: WebSocket): Promise<string> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => reject(new Error('Timeout waiting for message')), 2000);
    ws.once('message', (data: RawData) => {
      clearTimeout(timeout);
      resolve(rawDataToString(data));
    });
  });
}

describe('DeviceEmulator', () => {
  describe('handleCommand', () => {
    it('answers a read with the current value', () => {
      const emulator = new DeviceEmulator({ values: { 'in-a:voltage': '9.50' } });
      assert.strictEqual(emulator.handleCommand('in-a:voltage'), 'in-a:voltage::9.50');
    });

    it('stores a write and echoes the assignment', () => {
      const emulator = new DeviceEmulator({ values: { 'fan:enabled': '0' } });
      assert.strictEqual(emulator.handleCommand('fan:enabled=1'), 'fan:enabled=1::1');
      assert.strictEqual(emulator.getValue('fan:enabled'), '1');
    });

    it('answers an unknown key with an error payload', () => {
      const emulator = new DeviceEmulator({ values: {} });
      assert.strictEqual(emulator.handleCommand('bogus:key=3'), `bogus:key::${UNKNOWN_PARAMETER_PAYLOAD}`);
      assert.strictEqual(emulator.getValue('bogus:key'), undefined);
    });

    it('starts with every default parameter', () => {
      const emulator = new DeviceEmulator();
      assert.deepStrictEqual(Object.keys(emulator.getState()), [...DEFAULT_PARAMETERS]);
      assert.strictEqual(emulator.getValue('out-a:voltage'), '0.00');
      assert.strictEqual(emulator.getValue('fan:enabled'), '0');
    });

    it('logs writes', () => {
      const emulator = new DeviceEmulator({ values: { 'fan:duty-cycle': '0' } });
      emulator.handleCommand('fan:duty-cycle=40');
      const log = emulator.getLog();
      assert.strictEqual(log.length, 1);
      assert.strictEqual(log[0].action, 'Write');
      assert.strictEqual(log[0].details, 'fan:duty-cycle = 40');
    });
  });

  describe('WebSocket endpoint', () => {
    let emulator: DeviceEmulator;
    let port: number;

    before(async () => {
      emulator = new DeviceEmulator({ values: { 'fan:rpm': '1200' } });
      port = (await emulator.start()).websocketPort;
    });

    after(async () => {
      await emulator.stop();
    });

    it('replies to each command', async () => {
      const ws = new WebSocket(`ws://127.0.0.1:${port}/websocket`);
      await new Promise<void>((resolve, reject) => {
        ws.once('open', () => resolve());
        ws.once('error', reject);
      });

      const reply = nextMessage(ws);
      ws.send('fan:rpm');
      assert.strictEqual(await reply, 'fan:rpm::1200');
      ws.close();
    });
  });
});

describe('end to end against the emulator', () => {
  let emulator: DeviceEmulator;
  let session: DeviceSession;

  before(async () => {
    emulator = new DeviceEmulator({ values: { 'in-a:voltage': '9.50', 'fan:enabled': '0' } });
    const ports = await emulator.start();
    const config = validateAppConfig({
      device: { host: '127.0.0.1', websocketPort: ports.websocketPort, httpPort: ports.httpPort },
      parameters: ['in-a:voltage', 'fan:enabled'],
      refresh: { intervalMs: 100, commandSpacingMs: 5 },
      reconnect: { baseDelayMs: 50, maxDelayMs: 200, maxAttempts: 0, connectTimeoutMs: 1000 },
      fallback: { baseIntervalMs: 100, requestTimeoutMs: 1000, batchSize: 10 },
      freshnessThresholdMs: 5000,
    });
    session = createSession(config);
    await session.coordinator.start();
  });

  after(async () => {
    session.coordinator.close();
    await emulator.stop();
  });

  it('reads parameters over the live connection', async () => {
    await waitFor(() => session.coordinator.getValue('in-a:voltage') === '9.50'
      && session.coordinator.getValue('fan:enabled') === '0');

    const status = session.coordinator.getConnectionStatus();
    assert.strictEqual(status.liveConnected, true);
    assert.strictEqual(status.activeSource, 'live');
  });

  it('picks up device-side changes on the next refresh', async () => {
    emulator.setValue('in-a:voltage', '9.52');
    await waitFor(() => session.coordinator.getValue('in-a:voltage') === '9.52');
  });

  it('writes through the live connection', async () => {
    session.coordinator.sendCommand('fan:enabled=1');
    await waitFor(() => session.coordinator.getValue('fan:enabled') === '1');
    assert.strictEqual(emulator.getValue('fan:enabled'), '1');
  });

  it('polls the fallback and reconnects after the device drops the socket', async () => {
    emulator.dropClients();

    await waitFor(() => session.coordinator.getConnectionStatus().counters.fallbackRounds >= 1);
    await waitFor(() => session.connection.stats.successfulConnects >= 2 && session.connection.isConnected());

    const status = session.coordinator.getConnectionStatus();
    assert.strictEqual(status.reconnectAttempt, 0);
    assert.strictEqual(status.activeSource, 'live');
    assert.strictEqual(status.lastFallbackError, null);
    assert.strictEqual(status.fallbackHealth?.consecutiveFailures, 0);
    assert.strictEqual(status.fallbackHealth?.degraded, false);
  });
});
