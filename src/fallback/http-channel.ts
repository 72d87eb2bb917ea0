/**
 * HTTP fallback channel
 *
 * Stateless request/response path to the controller's command endpoint:
 *   GET http://{host}:{port}/command?query=in-a:voltage;fan:enabled
 * The body echoes each command with "::" and its value, one reply per
 * line or separated by ';'. Bodies over MAX_RESPONSE_CHARS are rejected.
 * Request timeouts adapt through a NetworkMonitor.
 */

import { ParameterSnapshot, BATCH_SEPARATOR, decodeResponse } from '../protocol/parameter-codec';
import { NetworkHealth } from '../health/types';
import { Scheduler, systemScheduler } from '../scheduling/task-scheduler';
import { TransportError, errorMessage } from '../errors';
import { NetworkMonitor } from './network-monitor';
import { getLogger } from '../logger';

const log = getLogger('HttpChannel');

export const MAX_RESPONSE_CHARS = 10000;

export interface FallbackChannel {
  /** Send a batch of commands in one request and decode the reply */
  request(commands: readonly string[]): Promise<ParameterSnapshot>;
  /** Request health, for channels that track it */
  getHealth?(): NetworkHealth;
}

export interface HttpChannelOptions {
  host: string;
  port: number;
  /** Base timeout; grows up to 3x after timed-out requests */
  requestTimeoutMs: number;
  scheduler?: Scheduler;
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

export class HttpFallbackChannel implements FallbackChannel {
  readonly baseUrl: string;
  private readonly monitor: NetworkMonitor;

  constructor(options: HttpChannelOptions) {
    this.baseUrl = `http://${options.host}:${options.port}`;
    const scheduler = options.scheduler ?? systemScheduler;
    this.monitor = new NetworkMonitor(options.requestTimeoutMs, () => scheduler.now());
  }

  buildUrl(commands: readonly string[]): string {
    const url = new URL('/command', this.baseUrl);
    url.searchParams.set('query', commands.join(BATCH_SEPARATOR));
    return url.toString();
  }

  getHealth(): NetworkHealth {
    return this.monitor.getHealth();
  }

  async request(commands: readonly string[]): Promise<ParameterSnapshot> {
    const url = this.buildUrl(commands);
    const timeoutMs = this.monitor.getTimeoutMs();
    log.debug({ url, timeoutMs }, 'Fallback request');

    this.monitor.recordRequestStart();
    let text: string;
    try {
      text = await this.fetchText(url, timeoutMs);
    } catch (err) {
      const timedOut = isTimeout(err);
      this.monitor.recordFailure(timedOut);
      if (err instanceof TransportError) throw err;
      if (timedOut) {
        throw new TransportError(`Fallback request timed out after ${timeoutMs}ms`, { cause: err });
      }
      throw new TransportError(`Fallback request failed: ${errorMessage(err)}`, { cause: err });
    }

    this.monitor.recordSuccess();
    return decodeResponse(text);
  }

  private async fetchText(url: string, timeoutMs: number): Promise<string> {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!res.ok) {
      await res.body?.cancel();
      throw new TransportError(`HTTP ${res.status} from ${this.baseUrl}`);
    }
    if (!res.body) return '';

    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let text = '';
    for (;;) {
      const chunk = await reader.read();
      if (chunk.done) break;
      text += decoder.decode(chunk.value, { stream: true });
      if (text.length > MAX_RESPONSE_CHARS) {
        await reader.cancel();
        throw new TransportError(`Response from ${this.baseUrl} exceeds ${MAX_RESPONSE_CHARS} characters`);
      }
    }
    return text + decoder.decode();
  }
}
