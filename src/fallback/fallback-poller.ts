/**
 * Fallback Poller
 *
 * One polling round over the fallback channel, used while the live
 * connection is down. Keys are requested in batches; a failed batch or a
 * key missing from a reply only removes that key from the round. The round
 * fails as a whole only when no key produced a value.
 */

import { ParameterSnapshot } from '../protocol/parameter-codec';
import { Scheduler, systemScheduler } from '../scheduling/task-scheduler';
import { FallbackFetchError, errorMessage } from '../errors';
import { FallbackChannel } from './http-channel';
import { getLogger } from '../logger';

const log = getLogger('FallbackPoller');

export interface FallbackRound {
  values: ParameterSnapshot;
  /** Subscribed keys that produced no value this round */
  missing: string[];
  startedAt: number;
  completedAt: number;
}

export interface FallbackPollerOptions {
  channel: FallbackChannel;
  /** Keys per request; 1 sends one request per key */
  batchSize: number;
  scheduler?: Scheduler;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batchSize = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

export class FallbackPoller {
  private readonly channel: FallbackChannel;
  private readonly batchSize: number;
  private readonly scheduler: Scheduler;

  constructor(options: FallbackPollerOptions) {
    this.channel = options.channel;
    this.batchSize = options.batchSize;
    this.scheduler = options.scheduler ?? systemScheduler;
  }

  async poll(keys: readonly string[]): Promise<FallbackRound> {
    const startedAt = this.scheduler.now();
    const values: ParameterSnapshot = {};
    const errors: string[] = [];

    // Batches go out one after another; the device handles one request at a time
    for (const batch of chunk(keys, this.batchSize)) {
      try {
        const reply = await this.channel.request(batch);
        for (const key of batch) {
          if (Object.hasOwn(reply, key)) values[key] = reply[key];
        }
      } catch (err) {
        errors.push(errorMessage(err));
        log.debug({ keys: batch, error: errorMessage(err) }, 'Fallback batch failed');
      }
    }

    const missing = keys.filter((key) => !Object.hasOwn(values, key));
    if (keys.length > 0 && missing.length === keys.length) {
      const reason = errors[0] ?? 'no values in reply';
      throw new FallbackFetchError(`Fallback round failed for all ${keys.length} key(s): ${reason}`, missing);
    }

    if (missing.length > 0) {
      log.debug({ missing }, 'Fallback round incomplete');
    }

    return { values, missing, startedAt, completedAt: this.scheduler.now() };
  }
}
