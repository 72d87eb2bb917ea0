/**
 * Network Monitor
 *
 * Request health for the fallback channel. Each timed-out request grows the
 * timeout by 20% (capped at 3x the configured one); each success shrinks it
 * by 10% back towards 1x. Two failures in a row mark the channel degraded,
 * three successes in a row clear it.
 */

import { NetworkHealth } from '../health/types';
import { getLogger } from '../logger';

const log = getLogger('NetworkMonitor');

const TIMEOUT_GROWTH = 1.2;
const TIMEOUT_DECAY = 0.9;
const MAX_TIMEOUT_MULTIPLIER = 3;
const DEGRADED_AFTER_FAILURES = 2;
const RECOVERED_AFTER_SUCCESSES = 3;

export class NetworkMonitor {
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private totalRequests = 0;
  private totalTimeouts = 0;
  private multiplier = 1;
  private degraded = false;
  private lastRequestAt: number | null = null;
  private lastFailureAt: number | null = null;

  constructor(
    private readonly baseTimeoutMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get isDegraded(): boolean {
    return this.degraded;
  }

  getTimeoutMs(): number {
    return Math.min(Math.round(this.baseTimeoutMs * this.multiplier), this.baseTimeoutMs * MAX_TIMEOUT_MULTIPLIER);
  }

  recordRequestStart(): void {
    this.totalRequests++;
    this.lastRequestAt = this.now();
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses++;

    if (this.multiplier > 1) {
      this.multiplier = Math.max(1, this.multiplier * TIMEOUT_DECAY);
    }

    if (this.degraded && this.consecutiveSuccesses >= RECOVERED_AFTER_SUCCESSES) {
      this.degraded = false;
      log.info({ successes: this.consecutiveSuccesses }, 'Fallback channel recovered');
    }
  }

  recordFailure(timedOut: boolean): void {
    this.consecutiveSuccesses = 0;
    this.consecutiveFailures++;
    this.lastFailureAt = this.now();

    if (timedOut) {
      this.totalTimeouts++;
      this.multiplier = Math.min(MAX_TIMEOUT_MULTIPLIER, this.multiplier * TIMEOUT_GROWTH);
    }

    if (!this.degraded && this.consecutiveFailures >= DEGRADED_AFTER_FAILURES) {
      this.degraded = true;
      log.warn({ failures: this.consecutiveFailures, timeoutMs: this.getTimeoutMs() }, 'Fallback channel degraded');
    }
  }

  getHealth(): NetworkHealth {
    return {
      consecutiveFailures: this.consecutiveFailures,
      consecutiveSuccesses: this.consecutiveSuccesses,
      totalRequests: this.totalRequests,
      totalTimeouts: this.totalTimeouts,
      timeoutMultiplier: this.multiplier,
      currentTimeoutMs: this.getTimeoutMs(),
      degraded: this.degraded,
      lastRequestAt: this.lastRequestAt,
      lastFailureAt: this.lastFailureAt,
    };
  }
}
