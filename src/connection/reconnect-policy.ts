/**
 * Reconnect Policy
 *
 * Exponential backoff loop that re-opens the live connection after it
 * drops. Attempt n waits min(base * 2^(n-1), max) before calling
 * target.open(); a success resets the counter, a failure schedules the
 * next attempt until maxAttempts is reached (0 = unlimited). Once
 * exhausted the policy stays idle until reset() is called.
 *
 * Events:
 *   'scheduled' ({ attempt, delayMs })
 *   'attemptFailed' ({ attempt, error })
 *   'recovered' (attempts: number)
 *   'exhausted' (attempts: number)
 */

import { EventEmitter } from 'events';
import { ReconnectConfig, ReconnectState, DEFAULT_RECONNECT } from '../health/types';
import { Scheduler, TimerHandle, cancelTimer, systemScheduler } from '../scheduling/task-scheduler';
import { OpenOptions } from './persistent-connection';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('Reconnect');

export interface ReconnectTarget {
  open(options?: OpenOptions): Promise<void>;
}

export interface ScheduledAttempt {
  attempt: number;
  delayMs: number;
}

/** Backoff before attempt n (1-based): base * 2^(n-1), capped at max */
export function calculateBackoff(attempt: number, config: Pick<ReconnectConfig, 'baseDelayMs' | 'maxDelayMs'>): number {
  const delay = config.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, config.maxDelayMs);
}

export class ReconnectPolicy extends EventEmitter {
  private readonly target: ReconnectTarget;
  private readonly config: ReconnectConfig;
  private readonly scheduler: Scheduler;

  private _attempt = 0;
  private _exhausted = false;
  private shouldContinue = true;
  private attemptInFlight = false;
  private timer: TimerHandle | null = null;

  constructor(target: ReconnectTarget, config?: Partial<ReconnectConfig>, scheduler: Scheduler = systemScheduler) {
    super();
    this.target = target;
    this.config = { ...DEFAULT_RECONNECT, ...config };
    this.scheduler = scheduler;
  }

  get attempt(): number {
    return this._attempt;
  }

  get exhausted(): boolean {
    return this._exhausted;
  }

  /** Waiting out a backoff delay or running an attempt */
  get active(): boolean {
    return this.timer !== null || this.attemptInFlight;
  }

  getState(): ReconnectState {
    return {
      attempt: this._attempt,
      currentDelayMs: this._attempt === 0
        ? this.config.baseDelayMs
        : calculateBackoff(this._attempt, this.config),
      shouldContinue: this.shouldContinue,
      exhausted: this._exhausted,
    };
  }

  /** Start the backoff loop after a drop or failed open */
  trigger(): void {
    if (!this.shouldContinue || this._exhausted || this.active) return;
    this.scheduleNext();
  }

  /**
   * Manual reconnect: forget previous failures and leave the policy ready
   * to run again. The caller opens the connection itself.
   */
  reset(): void {
    this.timer = cancelTimer(this.timer);
    this._attempt = 0;
    this._exhausted = false;
    this.shouldContinue = true;
  }

  /** Deliberate shutdown; an in-flight attempt's outcome is ignored */
  stop(): void {
    this.shouldContinue = false;
    this.timer = cancelTimer(this.timer);
  }

  /** A connection opened outside the loop counts as recovery */
  markConnected(): void {
    // The loop's own attempt reports its success itself
    if (this.attemptInFlight) return;
    if (this._attempt === 0 && !this._exhausted) return;
    this.timer = cancelTimer(this.timer);
    const attempts = this._attempt;
    this._attempt = 0;
    this._exhausted = false;
    this.emit('recovered', attempts);
  }

  private scheduleNext(): void {
    const { maxAttempts } = this.config;
    if (maxAttempts > 0 && this._attempt >= maxAttempts) {
      this._exhausted = true;
      log.error({ attempts: this._attempt }, 'Reconnect attempts exhausted');
      this.emit('exhausted', this._attempt);
      return;
    }

    this._attempt++;
    const delayMs = calculateBackoff(this._attempt, this.config);
    log.info({ attempt: this._attempt, delayMs }, 'Reconnect scheduled');

    const scheduled: ScheduledAttempt = { attempt: this._attempt, delayMs };
    this.emit('scheduled', scheduled);

    this.timer = this.scheduler.setTimeout(() => {
      this.timer = null;
      this.runAttempt().catch((err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Reconnect loop failed');
      });
    }, delayMs);
  }

  private async runAttempt(): Promise<void> {
    if (!this.shouldContinue) return;
    const attempt = this._attempt;
    this.attemptInFlight = true;

    try {
      await this.target.open({ reconnecting: true });
    } catch (err) {
      this.attemptInFlight = false;
      if (!this.shouldContinue) return;
      log.warn({ attempt, error: errorMessage(err) }, 'Reconnect attempt failed');
      this.emit('attemptFailed', { attempt, error: errorMessage(err) });
      this.scheduleNext();
      return;
    }

    this.attemptInFlight = false;
    if (!this.shouldContinue) return;
    this._attempt = 0;
    log.info({ attempts: attempt }, 'Reconnected');
    this.emit('recovered', attempt);
  }
}
