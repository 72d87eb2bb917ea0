/**
 * Refresh Scheduler
 *
 * The controller only answers requests, so subscribed parameters are kept
 * fresh by re-reading them. Each cycle sends one read per key, spaced
 * commandSpacingMs apart; cycles start immediately on start() and then
 * every intervalMs. A tick that lands while the previous cycle is still
 * sending is skipped.
 *
 * Events:
 *   'cycleComplete' (commandsSent: number)
 */

import { EventEmitter } from 'events';
import { encodeCommand } from '../protocol/parameter-codec';
import { Scheduler, TimerHandle, cancelTimer, systemScheduler } from '../scheduling/task-scheduler';
import { getLogger } from '../logger';

const log = getLogger('Refresh');

export interface RefreshSchedulerOptions {
  keys: readonly string[];
  intervalMs: number;
  commandSpacingMs: number;
  /** Write one command line; returns false when it could not be sent */
  send: (command: string) => boolean;
  scheduler?: Scheduler;
}

export class RefreshScheduler extends EventEmitter {
  readonly keys: readonly string[];

  private readonly intervalMs: number;
  private readonly commandSpacingMs: number;
  private readonly send: (command: string) => boolean;
  private readonly scheduler: Scheduler;

  private intervalTimer: TimerHandle | null = null;
  private spacingTimer: TimerHandle | null = null;
  private cycleInProgress = false;
  private _cycles = 0;

  constructor(options: RefreshSchedulerOptions) {
    super();
    this.keys = Array.from(new Set(options.keys));
    this.intervalMs = options.intervalMs;
    this.commandSpacingMs = options.commandSpacingMs;
    this.send = options.send;
    this.scheduler = options.scheduler ?? systemScheduler;
  }

  get running(): boolean {
    return this.intervalTimer !== null;
  }

  /** Cycles started since construction (skipped ticks excluded) */
  get cycles(): number {
    return this._cycles;
  }

  /** Start (or restart) refreshing; the first cycle runs immediately */
  start(): void {
    this.stop();
    log.debug({ keys: this.keys.length, intervalMs: this.intervalMs }, 'Refresh started');
    this.intervalTimer = this.scheduler.setInterval(() => this.runCycle(), this.intervalMs);
    this.runCycle();
  }

  stop(): void {
    const wasRunning = this.running;
    this.intervalTimer = cancelTimer(this.intervalTimer);
    this.spacingTimer = cancelTimer(this.spacingTimer);
    this.cycleInProgress = false;
    if (wasRunning) log.debug('Refresh stopped');
  }

  private runCycle(): void {
    if (this.keys.length === 0) return;
    if (this.cycleInProgress) {
      log.warn({ intervalMs: this.intervalMs }, 'Previous refresh cycle still sending, tick skipped');
      return;
    }

    this.cycleInProgress = true;
    this._cycles++;
    let index = 0;
    let sent = 0;

    const sendNext = (): void => {
      this.spacingTimer = null;
      if (!this.running) return;

      if (this.send(encodeCommand(this.keys[index]))) sent++;
      index++;

      if (index < this.keys.length) {
        this.spacingTimer = this.scheduler.setTimeout(sendNext, this.commandSpacingMs);
        return;
      }

      this.cycleInProgress = false;
      log.debug({ sent }, 'Refresh cycle complete');
      this.emit('cycleComplete', sent);
    };

    sendNext();
  }
}
