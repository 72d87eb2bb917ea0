/**
 * Scheduled tasks
 *
 * Every timer in the session goes through a Scheduler so the component that
 * creates it owns a cancellable handle, and tests can swap in a manual clock.
 */

export interface TimerHandle {
  /** Cancel the task. Safe to call more than once. */
  cancel(): void;
  /** False once cancelled or, for one-shot tasks, once fired */
  readonly active: boolean;
}

export interface Scheduler {
  /** Current time in epoch milliseconds */
  now(): number;
  setTimeout(task: () => void, delayMs: number): TimerHandle;
  setInterval(task: () => void, intervalMs: number): TimerHandle;
}

class NodeTimeoutHandle implements TimerHandle {
  private timer: ReturnType<typeof setTimeout> | null;

  constructor(task: () => void, delayMs: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      task();
    }, delayMs);
  }

  get active(): boolean {
    return this.timer !== null;
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

class NodeIntervalHandle implements TimerHandle {
  private timer: ReturnType<typeof setInterval> | null;

  constructor(task: () => void, intervalMs: number) {
    this.timer = setInterval(task, intervalMs);
  }

  get active(): boolean {
    return this.timer !== null;
  }

  cancel(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

/** Scheduler backed by Node's timers and wall clock */
export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  setTimeout: (task, delayMs) => new NodeTimeoutHandle(task, delayMs),
  setInterval: (task, intervalMs) => new NodeIntervalHandle(task, intervalMs),
};

/** Cancel a handle if present and return null, for `this.timer = cancelTimer(this.timer)` */
export function cancelTimer(handle: TimerHandle | null): null {
  handle?.cancel();
  return null;
}
