import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ReconnectPolicy, ReconnectTarget, ScheduledAttempt, calculateBackoff } from '../connection/reconnect-policy';
import { OpenOptions } from '../connection/persistent-connection';
import { TransportError } from '../errors';
import { ManualScheduler } from './helpers/manual-scheduler';

/** Open target whose attempts succeed or fail from a queue (default: fail) */
class FakeTarget implements ReconnectTarget {
  calls: number[] = [];
  options: Array<OpenOptions | undefined> = [];
  outcomes: boolean[] = [];

  constructor(private readonly scheduler: ManualScheduler) {}

  async open(options?: OpenOptions): Promise<void> {
    this.calls.push(this.scheduler.now());
    this.options.push(options);
    if (!(this.outcomes.shift() ?? false)) {
      throw new TransportError('Connection failed: ECONNREFUSED');
    }
  }
}

describe('calculateBackoff', () => {
  it('doubles from the base delay up to the cap', () => {
    const config = { baseDelayMs: 5000, maxDelayMs: 300000 };
    const delays = [1, 2, 3, 4, 5, 6, 7, 8].map((attempt) => calculateBackoff(attempt, config));
    assert.deepStrictEqual(delays, [5000, 10000, 20000, 40000, 80000, 160000, 300000, 300000]);
  });

  it('treats attempt 0 like attempt 1', () => {
    assert.strictEqual(calculateBackoff(0, { baseDelayMs: 100, maxDelayMs: 1000 }), 100);
  });
});

describe('ReconnectPolicy', () => {
  let scheduler: ManualScheduler;
  let target: FakeTarget;
  let scheduled: ScheduledAttempt[];

  function createPolicy(maxAttempts: number, baseDelayMs = 5000, maxDelayMs = 300000): ReconnectPolicy {
    const policy = new ReconnectPolicy(target, { baseDelayMs, maxDelayMs, maxAttempts }, scheduler);
    policy.on('scheduled', (attempt: ScheduledAttempt) => scheduled.push(attempt));
    return policy;
  }

  beforeEach(() => {
    scheduler = new ManualScheduler();
    target = new FakeTarget(scheduler);
    scheduled = [];
  });

  it('backs off exponentially and stops after maxAttempts', async () => {
    const policy = createPolicy(8);
    const exhausted: number[] = [];
    policy.on('exhausted', (attempts: number) => exhausted.push(attempts));

    policy.trigger();
    await scheduler.advance(915000);

    assert.deepStrictEqual(
      scheduled.map((s) => s.delayMs),
      [5000, 10000, 20000, 40000, 80000, 160000, 300000, 300000],
    );
    assert.deepStrictEqual(target.calls, [5000, 15000, 35000, 75000, 155000, 315000, 615000, 915000]);
    assert.deepStrictEqual(exhausted, [8]);
    assert.strictEqual(policy.exhausted, true);
    assert.strictEqual(policy.active, false);
  });

  it('stays idle once exhausted until reset', async () => {
    const policy = createPolicy(1);
    policy.trigger();
    await scheduler.advance(5000);
    assert.strictEqual(policy.exhausted, true);

    policy.trigger();
    await scheduler.advance(60000);
    assert.strictEqual(target.calls.length, 1);

    policy.reset();
    assert.strictEqual(policy.attempt, 0);
    assert.strictEqual(policy.exhausted, false);
    policy.trigger();
    assert.deepStrictEqual(scheduled[scheduled.length - 1], { attempt: 1, delayMs: 5000 });
  });

  it('opens with the reconnecting flag', async () => {
    const policy = createPolicy(3);
    policy.trigger();
    await scheduler.advance(5000);
    assert.deepStrictEqual(target.options, [{ reconnecting: true }]);
  });

  it('resets the counter after a successful attempt', async () => {
    const policy = createPolicy(10);
    const recovered: number[] = [];
    policy.on('recovered', (attempts: number) => recovered.push(attempts));
    target.outcomes = [false, false, true];

    policy.trigger();
    await scheduler.advance(5000);
    await scheduler.advance(10000);
    assert.strictEqual(policy.attempt, 3);
    await scheduler.advance(20000);

    assert.deepStrictEqual(target.calls, [5000, 15000, 35000]);
    assert.deepStrictEqual(recovered, [3]);
    assert.strictEqual(policy.attempt, 0);
    assert.strictEqual(policy.active, false);

    // The next drop starts again from the base delay
    policy.trigger();
    assert.deepStrictEqual(scheduled[scheduled.length - 1], { attempt: 1, delayMs: 5000 });
  });

  it('reports each failed attempt', async () => {
    const policy = createPolicy(10);
    const failures: Array<{ attempt: number; error: string }> = [];
    policy.on('attemptFailed', (failure: { attempt: number; error: string }) => failures.push(failure));

    policy.trigger();
    await scheduler.advance(15000);

    assert.deepStrictEqual(failures, [
      { attempt: 1, error: 'Connection failed: ECONNREFUSED' },
      { attempt: 2, error: 'Connection failed: ECONNREFUSED' },
    ]);
  });

  it('retries without limit when maxAttempts is 0', async () => {
    const policy = createPolicy(0, 100, 1000);
    policy.trigger();
    await scheduler.advance(10000);

    assert.strictEqual(target.calls.length, 12);
    assert.strictEqual(policy.attempt, 13);
    assert.strictEqual(policy.exhausted, false);
  });

  it('ignores triggers while an attempt is pending', () => {
    const policy = createPolicy(10);
    policy.trigger();
    policy.trigger();
    assert.strictEqual(scheduled.length, 1);
    assert.strictEqual(policy.active, true);
  });

  it('does nothing after stop', async () => {
    const policy = createPolicy(10);
    policy.trigger();
    policy.stop();
    await scheduler.advance(60000);

    assert.strictEqual(target.calls.length, 0);
    assert.strictEqual(policy.active, false);
    policy.trigger();
    assert.strictEqual(scheduled.length, 1);
  });

  it('treats an outside connect as recovery', async () => {
    const policy = createPolicy(10);
    const recovered: number[] = [];
    policy.on('recovered', (attempts: number) => recovered.push(attempts));

    policy.trigger();
    policy.markConnected();
    await scheduler.advance(60000);

    assert.deepStrictEqual(recovered, [1]);
    assert.strictEqual(policy.attempt, 0);
    assert.strictEqual(target.calls.length, 0);
  });

  it('reports its state', () => {
    const policy = createPolicy(10);
    assert.deepStrictEqual(policy.getState(), { attempt: 0, currentDelayMs: 5000, shouldContinue: true, exhausted: false });
    policy.trigger();
    policy.trigger();
    assert.strictEqual(policy.getState().attempt, 1);
  });
});
