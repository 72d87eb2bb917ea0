import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { FallbackPoller, chunk } from '../fallback/fallback-poller';
import { FallbackFetchError, TransportError } from '../errors';
import { ParameterSnapshot } from '../protocol/parameter-codec';
import { ManualScheduler } from './helpers/manual-scheduler';
import { FakeChannel } from './helpers/fakes';

const DEVICE: ParameterSnapshot = {
  'in-a:voltage': '9.50',
  'in-b:voltage': '3.10',
  'fan:enabled': '1',
  'fan:rpm': '1200',
  'out-a:voltage': '5.00',
};

function answerFrom(values: ParameterSnapshot) {
  return (commands: readonly string[]): ParameterSnapshot => {
    const reply: ParameterSnapshot = {};
    for (const command of commands) {
      if (Object.hasOwn(values, command)) reply[command] = values[command];
    }
    return reply;
  };
}

describe('chunk', () => {
  it('splits into batches of the given size', () => {
    assert.deepStrictEqual(chunk([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
    assert.deepStrictEqual(chunk([], 3), []);
  });

  it('uses batches of one for sizes below 1', () => {
    assert.deepStrictEqual(chunk(['a', 'b'], 0), [['a'], ['b']]);
  });
});

describe('FallbackPoller', () => {
  let scheduler: ManualScheduler;

  beforeEach(() => {
    scheduler = new ManualScheduler(1000);
  });

  it('requests keys in sequential batches', async () => {
    const channel = new FakeChannel(answerFrom(DEVICE));
    const poller = new FallbackPoller({ channel, batchSize: 2, scheduler });

    const round = await poller.poll(Object.keys(DEVICE));

    assert.deepStrictEqual(channel.requests, [
      ['in-a:voltage', 'in-b:voltage'],
      ['fan:enabled', 'fan:rpm'],
      ['out-a:voltage'],
    ]);
    assert.deepStrictEqual(round.values, DEVICE);
    assert.deepStrictEqual(round.missing, []);
    assert.strictEqual(round.startedAt, 1000);
    assert.strictEqual(round.completedAt, 1000);
  });

  it('lists keys the device did not answer', async () => {
    const channel = new FakeChannel(answerFrom({ 'fan:rpm': '1200', 'extra:key': '7' }));
    const poller = new FallbackPoller({ channel, batchSize: 10, scheduler });

    const round = await poller.poll(['fan:rpm', 'fan:enabled']);

    assert.deepStrictEqual(round.values, { 'fan:rpm': '1200' });
    assert.deepStrictEqual(round.missing, ['fan:enabled']);
  });

  it('loses only the keys of a failed batch', async () => {
    const channel = new FakeChannel((commands) =>
      commands.includes('fan:enabled') ? new TransportError('HTTP 500 from http://grow.local:80') : answerFrom(DEVICE)(commands));
    const poller = new FallbackPoller({ channel, batchSize: 2, scheduler });

    const round = await poller.poll(Object.keys(DEVICE));

    assert.deepStrictEqual(round.values, {
      'in-a:voltage': '9.50',
      'in-b:voltage': '3.10',
      'out-a:voltage': '5.00',
    });
    assert.deepStrictEqual(round.missing, ['fan:enabled', 'fan:rpm']);
  });

  it('fails the round when no key produced a value', async () => {
    const channel = new FakeChannel(() => new TransportError('HTTP 503 from http://grow.local:80'));
    const poller = new FallbackPoller({ channel, batchSize: 1, scheduler });

    await assert.rejects(poller.poll(['fan:rpm', 'fan:enabled']), (err: unknown) => {
      assert.ok(err instanceof FallbackFetchError);
      assert.strictEqual(err.message, 'Fallback round failed for all 2 key(s): HTTP 503 from http://grow.local:80');
      assert.deepStrictEqual(err.failedKeys, ['fan:rpm', 'fan:enabled']);
      return true;
    });
    assert.strictEqual(channel.requests.length, 2);
  });

  it('fails the round when every reply is empty', async () => {
    const channel = new FakeChannel(() => ({}));
    const poller = new FallbackPoller({ channel, batchSize: 10, scheduler });

    await assert.rejects(poller.poll(['fan:rpm']), {
      name: 'FallbackFetchError',
      message: 'Fallback round failed for all 1 key(s): no values in reply',
    });
  });

  it('does not mistake object prototype names for replies', async () => {
    const channel = new FakeChannel(answerFrom({ 'fan:rpm': '1200' }));
    const poller = new FallbackPoller({ channel, batchSize: 10, scheduler });

    const round = await poller.poll(['constructor', 'fan:rpm']);

    assert.deepStrictEqual(round.values, { 'fan:rpm': '1200' });
    assert.deepStrictEqual(round.missing, ['constructor']);
  });

  it('returns an empty round for no keys', async () => {
    const channel = new FakeChannel(answerFrom(DEVICE));
    const poller = new FallbackPoller({ channel, batchSize: 10, scheduler });

    const round = await poller.poll([]);

    assert.deepStrictEqual(round.values, {});
    assert.strictEqual(channel.requests.length, 0);
  });
});
