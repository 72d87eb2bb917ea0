import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ParameterStore } from '../coordinator/parameter-store';

describe('ParameterStore', () => {
  let store: ParameterStore;

  beforeEach(() => {
    store = new ParameterStore();
  });

  it('reports new keys as changes', () => {
    const changes = store.apply({ 'in-a:voltage': '9.50', 'fan:enabled': '1' }, 'live', store.stamp(100));

    assert.deepStrictEqual(changes, [
      { key: 'in-a:voltage', value: '9.50', previous: undefined, source: 'live' },
      { key: 'fan:enabled', value: '1', previous: undefined, source: 'live' },
    ]);
    assert.strictEqual(store.size, 2);
  });

  it('reports nothing for an unchanged value but refreshes its entry', () => {
    store.apply({ 'fan:rpm': '1200' }, 'live', store.stamp(100));
    const changes = store.apply({ 'fan:rpm': '1200' }, 'fallback', store.stamp(200));

    assert.deepStrictEqual(changes, []);
    assert.deepStrictEqual(store.getEntry('fan:rpm'), { value: '1200', source: 'fallback', updatedAt: 200, revision: 2 });
  });

  it('carries the previous value on a change', () => {
    store.apply({ 'in-a:voltage': '9.50' }, 'live', store.stamp(100));
    const changes = store.apply({ 'in-a:voltage': '9.52' }, 'live', store.stamp(200));

    assert.deepStrictEqual(changes, [{ key: 'in-a:voltage', value: '9.52', previous: '9.50', source: 'live' }]);
    assert.strictEqual(store.get('in-a:voltage'), '9.52');
  });

  it('ignores a write stamped before the current entry', () => {
    const roundStart = store.stamp(400);
    store.apply({ 'fan:enabled': '1' }, 'live', store.stamp(500));
    const changes = store.apply({ 'fan:enabled': '0', 'fan:rpm': '900' }, 'fallback', roundStart);

    assert.deepStrictEqual(changes, [{ key: 'fan:rpm', value: '900', previous: undefined, source: 'fallback' }]);
    assert.deepStrictEqual(store.getEntry('fan:enabled'), { value: '1', source: 'live', updatedAt: 500, revision: 2 });
  });

  it('orders writes by stamp even when the wall clock steps back', () => {
    store.apply({ 'in-a:voltage': '9.50' }, 'live', store.stamp(100000));
    const changes = store.apply({ 'in-a:voltage': '9.52' }, 'live', store.stamp(40000));

    assert.deepStrictEqual(changes, [{ key: 'in-a:voltage', value: '9.52', previous: '9.50', source: 'live' }]);
    assert.strictEqual(store.get('in-a:voltage'), '9.52');
    assert.strictEqual(store.getEntry('in-a:voltage')?.updatedAt, 40000);
  });

  it('hands out copies', () => {
    store.apply({ 'fan:rpm': '1200' }, 'live', store.stamp(100));
    const snapshot = store.snapshot();
    snapshot['fan:rpm'] = '0';

    assert.deepStrictEqual(store.snapshot(), { 'fan:rpm': '1200' });
    assert.strictEqual(store.get('missing'), undefined);
    assert.strictEqual(store.getEntry('missing'), undefined);
  });
});
