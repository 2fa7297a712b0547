import assert from 'node:assert/strict';
import { test } from 'node:test';
import { WaitGroup } from '../waitGroup';

test('wait resolves immediately at zero', async () => {
  const group = new WaitGroup();
  await group.wait();
  assert.equal(group.count, 0);
});

test('wait resolves only after every unit is done', async () => {
  const group = new WaitGroup();
  group.add(2);
  let released = false;
  const waiting = group.wait().then(() => {
    released = true;
  });

  group.done();
  await Promise.resolve();
  assert.equal(released, false);

  group.add();
  group.done();
  group.done();
  await waiting;
  assert.equal(released, true);
  assert.equal(group.count, 0);
});

test('rejects negative deltas and extra done calls', () => {
  const group = new WaitGroup();
  assert.throws(() => group.add(-1), RangeError);
  assert.throws(() => group.done(), /went negative/);
});
