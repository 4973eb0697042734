import test from 'node:test';
import assert from 'node:assert/strict';

import { FrameBudgetMonitor } from '../src/runtime/frameBudget.js';

const fakeClock = () => {
  let now = 0n;
  return {
    clock: () => now,
    advanceMs: (ms: number) => {
      now += BigInt(ms) * 1_000_000n;
    },
  };
};

test('frame samples report duration and throughput', () => {
  const time = fakeClock();
  const monitor = new FrameBudgetMonitor({}, { clock: time.clock });
  monitor.beginFrame(0);
  time.advanceMs(20);
  const sample = monitor.endFrame(1_000_000);
  assert.equal(sample.frameIndex, 0);
  assert.equal(sample.frameMs, 20);
  assert.ok(Math.abs(sample.megapixelsPerSecond - 50) < 1e-9);
});

test('frames over budget are recorded as violations', () => {
  const time = fakeClock();
  const monitor = new FrameBudgetMonitor(
    { frameMs: 16, minMegapixelsPerSecond: 10 },
    { clock: time.clock },
  );
  monitor.beginFrame(0);
  time.advanceMs(10);
  monitor.endFrame(1_000_000);
  monitor.beginFrame(1);
  time.advanceMs(20);
  monitor.endFrame(100_000);

  const snapshot = monitor.snapshot();
  assert.equal(snapshot.frames, 2);
  assert.equal(snapshot.frameMsAvg, 15);
  assert.equal(snapshot.frameMsMax, 20);
  assert.deepEqual(
    snapshot.violations.map((violation) => [violation.type, violation.frameIndex]),
    [
      ['frameMs', 1],
      ['minMegapixelsPerSecond', 1],
    ],
  );
});

test('frame brackets must alternate', () => {
  const monitor = new FrameBudgetMonitor({}, { label: 'bench', clock: () => 0n });
  assert.throws(() => monitor.endFrame(1), /\[bench\] endFrame called without beginFrame/);
  monitor.beginFrame(0);
  assert.throws(() => monitor.beginFrame(1), /\[bench\] beginFrame called twice/);
});
