import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  DEFAULT_INTENSITY_RAMP,
  isAlertLevel,
  queueRotations,
  resetIntensityRamp,
  stepIntensityRamp,
} from '../src/settings/intensityRamp.js';

const approx = (actual: number, expected: number) =>
  assert.ok(Math.abs(actual - expected) < 1e-12, `${actual} != ${expected}`);

test('ramp climbs at the base rate and twice as fast when boosted', () => {
  approx(stepIntensityRamp(resetIntensityRamp(), { dt: 1 }).intensity, 0.005);
  approx(stepIntensityRamp(resetIntensityRamp(), { dt: 1, boosted: true }).intensity, 0.01);
});

test('queued rotations are consumed on the next tick', () => {
  const queued = queueRotations(resetIntensityRamp(), 2);
  assert.equal(queued.pendingRotations, 2);
  const next = stepIntensityRamp(queued, { dt: 0 });
  approx(next.intensity, 0.06);
  assert.equal(next.pendingRotations, 0);
  approx(stepIntensityRamp(next, { dt: 0 }).intensity, 0.06);
});

test('negative or non-finite input does not lower the ramp', () => {
  const state = { intensity: 0.4, pendingRotations: 0 };
  assert.equal(stepIntensityRamp(state, { dt: -10 }).intensity, 0.4);
  assert.equal(stepIntensityRamp(state, { dt: Number.NaN }).intensity, 0.4);
  assert.equal(queueRotations(state, -3).pendingRotations, 0);
});

test('ramp never exceeds full intensity', () => {
  fc.assert(
    fc.property(
      fc.double({ min: 0, max: 1, noNaN: true }),
      fc.double({ min: 0, max: 1000, noNaN: true }),
      fc.integer({ min: 0, max: 50 }),
      fc.boolean(),
      (intensity, dt, rotations, boosted) => {
        const next = stepIntensityRamp({ intensity, pendingRotations: 0 }, { dt, rotations, boosted });
        return next.intensity <= 1 && next.intensity >= intensity - 1e-12;
      },
    ),
  );
});

test('alert level starts at the threshold', () => {
  assert.equal(DEFAULT_INTENSITY_RAMP.alertThreshold, 0.7);
  assert.equal(isAlertLevel(0.7), true);
  assert.equal(isAlertLevel(0.69), false);
});
