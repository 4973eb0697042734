import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  EYE_DAMPENING,
  EYE_EDGE_BAND,
  evaluateEyePattern,
  pupilRadius,
  shadeEye,
  type EyeSample,
} from '../src/dream/eyePattern.js';
import { placeEye, placeNeighborhood } from '../src/dream/gridPlacement.js';

const pointArb = fc.record({
  x: fc.double({ min: 0, max: 1, noNaN: true }),
  y: fc.double({ min: 0, max: 1, noNaN: true }),
});

test('eye center shows the pupil at full alpha', () => {
  const eye = placeEye({ x: 3, y: 2 }, 0.5);
  assert.ok(pupilRadius(eye, 0.5) > EYE_EDGE_BAND);
  const sample = shadeEye(eye.center, 1, eye, 0.5);
  assert.ok(sample);
  assert.equal(sample.alpha, 1);
  assert.deepEqual(sample.color, { r: 0.03, g: 0.02, b: 0.04 });
});

test('points on or beyond the outer radius do not qualify', () => {
  const eye = placeEye({ x: 1, y: 4 }, 0);
  assert.equal(shadeEye({ x: eye.center.x + eye.radius * 1.01, y: eye.center.y }, 1, eye, 0), null);
  assert.equal(
    shadeEye({ x: eye.center.x, y: eye.center.y - eye.radius * 1.001 }, 1, eye, 0),
    null,
  );
});

test('eyes stay circular on a 2:1 image once x is aspect corrected', () => {
  const aspect = 256 / 128;
  const eye = placeEye({ x: 3, y: 2 }, 1.25);
  const k = eye.radius - EYE_EDGE_BAND / 2;
  const alongX = shadeEye({ x: eye.center.x + k / aspect, y: eye.center.y }, aspect, eye, 1.25);
  const alongY = shadeEye({ x: eye.center.x, y: eye.center.y + k }, aspect, eye, 1.25);
  assert.ok(alongX && alongY);
  assert.ok(Math.abs(alongX.alpha - 0.5) < 1e-6, `x alpha ${alongX.alpha}`);
  assert.ok(Math.abs(alongY.alpha - 0.5) < 1e-6, `y alpha ${alongY.alpha}`);

  const uncorrected = shadeEye({ x: eye.center.x + k / aspect, y: eye.center.y }, 1, eye, 1.25);
  assert.ok(uncorrected);
  assert.equal(uncorrected.alpha, 1);
});

test('winning alpha is scaled by intensity and the dampening factor', () => {
  const eye = placeEye({ x: 3, y: 2 }, 0.5);
  const sample = evaluateEyePattern(eye.center, 1, 0.5, 0.5);
  assert.ok(Math.abs(sample.alpha - 0.5 * EYE_DAMPENING) < 1e-12);
});

test('the highest-alpha candidate wins and ties keep scan order', () => {
  fc.assert(
    fc.property(pointArb, fc.double({ min: 0, max: 500, noNaN: true }), (point, time) => {
      const aspect = 1.5;
      const candidates = placeNeighborhood(point, time).map((eye) =>
        shadeEye(point, aspect, eye, time),
      );
      let expected: EyeSample | null = null;
      for (const candidate of candidates) {
        if (candidate && (!expected || candidate.alpha > expected.alpha)) {
          expected = candidate;
        }
      }
      const result = evaluateEyePattern(point, aspect, time, 1);
      if (!expected) {
        assert.equal(result.alpha, 0);
        return;
      }
      assert.ok(Math.abs(result.alpha - expected.alpha * EYE_DAMPENING) < 1e-12);
      assert.deepEqual(result.color, expected.color);
    }),
  );
});

test('eye alpha stays within [0, 1] for intensity in [0, 1]', () => {
  fc.assert(
    fc.property(
      pointArb,
      fc.double({ min: 0, max: 1000, noNaN: true }),
      fc.double({ min: 0, max: 1, noNaN: true }),
      fc.double({ min: 0.25, max: 4, noNaN: true }),
      (point, time, intensity, aspect) => {
        const { alpha } = evaluateEyePattern(point, aspect, time, intensity);
        return alpha >= 0 && alpha <= 1;
      },
    ),
  );
});
