import test from 'node:test';
import assert from 'node:assert/strict';

import { makeResolution } from '../src/fields/contracts.js';
import { digestBytes, digestFrame, frameHeader } from '../src/serialization/frameDigest.js';
import { createDreamSettings } from '../src/settings/dreamSettings.js';

test('digest of no bytes is the BLAKE3 empty hash', () => {
  assert.equal(
    digestBytes(new Uint8Array(0)),
    'af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262',
  );
});

test('frame header lists size then settings', () => {
  assert.equal(
    frameHeader(makeResolution(4, 2), createDreamSettings({ intensity: 0.5, time: 1.25 })),
    '{"width":4,"height":2,"intensity":0.5,"time":1.25}',
  );
});

test('settings change the frame digest but not the pixel digest', () => {
  const pixels = new Uint8ClampedArray(4 * 2 * 4).fill(200);
  const resolution = makeResolution(4, 2);
  const a = digestFrame(pixels, resolution, createDreamSettings({ intensity: 0.5 }));
  const b = digestFrame(pixels, resolution, createDreamSettings({ intensity: 0.55 }));
  assert.match(a.pixels, /^[0-9a-f]{64}$/);
  assert.match(a.frame, /^[0-9a-f]{64}$/);
  assert.equal(a.pixels, b.pixels);
  assert.notEqual(a.frame, b.frame);
  assert.equal(a.pixels, digestBytes(new Uint8Array(pixels.buffer)));
});
