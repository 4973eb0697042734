import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import { hash1, hash2, saltedHash1 } from '../src/dream/hashField.js';

const cellArb = fc.record({
  x: fc.integer({ min: -1000, max: 1000 }),
  y: fc.integer({ min: -1000, max: 1000 }),
});

test('hash outputs are deterministic for the same cell', () => {
  fc.assert(
    fc.property(cellArb, (cell) => {
      assert.deepEqual(hash2(cell), hash2({ x: cell.x, y: cell.y }));
      assert.equal(hash1(cell), hash1({ x: cell.x, y: cell.y }));
    }),
  );
});

test('hash outputs stay inside [0, 1)', () => {
  fc.assert(
    fc.property(cellArb, (cell) => {
      const v = hash2(cell);
      const s = hash1(cell);
      return v.x >= 0 && v.x < 1 && v.y >= 0 && v.y < 1 && s >= 0 && s < 1;
    }),
  );
});

test('hash of the origin folds to zero', () => {
  assert.equal(hash1({ x: 0, y: 0 }), 0);
  assert.deepEqual(hash2({ x: 0, y: 0 }), { x: 0, y: 0 });
});

test('adjacent grid cells receive distinct, roughly centred values', () => {
  const values: number[] = [];
  for (let y = 0; y < 7; y++) {
    for (let x = 0; x < 7; x++) {
      values.push(hash1({ x, y }));
    }
  }
  assert.equal(new Set(values).size, values.length);
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  assert.ok(mean > 0.25 && mean < 0.75, `mean ${mean.toFixed(3)} drifted from 0.5`);
});

test('salted hash matches hash1 of the shifted cell', () => {
  assert.equal(saltedHash1({ x: 2, y: 3 }, 17, 31), hash1({ x: 19, y: 34 }));
});
