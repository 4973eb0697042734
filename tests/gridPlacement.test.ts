import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  GRID_SIZE,
  cellOf,
  neighborhood,
  placeEye,
  placeNeighborhood,
} from '../src/dream/gridPlacement.js';
import { hash2 } from '../src/dream/hashField.js';
import { length } from '../src/dream/math.js';

const cellArb = fc.record({
  x: fc.integer({ min: -50, max: 50 }),
  y: fc.integer({ min: -50, max: 50 }),
});
const timeArb = fc.double({ min: 0, max: 10_000, noNaN: true });

test('cellOf floors the scaled coordinate', () => {
  assert.deepEqual(cellOf({ x: 0.05, y: 0.99 }), { x: 0, y: 6 });
  assert.deepEqual(cellOf({ x: 1, y: 0 }), { x: 7, y: 0 });
  assert.deepEqual(cellOf({ x: 3 / 7 + 1e-9, y: 0.5 }), { x: 3, y: 3 });
});

test('neighborhood walks rows then columns around the home cell', () => {
  const cells = neighborhood({ x: 2, y: 3 });
  assert.equal(cells.length, 9);
  assert.deepEqual(cells[0], { x: 1, y: 2 });
  assert.deepEqual(cells[1], { x: 2, y: 2 });
  assert.deepEqual(cells[4], { x: 2, y: 3 });
  assert.deepEqual(cells[8], { x: 3, y: 4 });
});

test('placeEye is a pure function of cell and time', () => {
  fc.assert(
    fc.property(cellArb, timeArb, (cell, time) => {
      assert.deepEqual(placeEye(cell, time), placeEye({ ...cell }, time));
    }),
  );
});

test('drift never exceeds the feature radius', () => {
  fc.assert(
    fc.property(cellArb, timeArb, (cell, time) => {
      const eye = placeEye(cell, time);
      return length(eye.drift) <= eye.radius;
    }),
  );
});

test('resting position sits inside the central band of the cell', () => {
  fc.assert(
    fc.property(cellArb, timeArb, (cell, time) => {
      const eye = placeEye(cell, time);
      const jitter = hash2(cell);
      const restX = eye.center.x - eye.drift.x;
      const restY = eye.center.y - eye.drift.y;
      assert.ok(Math.abs(restX - (cell.x + 0.3 + jitter.x * 0.4) / GRID_SIZE) < 1e-12);
      assert.ok(Math.abs(restY - (cell.y + 0.3 + jitter.y * 0.4) / GRID_SIZE) < 1e-12);
      assert.ok(restX * GRID_SIZE >= cell.x + 0.3 - 1e-9);
      assert.ok(restX * GRID_SIZE <= cell.x + 0.7 + 1e-9);
    }),
  );
});

test('radius stays within the configured span', () => {
  fc.assert(
    fc.property(cellArb, (cell) => {
      const eye = placeEye(cell, 0);
      return eye.radius >= 0.12 / GRID_SIZE && eye.radius < 0.24 / GRID_SIZE;
    }),
  );
});

test('a cell yields the same descriptor whichever neighbour asks for it', () => {
  const time = 4.25;
  // Pixel in cell (0, 0) sees cell (1, 1) last; pixel in cell (2, 2) sees it first.
  const fromLowerLeft = placeNeighborhood({ x: 0.5 / GRID_SIZE, y: 0.5 / GRID_SIZE }, time);
  const fromUpperRight = placeNeighborhood({ x: 2.5 / GRID_SIZE, y: 2.5 / GRID_SIZE }, time);
  assert.deepEqual(fromLowerLeft[8].identity, { x: 1, y: 1 });
  assert.deepEqual(fromUpperRight[0].identity, { x: 1, y: 1 });
  assert.deepEqual(fromLowerLeft[8], fromUpperRight[0]);
});
