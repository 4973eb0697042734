import { hash1, hash2, saltedHash1 } from './hashField.js';
import { TAU, type Vec2 } from './math.js';

export const GRID_SIZE = 7;

const BASE_OFFSET = 0.3;
const JITTER_SPAN = 0.4;
const RADIUS_MIN = 0.12;
const RADIUS_SPAN = 0.12;
const DRIFT_SCALE = 0.7;
const DRIFT_FREQ_X = 0.7;
const DRIFT_FREQ_Y = 1.1;

export type GridCell = {
  readonly x: number;
  readonly y: number;
};

/**
 * Procedural feature anchored to one grid cell. All lengths are in normalized image units,
 * measured along y (x distances are multiplied by the aspect ratio before comparison).
 */
export type EyeDescriptor = {
  readonly identity: GridCell;
  readonly center: Vec2;
  readonly radius: number;
  /** Offset from the resting position; never longer than `radius`. */
  readonly drift: Vec2;
  /** Per-cell phase in [0, 2π), shared by the drift and pupil oscillators. */
  readonly phase: number;
};

/** Scan order used by every neighbourhood walk: rows -1..1, columns -1..1 within a row. */
export const NEIGHBOR_OFFSETS: readonly GridCell[] = Object.freeze([
  { x: -1, y: -1 },
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: -1, y: 0 },
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: -1, y: 1 },
  { x: 0, y: 1 },
  { x: 1, y: 1 },
]);

export const cellOf = (coordinate: Vec2): GridCell => ({
  x: Math.floor(coordinate.x * GRID_SIZE),
  y: Math.floor(coordinate.y * GRID_SIZE),
});

export const neighborhood = (home: GridCell): GridCell[] =>
  NEIGHBOR_OFFSETS.map((offset) => ({ x: home.x + offset.x, y: home.y + offset.y }));

export const cellPhase = (cell: GridCell): number => saltedHash1(cell, 17, 31) * TAU;

export const computeDrift = (radius: number, phase: number, time: number): Vec2 => ({
  x: radius * DRIFT_SCALE * Math.sin(time * DRIFT_FREQ_X + phase),
  y: radius * DRIFT_SCALE * Math.cos(time * DRIFT_FREQ_Y + phase),
});

export const placeEye = (cell: GridCell, time: number): EyeDescriptor => {
  const jitter = hash2(cell);
  const radius = (RADIUS_MIN + RADIUS_SPAN * hash1(cell)) / GRID_SIZE;
  const phase = cellPhase(cell);
  const drift = computeDrift(radius, phase, time);
  return {
    identity: { x: cell.x, y: cell.y },
    center: {
      x: (cell.x + BASE_OFFSET + jitter.x * JITTER_SPAN) / GRID_SIZE + drift.x,
      y: (cell.y + BASE_OFFSET + jitter.y * JITTER_SPAN) / GRID_SIZE + drift.y,
    },
    radius,
    drift,
    phase,
  };
};

export const placeNeighborhood = (coordinate: Vec2, time: number): EyeDescriptor[] =>
  neighborhood(cellOf(coordinate)).map((cell) => placeEye(cell, time));
