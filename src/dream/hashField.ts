import { fract, type Vec2 } from './math.js';

const HASH_SCALE = 43758.5453;

/**
 * Two-channel cell hash. Each channel folds a different dot product through `sin` and keeps the
 * fractional part, so neighbouring integer inputs land far apart in [0, 1).
 */
export const hash2 = (p: Vec2): Vec2 => {
  const qx = p.x * 127.1 + p.y * 311.7;
  const qy = p.x * 269.5 + p.y * 183.3;
  return {
    x: fract(Math.sin(qx) * HASH_SCALE),
    y: fract(Math.sin(qy) * HASH_SCALE),
  };
};

export const hash1 = (p: Vec2): number => fract(Math.sin(p.x * 12.9898 + p.y * 78.233) * HASH_SCALE);

/** `hash1` of a cell shifted by a fixed salt; separate salts give independent per-cell streams. */
export const saltedHash1 = (cell: Vec2, saltX: number, saltY: number): number =>
  hash1({ x: cell.x + saltX, y: cell.y + saltY });
