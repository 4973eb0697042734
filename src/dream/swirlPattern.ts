import { cellOf, NEIGHBOR_OFFSETS, placeEye, type EyeDescriptor } from './gridPlacement.js';
import { saltedHash1 } from './hashField.js';
import { aspectOffset, length, smoothstep, type Vec2 } from './math.js';

export const SWIRL_REACH = 3;
export const SWIRL_DAMPENING = 0.2;
export const SWIRL_SHARPNESS = 8;

const CURL_MIN = 2;
const CURL_SPAN = 4;
const ARMS_MIN = 24;
const ARMS_SPAN = 9;
const ROTATION_RATE = 0.3;
const RING_WIDTH = 0.003;
const OUTER_RING_STRENGTH = 0.5;
const FADE_IN_END = 0.15;
const FADE_OUT_START = 0.6;

/**
 * How the dampening factor is applied across the neighbourhood.
 * - `repeated`: the running maximum is rescaled after every qualifying candidate, so a pixel
 *   reached by k features ends up attenuated by 0.2^k relative to its strongest line.
 * - `single`: the maximum over all candidates is rescaled once.
 */
export type SwirlDampening = 'repeated' | 'single';

export const SWIRL_DAMPENING_MODES: readonly SwirlDampening[] = ['repeated', 'single'];

export const curlRate = (descriptor: EyeDescriptor) =>
  CURL_MIN + CURL_SPAN * saltedHash1(descriptor.identity, 5.3, 9.1);

/** Integer arm count in [24, 32]; integral so the pattern is continuous across the angle seam. */
export const armCount = (descriptor: EyeDescriptor) => {
  const spread = Math.floor(ARMS_SPAN * saltedHash1(descriptor.identity, 3.7, 1.9));
  return ARMS_MIN + Math.min(ARMS_SPAN - 1, spread);
};

const ring = (distance: number, radius: number) =>
  1 - smoothstep(0, RING_WIDTH, Math.abs(distance - radius));

/**
 * Tendril strength contributed by a single feature, or null outside the open interval
 * (radius, reach) where it does not qualify.
 */
export const swirlCandidate = (
  point: Vec2,
  aspect: number,
  descriptor: EyeDescriptor,
  time: number,
): number | null => {
  const radius = descriptor.radius;
  const reach = radius * SWIRL_REACH;
  const offset = aspectOffset(point, descriptor.center, aspect);
  const distance = length(offset);
  if (distance <= radius || distance >= reach) {
    return null;
  }

  const u = (distance - radius) / (reach - radius);
  const angle = Math.atan2(offset.y, offset.x);
  const warped = angle + curlRate(descriptor) * u + time * ROTATION_RATE;
  const lines = Math.pow(Math.abs(Math.sin(warped * armCount(descriptor))), SWIRL_SHARPNESS);
  const fade = smoothstep(0, FADE_IN_END, u) * (1 - smoothstep(FADE_OUT_START, 1, u));

  const innerRing = ring(distance, radius);
  const outerRing = ring(distance, reach) * OUTER_RING_STRENGTH;
  return Math.max(lines * fade, innerRing, outerRing);
};

export const evaluateSwirlPattern = (
  point: Vec2,
  aspect: number,
  time: number,
  intensity: number,
  dampening: SwirlDampening = 'repeated',
): number => {
  const home = cellOf(point);
  let accumulated = 0;
  for (const offset of NEIGHBOR_OFFSETS) {
    const descriptor = placeEye({ x: home.x + offset.x, y: home.y + offset.y }, time);
    const candidate = swirlCandidate(point, aspect, descriptor, time);
    if (candidate === null) continue;
    accumulated = Math.max(accumulated, candidate);
    if (dampening === 'repeated') {
      accumulated *= SWIRL_DAMPENING;
    }
  }
  if (dampening === 'single') {
    accumulated *= SWIRL_DAMPENING;
  }
  return accumulated * intensity;
};
