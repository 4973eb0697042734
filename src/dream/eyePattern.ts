import { cellOf, NEIGHBOR_OFFSETS, placeEye, type EyeDescriptor } from './gridPlacement.js';
import { saltedHash1 } from './hashField.js';
import {
  aspectOffset,
  length,
  mixRgb,
  mixScalar,
  scaleRgb,
  smoothstep,
  type Rgb,
  type Vec2,
} from './math.js';

export const EYE_EDGE_BAND = 0.002;
export const EYE_DAMPENING = 0.2;

const INNER_RATIO = 0.5;
const PUPIL_BASE = 0.55;
const PUPIL_PULSE = 0.15;
const PUPIL_RATE = 2.3;
const RING_SHADE = 0.6;

const IRIS_A: Rgb = { r: 0.28, g: 0.62, b: 0.55 };
const IRIS_B: Rgb = { r: 0.78, g: 0.46, b: 0.12 };
const PUPIL_COLOR: Rgb = { r: 0.03, g: 0.02, b: 0.04 };

export type EyeSample = {
  color: Rgb;
  alpha: number;
};

export const EMPTY_EYE: Readonly<EyeSample> = Object.freeze({
  color: Object.freeze({ r: 0, g: 0, b: 0 }),
  alpha: 0,
});

export const irisBaseColor = (descriptor: EyeDescriptor): Rgb =>
  mixRgb(IRIS_A, IRIS_B, saltedHash1(descriptor.identity, 41, 7));

export const pupilRadius = (descriptor: EyeDescriptor, time: number) =>
  descriptor.radius *
  INNER_RATIO *
  (PUPIL_BASE + PUPIL_PULSE * Math.sin(time * PUPIL_RATE + descriptor.phase));

/**
 * Shades one candidate eye at `point`. Returns null when the point lies outside the outer iris
 * radius, which is how the neighbourhood scan skips cells that cannot contribute.
 */
export const shadeEye = (
  point: Vec2,
  aspect: number,
  descriptor: EyeDescriptor,
  time: number,
): EyeSample | null => {
  const outer = descriptor.radius;
  const distance = length(aspectOffset(point, descriptor.center, aspect));
  if (distance >= outer) {
    return null;
  }

  const inner = outer * INNER_RATIO;
  const outerEdge = 1 - smoothstep(outer - EYE_EDGE_BAND, outer, distance);
  const irisMask = smoothstep(inner - EYE_EDGE_BAND, inner, distance) * outerEdge;

  const pupil = pupilRadius(descriptor, time);
  const pupilMask = 1 - smoothstep(pupil - EYE_EDGE_BAND, pupil, distance);

  const ring = scaleRgb(irisBaseColor(descriptor), mixScalar(RING_SHADE, 1, irisMask));
  return {
    color: mixRgb(ring, PUPIL_COLOR, pupilMask),
    alpha: outerEdge,
  };
};

/**
 * Winner-take-all over the 3×3 neighbourhood: only the candidate with the highest alpha is kept,
 * and on equal alpha the earlier cell in scan order stays. The winner's alpha is scaled by
 * `intensity` and the fixed dampening factor.
 */
export const evaluateEyePattern = (
  point: Vec2,
  aspect: number,
  time: number,
  intensity: number,
): EyeSample => {
  const home = cellOf(point);
  let best: EyeSample | null = null;
  for (const offset of NEIGHBOR_OFFSETS) {
    const descriptor = placeEye({ x: home.x + offset.x, y: home.y + offset.y }, time);
    const candidate = shadeEye(point, aspect, descriptor, time);
    if (candidate && (!best || candidate.alpha > best.alpha)) {
      best = candidate;
    }
  }
  if (!best) {
    return { color: { ...EMPTY_EYE.color }, alpha: 0 };
  }
  return {
    color: best.color,
    alpha: best.alpha * intensity * EYE_DAMPENING,
  };
};
