import type { ImageDataLike } from '../fields/contracts.js';
import { sampleSource } from '../pipeline/sampling.js';
import { mixRgb, type Rgb, type Rgba, type Vec2 } from './math.js';

export const ABERRATION_SCALE = 0.012;

const WARM_TINT: Rgb = { r: 1.0, g: 0.85, b: 0.35 };
const TINT_MIX = 0.35;
const WARM_UP = { r: 0.1, g: 0.05, b: -0.1 } as const;

/**
 * Lens-style channel dispersion: red is pulled outward along the ray from the image center,
 * blue inward, green stays put. The offset grows with distance from the center.
 */
export const sampleChromaticAberration = (
  image: ImageDataLike,
  uv: Vec2,
  intensity: number,
): Rgba => {
  const scale = intensity * ABERRATION_SCALE;
  const offsetX = (uv.x - 0.5) * scale;
  const offsetY = (uv.y - 0.5) * scale;
  const center = sampleSource(image, uv);
  const red = sampleSource(image, { x: uv.x + offsetX, y: uv.y + offsetY });
  const blue = sampleSource(image, { x: uv.x - offsetX, y: uv.y - offsetY });
  return { r: red.r, g: center.g, b: blue.b, a: center.a };
};

export const applyWarmTint = (color: Rgb, intensity: number): Rgb => {
  const warmed: Rgb = {
    r: color.r * (1 + WARM_UP.r * intensity),
    g: color.g * (1 + WARM_UP.g * intensity),
    b: color.b * (1 + WARM_UP.b * intensity),
  };
  return mixRgb(warmed, WARM_TINT, intensity * TINT_MIX);
};
