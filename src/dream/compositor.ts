import { computeAspectRatio, type ImageDataLike } from '../fields/contracts.js';
import { sampleSource } from '../pipeline/sampling.js';
import type { DreamSettings } from '../settings/dreamSettings.js';
import { applyWarmTint, sampleChromaticAberration } from './colorEffects.js';
import { evaluateEyePattern } from './eyePattern.js';
import { mixRgb, smoothstep, type Rgb, type Rgba, type Vec2 } from './math.js';
import { evaluateSwirlPattern, type SwirlDampening } from './swirlPattern.js';

export const BYPASS_THRESHOLD = 0.001;

const PATTERN_CAP = 0.7;
const SWIRL_ACCENT: Rgb = { r: 1.0, g: 0.72, b: 0.18 };

export type DreamActivation = {
  aberration: number;
  tint: number;
  swirl: number;
  eyes: number;
};

export type ComposeOptions = {
  swirlDampening?: SwirlDampening;
  /**
   * Width over height of the surface the pixel lands on. Defaults to the source image's ratio;
   * pass the output's ratio when the source is resampled to a different size.
   */
  aspect?: number;
};

export type DreamPixel = {
  color: Rgba;
  eyeAlpha: number;
  swirl: number;
  bypassed: boolean;
};

/** Each layer ramps in over its own slice of the global intensity, so effects arrive in turn. */
export const computeActivation = (intensity: number): DreamActivation => ({
  aberration: smoothstep(0.0, 0.5, intensity),
  tint: smoothstep(0.1, 0.6, intensity),
  swirl: smoothstep(0.3, 0.8, intensity) * PATTERN_CAP,
  eyes: smoothstep(0.5, 1.0, intensity) * PATTERN_CAP,
});

export const composeDreamPixel = (
  image: ImageDataLike,
  uv: Vec2,
  settings: DreamSettings,
  options: ComposeOptions = {},
): DreamPixel => {
  const sourceAspect = computeAspectRatio(image.width, image.height);
  const aspect = options.aspect ?? sourceAspect;
  if (settings.intensity < BYPASS_THRESHOLD) {
    return { color: sampleSource(image, uv), eyeAlpha: 0, swirl: 0, bypassed: true };
  }

  const activation = computeActivation(settings.intensity);
  const aberrated = sampleChromaticAberration(image, uv, activation.aberration);
  const tinted = applyWarmTint(aberrated, activation.tint);

  const swirl = evaluateSwirlPattern(
    uv,
    aspect,
    settings.time,
    activation.swirl,
    options.swirlDampening,
  );
  const lit: Rgb = {
    r: tinted.r + SWIRL_ACCENT.r * swirl,
    g: tinted.g + SWIRL_ACCENT.g * swirl,
    b: tinted.b + SWIRL_ACCENT.b * swirl,
  };

  const eye = evaluateEyePattern(uv, aspect, settings.time, activation.eyes);
  const blended = mixRgb(lit, eye.color, eye.alpha);
  return {
    color: { ...blended, a: 1 },
    eyeAlpha: eye.alpha,
    swirl,
    bypassed: false,
  };
};

export const evaluateDreamPixel = (
  image: ImageDataLike,
  uv: Vec2,
  settings: DreamSettings,
  options: ComposeOptions = {},
): Rgba => composeDreamPixel(image, uv, settings, options).color;
