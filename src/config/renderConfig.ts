import { DEFAULT_INTENSITY_RAMP, type IntensityRampConfig } from '../settings/intensityRamp.js';
import { SWIRL_DAMPENING_MODES, type SwirlDampening } from '../dream/swirlPattern.js';

const clamp = (value: number, min: number, max: number) => {
  if (Number.isNaN(value)) return min;
  if (!Number.isFinite(value)) return value > 0 ? max : min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
};

export type DreamRenderConfig = {
  intensity: number;
  time: number;
  swirlDampening: SwirlDampening;
  tileHeight: number;
  ramp: IntensityRampConfig;
};

export type DreamRenderConfigInit = {
  intensity?: number;
  time?: number;
  swirlDampening?: SwirlDampening;
  tileHeight?: number;
  ramp?: Partial<IntensityRampConfig>;
};

type ScalarKey = 'intensity' | 'time' | 'tileHeight';
type RampKey = keyof IntensityRampConfig;

const INTERNAL_DEFAULT_RENDER_CONFIG: DreamRenderConfig = {
  intensity: 1,
  time: 0,
  swirlDampening: 'repeated',
  tileHeight: 64,
  ramp: { ...DEFAULT_INTENSITY_RAMP },
};

export const RENDER_CONFIG_BOUNDS: Readonly<Record<ScalarKey, { min: number; max: number }>> =
  Object.freeze({
    intensity: { min: 0, max: 1 },
    time: { min: 0, max: 86_400 },
    tileHeight: { min: 1, max: 4096 },
  });

export const RAMP_CONFIG_BOUNDS: Readonly<Record<RampKey, { min: number; max: number }>> =
  Object.freeze({
    baseRate: { min: 0, max: 1 },
    boostMultiplier: { min: 1, max: 16 },
    rotationBump: { min: 0, max: 1 },
    alertThreshold: { min: 0, max: 1 },
  });

const sanitizeScalar = (key: ScalarKey, value: number | undefined): number => {
  if (value == null) return INTERNAL_DEFAULT_RENDER_CONFIG[key];
  const bounds = RENDER_CONFIG_BOUNDS[key];
  return clamp(value, bounds.min, bounds.max);
};

const sanitizeRampValue = (key: RampKey, value: number | undefined): number => {
  if (value == null) return DEFAULT_INTENSITY_RAMP[key];
  const bounds = RAMP_CONFIG_BOUNDS[key];
  return clamp(value, bounds.min, bounds.max);
};

export const isSwirlDampening = (value: unknown): value is SwirlDampening =>
  typeof value === 'string' && SWIRL_DAMPENING_MODES.some((mode) => mode === value);

export const createDreamRenderConfig = (init?: DreamRenderConfigInit): DreamRenderConfig => {
  const dampening = init?.swirlDampening;
  return {
    intensity: sanitizeScalar('intensity', init?.intensity),
    time: sanitizeScalar('time', init?.time),
    swirlDampening: isSwirlDampening(dampening)
      ? dampening
      : INTERNAL_DEFAULT_RENDER_CONFIG.swirlDampening,
    tileHeight: Math.floor(sanitizeScalar('tileHeight', init?.tileHeight)),
    ramp: {
      baseRate: sanitizeRampValue('baseRate', init?.ramp?.baseRate),
      boostMultiplier: sanitizeRampValue('boostMultiplier', init?.ramp?.boostMultiplier),
      rotationBump: sanitizeRampValue('rotationBump', init?.ramp?.rotationBump),
      alertThreshold: sanitizeRampValue('alertThreshold', init?.ramp?.alertThreshold),
    },
  };
};

export const getDefaultRenderConfig = (): DreamRenderConfig => createDreamRenderConfig();
