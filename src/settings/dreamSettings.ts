const sanitizeFinite = (value: number | undefined, fallback: number) => {
  if (value == null) return fallback;
  if (Number.isNaN(value)) return fallback;
  if (!Number.isFinite(value)) return fallback;
  return value;
};

export const INTENSITY_STEP = 0.05;

/**
 * Per-frame parameters of the dream effect.
 *  - intensity: effect strength, 0 (off) to 1 (full). Not clamped here; only the stepping
 *    helpers keep it inside [0, 1].
 *  - time: elapsed seconds driving drift, pupils and tendril rotation. Never decreases.
 *  - reserved: padding that brings the uniform block to 16 bytes.
 */
export type DreamSettings = {
  readonly intensity: number;
  readonly time: number;
  readonly reserved: readonly [number, number];
};

export type DreamSettingsInit = {
  intensity?: number;
  time?: number;
};

export const DREAM_SETTINGS_DEFAULT: Readonly<DreamSettings> = Object.freeze({
  intensity: 0,
  time: 0,
  reserved: Object.freeze([0, 0] as const),
});

export const createDreamSettings = (init?: DreamSettingsInit): DreamSettings => ({
  intensity: sanitizeFinite(init?.intensity, DREAM_SETTINGS_DEFAULT.intensity),
  time: Math.max(0, sanitizeFinite(init?.time, DREAM_SETTINGS_DEFAULT.time)),
  reserved: [0, 0],
});

export type IntensityDirection = 'up' | 'down';

export const stepIntensity = (
  settings: DreamSettings,
  direction: IntensityDirection,
  step = INTENSITY_STEP,
): DreamSettings => {
  const delta = direction === 'up' ? step : -step;
  const next = Math.max(0, Math.min(1, settings.intensity + delta));
  return { ...settings, intensity: next };
};

export const advanceTime = (settings: DreamSettings, elapsedSeconds: number): DreamSettings => {
  if (!Number.isFinite(elapsedSeconds) || elapsedSeconds <= settings.time) {
    return settings;
  }
  return { ...settings, time: elapsedSeconds };
};

export const DREAM_UNIFORM_FLOATS = 4;
export const DREAM_UNIFORM_BYTES = DREAM_UNIFORM_FLOATS * 4;

/** Writes the settings as the 16-byte uniform block `{ intensity, time, _align, _align2 }`. */
export const packDreamSettings = (
  settings: DreamSettings,
  target: Float32Array = new Float32Array(DREAM_UNIFORM_FLOATS),
  offset = 0,
): Float32Array => {
  if (target.length < offset + DREAM_UNIFORM_FLOATS) {
    throw new Error(
      `[settings] uniform target has ${target.length} floats, need ${offset + DREAM_UNIFORM_FLOATS}`,
    );
  }
  target[offset] = settings.intensity;
  target[offset + 1] = settings.time;
  target[offset + 2] = settings.reserved[0];
  target[offset + 3] = settings.reserved[1];
  return target;
};

export const unpackDreamSettings = (source: Float32Array, offset = 0): DreamSettings =>
  createDreamSettings({ intensity: source[offset], time: source[offset + 1] });

export const formatIntensity = (settings: DreamSettings) =>
  `Intensity: ${settings.intensity.toFixed(2)}`;

export const dreamSettingsToJSON = (settings: DreamSettings) => ({
  intensity: settings.intensity,
  time: settings.time,
});
