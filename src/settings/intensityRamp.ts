export type IntensityRampConfig = {
  /** Intensity gained per second. */
  baseRate: number;
  /** Rate multiplier while the ramp is boosted. */
  boostMultiplier: number;
  /** Flat increase per pending rotation event. */
  rotationBump: number;
  /** Intensity at which the ramp reports the alert level. */
  alertThreshold: number;
};

export type IntensityRampState = {
  readonly intensity: number;
  readonly pendingRotations: number;
};

export type IntensityRampStep = {
  dt: number;
  boosted?: boolean;
  rotations?: number;
};

export const DEFAULT_INTENSITY_RAMP: Readonly<IntensityRampConfig> = Object.freeze({
  baseRate: 0.005,
  boostMultiplier: 2,
  rotationBump: 0.03,
  alertThreshold: 0.7,
});

export const resetIntensityRamp = (): IntensityRampState => ({ intensity: 0, pendingRotations: 0 });

export const queueRotations = (state: IntensityRampState, count: number): IntensityRampState => ({
  ...state,
  pendingRotations: state.pendingRotations + Math.max(0, Math.floor(count)),
});

/**
 * Advances the ramp by one tick. Queued and passed-in rotations are consumed in the same tick,
 * and the result never exceeds 1.
 */
export const stepIntensityRamp = (
  state: IntensityRampState,
  step: IntensityRampStep,
  config: IntensityRampConfig = DEFAULT_INTENSITY_RAMP,
): IntensityRampState => {
  const dt = Number.isFinite(step.dt) ? Math.max(0, step.dt) : 0;
  const rate = step.boosted ? config.baseRate * config.boostMultiplier : config.baseRate;
  const rotations = state.pendingRotations + Math.max(0, Math.floor(step.rotations ?? 0));
  let intensity = state.intensity + rate * dt;
  if (rotations > 0) {
    intensity += config.rotationBump * rotations;
  }
  return { intensity: Math.min(1, intensity), pendingRotations: 0 };
};

export const isAlertLevel = (
  intensity: number,
  config: IntensityRampConfig = DEFAULT_INTENSITY_RAMP,
) => intensity >= config.alertThreshold;
