import { readFile } from 'node:fs/promises';

import {
  createDreamRenderConfig,
  isSwirlDampening,
  RAMP_CONFIG_BOUNDS,
  RENDER_CONFIG_BOUNDS,
  type DreamRenderConfig,
  type DreamRenderConfigInit,
} from './renderConfig.js';
import type { IntensityRampConfig } from '../settings/intensityRamp.js';

export interface ConfigValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly string[];
  readonly severity: 'error' | 'warning';
}

export type ConfigLoadResult =
  | {
      readonly kind: 'success';
      readonly config: DreamRenderConfig;
      readonly issues: ConfigValidationIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: ConfigValidationIssue[] | undefined;
      readonly sourceName?: string;
    };

const SCALAR_KEYS = ['intensity', 'time', 'tileHeight'] as const satisfies ReadonlyArray<
  keyof typeof RENDER_CONFIG_BOUNDS
>;
const RAMP_KEYS = [
  'baseRate',
  'boostMultiplier',
  'rotationBump',
  'alertThreshold',
] as const satisfies ReadonlyArray<keyof IntensityRampConfig>;
const KNOWN_ROOT_KEYS = new Set<string>([...SCALAR_KEYS, 'swirlDampening', 'ramp']);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const pushIssue = (
  issues: ConfigValidationIssue[],
  code: string,
  message: string,
  path: string[],
  severity: ConfigValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const readBoundedNumber = (
  issues: ConfigValidationIssue[],
  source: Record<string, unknown>,
  key: string,
  bounds: { min: number; max: number },
  path: string[],
): number | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    pushIssue(issues, 'config/type', `"${key}" must be a finite number`, [...path, key]);
    return undefined;
  }
  if (value < bounds.min || value > bounds.max) {
    pushIssue(
      issues,
      'config/range',
      `"${key}" = ${value} is outside [${bounds.min}, ${bounds.max}] and will be clamped`,
      [...path, key],
      'warning',
    );
  }
  return value;
};

export const validateDreamConfig = (
  payload: unknown,
): { init: DreamRenderConfigInit; issues: ConfigValidationIssue[] } => {
  const issues: ConfigValidationIssue[] = [];
  const init: DreamRenderConfigInit = {};
  if (!isRecord(payload)) {
    pushIssue(issues, 'config/root', 'Config root must be an object', []);
    return { init, issues };
  }

  for (const key of Object.keys(payload)) {
    if (!KNOWN_ROOT_KEYS.has(key)) {
      pushIssue(issues, 'config/unknown-key', `Unknown key "${key}" ignored`, [key], 'warning');
    }
  }

  for (const key of SCALAR_KEYS) {
    const value = readBoundedNumber(issues, payload, key, RENDER_CONFIG_BOUNDS[key], []);
    if (value !== undefined) {
      init[key] = value;
    }
  }

  const dampening = payload.swirlDampening;
  if (dampening !== undefined) {
    if (isSwirlDampening(dampening)) {
      init.swirlDampening = dampening;
    } else {
      pushIssue(
        issues,
        'config/enum',
        `"swirlDampening" must be "repeated" or "single"`,
        ['swirlDampening'],
      );
    }
  }

  const ramp = payload.ramp;
  if (ramp !== undefined) {
    if (!isRecord(ramp)) {
      pushIssue(issues, 'config/type', '"ramp" must be an object', ['ramp']);
    } else {
      const rampInit: Partial<IntensityRampConfig> = {};
      for (const key of RAMP_KEYS) {
        const value = readBoundedNumber(issues, ramp, key, RAMP_CONFIG_BOUNDS[key], ['ramp']);
        if (value !== undefined) {
          rampInit[key] = value;
        }
      }
      init.ramp = rampInit;
    }
  }

  return { init, issues };
};

export const loadDreamConfigFromJson = (json: string, sourceName?: string): ConfigLoadResult => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON config',
      issues: undefined,
      sourceName,
    };
  }

  const { init, issues } = validateDreamConfig(parsed);
  if (issues.some((issue) => issue.severity === 'error')) {
    return {
      kind: 'error',
      message: `Config ${sourceName ?? '<inline>'} has ${issues.filter((issue) => issue.severity === 'error').length} error(s)`,
      issues,
      sourceName,
    };
  }
  return {
    kind: 'success',
    config: createDreamRenderConfig(init),
    issues,
    sourceName,
  };
};

export const loadDreamConfigFromFile = async (path: string): Promise<ConfigLoadResult> => {
  const json = await readFile(path, 'utf8');
  return loadDreamConfigFromJson(json, path);
};
