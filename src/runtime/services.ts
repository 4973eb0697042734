import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import {
  DEFAULT_MEDIA_TOOLS,
  decodeImage,
  encodeFrameSequence,
  encodeImage,
  type MediaTools,
} from '../cli/utils/ffmpeg.js';
import { loadDreamConfigFromFile, type ConfigValidationIssue } from '../config/loader.js';
import { createDreamRenderConfig, type DreamRenderConfig } from '../config/renderConfig.js';
import { placeEye, type EyeDescriptor } from '../dream/gridPlacement.js';
import { armCount, curlRate, SWIRL_REACH } from '../dream/swirlPattern.js';
import { irisBaseColor } from '../dream/eyePattern.js';
import { createUniformImage, type ImageDataLike } from '../fields/contracts.js';
import { renderDreamFrame, type DreamFrameMetrics } from '../pipeline/dreamFrame.js';
import { digestFrame, type FrameDigest } from '../serialization/frameDigest.js';
import { advanceTime, createDreamSettings, type DreamSettings } from '../settings/dreamSettings.js';
import {
  isAlertLevel,
  resetIntensityRamp,
  stepIntensityRamp,
  type IntensityRampState,
} from '../settings/intensityRamp.js';
import type { TelemetryPublisher } from '../telemetry/publisher.js';
import { FrameBudgetMonitor, type FrameBudget, type FrameBudgetSnapshot } from './frameBudget.js';

export type SyntheticSource = {
  width: number;
  height: number;
  gray: number;
};

export type SourceSpec = { kind: 'file'; path: string } | ({ kind: 'synthetic' } & SyntheticSource);

export type RuntimeConfigResult = {
  config: DreamRenderConfig;
  issues: ConfigValidationIssue[];
  configPath?: string;
};

export const resolveRuntimeConfig = async (configPath?: string): Promise<RuntimeConfigResult> => {
  if (!configPath) {
    return { config: createDreamRenderConfig(), issues: [] };
  }
  const result = await loadDreamConfigFromFile(resolve(process.cwd(), configPath));
  if (result.kind === 'error') {
    const details = (result.issues ?? [])
      .map((issue) => `  • ${issue.message} (${issue.code} @ ${issue.path.join('.') || '<root>'})`)
      .join('\n');
    throw new Error(details ? `${result.message}\n${details}` : result.message);
  }
  return { config: result.config, issues: result.issues, configPath };
};

export const loadSource = async (
  source: SourceSpec,
  tools: MediaTools = DEFAULT_MEDIA_TOOLS,
): Promise<ImageDataLike> => {
  if (source.kind === 'synthetic') {
    return createUniformImage(source.width, source.height, source.gray);
  }
  return decodeImage(tools, resolve(process.cwd(), source.path));
};

/** Parses `256x128` (or `256×128`) into positive integer dimensions. */
export const parseDimensions = (text: string): { width: number; height: number } => {
  const match = /^(\d+)\s*[x×]\s*(\d+)$/i.exec(text.trim());
  if (!match) {
    throw new Error(`Invalid dimensions "${text}"; expected WIDTHxHEIGHT`);
  }
  const width = Number.parseInt(match[1], 10);
  const height = Number.parseInt(match[2], 10);
  if (width <= 0 || height <= 0) {
    throw new Error(`Dimensions must be positive (received ${width}x${height})`);
  }
  return { width, height };
};

export type RenderImageOptions = {
  source: SourceSpec;
  output?: string;
  config: DreamRenderConfig;
  tools?: MediaTools;
};

export type RenderImageSummary = {
  output?: string;
  width: number;
  height: number;
  settings: { intensity: number; time: number };
  metrics: DreamFrameMetrics;
  digest: FrameDigest;
  frameMs: number;
};

export const renderImage = async (options: RenderImageOptions): Promise<RenderImageSummary> => {
  const tools = options.tools ?? DEFAULT_MEDIA_TOOLS;
  const source = await loadSource(options.source, tools);
  const settings = createDreamSettings({
    intensity: options.config.intensity,
    time: options.config.time,
  });
  const monitor = new FrameBudgetMonitor({}, { label: 'render' });
  monitor.beginFrame(0);
  const frame = renderDreamFrame({
    source,
    settings,
    tileHeight: options.config.tileHeight,
    options: { swirlDampening: options.config.swirlDampening },
  });
  const sample = monitor.endFrame(frame.resolution.texels);

  let output: string | undefined;
  if (options.output) {
    output = resolve(process.cwd(), options.output);
    await encodeImage(
      tools.ffmpeg,
      { width: frame.resolution.width, height: frame.resolution.height, data: frame.out },
      output,
    );
  }

  return {
    output,
    width: frame.resolution.width,
    height: frame.resolution.height,
    settings: { intensity: settings.intensity, time: settings.time },
    metrics: frame.metrics,
    digest: digestFrame(frame.out, frame.resolution, settings),
    frameMs: sample.frameMs,
  };
};

export type SequenceFrameRecord = {
  frameIndex: number;
  intensity: number;
  time: number;
  alert: boolean;
  eyeCoverage: number;
  swirlCoverage: number;
  digest: string;
};

export type RenderSequenceOptions = {
  source: SourceSpec;
  config: DreamRenderConfig;
  frames: number;
  fps: number;
  /** Drive intensity with the ramp instead of holding `config.intensity`. */
  ramp?: boolean;
  boosted?: boolean;
  /** Rotation events injected at the given frame indices. */
  rotationFrames?: readonly number[];
  outputDir?: string;
  video?: string;
  budget?: FrameBudget;
  telemetry?: TelemetryPublisher;
  tools?: MediaTools;
  onFrame?: (record: SequenceFrameRecord) => void;
};

export type RenderSequenceSummary = {
  frames: SequenceFrameRecord[];
  performance: FrameBudgetSnapshot;
  outputDir?: string;
  video?: string;
};

const FRAME_PATTERN = 'frame_%05d.png';

const frameFileName = (index: number) => `frame_${index.toString().padStart(5, '0')}.png`;

export const renderSequence = async (
  options: RenderSequenceOptions,
): Promise<RenderSequenceSummary> => {
  const tools = options.tools ?? DEFAULT_MEDIA_TOOLS;
  const source = await loadSource(options.source, tools);
  const frameCount = Math.max(1, Math.floor(options.frames));
  const dt = 1 / Math.max(1, options.fps);
  const outputDir = options.outputDir ? resolve(process.cwd(), options.outputDir) : undefined;
  if (outputDir) {
    await mkdir(outputDir, { recursive: true });
  }
  if (options.video && !outputDir) {
    throw new Error('[sequence] a video output needs an output directory for its frames');
  }

  const rotationFrames = new Set(options.rotationFrames ?? []);
  const monitor = new FrameBudgetMonitor(options.budget ?? {}, { label: 'sequence' });
  let settings: DreamSettings = createDreamSettings({
    intensity: options.ramp ? 0 : options.config.intensity,
    time: options.config.time,
  });
  let ramp: IntensityRampState = { ...resetIntensityRamp(), intensity: settings.intensity };
  const records: SequenceFrameRecord[] = [];

  for (let frameIndex = 0; frameIndex < frameCount; frameIndex++) {
    if (frameIndex > 0) {
      settings = advanceTime(settings, options.config.time + frameIndex * dt);
    }
    if (options.ramp) {
      // Frame 0 takes no time step but still receives its rotation bump.
      ramp = stepIntensityRamp(
        ramp,
        {
          dt: frameIndex > 0 ? dt : 0,
          boosted: options.boosted,
          rotations: rotationFrames.has(frameIndex) ? 1 : 0,
        },
        options.config.ramp,
      );
      settings = { ...settings, intensity: ramp.intensity };
    }

    monitor.beginFrame(frameIndex);
    const frame = renderDreamFrame({
      source,
      settings,
      tileHeight: options.config.tileHeight,
      options: { swirlDampening: options.config.swirlDampening },
    });
    const sample = monitor.endFrame(frame.resolution.texels);
    const digest = digestFrame(frame.out, frame.resolution, settings);

    if (outputDir) {
      await encodeImage(
        tools.ffmpeg,
        { width: frame.resolution.width, height: frame.resolution.height, data: frame.out },
        join(outputDir, frameFileName(frameIndex)),
      );
    }

    const record: SequenceFrameRecord = {
      frameIndex,
      intensity: settings.intensity,
      time: settings.time,
      alert: isAlertLevel(settings.intensity, options.config.ramp),
      eyeCoverage: frame.metrics.eyeCoverage,
      swirlCoverage: frame.metrics.swirlCoverage,
      digest: digest.frame,
    };
    records.push(record);
    options.telemetry?.publishFrame({
      sample,
      metrics: frame.metrics,
      intensity: settings.intensity,
      time: settings.time,
      digest: digest.frame,
    });
    options.onFrame?.(record);
  }

  let video: string | undefined;
  if (options.video && outputDir) {
    video = resolve(process.cwd(), options.video);
    await encodeFrameSequence(tools.ffmpeg, join(outputDir, FRAME_PATTERN), options.fps, video);
  }

  return { frames: records, performance: monitor.snapshot(), outputDir, video };
};

export type CellReport = {
  descriptor: EyeDescriptor;
  reach: number;
  curlRate: number;
  armCount: number;
  irisColor: { r: number; g: number; b: number };
};

export const inspectCell = (cellX: number, cellY: number, time: number): CellReport => {
  const descriptor = placeEye({ x: Math.floor(cellX), y: Math.floor(cellY) }, time);
  return {
    descriptor,
    reach: descriptor.radius * SWIRL_REACH,
    curlRate: curlRate(descriptor),
    armCount: armCount(descriptor),
    irisColor: irisBaseColor(descriptor),
  };
};
