import { composeDreamPixel, type ComposeOptions } from '../dream/compositor.js';
import {
  assertImageShape,
  computeAspectRatio,
  makeResolution,
  type FieldResolution,
  type ImageDataLike,
} from '../fields/contracts.js';
import type { DreamSettings } from '../settings/dreamSettings.js';

export type DreamFrameInput = {
  source: ImageDataLike;
  settings: DreamSettings;
  /** Output size; defaults to the source size. The source is resampled when they differ. */
  width?: number;
  height?: number;
  out?: Uint8ClampedArray;
  tileHeight?: number;
  options?: ComposeOptions;
  /** Per-texel layer values, written alongside the color output when provided. */
  layers?: DreamLayerBuffers;
};

export type DreamLayerBuffers = {
  eyeAlpha: Float32Array;
  swirl: Float32Array;
};

export type DreamFrameMetrics = {
  /** Fraction of pixels showing any eye. */
  eyeCoverage: number;
  /** Fraction of pixels touched by a tendril or ring. */
  swirlCoverage: number;
  meanLuma: number;
  bypassed: boolean;
};

export type DreamFrameResult = {
  out: Uint8ClampedArray;
  resolution: FieldResolution;
  metrics: DreamFrameMetrics;
};

export type DreamTileAccumulator = {
  eyePixels: number;
  swirlPixels: number;
  lumaSum: number;
  bypassed: boolean;
};

const DEFAULT_TILE_HEIGHT = 64;

const toByte = (value: number) => Math.round(Math.max(0, Math.min(1, value)) * 255);

export const createTileAccumulator = (): DreamTileAccumulator => ({
  eyePixels: 0,
  swirlPixels: 0,
  lumaSum: 0,
  bypassed: false,
});

/**
 * Renders rows [rowStart, rowEnd) into `out`. Each pixel depends only on its own coordinate, so
 * tiles may run in any order (or on separate workers) and still produce the same frame.
 */
export const renderDreamTile = (
  input: DreamFrameInput,
  resolution: FieldResolution,
  out: Uint8ClampedArray,
  rowStart: number,
  rowEnd: number,
  accumulator: DreamTileAccumulator = createTileAccumulator(),
): DreamTileAccumulator => {
  const { width, height } = resolution;
  const start = Math.max(0, Math.floor(rowStart));
  const end = Math.min(height, Math.floor(rowEnd));
  const options: ComposeOptions = { ...input.options, aspect: computeAspectRatio(width, height) };
  const layers = input.layers;
  for (let y = start; y < end; y++) {
    const v = (y + 0.5) / height;
    for (let x = 0; x < width; x++) {
      const pixel = composeDreamPixel(
        input.source,
        { x: (x + 0.5) / width, y: v },
        input.settings,
        options,
      );
      const texel = y * width + x;
      const index = texel * 4;
      const r = toByte(pixel.color.r);
      const g = toByte(pixel.color.g);
      const b = toByte(pixel.color.b);
      out[index] = r;
      out[index + 1] = g;
      out[index + 2] = b;
      out[index + 3] = 255;
      if (layers) {
        layers.eyeAlpha[texel] = pixel.eyeAlpha;
        layers.swirl[texel] = pixel.swirl;
      }
      if (pixel.eyeAlpha > 0) accumulator.eyePixels += 1;
      if (pixel.swirl > 0) accumulator.swirlPixels += 1;
      accumulator.lumaSum += (0.2126 * r + 0.7152 * g + 0.0722 * b) / 255;
      accumulator.bypassed = pixel.bypassed;
    }
  }
  return accumulator;
};

export const renderDreamFrame = (input: DreamFrameInput): DreamFrameResult => {
  assertImageShape(input.source, 'source');
  const resolution = makeResolution(
    input.width ?? input.source.width,
    input.height ?? input.source.height,
  );
  const expected = resolution.texels * 4;
  const out = input.out ?? new Uint8ClampedArray(expected);
  if (out.length !== expected) {
    throw new Error(`[frame] output buffer length ${out.length} does not match ${expected}`);
  }
  if (
    input.layers &&
    (input.layers.eyeAlpha.length !== resolution.texels ||
      input.layers.swirl.length !== resolution.texels)
  ) {
    throw new Error(`[frame] layer buffers must hold ${resolution.texels} texels`);
  }

  const tileHeight = Math.max(1, Math.floor(input.tileHeight ?? DEFAULT_TILE_HEIGHT));
  const accumulator = createTileAccumulator();
  for (let row = 0; row < resolution.height; row += tileHeight) {
    renderDreamTile(input, resolution, out, row, row + tileHeight, accumulator);
  }

  const texels = Math.max(1, resolution.texels);
  return {
    out,
    resolution,
    metrics: {
      eyeCoverage: accumulator.eyePixels / texels,
      swirlCoverage: accumulator.swirlPixels / texels,
      meanLuma: accumulator.lumaSum / texels,
      bypassed: accumulator.bypassed,
    },
  };
};
