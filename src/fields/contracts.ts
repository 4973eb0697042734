export type PixelBytes = Uint8ClampedArray | Uint8Array;

/** Row-major RGBA8 image, four bytes per texel. */
export type ImageDataLike = {
  width: number;
  height: number;
  data: PixelBytes;
};

export type FieldResolution = {
  width: number;
  height: number;
  texels: number;
};

export class DreamPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DreamPreconditionError';
  }
}

const isPositiveDimension = (value: number) => Number.isFinite(value) && value > 0;

export const makeResolution = (width: number, height: number): FieldResolution => ({
  width,
  height,
  texels: width * height,
});

/**
 * Width over height. A zero height would make every aspect-corrected distance meaningless, so it
 * is rejected rather than propagated as Infinity.
 */
export const computeAspectRatio = (width: number, height: number): number => {
  if (!isPositiveDimension(height)) {
    throw new DreamPreconditionError(`[dream] image height must be positive (received ${height})`);
  }
  if (!isPositiveDimension(width)) {
    throw new DreamPreconditionError(`[dream] image width must be positive (received ${width})`);
  }
  return width / height;
};

export const assertImageShape = (image: ImageDataLike, label = 'image') => {
  computeAspectRatio(image.width, image.height);
  const expected = image.width * image.height * 4;
  if (image.data.length !== expected) {
    throw new DreamPreconditionError(
      `[dream] ${label} buffer length ${image.data.length} does not match ${expected} (${image.width}×${image.height} RGBA)`,
    );
  }
};

/** Solid-color image; `gray` is a normalized level, written to R, G and B with opaque alpha. */
export const createUniformImage = (width: number, height: number, gray = 0.5): ImageDataLike => {
  const resolution = makeResolution(width, height);
  const data = new Uint8ClampedArray(resolution.texels * 4);
  const level = Math.round(Math.max(0, Math.min(1, gray)) * 255);
  for (let i = 0; i < resolution.texels; i++) {
    const base = i * 4;
    data[base] = level;
    data[base + 1] = level;
    data[base + 2] = level;
    data[base + 3] = 255;
  }
  return { width, height, data };
};
