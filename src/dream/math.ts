export type Vec2 = {
  x: number;
  y: number;
};

export type Rgb = {
  r: number;
  g: number;
  b: number;
};

export type Rgba = Rgb & {
  a: number;
};

export const TAU = Math.PI * 2;

export const clamp = (value: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, value));

export const clamp01 = (value: number) => clamp(value, 0, 1);

export const fract = (value: number) => value - Math.floor(value);

export const mixScalar = (a: number, b: number, t: number) => a * (1 - t) + b * t;

export const mixRgb = (a: Rgb, b: Rgb, t: number): Rgb => ({
  r: mixScalar(a.r, b.r, t),
  g: mixScalar(a.g, b.g, t),
  b: mixScalar(a.b, b.b, t),
});

export const scaleRgb = (color: Rgb, factor: number): Rgb => ({
  r: color.r * factor,
  g: color.g * factor,
  b: color.b * factor,
});

/** Hermite step matching the shading-language builtin, including reversed edges. */
export const smoothstep = (edge0: number, edge1: number, x: number) => {
  const t = clamp01((x - edge0) / (edge1 - edge0));
  return t * t * (3 - 2 * t);
};

/** Offset from `center` to `point`, with x stretched by the aspect ratio so circles stay round. */
export const aspectOffset = (point: Vec2, center: Vec2, aspect: number): Vec2 => ({
  x: (point.x - center.x) * aspect,
  y: point.y - center.y,
});

export const length = (v: Vec2) => Math.sqrt(v.x * v.x + v.y * v.y);
