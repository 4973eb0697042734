import type { ImageDataLike } from '../fields/contracts.js';
import { clamp, mixScalar, type Rgba, type Vec2 } from '../dream/math.js';

const INV_255 = 1 / 255;

/**
 * Bilinear RGBA sample at a normalized coordinate with clamp-to-edge addressing. Texel centers
 * sit at (i + 0.5) / width, so sampling exactly at a center returns that texel unchanged.
 */
export const sampleSource = (image: ImageDataLike, uv: Vec2): Rgba => {
  const { width: W, height: H, data } = image;
  const xx = clamp(uv.x * W - 0.5, 0, W - 1);
  const yy = clamp(uv.y * H - 0.5, 0, H - 1);
  const x0 = Math.floor(xx);
  const y0 = Math.floor(yy);
  const x1 = Math.min(x0 + 1, W - 1);
  const y1 = Math.min(y0 + 1, H - 1);
  const fx = xx - x0;
  const fy = yy - y0;
  const i00 = (y0 * W + x0) * 4;
  const i10 = (y0 * W + x1) * 4;
  const i01 = (y1 * W + x0) * 4;
  const i11 = (y1 * W + x1) * 4;
  const channel = (offset: number) => {
    const top = mixScalar(data[i00 + offset], data[i10 + offset], fx);
    const bottom = mixScalar(data[i01 + offset], data[i11 + offset], fx);
    return mixScalar(top, bottom, fy) * INV_255;
  };
  return {
    r: channel(0),
    g: channel(1),
    b: channel(2),
    a: channel(3),
  };
};
