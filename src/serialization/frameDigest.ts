import { createHash } from 'blake3-wasm';

import type { FieldResolution } from '../fields/contracts.js';
import { dreamSettingsToJSON, type DreamSettings } from '../settings/dreamSettings.js';

const textEncoder = new TextEncoder();

const bytesToHex = (bytes: Uint8Array): string => {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += bytes[i].toString(16).padStart(2, '0');
  }
  return result;
};

export type FrameDigest = {
  /** BLAKE3 of the RGBA bytes only. */
  pixels: string;
  /** BLAKE3 of the header (size + settings) followed by the RGBA bytes. */
  frame: string;
};

export const digestBytes = (bytes: Uint8Array): string =>
  bytesToHex(createHash().update(bytes).digest());

/** Key order is fixed so the header text is stable across runs. */
export const frameHeader = (resolution: FieldResolution, settings: DreamSettings): string => {
  const { intensity, time } = dreamSettingsToJSON(settings);
  return JSON.stringify({
    width: resolution.width,
    height: resolution.height,
    intensity,
    time,
  });
};

export const digestFrame = (
  pixels: Uint8Array | Uint8ClampedArray,
  resolution: FieldResolution,
  settings: DreamSettings,
): FrameDigest => {
  const view = new Uint8Array(pixels.buffer, pixels.byteOffset, pixels.byteLength);
  const header = textEncoder.encode(frameHeader(resolution, settings));
  const frame = createHash().update(header).update(view).digest();
  return {
    pixels: digestBytes(view),
    frame: bytesToHex(frame),
  };
};
