import { basename } from 'node:path';

import type { ImageDataLike } from '../../fields/contracts.js';
import { runCommand } from './exec.js';

export type MediaTools = {
  ffmpeg: string;
  ffprobe: string;
};

export const DEFAULT_MEDIA_TOOLS: Readonly<MediaTools> = Object.freeze({
  ffmpeg: 'ffmpeg',
  ffprobe: 'ffprobe',
});

export type ImageProbe = {
  readonly width: number;
  readonly height: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const firstStream = (payload: unknown): Record<string, unknown> | undefined => {
  if (!isRecord(payload) || !Array.isArray(payload.streams)) return undefined;
  const stream: unknown = payload.streams[0];
  return isRecord(stream) ? stream : undefined;
};

export const probeImage = async (ffprobe: string, input: string): Promise<ImageProbe> => {
  const { stdout } = await runCommand(ffprobe, [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=width,height',
    '-of',
    'json',
    input,
  ]);
  const payload: unknown = JSON.parse(stdout.toString('utf8'));
  const stream = firstStream(payload);
  const width = stream?.width;
  const height = stream?.height;
  if (typeof width !== 'number' || typeof height !== 'number') {
    throw new Error(`ffprobe failed to derive dimensions for ${basename(input)}`);
  }
  return { width, height };
};

/** Decodes the first frame of any ffmpeg-readable input into an RGBA8 image. */
export const decodeImage = async (tools: MediaTools, input: string): Promise<ImageDataLike> => {
  const { width, height } = await probeImage(tools.ffprobe, input);
  const { stdout } = await runCommand(tools.ffmpeg, [
    '-v',
    'error',
    '-i',
    input,
    '-frames:v',
    '1',
    '-f',
    'rawvideo',
    '-pix_fmt',
    'rgba',
    '-',
  ]);
  const expected = width * height * 4;
  if (stdout.byteLength !== expected) {
    throw new Error(
      `[ffmpeg] expected ${expected} bytes for ${basename(input)}, received ${stdout.byteLength}`,
    );
  }
  return {
    width,
    height,
    data: new Uint8ClampedArray(stdout.buffer, stdout.byteOffset, stdout.byteLength),
  };
};

export const encodeImage = async (
  ffmpeg: string,
  image: ImageDataLike,
  outputPath: string,
): Promise<void> => {
  const expected = image.width * image.height * 4;
  if (image.data.byteLength !== expected) {
    throw new Error(
      `[ffmpeg] encodeImage expected ${expected} bytes for ${image.width}x${image.height}, received ${image.data.byteLength}`,
    );
  }
  const input = new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  await runCommand(
    ffmpeg,
    [
      '-v',
      'error',
      '-y',
      '-f',
      'rawvideo',
      '-pix_fmt',
      'rgba',
      '-s',
      `${image.width}x${image.height}`,
      '-i',
      '-',
      '-frames:v',
      '1',
      outputPath,
    ],
    { input },
  );
};

/** Assembles numbered PNG frames (`pattern` like `frame_%05d.png`) into a video. */
export const encodeFrameSequence = async (
  ffmpeg: string,
  pattern: string,
  fps: number,
  outputPath: string,
): Promise<void> => {
  await runCommand(ffmpeg, [
    '-v',
    'error',
    '-y',
    '-framerate',
    fps.toString(),
    '-i',
    pattern,
    '-pix_fmt',
    'yuv420p',
    outputPath,
  ]);
};
