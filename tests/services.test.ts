import test from 'node:test';
import assert from 'node:assert/strict';

import { createDreamRenderConfig } from '../src/config/renderConfig.js';
import { placeEye } from '../src/dream/gridPlacement.js';
import {
  inspectCell,
  parseDimensions,
  renderImage,
  renderSequence,
  resolveRuntimeConfig,
  type SourceSpec,
} from '../src/runtime/services.js';
import { TelemetryPublisher } from '../src/telemetry/publisher.js';

const synthetic: SourceSpec = { kind: 'synthetic', width: 16, height: 16, gray: 0.5 };

test('without a path the runtime config is the default', async () => {
  const result = await resolveRuntimeConfig();
  assert.deepEqual(result.config, createDreamRenderConfig());
  assert.deepEqual(result.issues, []);
  assert.equal(result.configPath, undefined);
});

test('dimensions parse from WIDTHxHEIGHT', () => {
  assert.deepEqual(parseDimensions('256x128'), { width: 256, height: 128 });
  assert.deepEqual(parseDimensions(' 64×32 '), { width: 64, height: 32 });
  assert.throws(() => parseDimensions('wide'), /Invalid dimensions "wide"/);
  assert.throws(() => parseDimensions('0x10'), /Dimensions must be positive/);
});

test('rendering a synthetic image without output only summarizes it', async () => {
  const summary = await renderImage({
    source: synthetic,
    config: createDreamRenderConfig({ intensity: 0.75, time: 2 }),
  });
  assert.equal(summary.output, undefined);
  assert.equal(summary.width, 16);
  assert.equal(summary.height, 16);
  assert.deepEqual(summary.settings, { intensity: 0.75, time: 2 });
  assert.equal(summary.metrics.bypassed, false);
  assert.match(summary.digest.frame, /^[0-9a-f]{64}$/);
});

test('sequences advance time by one frame interval per frame', async () => {
  const summary = await renderSequence({
    source: synthetic,
    config: createDreamRenderConfig({ intensity: 0.6 }),
    frames: 3,
    fps: 10,
  });
  assert.deepEqual(
    summary.frames.map((frame) => frame.time),
    [0, 0.1, 0.2],
  );
  assert.deepEqual(
    summary.frames.map((frame) => frame.intensity),
    [0.6, 0.6, 0.6],
  );
  assert.equal(summary.performance.frames, 3);
  assert.equal(new Set(summary.frames.map((frame) => frame.digest)).size, 3);
});

test('ramped sequences start at rest and take rotation bumps', async () => {
  const sent: string[] = [];
  const telemetry = new TelemetryPublisher({ send: (text) => sent.push(text), close: () => {} });
  const seen: number[] = [];
  const summary = await renderSequence({
    source: synthetic,
    config: createDreamRenderConfig(),
    frames: 3,
    fps: 10,
    ramp: true,
    rotationFrames: [1],
    telemetry,
    onFrame: (record) => seen.push(record.frameIndex),
  });
  const intensities = summary.frames.map((frame) => frame.intensity);
  assert.equal(intensities[0], 0);
  assert.ok(Math.abs(intensities[1] - 0.0305) < 1e-12);
  assert.ok(Math.abs(intensities[2] - 0.031) < 1e-12);
  assert.equal(summary.frames.some((frame) => frame.alert), false);
  assert.deepEqual(seen, [0, 1, 2]);
  assert.equal(telemetry.framesSent, 3);
  assert.equal(sent.length, 3);
});

test('a rotation on the first frame bumps that frame', async () => {
  const summary = await renderSequence({
    source: synthetic,
    config: createDreamRenderConfig(),
    frames: 2,
    fps: 10,
    ramp: true,
    rotationFrames: [0],
  });
  const intensities = summary.frames.map((frame) => frame.intensity);
  assert.ok(Math.abs(intensities[0] - 0.03) < 1e-12, `first frame ${intensities[0]}`);
  assert.ok(Math.abs(intensities[1] - 0.0305) < 1e-12, `second frame ${intensities[1]}`);
});

test('a video needs a frame directory', async () => {
  await assert.rejects(
    renderSequence({
      source: synthetic,
      config: createDreamRenderConfig(),
      frames: 1,
      fps: 10,
      video: 'out.mp4',
    }),
    /a video output needs an output directory/,
  );
});

test('cell inspection reports the placed feature and its swirl parameters', () => {
  const report = inspectCell(3, 4, 1.5);
  assert.deepEqual(report.descriptor, placeEye({ x: 3, y: 4 }, 1.5));
  assert.equal(report.reach, report.descriptor.radius * 3);
  assert.ok(report.armCount >= 24 && report.armCount <= 32);
  assert.ok(report.curlRate >= 2 && report.curlRate < 6);
});
