#!/usr/bin/env node
import { createWriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { createDreamRenderConfig, isSwirlDampening } from '../config/renderConfig.js';
import type { ConfigValidationIssue } from '../config/loader.js';
import { DEFAULT_MEDIA_TOOLS, type MediaTools } from './utils/ffmpeg.js';
import { formatCliError } from './utils/report.js';
import {
  inspectCell,
  parseDimensions,
  renderImage,
  renderSequence,
  resolveRuntimeConfig,
  type SourceSpec,
} from '../runtime/services.js';
import {
  connectTelemetrySink,
  startTelemetryCollector,
  TelemetryPublisher,
} from '../telemetry/publisher.js';

const exitWithError = (error: unknown): never => {
  console.error(formatCliError(error));
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`dream-cli – offline renderer for the dream image effect

Commands:
  render   (--input <image> | --synthetic <WxH>) [--output <image>] [--intensity 0..1] [--time s]
  sequence (--input <image> | --synthetic <WxH>) --frames <n> [--fps 30] [--ramp] [--output-dir <dir>]
  inspect  <cellX> <cellY> [--time s]
  telemetry [--port 8090] [--output frames.jsonl]

Run "dream-cli <command> --help" to learn more about a command.`);
};

const printRenderUsage = () => {
  console.log(`dream-cli render

Apply the dream effect to a single image.

Source (one of):
  --input <image>            Any ffmpeg-readable image
  --synthetic <WxH>          Uniform gray image of the given size
  --gray <0..1>              Gray level for --synthetic (default 0.5)

Optional:
  --output <image>           Output image path (.png recommended)
  --config <path>            JSON render config
  --intensity <0..1>         Effect intensity (overrides config)
  --time <seconds>           Animation time (overrides config)
  --swirl-dampening <mode>   "repeated" (default) or "single"
  --ffmpeg <path>            ffmpeg executable (default "ffmpeg")
  --ffprobe <path>           ffprobe executable (default "ffprobe")
  --json                     Emit the summary as JSON
`);
};

const printSequenceUsage = () => {
  console.log(`dream-cli sequence

Render an animated sequence, advancing time by 1/fps per frame.

Source: --input <image> | --synthetic <WxH> [--gray <0..1>]

Optional:
  --frames <count>           Frame count (default 60)
  --fps <rate>               Frames per second (default 30)
  --config <path>            JSON render config
  --intensity <0..1>         Fixed intensity when --ramp is not set
  --ramp                     Build intensity up from 0 with the intensity ramp
  --boost                    Use the boosted ramp rate
  --rotation-at <frame>      Inject a rotation bump at a frame (repeatable)
  --output-dir <dir>         Write frame_00000.png … into this directory
  --video <path>             Assemble the frames into a video (needs --output-dir)
  --frame-budget-ms <ms>     Report frames slower than this
  --telemetry <ws-url>       Publish one JSON sample per frame to a collector
  --output <metrics.json>    Write the per-frame records to a file
  --json                     Emit the summary as JSON
`);
};

const printInspectUsage = () => {
  console.log(`dream-cli inspect <cellX> <cellY> [--time <seconds>]

Print the procedural eye descriptor placed in a grid cell.
`);
};

const printTelemetryUsage = () => {
  console.log(`dream-cli telemetry

Starts a WebSocket endpoint that collects frame samples published by "sequence --telemetry".

Flags:
  --port <number>     Port to listen on (default 8090)
  --output <path>     Append newline-delimited JSON frames to this file
`);
};

type SourceFlags = {
  input?: string;
  synthetic?: string;
  gray: number;
};

const resolveSourceSpec = (flags: SourceFlags, command: string): SourceSpec => {
  if (flags.input && flags.synthetic) {
    return exitWithError(`${command} takes either --input or --synthetic, not both.`);
  }
  if (flags.synthetic) {
    const { width, height } = parseDimensions(flags.synthetic);
    return { kind: 'synthetic', width, height, gray: flags.gray };
  }
  if (flags.input) {
    return { kind: 'file', path: flags.input };
  }
  return exitWithError(`${command} requires --input or --synthetic.`);
};

const readNumber = (value: string | undefined, flag: string): number => {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    return exitWithError(`${flag} expects a number (received "${value ?? ''}").`);
  }
  return parsed;
};

const reportConfigIssues = (issues: ConfigValidationIssue[]) => {
  issues
    .filter((issue) => issue.severity === 'warning')
    .forEach((issue) => {
      console.warn(`[config] ${issue.message} (${issue.code})`);
    });
};

const handleRenderCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printRenderUsage();
    process.exit(0);
  }

  const options: SourceFlags & {
    output?: string;
    config?: string;
    intensity?: number;
    time?: number;
    swirlDampening?: string;
    tools: MediaTools;
    json: boolean;
  } = { gray: 0.5, tools: { ...DEFAULT_MEDIA_TOOLS }, json: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--input':
        options.input = args[++i];
        break;
      case '--synthetic':
        options.synthetic = args[++i];
        break;
      case '--gray':
        options.gray = readNumber(args[++i], '--gray');
        break;
      case '--output':
        options.output = args[++i];
        break;
      case '--config':
        options.config = args[++i];
        break;
      case '--intensity':
        options.intensity = readNumber(args[++i], '--intensity');
        break;
      case '--time':
        options.time = readNumber(args[++i], '--time');
        break;
      case '--swirl-dampening':
        options.swirlDampening = args[++i];
        break;
      case '--ffmpeg':
        options.tools.ffmpeg = args[++i] ?? options.tools.ffmpeg;
        break;
      case '--ffprobe':
        options.tools.ffprobe = args[++i] ?? options.tools.ffprobe;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        exitWithError(`Unknown flag "${arg}"`);
    }
  }

  const source = resolveSourceSpec(options, 'render');
  const runtime = await resolveRuntimeConfig(options.config);
  reportConfigIssues(runtime.issues);
  if (options.swirlDampening !== undefined && !isSwirlDampening(options.swirlDampening)) {
    exitWithError(`Unsupported swirl dampening "${options.swirlDampening}".`);
  }
  const config = createDreamRenderConfig({
    ...runtime.config,
    intensity: options.intensity ?? runtime.config.intensity,
    time: options.time ?? runtime.config.time,
    swirlDampening: isSwirlDampening(options.swirlDampening)
      ? options.swirlDampening
      : runtime.config.swirlDampening,
  });

  const summary = await renderImage({ source, output: options.output, config, tools: options.tools });

  if (options.json) {
    console.log(JSON.stringify({ status: 'ok', ...summary }, null, 2));
    return;
  }
  console.log(
    `[render] ${summary.width}×${summary.height} @ intensity ${summary.settings.intensity.toFixed(2)}, t=${summary.settings.time.toFixed(2)}s in ${summary.frameMs.toFixed(1)}ms`,
  );
  console.log(
    `         eyes ${(summary.metrics.eyeCoverage * 100).toFixed(1)}% | tendrils ${(summary.metrics.swirlCoverage * 100).toFixed(1)}% | digest ${summary.digest.frame.slice(0, 16)}`,
  );
  if (summary.output) {
    console.log(`         wrote ${summary.output}`);
  }
};

const handleSequenceCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printSequenceUsage();
    process.exit(0);
  }

  const options: SourceFlags & {
    frames: number;
    fps: number;
    config?: string;
    intensity?: number;
    ramp: boolean;
    boost: boolean;
    rotationFrames: number[];
    outputDir?: string;
    video?: string;
    frameBudgetMs?: number;
    telemetry?: string;
    output?: string;
    tools: MediaTools;
    json: boolean;
  } = {
    gray: 0.5,
    frames: 60,
    fps: 30,
    ramp: false,
    boost: false,
    rotationFrames: [],
    tools: { ...DEFAULT_MEDIA_TOOLS },
    json: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--input':
        options.input = args[++i];
        break;
      case '--synthetic':
        options.synthetic = args[++i];
        break;
      case '--gray':
        options.gray = readNumber(args[++i], '--gray');
        break;
      case '--frames':
        options.frames = Math.max(1, Math.floor(readNumber(args[++i], '--frames')));
        break;
      case '--fps':
        options.fps = Math.max(1, readNumber(args[++i], '--fps'));
        break;
      case '--config':
        options.config = args[++i];
        break;
      case '--intensity':
        options.intensity = readNumber(args[++i], '--intensity');
        break;
      case '--ramp':
        options.ramp = true;
        break;
      case '--boost':
        options.boost = true;
        break;
      case '--rotation-at':
        options.rotationFrames.push(Math.floor(readNumber(args[++i], '--rotation-at')));
        break;
      case '--output-dir':
        options.outputDir = args[++i];
        break;
      case '--video':
        options.video = args[++i];
        break;
      case '--frame-budget-ms':
        options.frameBudgetMs = readNumber(args[++i], '--frame-budget-ms');
        break;
      case '--telemetry':
        options.telemetry = args[++i];
        break;
      case '--output':
        options.output = args[++i];
        break;
      case '--ffmpeg':
        options.tools.ffmpeg = args[++i] ?? options.tools.ffmpeg;
        break;
      case '--ffprobe':
        options.tools.ffprobe = args[++i] ?? options.tools.ffprobe;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        exitWithError(`Unknown flag "${arg}"`);
    }
  }

  const source = resolveSourceSpec(options, 'sequence');
  const runtime = await resolveRuntimeConfig(options.config);
  reportConfigIssues(runtime.issues);
  const config = createDreamRenderConfig({
    ...runtime.config,
    intensity: options.intensity ?? runtime.config.intensity,
  });

  const telemetry = options.telemetry
    ? new TelemetryPublisher(await connectTelemetrySink(options.telemetry))
    : undefined;

  try {
    const summary = await renderSequence({
      source,
      config,
      frames: options.frames,
      fps: options.fps,
      ramp: options.ramp,
      boosted: options.boost,
      rotationFrames: options.rotationFrames,
      outputDir: options.outputDir,
      video: options.video,
      budget: options.frameBudgetMs != null ? { frameMs: options.frameBudgetMs } : undefined,
      telemetry,
      tools: options.tools,
      onFrame: options.json
        ? undefined
        : (record) => {
            console.log(
              `[sequence] frame ${record.frameIndex} intensity ${record.intensity.toFixed(3)}${record.alert ? ' (alert)' : ''} eyes ${(record.eyeCoverage * 100).toFixed(1)}%`,
            );
          },
    });

    const payload = { status: 'ok', ...summary };
    if (options.output) {
      await writeFile(options.output, JSON.stringify(payload, null, 2), 'utf8');
    }
    if (options.json) {
      console.log(JSON.stringify(payload, null, 2));
      return;
    }
    console.log(
      `[sequence] ${summary.performance.frames} frames, avg ${summary.performance.frameMsAvg.toFixed(1)}ms, max ${summary.performance.frameMsMax.toFixed(1)}ms`,
    );
    if (summary.performance.violations.length > 0) {
      console.warn(`[sequence] ${summary.performance.violations.length} frame(s) over budget`);
    }
    if (summary.video) {
      console.log(`           video written to ${summary.video}`);
    } else if (summary.outputDir) {
      console.log(`           frames written to ${summary.outputDir}`);
    }
  } finally {
    telemetry?.close();
  }
};

const handleInspectCommand = (args: string[]) => {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printInspectUsage();
    process.exit(0);
  }
  let time = 0;
  const positional: number[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--time') {
      time = readNumber(args[++i], '--time');
    } else if (arg.startsWith('--')) {
      exitWithError(`Unknown flag "${arg}"`);
    } else {
      positional.push(readNumber(arg, 'cell index'));
    }
  }
  if (positional.length !== 2) {
    exitWithError('inspect requires two cell indices.');
  }
  console.log(JSON.stringify(inspectCell(positional[0], positional[1], time), null, 2));
};

const runTelemetryCollector = (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printTelemetryUsage();
    process.exit(0);
  }
  let port = 8090;
  let outputPath: string | undefined;
  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (arg === '--port' && args[index + 1]) {
      const value = Number.parseInt(args[index + 1], 10);
      if (Number.isFinite(value) && value > 0) {
        port = value;
      } else {
        console.warn(`Ignoring invalid port value "${args[index + 1]}"`);
      }
      index += 1;
      continue;
    }
    if (arg === '--output' && args[index + 1]) {
      outputPath = args[index + 1];
      index += 1;
      continue;
    }
    console.warn(`Ignoring argument "${arg}"`);
  }

  let writer: ReturnType<typeof createWriteStream> | null = null;
  if (outputPath) {
    const resolved = resolve(process.cwd(), outputPath);
    writer = createWriteStream(resolved, { flags: 'a' });
    console.log(`[telemetry] appending frames to ${resolved}`);
  }

  const collector = startTelemetryCollector({
    port,
    onMessage: (text) => {
      if (writer) {
        writer.write(`${text}\n`);
      } else {
        console.log(text);
      }
    },
    onListening: (listening) => {
      console.log(`[telemetry] listening on ws://localhost:${listening}`);
    },
    onError: (error) => {
      console.error('[telemetry] server error', error);
      writer?.close();
      process.exit(1);
    },
  });

  const shutdown = () => {
    console.log('\n[telemetry] shutting down…');
    writer?.close();
    collector.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[telemetry] close failed', error);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'render':
      await handleRenderCommand(rest);
      break;
    case 'sequence':
      await handleSequenceCommand(rest);
      break;
    case 'inspect':
      handleInspectCommand(rest);
      break;
    case 'telemetry':
      runTelemetryCollector(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error: unknown) => {
  exitWithError(error);
});
