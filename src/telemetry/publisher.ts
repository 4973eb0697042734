import WebSocket, { WebSocketServer } from 'ws';

import type { DreamFrameMetrics } from '../pipeline/dreamFrame.js';
import type { FrameSample } from '../runtime/frameBudget.js';

export type TelemetrySink = {
  send: (text: string) => void;
  close: () => void;
};

export type DreamTelemetryFrame = {
  type: 'dream-frame';
  frameIndex: number;
  intensity: number;
  time: number;
  frameMs: number;
  megapixelsPerSecond: number;
  eyeCoverage: number;
  swirlCoverage: number;
  digest?: string;
};

export class TelemetryPublisher {
  private sent = 0;

  constructor(private readonly sink: TelemetrySink) {}

  get framesSent(): number {
    return this.sent;
  }

  publishFrame(params: {
    sample: FrameSample;
    metrics: DreamFrameMetrics;
    intensity: number;
    time: number;
    digest?: string;
  }): DreamTelemetryFrame {
    const frame: DreamTelemetryFrame = {
      type: 'dream-frame',
      frameIndex: params.sample.frameIndex,
      intensity: params.intensity,
      time: params.time,
      frameMs: params.sample.frameMs,
      megapixelsPerSecond: params.sample.megapixelsPerSecond,
      eyeCoverage: params.metrics.eyeCoverage,
      swirlCoverage: params.metrics.swirlCoverage,
      digest: params.digest,
    };
    this.sink.send(JSON.stringify(frame));
    this.sent += 1;
    return frame;
  }

  close() {
    this.sink.close();
  }
}

/** Opens a WebSocket to a telemetry collector and resolves once it can accept frames. */
export const connectTelemetrySink = (url: string): Promise<TelemetrySink> =>
  new Promise((resolve, reject) => {
    const socket = new WebSocket(url);
    socket.once('error', reject);
    socket.once('open', () => {
      socket.off('error', reject);
      socket.on('error', (error) => {
        console.error('[telemetry] socket error', error);
      });
      resolve({
        send: (text) => socket.send(text),
        close: () => socket.close(),
      });
    });
  });

export type TelemetryCollector = {
  close: () => Promise<void>;
};

export const startTelemetryCollector = (options: {
  port: number;
  onMessage: (text: string) => void;
  onListening?: (port: number) => void;
  onError?: (error: Error) => void;
}): TelemetryCollector => {
  const server = new WebSocketServer({ port: options.port });
  server.on('connection', (socket) => {
    console.log('[telemetry] client connected');
    socket.on('message', (data) => {
      let text: string;
      if (Array.isArray(data)) {
        text = Buffer.concat(data).toString('utf8');
      } else if (data instanceof ArrayBuffer) {
        text = Buffer.from(data).toString('utf8');
      } else {
        text = data.toString('utf8');
      }
      options.onMessage(text);
    });
    socket.on('close', () => {
      console.log('[telemetry] client disconnected');
    });
  });
  server.on('listening', () => {
    options.onListening?.(options.port);
  });
  server.on('error', (error) => {
    if (options.onError) {
      options.onError(error);
    } else {
      console.error('[telemetry] server error', error);
    }
  });
  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
};
