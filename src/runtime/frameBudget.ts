export type FrameBudget = {
  frameMs?: number;
  /** Minimum acceptable throughput in megapixels per second. */
  minMegapixelsPerSecond?: number;
};

export type FrameSample = {
  frameIndex: number;
  frameMs: number;
  texels: number;
  megapixelsPerSecond: number;
};

export type FrameBudgetViolation = {
  type: keyof FrameBudget;
  value: number;
  limit: number;
  frameIndex: number;
};

export type FrameBudgetSnapshot = {
  frames: number;
  frameMsAvg: number;
  frameMsMax: number;
  lastSample: FrameSample | null;
  violations: FrameBudgetViolation[];
};

export type FrameClock = () => bigint;

const DEFAULT_CLOCK: FrameClock = () => process.hrtime.bigint();

export class FrameBudgetMonitor {
  private readonly budget: FrameBudget;
  private readonly clock: FrameClock;
  private readonly label: string;
  private readonly violations: FrameBudgetViolation[] = [];

  private frames = 0;
  private frameMsTotal = 0;
  private frameMsMax = 0;
  private lastSample: FrameSample | null = null;
  private pending: { start: bigint; frameIndex: number } | null = null;

  constructor(budget: FrameBudget = {}, options: { label?: string; clock?: FrameClock } = {}) {
    this.budget = { ...budget };
    this.clock = options.clock ?? DEFAULT_CLOCK;
    this.label = options.label ?? 'frame-budget';
  }

  beginFrame(frameIndex: number) {
    if (this.pending) {
      throw new Error(`[${this.label}] beginFrame called twice without endFrame.`);
    }
    this.pending = { start: this.clock(), frameIndex };
  }

  endFrame(texels: number): FrameSample {
    if (!this.pending) {
      throw new Error(`[${this.label}] endFrame called without beginFrame.`);
    }
    const { start, frameIndex } = this.pending;
    this.pending = null;
    const frameMs = Number(this.clock() - start) / 1_000_000;
    const megapixelsPerSecond = frameMs > 0 ? texels / 1_000_000 / (frameMs / 1000) : 0;
    const sample: FrameSample = { frameIndex, frameMs, texels, megapixelsPerSecond };

    this.frames += 1;
    this.frameMsTotal += frameMs;
    this.frameMsMax = Math.max(this.frameMsMax, frameMs);
    this.lastSample = sample;
    this.checkBudget(sample);
    return sample;
  }

  private checkBudget(sample: FrameSample) {
    const { frameMs, minMegapixelsPerSecond } = this.budget;
    if (typeof frameMs === 'number' && sample.frameMs > frameMs) {
      this.violations.push({
        type: 'frameMs',
        value: sample.frameMs,
        limit: frameMs,
        frameIndex: sample.frameIndex,
      });
    }
    if (
      typeof minMegapixelsPerSecond === 'number' &&
      sample.frameMs > 0 &&
      sample.megapixelsPerSecond < minMegapixelsPerSecond
    ) {
      this.violations.push({
        type: 'minMegapixelsPerSecond',
        value: sample.megapixelsPerSecond,
        limit: minMegapixelsPerSecond,
        frameIndex: sample.frameIndex,
      });
    }
  }

  snapshot(): FrameBudgetSnapshot {
    return {
      frames: this.frames,
      frameMsAvg: this.frames > 0 ? this.frameMsTotal / this.frames : 0,
      frameMsMax: this.frameMsMax,
      lastSample: this.lastSample,
      violations: [...this.violations],
    };
  }
}
