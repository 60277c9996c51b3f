import type { CursorPipeline } from "../motion/CursorPipeline";
import type { SampleResult } from "../motion/types";
import type { CursorStore } from "../../store/cursorStore";
import type { SampleSource } from "./LineSampleSource";
import { driverLog } from "../logger";

export const DEFAULT_POLL_HZ = 100;

export interface SampleDriverOptions {
  pollHz?: number;
}

/**
 * Fixed-cadence loop between a sample source and the pipeline.
 *
 * Each tick takes at most one sample. An empty tick does nothing, so the
 * cursor holds still while the device is quiet.
 */
export class SampleDriver {
  readonly pollHz: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private tickCount = 0;
  private idleTicks = 0;
  private drainWaiters: (() => void)[] = [];

  constructor(
    private readonly source: SampleSource,
    private readonly pipeline: CursorPipeline,
    private readonly store: CursorStore,
    options: SampleDriverOptions = {},
  ) {
    const pollHz = options.pollHz ?? DEFAULT_POLL_HZ;
    if (!Number.isFinite(pollHz) || pollHz <= 0) {
      throw new Error(`SampleDriver pollHz must be > 0 (got ${pollHz})`);
    }
    this.pollHz = pollHz;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    const intervalMs = 1000 / this.pollHz;
    this.timer = setInterval(() => this.tick(), intervalMs);
    driverLog.info(`Sampling at ${this.pollHz} Hz`);
  }

  stop(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      driverLog.info(
        `Stopped after ${this.tickCount} ticks (${this.idleTicks} idle)`,
      );
    }

    for (const resolve of waiters) resolve();
  }

  /**
   * Keep ticking until the source comes up empty, then stop.
   * Resolves once stopped; resolves at once if the driver is not running.
   */
  finishWhenDrained(): Promise<void> {
    if (!this.timer) return Promise.resolve();
    return new Promise((resolve) => this.drainWaiters.push(resolve));
  }

  /** Run one iteration; returns null when no sample was waiting */
  tick(): SampleResult | null {
    this.tickCount++;

    const sample = this.source.poll();
    if (!sample) {
      this.idleTicks++;
      if (this.drainWaiters.length > 0) this.stop();
      return null;
    }

    const result = this.pipeline.processSample(sample);
    this.store.getState().publish(result);
    return result;
  }
}
