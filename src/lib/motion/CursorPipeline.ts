/**
 * CursorPipeline - Single entry point from quaternion sample to cursor state
 * ==========================================================================
 *
 *   quaternion → decodeOrientation → (yaw, pitch, roll)
 *              → MotionTracker     → (dx, dy)
 *              → CursorPlotter     → (x, y, path)
 *
 * One call per arrived sample, strictly sequential. Nothing here reads the
 * clock or suspends; scheduling belongs to the caller (see SampleDriver).
 *
 * @module CursorPipeline
 */

import {
  decodeOrientation,
  isFiniteQuaternion,
} from "../math/orientationDecoder";
import { pipelineLog } from "../logger";
import { CursorPlotter } from "./CursorPlotter";
import { MotionTracker } from "./MotionTracker";
import { resolveMotionConfig, type MotionConfig } from "./motionConfig";
import type { CursorSnapshot, QuaternionSample, SampleResult } from "./types";

export interface PipelineStats {
  acceptedSamples: number;
  rejectedSamples: number;
}

export class CursorPipeline {
  readonly config: Readonly<MotionConfig>;

  private readonly tracker: MotionTracker;
  private readonly plotter: CursorPlotter;
  private stats: PipelineStats = { acceptedSamples: 0, rejectedSamples: 0 };

  constructor(config: Partial<MotionConfig> = {}) {
    this.config = resolveMotionConfig(config);
    this.tracker = new MotionTracker(this.config);
    this.plotter = new CursorPlotter(this.config.pathCapacity);
  }

  processSample(sample: QuaternionSample): SampleResult {
    // A NaN would stick in the smoothing accumulators forever
    if (!isFiniteQuaternion(sample)) {
      this.stats.rejectedSamples++;
      pipelineLog.warn("Rejected non-finite quaternion sample", sample);
      return {
        accepted: false,
        reason: `non-finite quaternion [${sample.join(", ")}]`,
      };
    }

    const orientation = decodeOrientation(sample);
    const delta = this.tracker.update(orientation.yaw, orientation.pitch);
    const cursor = this.plotter.advance(delta.dx, delta.dy, orientation.roll);

    this.stats.acceptedSamples++;
    return { accepted: true, orientation, delta, cursor };
  }

  /** Forget the angle baseline and return the cursor to the origin */
  reset(): void {
    this.tracker.reset();
    this.plotter.reset();
    this.stats = { acceptedSamples: 0, rejectedSamples: 0 };
    pipelineLog.info("Pipeline reset");
  }

  getCursor(): CursorSnapshot {
    return this.plotter.snapshot();
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }
}
