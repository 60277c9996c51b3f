/**
 * MotionTracker - yaw/pitch stream → smoothed, deadzoned screen deltas
 *
 * Per update:
 *   1. raw Δ = current − previous (per axis)
 *   2. wrap Δ into [−180, 180] so crossing ±180° is a small step
 *   3. s = α·Δ + (1 − α)·s_prev (per axis, running across calls)
 *   4. |s| < deadzone → emit 0 for that axis (s itself is kept)
 *   5. dx = −s_yaw·gainX, dy = s_pitch·gainY
 *
 * The first update after construction or reset() only seeds the baseline.
 */

import type { MotionConfig } from "./motionConfig";
import type { MotionDelta } from "./types";

export type AngleBaseline =
  | { kind: "unseeded" }
  | { kind: "seeded"; yaw: number; pitch: number };

export interface MotionTrackerState {
  baseline: AngleBaseline;
  smoothedYaw: number;
  smoothedPitch: number;
}

/**
 * Shortest signed angular step for a raw degree difference.
 */
export function wrapAngleDelta(delta: number): number {
  if (delta > 180) return delta - 360;
  if (delta < -180) return delta + 360;
  return delta;
}

export class MotionTracker {
  private baseline: AngleBaseline = { kind: "unseeded" };
  private smoothedYaw = 0;
  private smoothedPitch = 0;

  constructor(
    private readonly config: Pick<
      MotionConfig,
      "gainX" | "gainY" | "smoothingAlpha" | "deadzoneThreshold"
    >,
  ) {}

  update(yaw: number, pitch: number): MotionDelta {
    const baseline = this.baseline;
    this.baseline = { kind: "seeded", yaw, pitch };

    if (baseline.kind === "unseeded") {
      return { dx: 0, dy: 0 };
    }

    const { smoothingAlpha: alpha, deadzoneThreshold, gainX, gainY } =
      this.config;

    const rawYaw = wrapAngleDelta(yaw - baseline.yaw);
    const rawPitch = wrapAngleDelta(pitch - baseline.pitch);

    this.smoothedYaw = alpha * rawYaw + (1 - alpha) * this.smoothedYaw;
    this.smoothedPitch = alpha * rawPitch + (1 - alpha) * this.smoothedPitch;

    const moveYaw =
      Math.abs(this.smoothedYaw) < deadzoneThreshold ? 0 : this.smoothedYaw;
    const movePitch =
      Math.abs(this.smoothedPitch) < deadzoneThreshold ? 0 : this.smoothedPitch;

    return {
      // 0 - x rather than -x: an idle axis stays +0
      dx: 0 - moveYaw * gainX,
      dy: movePitch * gainY,
    };
  }

  reset(): void {
    this.baseline = { kind: "unseeded" };
    this.smoothedYaw = 0;
    this.smoothedPitch = 0;
  }

  /** Copy of the baseline and smoothing accumulators, for inspection */
  getState(): MotionTrackerState {
    return {
      baseline: { ...this.baseline },
      smoothedYaw: this.smoothedYaw,
      smoothedPitch: this.smoothedPitch,
    };
  }
}
