/**
 * Shared value types for the orientation → cursor pipeline.
 * Every value here is passed downstream by copy; only the trackers keep state.
 */

/** Orientation quaternion, scalar first: [q0, q1, q2, q3] */
export type QuaternionSample = [number, number, number, number];

/** Euler angles in degrees (after the device axis remap) */
export interface Orientation {
  yaw: number;
  pitch: number;
  roll: number;
}

/** Screen-space motion for one sample */
export interface MotionDelta {
  dx: number;
  dy: number;
}

export interface CursorPoint {
  x: number;
  y: number;
}

export interface CursorSnapshot {
  x: number;
  y: number;
  /** Oldest-first */
  path: readonly CursorPoint[];
}

export type SampleResult =
  | {
      accepted: true;
      orientation: Orientation;
      delta: MotionDelta;
      cursor: CursorSnapshot;
    }
  | {
      accepted: false;
      reason: string;
    };
