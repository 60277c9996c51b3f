/**
 * Motion Module Barrel Export
 * ===========================
 */

export * from "./types";
export * from "./motionConfig";
export * from "./MotionTracker";
export * from "./PathRingBuffer";
export * from "./CursorPlotter";
export * from "./CursorPipeline";

export {
  decodeOrientation,
  isFiniteQuaternion,
} from "../math/orientationDecoder";
