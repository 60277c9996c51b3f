// ============================================================================
// TYPES
// ============================================================================

export interface MotionConfig {
  /** Screen units per degree of smoothed yaw delta (default: 18) */
  gainX: number;
  /** Screen units per degree of smoothed pitch delta (default: 18) */
  gainY: number;
  /** Weight of the newest raw delta, in (0, 1] (default: 0.2) */
  smoothingAlpha: number;
  /** Smoothed deltas below this magnitude (degrees) emit no motion (default: 0.02) */
  deadzoneThreshold: number;
  /** Maximum retained cursor path points (default: 400) */
  pathCapacity: number;
}

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

export const DEFAULT_MOTION_CONFIG: Readonly<MotionConfig> = Object.freeze({
  gainX: 18.0,
  gainY: 18.0,
  smoothingAlpha: 0.2,
  deadzoneThreshold: 0.02,
  pathCapacity: 400,
});

/**
 * Fill defaults and validate. Throws one Error listing every bad field.
 */
export function resolveMotionConfig(
  overrides: Partial<MotionConfig> = {},
): MotionConfig {
  const config: MotionConfig = { ...DEFAULT_MOTION_CONFIG, ...overrides };
  const problems: string[] = [];

  if (!Number.isFinite(config.gainX)) {
    problems.push(`gainX must be finite (got ${config.gainX})`);
  }
  if (!Number.isFinite(config.gainY)) {
    problems.push(`gainY must be finite (got ${config.gainY})`);
  }
  if (
    !Number.isFinite(config.smoothingAlpha) ||
    config.smoothingAlpha <= 0 ||
    config.smoothingAlpha > 1
  ) {
    problems.push(
      `smoothingAlpha must be in (0, 1] (got ${config.smoothingAlpha})`,
    );
  }
  if (
    !Number.isFinite(config.deadzoneThreshold) ||
    config.deadzoneThreshold < 0
  ) {
    problems.push(
      `deadzoneThreshold must be a finite value >= 0 (got ${config.deadzoneThreshold})`,
    );
  }
  if (!Number.isInteger(config.pathCapacity) || config.pathCapacity < 1) {
    problems.push(
      `pathCapacity must be an integer >= 1 (got ${config.pathCapacity})`,
    );
  }

  if (problems.length > 0) {
    throw new Error(`Invalid motion config: ${problems.join("; ")}`);
  }

  return config;
}
