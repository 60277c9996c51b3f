import {
  DEFAULT_BAUD_RATE,
  DEFAULT_SERIAL_PATH,
} from "../connection/SerialConnection";
import { DEFAULT_POLL_HZ } from "../connection/SampleDriver";
import { resolveMotionConfig, type MotionConfig } from "../motion/motionConfig";
import { configLog } from "../logger";

export type SampleSourceKind = "serial" | "stdin";

export interface AppConfig {
  source: SampleSourceKind;
  serialPath: string;
  baudRate: number;
  pollHz: number;
  statusIntervalMs: number;
  motion: MotionConfig;
}

export const DEFAULT_STATUS_INTERVAL_MS = 1000;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number (got "${raw}")`);
  }
  return value;
}

function readPositive(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name) ?? fallback;
  if (value <= 0) {
    throw new Error(`${name} must be > 0 (got ${value})`);
  }
  return value;
}

function readSource(env: Env): SampleSourceKind {
  const raw = env.IMU_SOURCE?.trim().toLowerCase();
  if (raw === undefined || raw === "" || raw === "serial") return "serial";
  if (raw === "stdin") return "stdin";
  throw new Error(`IMU_SOURCE must be "serial" or "stdin" (got "${raw}")`);
}

/**
 * Build the runtime configuration from environment variables.
 * Unset or empty variables fall back to their defaults.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const motion: Partial<MotionConfig> = {};
  const gainX = readNumber(env, "IMU_GAIN_X");
  const gainY = readNumber(env, "IMU_GAIN_Y");
  const smoothingAlpha = readNumber(env, "IMU_SMOOTHING_ALPHA");
  const deadzoneThreshold = readNumber(env, "IMU_DEADZONE");
  const pathCapacity = readNumber(env, "IMU_PATH_CAPACITY");
  if (gainX !== undefined) motion.gainX = gainX;
  if (gainY !== undefined) motion.gainY = gainY;
  if (smoothingAlpha !== undefined) motion.smoothingAlpha = smoothingAlpha;
  if (deadzoneThreshold !== undefined) motion.deadzoneThreshold = deadzoneThreshold;
  if (pathCapacity !== undefined) motion.pathCapacity = pathCapacity;

  const config: AppConfig = {
    source: readSource(env),
    serialPath: env.IMU_SERIAL_PORT?.trim() || DEFAULT_SERIAL_PATH,
    baudRate: readPositive(env, "IMU_BAUD_RATE", DEFAULT_BAUD_RATE),
    pollHz: readPositive(env, "IMU_POLL_HZ", DEFAULT_POLL_HZ),
    statusIntervalMs: readPositive(
      env,
      "IMU_STATUS_INTERVAL_MS",
      DEFAULT_STATUS_INTERVAL_MS,
    ),
    motion: resolveMotionConfig(motion),
  };

  configLog.debug("Loaded config", config);
  return config;
}
