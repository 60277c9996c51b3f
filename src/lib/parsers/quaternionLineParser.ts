/**
 * Quaternion line parser
 *
 * Wire format: one ASCII line per sample, scalar first, comma separated:
 *   "q0,q1,q2,q3"            e.g. "0.9998,0.0120,-0.0031,0.0150"
 * Trailing fields after the fourth are ignored.
 */

import { parserLog } from "../logger";
import type { QuaternionSample } from "../motion/types";

const FIELD_COUNT = 4;

function parseField(field: string): number | null {
  const trimmed = field.trim();
  if (trimmed === "") return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse one line into a sample.
 * @returns null for blank, short or non-numeric lines
 */
export function parseQuaternionLine(line: string): QuaternionSample | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const parts = trimmed.split(",");
  if (parts.length < FIELD_COUNT) return null;

  const q0 = parseField(parts[0]);
  const q1 = parseField(parts[1]);
  const q2 = parseField(parts[2]);
  const q3 = parseField(parts[3]);

  if (q0 === null || q1 === null || q2 === null || q3 === null) {
    parserLog.debug(`Couldn't parse quaternion from line: ${JSON.stringify(line)}`);
    return null;
  }

  return [q0, q1, q2, q3];
}
