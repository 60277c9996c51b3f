/**
 * Orientation Decoder
 * ===================
 *
 * Decomposes a scalar-first unit quaternion [q0, q1, q2, q3] into
 * yaw / pitch / roll in degrees.
 *
 * AXIS REMAP (device mounting convention):
 *   The sensor is mounted rotated on the pointer body, so the angle about
 *   the X axis drives screen pitch and the asin term drives roll:
 *
 *     yaw   = atan2 term about Z
 *     pitch = atan2 term about X   ("roll" in textbook ZYX naming)
 *     roll  = asin term about Y    ("pitch" in textbook ZYX naming)
 *
 * Only the asin argument is clamped. atan2 is defined for every finite
 * pair, so its arguments are left alone.
 *
 * @module orientationDecoder
 */

import * as THREE from 'three';
import type { Orientation, QuaternionSample } from '../motion/types';

const COMPONENT_NAMES = ['q0', 'q1', 'q2', 'q3'] as const;

/**
 * True when all four components are finite numbers.
 */
export function isFiniteQuaternion(q: QuaternionSample): boolean {
    return q.every((v) => Number.isFinite(v));
}

/**
 * Decode a quaternion into remapped Euler angles (degrees).
 *
 * Non-unit quaternions are accepted and give mathematically defined output.
 *
 * @throws Error if any component is NaN or ±Infinity
 */
export function decodeOrientation(q: QuaternionSample): Orientation {
    const badIndex = q.findIndex((v) => !Number.isFinite(v));
    if (badIndex !== -1) {
        throw new Error(
            `Cannot decode quaternion: ${COMPONENT_NAMES[badIndex]} is ${q[badIndex]}`
        );
    }

    const [q0, q1, q2, q3] = q;

    const rollRaw = Math.atan2(
        2 * (q0 * q1 + q2 * q3),
        1 - 2 * (q1 * q1 + q2 * q2)
    );

    // Floating point overshoot near the poles would push asin out of domain
    const pitchArg = THREE.MathUtils.clamp(-2 * (q1 * q3 - q0 * q2), -1, 1);
    const pitchRaw = Math.asin(pitchArg);

    const yawRaw = Math.atan2(
        2 * (q1 * q2 + q0 * q3),
        1 - 2 * (q2 * q2 + q3 * q3)
    );

    // + 0 folds -0 into 0: a level device reads exactly (0, 0, 0)
    return {
        yaw: THREE.MathUtils.radToDeg(yawRaw) + 0,
        pitch: THREE.MathUtils.radToDeg(rollRaw) + 0,
        roll: THREE.MathUtils.radToDeg(pitchRaw) + 0,
    };
}
