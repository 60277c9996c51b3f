/**
 * Demo Quaternion Stream
 * ======================
 *
 * Writes a synthetic IMU feed to stdout, one "q0,q1,q2,q3" line per sample,
 * paced in real time. Pipe it into the app to move the cursor without hardware:
 *
 *   npx tsx scripts/generateDemoStream.ts | IMU_SOURCE=stdin npx tsx src/main.ts
 *
 * Optional args: duration in seconds (default 30), sample rate in Hz (default 100).
 */

import * as THREE from 'three';

// ============================================================================
// CONFIGURATION
// ============================================================================

const DURATION_S = Number(process.argv[2] ?? 30);
const SAMPLE_RATE = Number(process.argv[3] ?? 100);

const YAW_SWEEP_DEG = 40; // peak-to-centre
const YAW_PERIOD_S = 8;
const PITCH_WOBBLE_DEG = 12;
const PITCH_PERIOD_S = 3;
const ROLL_DRIFT_DEG = 5;

// ============================================================================
// NOISE
// ============================================================================

function gaussianNoise(mean: number, stdDev: number): number {
    const u1 = Math.random() || Number.MIN_VALUE;
    const u2 = Math.random();
    const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);
    return z0 * stdDev + mean;
}

// ============================================================================
// MOTION
// ============================================================================

const euler = new THREE.Euler();
const quat = new THREE.Quaternion();

function sampleAt(timeS: number): string {
    const yaw = YAW_SWEEP_DEG * Math.sin((2 * Math.PI * timeS) / YAW_PERIOD_S);
    const pitch = PITCH_WOBBLE_DEG * Math.sin((2 * Math.PI * timeS) / PITCH_PERIOD_S);
    const roll = ROLL_DRIFT_DEG * Math.sin((2 * Math.PI * timeS) / (YAW_PERIOD_S * 2));

    // Device axes: X carries pitch, Y carries roll, Z carries yaw
    euler.set(
        THREE.MathUtils.degToRad(pitch + gaussianNoise(0, 0.05)),
        THREE.MathUtils.degToRad(roll + gaussianNoise(0, 0.05)),
        THREE.MathUtils.degToRad(yaw + gaussianNoise(0, 0.05)),
        'ZYX',
    );
    quat.setFromEuler(euler);

    return [quat.w, quat.x, quat.y, quat.z].map((v) => v.toFixed(6)).join(',');
}

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
    if (!Number.isFinite(DURATION_S) || DURATION_S <= 0 || !Number.isFinite(SAMPLE_RATE) || SAMPLE_RATE <= 0) {
        console.error('Usage: generateDemoStream.ts [durationSeconds] [sampleRateHz]');
        process.exitCode = 1;
        return;
    }

    const totalSamples = Math.round(DURATION_S * SAMPLE_RATE);
    let index = 0;

    // Reader went away (e.g. the app exited): stop quietly
    process.stdout.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') throw err;
        clearInterval(timer);
    });

    const timer = setInterval(() => {
        process.stdout.write(`${sampleAt(index / SAMPLE_RATE)}\n`);
        index++;
        if (index >= totalSamples) {
            clearInterval(timer);
            console.error(`✅ Wrote ${totalSamples} samples at ${SAMPLE_RATE} Hz`);
        }
    }, 1000 / SAMPLE_RATE);
}

main();
