import * as THREE from "three";
import { PathRingBuffer } from "./PathRingBuffer";
import type { CursorSnapshot } from "./types";

const ORIGIN = new THREE.Vector2(0, 0);

/**
 * Roll-compensated cursor integrator.
 *
 * Each delta is rotated by the device roll so on-screen direction follows
 * how the pointer is held, then added to an unbounded absolute position.
 * Every accepted step is appended to the path history.
 */
export class CursorPlotter {
  private readonly position = new THREE.Vector2(0, 0);
  private readonly step = new THREE.Vector2();
  private readonly path: PathRingBuffer;

  constructor(pathCapacity?: number) {
    this.path = new PathRingBuffer(pathCapacity);
  }

  /**
   * @param rollDeg - Roll angle in degrees; positive turns the delta counter-clockwise
   */
  advance(dx: number, dy: number, rollDeg: number): CursorSnapshot {
    // x' = x·cos r − y·sin r, y' = x·sin r + y·cos r
    this.step
      .set(dx, dy)
      .rotateAround(ORIGIN, THREE.MathUtils.degToRad(rollDeg));

    this.position.add(this.step);
    this.path.push(this.position.x, this.position.y);

    return this.snapshot();
  }

  snapshot(): CursorSnapshot {
    return {
      x: this.position.x,
      y: this.position.y,
      path: this.path.toArray(),
    };
  }

  reset(): void {
    this.position.set(0, 0);
    this.path.clear();
  }
}
