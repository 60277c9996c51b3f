/**
 * PathRingBuffer - Pre-allocated circular buffer of cursor path points.
 *
 * Append is O(1): once full, each write overwrites the oldest point.
 * Coordinates live in two Float64Arrays so no per-point object is kept;
 * objects are only built when a snapshot is read.
 */

import { DEFAULT_MOTION_CONFIG } from "./motionConfig";
import type { CursorPoint } from "./types";

export const DEFAULT_PATH_CAPACITY = DEFAULT_MOTION_CONFIG.pathCapacity;

export class PathRingBuffer {
  private xs: Float64Array;
  private ys: Float64Array;
  private readonly capacity: number;
  private head = 0; // next write position
  private _size = 0;

  constructor(capacity: number = DEFAULT_PATH_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`PathRingBuffer capacity must be an integer >= 1 (got ${capacity})`);
    }
    this.capacity = capacity;
    this.xs = new Float64Array(capacity);
    this.ys = new Float64Array(capacity);
  }

  get length(): number {
    return this._size;
  }

  /** Append a point, evicting the oldest when full */
  push(x: number, y: number): void {
    this.xs[this.head] = x;
    this.ys[this.head] = y;
    this.head = (this.head + 1) % this.capacity;

    if (this._size < this.capacity) {
      this._size++;
    }
  }

  /** Copy out all points, oldest first */
  toArray(): CursorPoint[] {
    const out: CursorPoint[] = new Array(this._size);
    const tail = (this.head - this._size + this.capacity) % this.capacity;
    for (let i = 0; i < this._size; i++) {
      const idx = (tail + i) % this.capacity;
      out[i] = { x: this.xs[idx], y: this.ys[idx] };
    }
    return out;
  }

  /** Reset to empty */
  clear(): void {
    this.head = 0;
    this._size = 0;
  }
}
