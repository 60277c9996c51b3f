import { describe, it, expect } from "vitest";
import { DEFAULT_PATH_CAPACITY, PathRingBuffer } from "./PathRingBuffer";
import { DEFAULT_MOTION_CONFIG } from "./motionConfig";

describe("PathRingBuffer", () => {
  it("defaults to 400 points", () => {
    const ring = new PathRingBuffer();
    for (let i = 0; i < 450; i++) ring.push(i, -i);

    expect(DEFAULT_PATH_CAPACITY).toBe(DEFAULT_MOTION_CONFIG.pathCapacity);
    expect(DEFAULT_PATH_CAPACITY).toBe(400);
    expect(ring.length).toBe(400);
  });

  it("returns points oldest-first before it wraps", () => {
    const ring = new PathRingBuffer(5);
    ring.push(1, 10);
    ring.push(2, 20);
    ring.push(3, 30);

    expect(ring.toArray()).toEqual([
      { x: 1, y: 10 },
      { x: 2, y: 20 },
      { x: 3, y: 30 },
    ]);
  });

  it("keeps exactly the 400 most recent of 500 points in FIFO order", () => {
    const ring = new PathRingBuffer(400);
    for (let i = 0; i < 500; i++) ring.push(i, i * 2);

    const points = ring.toArray();
    expect(points).toHaveLength(400);
    expect(points[0]).toEqual({ x: 100, y: 200 });
    expect(points[399]).toEqual({ x: 499, y: 998 });
    points.forEach((p, i) => expect(p.x).toBe(100 + i));
  });

  it("evicts one point per append once full", () => {
    const ring = new PathRingBuffer(2);
    ring.push(1, 1);
    ring.push(2, 2);
    ring.push(3, 3);

    expect(ring.toArray()).toEqual([
      { x: 2, y: 2 },
      { x: 3, y: 3 },
    ]);
  });

  it("clear() empties the buffer and accepts new points", () => {
    const ring = new PathRingBuffer(3);
    for (let i = 0; i < 7; i++) ring.push(i, i);
    ring.clear();

    expect(ring.length).toBe(0);
    expect(ring.toArray()).toEqual([]);

    ring.push(42, 43);
    expect(ring.toArray()).toEqual([{ x: 42, y: 43 }]);
  });

  it("rejects a non-positive or fractional capacity", () => {
    expect(() => new PathRingBuffer(0)).toThrow(
      "PathRingBuffer capacity must be an integer >= 1 (got 0)",
    );
    expect(() => new PathRingBuffer(1.5)).toThrow("(got 1.5)");
  });
});
