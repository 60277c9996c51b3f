import { describe, it, expect } from "vitest";
import { CursorPlotter } from "./CursorPlotter";

describe("CursorPlotter", () => {
  describe("roll compensation", () => {
    it("leaves the delta unrotated at 0° roll", () => {
      const plotter = new CursorPlotter();
      const cursor = plotter.advance(5, 0, 0);

      expect(cursor.x).toBeCloseTo(5, 12);
      expect(cursor.y).toBeCloseTo(0, 12);
    });

    it("turns +x into +y at 90° roll", () => {
      const plotter = new CursorPlotter();
      const cursor = plotter.advance(5, 0, 90);

      expect(cursor.x).toBeCloseTo(0, 10);
      expect(cursor.y).toBeCloseTo(5, 10);
    });

    it("turns +x into -y at -90° roll", () => {
      const plotter = new CursorPlotter();
      const cursor = plotter.advance(5, 0, -90);

      expect(cursor.x).toBeCloseTo(0, 10);
      expect(cursor.y).toBeCloseTo(-5, 10);
    });

    it("flips both axes at 180° roll", () => {
      const plotter = new CursorPlotter();
      const cursor = plotter.advance(1, 2, 180);

      expect(cursor.x).toBeCloseTo(-1, 10);
      expect(cursor.y).toBeCloseTo(-2, 10);
    });

    it("preserves step length at an arbitrary roll", () => {
      const plotter = new CursorPlotter();
      const cursor = plotter.advance(3, 4, 37);

      expect(Math.hypot(cursor.x, cursor.y)).toBeCloseTo(5, 10);
    });
  });

  it("accumulates an unbounded absolute position and records each step", () => {
    const plotter = new CursorPlotter();
    plotter.advance(400, 0, 0);
    plotter.advance(400, 0, 0);
    const cursor = plotter.advance(0, -1000, 0);

    expect(cursor.x).toBeCloseTo(800, 10);
    expect(cursor.y).toBeCloseTo(-1000, 10);
    expect(cursor.path).toHaveLength(3);
    expect(cursor.path[0].x).toBeCloseTo(400, 10);
    expect(cursor.path[1].x).toBeCloseTo(800, 10);
    expect(cursor.path[2].y).toBeCloseTo(-1000, 10);
  });

  it("records a point even for a zero delta", () => {
    const plotter = new CursorPlotter();
    const cursor = plotter.advance(0, 0, 12);

    expect(cursor.path).toEqual([{ x: 0, y: 0 }]);
  });

  it("caps the path at the configured capacity", () => {
    const plotter = new CursorPlotter(3);
    let cursor = plotter.snapshot();
    for (let i = 0; i < 5; i++) {
      cursor = plotter.advance(1, 0, 0);
    }

    expect(cursor.path.map((p) => p.x)).toEqual([3, 4, 5]);
  });

  it("hands out snapshots that later steps do not mutate", () => {
    const plotter = new CursorPlotter();
    const first = plotter.advance(1, 1, 0);
    plotter.advance(1, 1, 0);

    expect(first.x).toBe(1);
    expect(first.path).toHaveLength(1);
  });

  it("reset() returns to the origin with an empty path", () => {
    const plotter = new CursorPlotter();
    plotter.advance(10, 10, 0);
    plotter.reset();

    expect(plotter.snapshot()).toEqual({ x: 0, y: 0, path: [] });
  });
});
