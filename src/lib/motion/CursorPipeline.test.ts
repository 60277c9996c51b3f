import { afterEach, describe, expect, it, vi } from "vitest";
import { CursorPipeline } from "./CursorPipeline";
import type { QuaternionSample } from "./types";

const IDENTITY: QuaternionSample = [1, 0, 0, 0];
const TILTED: QuaternionSample = [0.999, 0.01, 0, 0];

describe("CursorPipeline", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("seeds on the first sample without moving the cursor", () => {
    const pipeline = new CursorPipeline();
    const result = pipeline.processSample(IDENTITY);

    expect(result.accepted).toBe(true);
    if (!result.accepted) return;
    expect(result.delta).toEqual({ dx: 0, dy: 0 });
    expect(result.cursor.x).toBe(0);
    expect(result.cursor.y).toBe(0);
    expect(result.cursor.path).toHaveLength(1);
  });

  it("flags a non-finite sample and leaves all state untouched", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const pipeline = new CursorPipeline();
    pipeline.processSample(IDENTITY);

    const result = pipeline.processSample([1, NaN, 0, 0]);

    expect(result).toEqual({
      accepted: false,
      reason: "non-finite quaternion [1, NaN, 0, 0]",
    });
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(pipeline.getCursor().path).toHaveLength(1);
    expect(pipeline.getStats()).toEqual({
      acceptedSamples: 1,
      rejectedSamples: 1,
    });
  });

  it("produces the same motion whether or not a bad sample was skipped", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const clean = new CursorPipeline();
    const noisy = new CursorPipeline();

    clean.processSample(IDENTITY);
    clean.processSample(TILTED);

    noisy.processSample(IDENTITY);
    noisy.processSample([Infinity, 0, 0, 0]);
    noisy.processSample(TILTED);

    expect(noisy.getCursor()).toEqual(clean.getCursor());
  });

  it("uses the configured path capacity", () => {
    const pipeline = new CursorPipeline({ pathCapacity: 2 });
    for (let i = 0; i < 5; i++) pipeline.processSample(IDENTITY);

    expect(pipeline.getCursor().path).toHaveLength(2);
    expect(pipeline.config.pathCapacity).toBe(2);
  });

  it("reset() re-seeds and clears the cursor", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const pipeline = new CursorPipeline();
    pipeline.processSample(IDENTITY);
    pipeline.processSample(TILTED);
    pipeline.reset();

    expect(pipeline.getCursor()).toEqual({ x: 0, y: 0, path: [] });
    expect(pipeline.getStats()).toEqual({
      acceptedSamples: 0,
      rejectedSamples: 0,
    });

    // Next sample is a seed again, even though it differs from the last one
    const result = pipeline.processSample(IDENTITY);
    expect(result.accepted && result.delta).toEqual({ dx: 0, dy: 0 });
  });

  it("rejects invalid configuration at construction", () => {
    expect(() => new CursorPipeline({ smoothingAlpha: 0 })).toThrow(
      "smoothingAlpha must be in (0, 1] (got 0)",
    );
  });
});
