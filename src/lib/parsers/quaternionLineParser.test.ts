import { afterEach, describe, expect, it, vi } from "vitest";
import { parseQuaternionLine } from "./quaternionLineParser";

describe("parseQuaternionLine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses four comma-separated floats, scalar first", () => {
    expect(parseQuaternionLine("0.9998,0.0120,-0.0031,0.0150")).toEqual([
      0.9998, 0.012, -0.0031, 0.015,
    ]);
  });

  it("tolerates CRLF endings and padding around fields", () => {
    expect(parseQuaternionLine("  1.0 , 0 ,0, -0.5\r\n")).toEqual([
      1, 0, 0, -0.5,
    ]);
  });

  it("ignores fields after the fourth", () => {
    expect(parseQuaternionLine("1,0,0,0,42,extra")).toEqual([1, 0, 0, 0]);
  });

  it("accepts exponent notation", () => {
    expect(parseQuaternionLine("1e0,2.5e-3,0,0")).toEqual([1, 0.0025, 0, 0]);
  });

  it.each(["", "   ", "\r\n"])("returns null for blank line %j", (line) => {
    expect(parseQuaternionLine(line)).toBeNull();
  });

  it("returns null for fewer than four fields", () => {
    expect(parseQuaternionLine("1,0,0")).toBeNull();
  });

  it.each([
    "1,0,abc,0",
    "1,,0,0",
    "1,0,0,NaN",
    "1,0,Infinity,0",
    "# boot banner, v2, ready, ok",
  ])("returns null for non-numeric line %j", (line) => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    expect(parseQuaternionLine(line)).toBeNull();
  });
});
