import { describe, expect, it } from "vitest";

import {
  angularDistance,
  clamp,
  fromDms,
  normalizeDegrees,
  roundTo,
  toDms,
} from "@/lib/math/angles";

describe("normalizeDegrees", () => {
  it("wraps values into [0, 360)", () => {
    expect(normalizeDegrees(-30)).toBe(330);
    expect(normalizeDegrees(370)).toBe(10);
    expect(normalizeDegrees(720)).toBe(0);
    expect(normalizeDegrees(-720)).toBe(0);
  });

  it("never returns 360 for tiny negative inputs", () => {
    expect(normalizeDegrees(-1e-15)).toBe(0);
  });

  it("keeps every sample in range", () => {
    for (const value of [-1080.5, -359.99, -0.01, 0, 59.5, 359.999, 360, 725.25]) {
      const result = normalizeDegrees(value);
      expect(result).toBeGreaterThanOrEqual(0);
      expect(result).toBeLessThan(360);
    }
  });
});

describe("angularDistance", () => {
  it("takes the shorter arc across 0°", () => {
    expect(angularDistance(10, 350)).toBe(20);
    expect(angularDistance(350, 10)).toBe(20);
    expect(angularDistance(0, 180)).toBe(180);
  });

  it("measures zodiacal order when forward only", () => {
    expect(angularDistance(350, 10, true)).toBe(20);
    expect(angularDistance(10, 350, true)).toBe(340);
  });
});

describe("dms conversion", () => {
  it("splits decimal degrees", () => {
    expect(toDms(5.5)).toEqual({ degrees: 5, minutes: 30, seconds: 0 });
    expect(toDms(-1.25)).toEqual({ degrees: -1, minutes: 15, seconds: 0 });
  });

  it("joins degrees, minutes and seconds", () => {
    expect(fromDms(5, 30)).toBe(5.5);
    expect(fromDms(-1, 15)).toBe(-1.25);
    expect(fromDms(0, 0, 36)).toBeCloseTo(0.01, 10);
  });
});

describe("clamp and roundTo", () => {
  it("clamps to the unit interval by default", () => {
    expect(clamp(1.3)).toBe(1);
    expect(clamp(-0.2)).toBe(0);
    expect(clamp(0.45)).toBe(0.45);
  });

  it("rounds to the given digits", () => {
    expect(roundTo(12.3456, 2)).toBe(12.35);
  });
});
