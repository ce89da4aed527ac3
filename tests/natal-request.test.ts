import { describe, expect, it } from "vitest";

import { ChartError } from "@/lib/errors";
import { buildNatalRequest, resolveBirthInstant } from "@/lib/natal-request";

function errorCode(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    return error instanceof ChartError ? error.code : undefined;
  }
  return undefined;
}

describe("resolveBirthInstant", () => {
  it("applies summer time in the birth zone", () => {
    const utc = resolveBirthInstant({ date: "1990-05-15", time: "14:30", timezone: "Europe/Paris" });
    expect(utc.toISOString()).toBe("1990-05-15T12:30:00.000Z");
  });

  it("applies standard time in winter", () => {
    const utc = resolveBirthInstant({ date: "2000-01-15", time: "09:00:30", timezone: "Europe/Paris" });
    expect(utc.toISOString()).toBe("2000-01-15T08:00:30.000Z");
  });

  it("reports an unknown zone", () => {
    expect(
      errorCode(() => resolveBirthInstant({ date: "1990-05-15", time: "14:30", timezone: "Mars/Olympus" })),
    ).toBe("INVALID_TIMEZONE");
  });

  it("reports an impossible date", () => {
    expect(
      errorCode(() => resolveBirthInstant({ date: "1990-02-30", time: "14:30", timezone: "UTC" })),
    ).toBe("INVALID_DATETIME");
  });
});

describe("buildNatalRequest", () => {
  it("maps a birth moment and location to a chart request", () => {
    const positions = { Sun: { longitude: 54.4, latitude: 0, speed: 0.96 } };
    const payload = buildNatalRequest(
      { date: "1990-05-15", time: "14:30", timezone: "Europe/Paris" },
      { latitude: 48.85, longitude: 2.35 },
      positions,
    );

    expect(payload).toEqual({
      utc: new Date("1990-05-15T12:30:00.000Z"),
      latitude: 48.85,
      longitude: 2.35,
      positions,
      ascendant: null,
    });
  });
});
