import * as Astronomy from "astronomy-engine";

import type { EphemerisProvider } from "@/lib/ephemeris/provider";
import { normalizeDegrees } from "@/lib/math/angles";
import {
  ascendantFromSiderealTime,
  julianCenturies,
  julianDay,
  meanObliquity,
} from "@/lib/math/time";
import type { BodyName, RawPosition } from "@/lib/types/astro";

type EngineBodyName = Exclude<BodyName, "Rahu" | "Ketu">;

const ENGINE_BODIES: Record<EngineBodyName, Astronomy.Body> = {
  Sun: Astronomy.Body.Sun,
  Moon: Astronomy.Body.Moon,
  Mars: Astronomy.Body.Mars,
  Mercury: Astronomy.Body.Mercury,
  Jupiter: Astronomy.Body.Jupiter,
  Venus: Astronomy.Body.Venus,
  Saturn: Astronomy.Body.Saturn,
};

const HALF_DAY_MS = 12 * 3600 * 1000;

/** Mean daily motion of the lunar node, degrees per day (always retrograde). */
export const MEAN_NODE_DAILY_MOTION = -0.0529539;

/** Tropical longitude of the mean ascending lunar node (Meeus 47.7). */
export function meanLunarNode(jd: number): number {
  const t = julianCenturies(jd);
  return normalizeDegrees(
    125.04452 - 1934.136261 * t + 0.0020708 * t * t + (t * t * t) / 450000,
  );
}

function geocentricEcliptic(body: Astronomy.Body, date: Date): { longitude: number; latitude: number } {
  const ecliptic = Astronomy.Ecliptic(Astronomy.GeoVector(body, date, true));
  return { longitude: normalizeDegrees(ecliptic.elon), latitude: ecliptic.elat };
}

function signedDelta(from: number, to: number): number {
  const diff = normalizeDegrees(to - from);
  return diff > 180 ? diff - 360 : diff;
}

export class AstronomyEngineProvider implements EphemerisProvider {
  readonly name = "astronomy-engine";

  async getPosition(body: BodyName, utc: Date): Promise<RawPosition | null> {
    if (body === "Rahu" || body === "Ketu") {
      const node = meanLunarNode(julianDay(utc));
      return {
        longitude: body === "Rahu" ? node : normalizeDegrees(node + 180),
        latitude: 0,
        speed: MEAN_NODE_DAILY_MOTION,
      };
    }

    const engineBody = ENGINE_BODIES[body];
    const now = geocentricEcliptic(engineBody, utc);
    const before = geocentricEcliptic(engineBody, new Date(utc.getTime() - HALF_DAY_MS));
    const after = geocentricEcliptic(engineBody, new Date(utc.getTime() + HALF_DAY_MS));

    return {
      longitude: now.longitude,
      latitude: now.latitude,
      speed: signedDelta(before.longitude, after.longitude),
    };
  }

  async getAscendant(utc: Date, latitude: number, longitude: number): Promise<number | null> {
    const lst = normalizeDegrees(Astronomy.SiderealTime(utc) * 15 + longitude);
    return ascendantFromSiderealTime(lst, latitude, meanObliquity(julianDay(utc)));
  }
}
