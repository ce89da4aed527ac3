import { DateTime } from "luxon";

import { ChartError } from "@/lib/errors";
import type { BirthMoment, ChartRequestInput } from "@/lib/schemas/astro";
import type { BodyName, RawPosition } from "@/lib/types/astro";

/** Resolves a local wall-clock birth time in an IANA zone to a UTC instant. */
export function resolveBirthInstant(birth: BirthMoment): Date {
  const local = DateTime.fromISO(`${birth.date}T${birth.time}`, { zone: birth.timezone });

  if (!local.isValid) {
    const code = local.invalidReason === "unsupported zone" ? "INVALID_TIMEZONE" : "INVALID_DATETIME";
    throw new ChartError(code, undefined, {
      reason: local.invalidReason,
      explanation: local.invalidExplanation,
    });
  }

  return local.toUTC().toJSDate();
}

export interface NatalLocation {
  latitude: number;
  longitude: number;
}

export function buildNatalRequest(
  birth: BirthMoment,
  location: NatalLocation,
  positions: Partial<Record<BodyName, RawPosition>>,
  ascendant: number | null = null,
): ChartRequestInput {
  return {
    utc: resolveBirthInstant(birth),
    latitude: location.latitude,
    longitude: location.longitude,
    positions,
    ascendant,
  };
}
