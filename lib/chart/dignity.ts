import { getBody } from "@/lib/catalog/bodies";
import { signAt, signIndexOf } from "@/lib/catalog/signs";
import { degreesInSign } from "@/lib/chart/position";
import type { Dignity, DignityTier } from "@/lib/types/astro";

/** Within this many degrees of the exact point a dignity is "exact". */
export const EXACT_DIGNITY_ORB = 1;

/**
 * Evaluated in fixed priority: exaltation, debilitation, own sign
 * (refined to moolatrikona), then neutral.
 */
export function dignity(body: string, longitude: number): Dignity {
  const info = getBody(body);
  const sign = signAt(signIndexOf(longitude)).name;
  const degrees = degreesInSign(longitude);

  if (sign === info.exaltation.sign) {
    return Math.abs(degrees - info.exaltation.degree) <= EXACT_DIGNITY_ORB
      ? "Exalted (exact)"
      : "Exalted";
  }

  if (sign === info.debilitation.sign) {
    return Math.abs(degrees - info.debilitation.degree) <= EXACT_DIGNITY_ORB
      ? "Debilitated (exact)"
      : "Debilitated";
  }

  if (info.owns.includes(sign)) {
    const span = info.moolatrikona;
    if (span && span.sign === sign && degrees >= span.from && degrees <= span.to) {
      return "Moolatrikona";
    }
    return "Own Sign";
  }

  return "Neutral";
}

export function isExalted(value: Dignity): boolean {
  return value === "Exalted" || value === "Exalted (exact)";
}

export function isDebilitated(value: Dignity): boolean {
  return value === "Debilitated" || value === "Debilitated (exact)";
}

export function isOwnOrMoolatrikona(value: Dignity): boolean {
  return value === "Own Sign" || value === "Moolatrikona";
}

export function isDignified(value: Dignity): boolean {
  return isExalted(value) || isOwnOrMoolatrikona(value);
}

/**
 * Collapses a dignity into the tiers used by aspect effects. A neutral
 * placement takes the neutral tier, not the friendly or inimical one.
 */
export function dignityTier(body: string, longitude: number): DignityTier {
  const value = dignity(body, longitude);

  if (isDignified(value)) {
    return "dignified";
  }
  if (isDebilitated(value)) {
    return "debilitated";
  }
  return "neutral";
}
