import mansionData from "@/data/mansions.json";
import { ChartError, InvalidIdentifierError } from "@/lib/errors";
import { normalizeDegrees } from "@/lib/math/angles";
import { mansionDataSchema } from "@/lib/schemas/astro";
import type { BodyName, MansionInfo, MansionQuarter } from "@/lib/types/astro";

export const MANSION_COUNT = 27;
/** 13°20′ per mansion. */
export const MANSION_SPAN = 360 / MANSION_COUNT;
export const QUARTER_SPAN = MANSION_SPAN / 4;

const QUARTERS = [1, 2, 3, 4] as const;

function loadMansions(): MansionInfo[] {
  const parsed = mansionDataSchema.safeParse(mansionData);

  if (!parsed.success) {
    throw new ChartError("INVALID_DATA", "Mansion table failed validation.", parsed.error.flatten());
  }

  return parsed.data.map((entry, index) => ({ index, name: entry.name, lord: entry.lord }));
}

export const MANSIONS: readonly MansionInfo[] = loadMansions();

export function getMansion(index: number): MansionInfo {
  if (!Number.isInteger(index) || index < 0 || index >= MANSION_COUNT) {
    throw new InvalidIdentifierError("UNKNOWN_MANSION", index);
  }

  return MANSIONS[index];
}

export function mansionLord(index: number): BodyName {
  return getMansion(index).lord;
}

export function mansionIndexOf(longitude: number): number {
  return Math.min(MANSION_COUNT - 1, Math.floor(normalizeDegrees(longitude) / MANSION_SPAN));
}

export function degreesInMansion(longitude: number): number {
  return normalizeDegrees(longitude) - mansionIndexOf(longitude) * MANSION_SPAN;
}

export function mansionQuarter(longitude: number): MansionQuarter {
  return QUARTERS[Math.min(3, Math.floor(degreesInMansion(longitude) / QUARTER_SPAN))];
}
