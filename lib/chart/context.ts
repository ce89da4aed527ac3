import { BODY_NAMES, getBody } from "@/lib/catalog/bodies";
import { getMansion, mansionIndexOf, mansionQuarter } from "@/lib/catalog/mansions";
import { computeAspectMatrix } from "@/lib/chart/aspects";
import { dignity, isDignified } from "@/lib/chart/dignity";
import {
  type BodyPositions,
  buildHouses,
  houseOfLongitude,
  isInJunction,
  lordPlacement,
} from "@/lib/chart/houses";
import { derivePosition, divisionalSigns, pointPosition } from "@/lib/chart/position";
import {
  type StrengthInput,
  allHouseStrengths,
  chartYogas,
  overallChartStrength,
  strongestHouses,
  weakestHouses,
} from "@/lib/chart/strength";
import { loadConfig } from "@/lib/config";
import { ChartError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import {
  DEFAULT_AYANAMSA,
  ascendantFromSiderealTime,
  ayanamsa,
  isKnownAyanamsa,
  julianDay,
  localSiderealTime,
  meanObliquity,
  tropicalToSidereal,
} from "@/lib/math/time";
import { type ChartConfig, type ChartRequestInput, chartRequestSchema } from "@/lib/schemas/astro";
import type {
  AscendantInfo,
  BodyName,
  ChartBody,
  ChartContext,
  ChartSummary,
  HouseStrength,
  LordPlacement,
  SpecialPoints,
} from "@/lib/types/astro";

/** Tropical ascendant from local sidereal time, for when no provider supplies one. */
export function fallbackAscendant(utc: Date, latitude: number, longitude: number): number {
  const jd = julianDay(utc);
  return ascendantFromSiderealTime(localSiderealTime(jd, longitude), latitude, meanObliquity(jd));
}

function describeAscendant(longitude: number, source: AscendantInfo["source"]): AscendantInfo {
  const point = pointPosition(longitude);

  return {
    ...point,
    source,
    mansion: getMansion(mansionIndexOf(point.longitude)).name,
    quarter: mansionQuarter(point.longitude),
  };
}

/** Equal houses put the midheaven at the cusp of the 10th. */
export function specialPoints(ascendant: number | null, bodies: BodyPositions): SpecialPoints {
  if (ascendant === null) {
    return { midheaven: null, partOfFortune: null };
  }

  const { Sun: sun, Moon: moon } = bodies;

  return {
    midheaven: pointPosition(ascendant + 270),
    partOfFortune: sun && moon ? pointPosition(ascendant + moon.longitude - sun.longitude) : null,
  };
}

export function summarizeChart(
  ascendant: AscendantInfo | null,
  bodies: BodyPositions,
  strengths: readonly HouseStrength[],
): ChartSummary {
  const dignifiedBodies = BODY_NAMES.flatMap((name) => {
    const position = bodies[name];
    if (!position) {
      return [];
    }
    const value = dignity(name, position.longitude);
    return isDignified(value) ? [`${name} (${value})`] : [];
  });

  return {
    ascendantSign: ascendant?.sign ?? null,
    dignifiedBodies,
    strongestHouses: strongestHouses(strengths),
    weakestHouses: weakestHouses(strengths),
    overallStrength: overallChartStrength(bodies, strengths),
  };
}

/**
 * Validates a chart request and derives every structure of the chart.
 * Bodies the request lacks are listed in `missingBodies`; without an
 * ascendant no houses are built. Either makes the chart "incomplete".
 */
export function buildChartContext(
  request: ChartRequestInput,
  config: ChartConfig = loadConfig(),
): ChartContext {
  const parsed = chartRequestSchema.safeParse(request);

  if (!parsed.success) {
    throw new ChartError("INVALID_REQUEST", undefined, parsed.error.flatten());
  }

  const input = parsed.data;
  const log = createLogger(config.logLevel);
  const ayanamsaSystem = input.ayanamsa ?? config.defaultAyanamsa;
  const aspectMode = input.aspectMode ?? config.defaultAspectMode;
  const conjunctionOrb = input.conjunctionOrb ?? config.conjunctionOrb;
  const junctionOrb = input.junctionOrb ?? config.junctionOrb;

  if (!isKnownAyanamsa(ayanamsaSystem)) {
    log.warn(`Unknown ayanamsa system "${ayanamsaSystem}", using ${DEFAULT_AYANAMSA}`);
  }

  const jd = julianDay(input.utc);
  const offset = ayanamsa(jd, ayanamsaSystem);

  const positions: BodyPositions = {};
  const missingBodies: BodyName[] = [];

  for (const name of BODY_NAMES) {
    const raw = input.positions[name];
    if (!raw) {
      missingBodies.push(name);
      continue;
    }
    positions[name] = derivePosition(
      name,
      tropicalToSidereal(raw.longitude, offset),
      raw.latitude,
      raw.speed,
    );
  }

  if (missingBodies.length > 0) {
    log.warn("Chart is missing body positions", { missingBodies });
  }

  let ascendant: AscendantInfo | null = null;
  if (input.ascendant !== undefined && input.ascendant !== null) {
    ascendant = describeAscendant(tropicalToSidereal(input.ascendant, offset), "ephemeris");
  } else if (input.allowAscendantFallback) {
    log.info("Ascendant not supplied, using sidereal-time fallback");
    const tropical = fallbackAscendant(input.utc, input.latitude, input.longitude);
    ascendant = describeAscendant(tropicalToSidereal(tropical, offset), "fallback");
  } else {
    log.warn("Ascendant not supplied and fallback disabled, houses omitted");
  }

  const houses = ascendant ? buildHouses(ascendant.longitude, positions, junctionOrb) : [];
  const aspects = input.includeAspects ? computeAspectMatrix(positions, houses, aspectMode) : null;
  const strengthInput: StrengthInput = { houses, bodies: positions, aspects };
  const strengths = allHouseStrengths(strengthInput);

  const lordPlacements: Partial<Record<number, LordPlacement>> = {};
  for (const house of houses) {
    const placement = lordPlacement(houses, house.number, positions);
    if (placement) {
      lordPlacements[house.number] = placement;
    }
  }

  const bodies: Partial<Record<BodyName, ChartBody>> = {};
  for (const name of BODY_NAMES) {
    const position = positions[name];
    if (!position) {
      continue;
    }
    bodies[name] = {
      ...position,
      dignity: dignity(name, position.longitude),
      nature: getBody(name).nature,
      house: ascendant ? houseOfLongitude(position.longitude, ascendant.longitude) : null,
      inJunction: isInJunction(position.longitude, houses, junctionOrb),
      divisional: divisionalSigns(position.longitude),
    };
  }

  return {
    utc: input.utc.toISOString(),
    julianDay: jd,
    latitude: input.latitude,
    longitude: input.longitude,
    ayanamsaSystem: isKnownAyanamsa(ayanamsaSystem) ? ayanamsaSystem : DEFAULT_AYANAMSA,
    ayanamsa: offset,
    aspectMode,
    conjunctionOrb,
    status: missingBodies.length === 0 && ascendant !== null ? "complete" : "incomplete",
    missingBodies,
    ascendant,
    bodies,
    houses,
    lordPlacements,
    strengths,
    yogas: chartYogas(strengthInput, conjunctionOrb),
    aspects,
    specialPoints: specialPoints(ascendant?.longitude ?? null, positions),
    summary: summarizeChart(ascendant, positions, strengths),
  };
}
