import { BODY_NAMES, getBody } from "@/lib/catalog/bodies";
import { assertHouseNumber } from "@/lib/catalog/house-significations";
import { signAt } from "@/lib/catalog/signs";
import {
  DEFAULT_CONJUNCTION_ORB,
  aspectsToHouse,
  conjunctionCloseness,
  houseAspect,
  isAspecting,
} from "@/lib/chart/aspects";
import {
  dignity,
  isDebilitated,
  isExalted,
  isOwnOrMoolatrikona,
} from "@/lib/chart/dignity";
import { type BodyPositions, findHouse, houseNature, lordPlacement } from "@/lib/chart/houses";
import { angularDistance, clamp } from "@/lib/math/angles";
import type {
  AspectMatrix,
  AspectResult,
  BodyName,
  BodyPosition,
  ChartYogas,
  DhanaYoga,
  Dignity,
  Element,
  House,
  HouseNature,
  HouseStrength,
  HouseYoga,
  Quality,
  StrengthCategory,
  StrengthFactor,
  StrengthFactors,
} from "@/lib/types/astro";

export const STRENGTH_WEIGHTS: Readonly<StrengthFactors> = {
  base: 0.2,
  lord: 0.3,
  occupant: 0.25,
  aspect: 0.15,
  sign: 0.1,
};

export const ELEMENT_STRENGTH: Readonly<Record<Element, number>> = {
  Fire: 0.7,
  Earth: 0.6,
  Air: 0.5,
  Water: 0.6,
};

export const QUALITY_STRENGTH: Readonly<Record<Quality, number>> = {
  Cardinal: 0.7,
  Fixed: 0.8,
  Mutable: 0.5,
};

/** Score used when a house has no occupants or receives no aspects. */
export const NEUTRAL_SCORE = 0.3;

const STRENGTH_FACTORS: readonly StrengthFactor[] = ["base", "lord", "occupant", "aspect", "sign"];

const FACTOR_LABELS: Record<StrengthFactor, string> = {
  base: "house nature",
  lord: "lord placement",
  occupant: "occupants",
  aspect: "aspects",
  sign: "sign",
};

export interface StrengthInput {
  houses: readonly House[];
  bodies: BodyPositions;
  /**
   * Reused for the aspect factor only when computed in degree mode;
   * otherwise house aspects are derived from orbs.
   */
  aspects?: AspectMatrix | null;
}

export function baseScore(nature: HouseNature): number {
  if (nature.kendra && nature.trikona) {
    return 1;
  }
  if (nature.kendra || nature.trikona) {
    return 0.8;
  }
  if (nature.upachaya) {
    return 0.6;
  }
  if (nature.dusthana) {
    return 0.2;
  }
  return 0.5;
}

function dignityAdjustment(value: Dignity): number {
  if (isExalted(value)) {
    return 0.4;
  }
  if (isOwnOrMoolatrikona(value)) {
    return 0.3;
  }
  if (isDebilitated(value)) {
    return -0.3;
  }
  return 0;
}

export function lordScore(input: StrengthInput, house: number): number {
  const placement = lordPlacement(input.houses, house, input.bodies);
  if (!placement) {
    return 0;
  }

  const placed = houseNature(placement.placedInHouse);
  let score = 0.5 + dignityAdjustment(placement.dignity);

  if (placed.kendra || placed.trikona) {
    score += 0.2;
  } else if (placed.dusthana) {
    score -= 0.2;
  }

  if (placement.retrograde) {
    score -= 0.1;
  }

  return clamp(score);
}

export function bodyScore(position: BodyPosition): number {
  const nature = getBody(position.body).nature;
  let score = 0.5 + dignityAdjustment(dignity(position.body, position.longitude));

  if (nature === "Benefic") {
    score += 0.1;
  } else if (nature === "Malefic") {
    score -= 0.05;
  }

  if (position.retrograde) {
    score -= 0.1;
  }

  return clamp(score);
}

export function occupantScore(input: StrengthInput, house: number): number {
  const occupants = findHouse(input.houses, house).occupants.flatMap((body) => {
    const position = input.bodies[body];
    return position ? [position] : [];
  });

  if (occupants.length === 0) {
    return NEUTRAL_SCORE;
  }

  return occupants.reduce((sum, position) => sum + bodyScore(position), 0) / occupants.length;
}

/** Always orb-based, whatever mode the chart displays aspects in. */
function incomingAspects(input: StrengthInput, house: number): AspectResult[] {
  if (input.aspects?.mode === "degree") {
    return aspectsToHouse(input.aspects, house);
  }

  const target = findHouse(input.houses, house);
  return BODY_NAMES.flatMap((name) => {
    const position = input.bodies[name];
    if (!position) {
      return [];
    }
    const result = houseAspect(position, target, "degree");
    return isAspecting(result) ? [result] : [];
  });
}

export function aspectScore(input: StrengthInput, house: number): number {
  const aspects = incomingAspects(input, house);
  if (aspects.length === 0) {
    return NEUTRAL_SCORE;
  }

  const weighted = aspects.map((result) => {
    const nature = getBody(result.source).nature;
    const factor = nature === "Benefic" ? 1.2 : nature === "Malefic" ? 0.8 : 1;
    return result.totalStrength * factor;
  });

  return Math.min(1, weighted.reduce((sum, value) => sum + value, 0) / weighted.length);
}

export function signScore(signIndex: number): number {
  const sign = signAt(signIndex);
  return (ELEMENT_STRENGTH[sign.element] + QUALITY_STRENGTH[sign.quality]) / 2;
}

export function strengthCategory(total: number): StrengthCategory {
  if (total >= 0.8) {
    return "Very Strong";
  }
  if (total >= 0.6) {
    return "Strong";
  }
  if (total >= 0.4) {
    return "Moderate";
  }
  return total >= 0.2 ? "Weak" : "Very Weak";
}

export function contributingFactors(factors: StrengthFactors): string[] {
  const labels: string[] = [];

  for (const factor of STRENGTH_FACTORS) {
    if (factors[factor] >= 0.7) {
      labels.push(`Strong ${FACTOR_LABELS[factor]}`);
    } else if (factors[factor] <= 0.3) {
      labels.push(`Weak ${FACTOR_LABELS[factor]}`);
    }
  }

  return labels;
}

export function houseStrength(input: StrengthInput, house: number): HouseStrength {
  const target = findHouse(input.houses, house);

  const factors: StrengthFactors = {
    base: baseScore(target.nature),
    lord: lordScore(input, target.number),
    occupant: occupantScore(input, target.number),
    aspect: aspectScore(input, target.number),
    sign: signScore(target.signIndex),
  };

  const total =
    factors.base * STRENGTH_WEIGHTS.base +
    factors.lord * STRENGTH_WEIGHTS.lord +
    factors.occupant * STRENGTH_WEIGHTS.occupant +
    factors.aspect * STRENGTH_WEIGHTS.aspect +
    factors.sign * STRENGTH_WEIGHTS.sign;

  return {
    house: target.number,
    factors,
    weights: { ...STRENGTH_WEIGHTS },
    total,
    category: strengthCategory(total),
    contributors: contributingFactors(factors),
  };
}

export function allHouseStrengths(input: StrengthInput): HouseStrength[] {
  return input.houses.map((house) => houseStrength(input, house.number));
}

function rankHouses(
  strengths: readonly HouseStrength[],
  count: number,
  direction: 1 | -1,
): Array<{ house: number; total: number }> {
  return [...strengths]
    .sort((a, b) => direction * (b.total - a.total) || a.house - b.house)
    .slice(0, count)
    .map((entry) => ({ house: entry.house, total: entry.total }));
}

/** Ties go to the lower house number. */
export function strongestHouses(strengths: readonly HouseStrength[], count = 3) {
  return rankHouses(strengths, count, 1);
}

export function weakestHouses(strengths: readonly HouseStrength[], count = 3) {
  return rankHouses(strengths, count, -1);
}

export function houseYogas(
  input: StrengthInput,
  house: number,
  conjunctionOrb = DEFAULT_CONJUNCTION_ORB,
): HouseYoga[] {
  const target = findHouse(input.houses, assertHouseNumber(house));
  const yogas: HouseYoga[] = [];
  const placement = lordPlacement(input.houses, target.number, input.bodies);

  if (placement) {
    const placed = houseNature(placement.placedInHouse);
    if ((target.nature.kendra && placed.trikona) || (target.nature.trikona && placed.kendra)) {
      yogas.push({
        kind: "kendra-trikona",
        house: target.number,
        lord: placement.lord,
        placedIn: placement.placedInHouse,
      });
    }

    const other = placement.placedInHouse;
    if (other !== target.number) {
      const reverse = lordPlacement(input.houses, other, input.bodies);
      if (reverse && reverse.lord !== placement.lord && reverse.placedInHouse === target.number) {
        yogas.push({
          kind: "exchange",
          houses: [Math.min(target.number, other), Math.max(target.number, other)],
          lords: target.number < other ? [placement.lord, reverse.lord] : [reverse.lord, placement.lord],
        });
      }
    }
  }

  const occupants = target.occupants.flatMap((body) => {
    const position = input.bodies[body];
    return position ? [position] : [];
  });

  occupants.forEach((first, index) => {
    for (const second of occupants.slice(index + 1)) {
      const distance = angularDistance(first.longitude, second.longitude);
      if (distance <= conjunctionOrb) {
        yogas.push({
          kind: "conjunction",
          house: target.number,
          bodies: [first.body, second.body],
          distance,
          closeness: conjunctionCloseness(distance),
        });
      }
    }
  });

  return yogas;
}

function dhanaLinks(input: StrengthInput, conjunctionOrb: number): DhanaYoga[] {
  const second = lordPlacement(input.houses, 2, input.bodies);
  const eleventh = lordPlacement(input.houses, 11, input.bodies);

  if (!second || !eleventh) {
    return [];
  }

  const lords: [BodyName, BodyName] = [second.lord, eleventh.lord];
  if (second.lord === eleventh.lord) {
    return [{ lords, link: "same-body" }];
  }

  const links: DhanaYoga[] = [];
  const a = input.bodies[second.lord];
  const b = input.bodies[eleventh.lord];

  if (a && b) {
    if (angularDistance(a.longitude, b.longitude) <= conjunctionOrb) {
      links.push({ lords, link: "conjunction" });
    }
    if (second.placedInHouse === 11 && eleventh.placedInHouse === 2) {
      links.push({ lords, link: "exchange" });
    }

    const forward = input.aspects?.bodies[a.body]?.[b.body];
    const reverse = input.aspects?.bodies[b.body]?.[a.body];
    if (forward && reverse && isAspecting(forward) && isAspecting(reverse)) {
      links.push({ lords, link: "mutual-aspect" });
    }
  }

  return links;
}

export function chartYogas(
  input: StrengthInput,
  conjunctionOrb = DEFAULT_CONJUNCTION_ORB,
): ChartYogas {
  const byHouse: Record<number, HouseYoga[]> = {};
  const raja: ChartYogas["raja"] = [];

  for (const house of input.houses) {
    const yogas = houseYogas(input, house.number, conjunctionOrb);
    byHouse[house.number] = yogas;
    for (const yoga of yogas) {
      if (yoga.kind === "kendra-trikona") {
        raja.push(yoga);
      }
    }
  }

  return { byHouse, raja, dhana: dhanaLinks(input, conjunctionOrb) };
}

/**
 * Percentage score from body dignities (3 exalted, 2 own sign or
 * moolatrikona, -2 debilitated, 1 otherwise, out of 3 each) plus 2 points
 * when at least three houses are ranked.
 */
export function overallChartStrength(
  bodies: BodyPositions,
  strengths: readonly HouseStrength[],
): StrengthCategory {
  let points = 0;
  let possible = 0;

  for (const name of BODY_NAMES) {
    const position = bodies[name];
    if (!position) {
      continue;
    }

    const value = dignity(name, position.longitude);
    if (isExalted(value)) {
      points += 3;
    } else if (isOwnOrMoolatrikona(value)) {
      points += 2;
    } else if (isDebilitated(value)) {
      points -= 2;
    } else {
      points += 1;
    }
    possible += 3;
  }

  if (strongestHouses(strengths).length >= 3) {
    points += 2;
  }

  return strengthCategory(points / Math.max(possible, 1));
}
