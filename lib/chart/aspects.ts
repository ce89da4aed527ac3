import { BODY_NAMES, aspectLabel, effectiveAspectAngles, getBody } from "@/lib/catalog/bodies";
import { signAt, signIndexOf } from "@/lib/catalog/signs";
import { dignity, dignityTier } from "@/lib/chart/dignity";
import { type BodyPositions, findHouse } from "@/lib/chart/houses";
import { angularDistance, normalizeDegrees } from "@/lib/math/angles";
import type {
  AspectInfluence,
  AspectMatch,
  AspectMatrix,
  AspectMode,
  AspectResult,
  AspectSummary,
  AspectTarget,
  BodyName,
  BodyPosition,
  Conjunction,
  ConjunctionCloseness,
  DignityTier,
  DrishtiEffect,
  House,
  HouseAspectSummary,
  MutualAspect,
  NaturalNature,
  OrbCategory,
} from "@/lib/types/astro";

export const DEFAULT_CONJUNCTION_ORB = 8;

interface OrbBand {
  category: Exclude<OrbCategory, "none">;
  maxOrb: number;
  strength: number;
}

/** Upper bounds are inclusive: an orb of exactly 3° is still "close". */
export const ORB_BANDS: readonly OrbBand[] = [
  { category: "exact", maxOrb: 1, strength: 1 },
  { category: "close", maxOrb: 3, strength: 0.75 },
  { category: "wide", maxOrb: 5, strength: 0.5 },
  { category: "very_wide", maxOrb: 8, strength: 0.25 },
];

export function classifyOrb(orb: number): { category: OrbCategory; strength: number } {
  const band = ORB_BANDS.find((entry) => orb <= entry.maxOrb);
  return band ? { category: band.category, strength: band.strength } : { category: "none", strength: 0 };
}

const EFFECTS: Record<Exclude<NaturalNature, "Neutral">, Record<DignityTier, DrishtiEffect>> = {
  Benefic: {
    dignified: "Very Auspicious",
    friendly: "Auspicious",
    neutral: "Mildly Auspicious",
    inimical: "Neutral",
    debilitated: "Neutral",
  },
  Malefic: {
    dignified: "Neutral",
    friendly: "Mildly Inauspicious",
    neutral: "Inauspicious",
    inimical: "Very Inauspicious",
    debilitated: "Extremely Inauspicious",
  },
};

export function strengthQualifier(strength: number): "Strong" | "Moderate" | "Weak" {
  if (strength >= 0.75) {
    return "Strong";
  }
  return strength >= 0.5 ? "Moderate" : "Weak";
}

/**
 * Qualitative outcome of an aspect from the aspecting body's nature and
 * its dignity tier at the aspected point. Degree mode prefixes the orb
 * strength, e.g. "Strong Very Auspicious".
 */
export function drishtiEffect(
  nature: NaturalNature,
  tier: DignityTier,
  mode: AspectMode = "rasi",
  strength = 1,
): string {
  const effect: DrishtiEffect = nature === "Neutral" ? "Neutral" : EFFECTS[nature][tier];
  return mode === "degree" ? `${strengthQualifier(strength)} ${effect}` : effect;
}

function buildMatch(
  source: BodyPosition,
  angle: number,
  aspectPoint: number,
  orb: number | null,
  category: Exclude<OrbCategory, "none">,
  strength: number,
  mode: AspectMode,
): AspectMatch {
  const nature = getBody(source.body).nature;

  return {
    angle,
    label: aspectLabel(angle),
    orb,
    category,
    strength,
    aspectedSign: signAt(signIndexOf(aspectPoint)).name,
    dignity: dignity(source.body, aspectPoint),
    effect: drishtiEffect(nature, dignityTier(source.body, aspectPoint), mode, strength),
  };
}

function strongest(matches: readonly AspectMatch[]): AspectMatch | null {
  return matches.reduce<AspectMatch | null>(
    (best, match) => (best === null || match.strength > best.strength ? match : best),
    null,
  );
}

/**
 * Directed aspect from `source` onto a target longitude. In rasi mode the
 * whole sign is aspected and every match has strength 1; in degree mode
 * each angle is scored by its orb.
 */
export function aspectToLongitude(
  source: BodyPosition,
  targetLongitude: number,
  target: AspectTarget,
  mode: AspectMode,
): AspectResult {
  const angles = effectiveAspectAngles(source.body, {
    retrograde: source.retrograde,
    signIndex: source.signIndex,
  });
  const matches: AspectMatch[] = [];

  if (mode === "rasi") {
    const targetSign = signIndexOf(targetLongitude);

    for (const angle of angles) {
      const aspectedSign = (source.signIndex + Math.floor(angle / 30)) % 12;
      if (aspectedSign === targetSign) {
        matches.push(buildMatch(source, angle, aspectedSign * 30 + 15, null, "exact", 1, mode));
      }
    }
  } else {
    for (const angle of angles) {
      const aspectPoint = normalizeDegrees(source.longitude + angle);
      const orb = angularDistance(aspectPoint, targetLongitude);
      const { category, strength } = classifyOrb(orb);

      if (category !== "none") {
        matches.push(buildMatch(source, angle, aspectPoint, orb, category, strength, mode));
      }
    }
  }

  const primary = strongest(matches);

  return {
    source: source.body,
    target,
    mode,
    angularDistance: angularDistance(source.longitude, targetLongitude),
    matches,
    primary,
    orbCategory: primary?.category ?? "none",
    strength: primary?.strength ?? 0,
    totalStrength: matches.reduce((sum, match) => sum + match.strength, 0),
  };
}

export function bodyAspect(
  source: BodyPosition,
  target: BodyPosition,
  mode: AspectMode,
): AspectResult {
  if (source.body === target.body) {
    return {
      source: source.body,
      target: { kind: "body", body: target.body },
      mode,
      angularDistance: 0,
      matches: [],
      primary: null,
      orbCategory: "none",
      strength: 0,
      totalStrength: 0,
    };
  }

  return aspectToLongitude(source, target.longitude, { kind: "body", body: target.body }, mode);
}

export function houseAspect(source: BodyPosition, house: House, mode: AspectMode): AspectResult {
  return aspectToLongitude(source, house.cusp, { kind: "house", house: house.number }, mode);
}

export function isAspecting(result: AspectResult): boolean {
  return result.primary !== null;
}

function presentBodies(bodies: BodyPositions): BodyPosition[] {
  return BODY_NAMES.flatMap((name) => {
    const position = bodies[name];
    return position ? [position] : [];
  });
}

export function computeAspectMatrix(
  bodies: BodyPositions,
  houses: readonly House[],
  mode: AspectMode,
): AspectMatrix {
  const matrix: AspectMatrix = { mode, bodies: {}, houses: {} };
  const present = presentBodies(bodies);

  for (const source of present) {
    const row: Partial<Record<BodyName, AspectResult>> = {};
    for (const target of present) {
      row[target.body] = bodyAspect(source, target, mode);
    }
    matrix.bodies[source.body] = row;
    matrix.houses[source.body] = houses.map((house) => houseAspect(source, house, mode));
  }

  return matrix;
}

/** Every aspecting body-to-body entry, in source then target order. */
export function activeBodyAspects(matrix: AspectMatrix): AspectResult[] {
  return BODY_NAMES.flatMap((source) =>
    BODY_NAMES.flatMap((target) => {
      const result = matrix.bodies[source]?.[target];
      return result && isAspecting(result) ? [result] : [];
    }),
  );
}

export function aspectsToBody(matrix: AspectMatrix, target: BodyName): AspectResult[] {
  return activeBodyAspects(matrix).filter(
    (result) => result.target.kind === "body" && result.target.body === target,
  );
}

export function aspectsFromBody(matrix: AspectMatrix, source: BodyName): AspectResult[] {
  return activeBodyAspects(matrix).filter((result) => result.source === source);
}

export function aspectsToHouse(matrix: AspectMatrix, house: number): AspectResult[] {
  return BODY_NAMES.flatMap((source) =>
    (matrix.houses[source] ?? []).filter(
      (result) => isAspecting(result) && result.target.kind === "house" && result.target.house === house,
    ),
  );
}

export function mutualAspects(matrix: AspectMatrix): MutualAspect[] {
  const pairs: MutualAspect[] = [];

  BODY_NAMES.forEach((first, index) => {
    for (const second of BODY_NAMES.slice(index + 1)) {
      const forward = matrix.bodies[first]?.[second];
      const reverse = matrix.bodies[second]?.[first];

      if (forward && reverse && isAspecting(forward) && isAspecting(reverse)) {
        pairs.push({
          bodies: [first, second],
          forward,
          reverse,
          combinedStrength: forward.totalStrength + reverse.totalStrength,
        });
      }
    }
  });

  return pairs;
}

export function conjunctionCloseness(distance: number): ConjunctionCloseness {
  if (distance <= 1) {
    return "Very Close";
  }
  if (distance <= 3) {
    return "Close";
  }
  return distance <= 5 ? "Moderate" : "Wide";
}

export function conjunctions(
  bodies: BodyPositions,
  orb = DEFAULT_CONJUNCTION_ORB,
): Conjunction[] {
  const present = presentBodies(bodies);
  const found: Conjunction[] = [];

  present.forEach((first, index) => {
    for (const second of present.slice(index + 1)) {
      const distance = angularDistance(first.longitude, second.longitude);
      if (distance <= orb) {
        found.push({
          bodies: [first.body, second.body],
          distance,
          closeness: conjunctionCloseness(distance),
        });
      }
    }
  });

  return found;
}

/** Ties go to the body listed first in the catalog. */
function mostFrequent(counts: ReadonlyMap<BodyName, number>): BodyName | null {
  let best: BodyName | null = null;
  let bestCount = 0;

  for (const body of BODY_NAMES) {
    const count = counts.get(body) ?? 0;
    if (count > bestCount) {
      best = body;
      bestCount = count;
    }
  }

  return best;
}

export function aspectSummary(
  matrix: AspectMatrix,
  bodies: BodyPositions,
  conjunctionOrb = DEFAULT_CONJUNCTION_ORB,
): AspectSummary {
  const active = activeBodyAspects(matrix);
  const byAngle: Record<string, number> = {};
  const received = new Map<BodyName, number>();
  const cast = new Map<BodyName, number>();

  for (const result of active) {
    const angle = String(result.primary?.angle ?? 0);
    byAngle[angle] = (byAngle[angle] ?? 0) + 1;
    cast.set(result.source, (cast.get(result.source) ?? 0) + 1);
    if (result.target.kind === "body") {
      received.set(result.target.body, (received.get(result.target.body) ?? 0) + 1);
    }
  }

  const total = active.reduce((sum, result) => sum + result.totalStrength, 0);

  return {
    totalAspects: active.length,
    averageStrength: active.length > 0 ? total / active.length : 0,
    byAngle,
    strong: active.filter((result) => result.totalStrength >= 0.75),
    weak: active.filter((result) => result.totalStrength <= 0.25),
    exact: active.filter((result) => result.orbCategory === "exact"),
    mostAspected: mostFrequent(received),
    mostAspecting: mostFrequent(cast),
    conjunctions: conjunctions(bodies, conjunctionOrb),
    mutualAspects: mutualAspects(matrix),
  };
}

function effectTone(effect: string): "auspicious" | "inauspicious" | "neutral" {
  if (effect.endsWith("Inauspicious")) {
    return "inauspicious";
  }
  return effect.endsWith("Auspicious") ? "auspicious" : "neutral";
}

export function houseAspectSummary(
  matrix: AspectMatrix,
  houses: readonly House[],
  house: number,
): HouseAspectSummary {
  const target = findHouse(houses, house);
  const aspects = aspectsToHouse(matrix, target.number);
  const counts = { auspicious: 0, inauspicious: 0, neutral: 0 };

  for (const result of aspects) {
    counts[effectTone(result.primary?.effect ?? "Neutral")] += 1;
  }

  let influence: AspectInfluence = "No major aspects";
  if (aspects.length > 0) {
    if (counts.auspicious > counts.inauspicious) {
      influence = "Predominantly Auspicious";
    } else if (counts.inauspicious > counts.auspicious) {
      influence = "Predominantly Inauspicious";
    } else {
      influence = "Mixed Influences";
    }
  }

  return {
    house: target.number,
    aspects,
    ...counts,
    strongest: aspects.reduce<AspectResult | null>(
      (best, result) => (best === null || result.totalStrength > best.totalStrength ? result : best),
      null,
    ),
    influence,
  };
}
