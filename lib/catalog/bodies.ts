import { InvalidIdentifierError } from "@/lib/errors";
import type { BodyInfo, BodyName, NaturalNature, Relationship } from "@/lib/types/astro";

export const BODY_NAMES = [
  "Sun",
  "Moon",
  "Mars",
  "Mercury",
  "Jupiter",
  "Venus",
  "Saturn",
  "Rahu",
  "Ketu",
] as const satisfies readonly BodyName[];

export const BODIES: Readonly<Record<BodyName, BodyInfo>> = {
  Sun: {
    name: "Sun",
    sanskrit: "Surya",
    nature: "Malefic",
    friends: ["Moon", "Mars", "Jupiter"],
    neutrals: ["Mercury"],
    enemies: ["Venus", "Saturn", "Rahu", "Ketu"],
    owns: ["Leo"],
    exaltation: { sign: "Aries", degree: 10 },
    debilitation: { sign: "Libra", degree: 10 },
    moolatrikona: { sign: "Leo", from: 0, to: 20 },
    aspectAngles: [180],
    retrogradeSwaps: [],
    lunarNode: false,
  },
  Moon: {
    name: "Moon",
    sanskrit: "Chandra",
    nature: "Benefic",
    friends: ["Sun", "Mercury"],
    neutrals: ["Mars", "Jupiter", "Venus", "Saturn"],
    enemies: ["Rahu", "Ketu"],
    owns: ["Cancer"],
    exaltation: { sign: "Taurus", degree: 3 },
    debilitation: { sign: "Scorpio", degree: 3 },
    moolatrikona: { sign: "Taurus", from: 4, to: 30 },
    aspectAngles: [180],
    retrogradeSwaps: [],
    lunarNode: false,
  },
  Mars: {
    name: "Mars",
    sanskrit: "Mangala",
    nature: "Malefic",
    friends: ["Sun", "Moon", "Jupiter"],
    neutrals: ["Venus", "Saturn"],
    enemies: ["Mercury", "Rahu", "Ketu"],
    owns: ["Aries", "Scorpio"],
    exaltation: { sign: "Capricorn", degree: 28 },
    debilitation: { sign: "Cancer", degree: 28 },
    moolatrikona: { sign: "Aries", from: 0, to: 12 },
    aspectAngles: [90, 180, 210],
    retrogradeSwaps: [
      [90, 270],
      [210, 150],
    ],
    lunarNode: false,
  },
  Mercury: {
    name: "Mercury",
    sanskrit: "Budha",
    nature: "Neutral",
    friends: ["Sun", "Venus"],
    neutrals: ["Mars", "Jupiter", "Saturn"],
    enemies: ["Moon", "Rahu", "Ketu"],
    owns: ["Gemini", "Virgo"],
    exaltation: { sign: "Virgo", degree: 15 },
    debilitation: { sign: "Pisces", degree: 15 },
    moolatrikona: { sign: "Virgo", from: 16, to: 20 },
    aspectAngles: [180],
    retrogradeSwaps: [],
    lunarNode: false,
  },
  Jupiter: {
    name: "Jupiter",
    sanskrit: "Guru",
    nature: "Benefic",
    friends: ["Sun", "Moon", "Mars"],
    neutrals: ["Saturn"],
    enemies: ["Mercury", "Venus", "Rahu", "Ketu"],
    owns: ["Sagittarius", "Pisces"],
    exaltation: { sign: "Cancer", degree: 5 },
    debilitation: { sign: "Capricorn", degree: 5 },
    moolatrikona: { sign: "Sagittarius", from: 0, to: 10 },
    aspectAngles: [120, 180, 240],
    retrogradeSwaps: [],
    lunarNode: false,
  },
  Venus: {
    name: "Venus",
    sanskrit: "Shukra",
    nature: "Benefic",
    friends: ["Mercury", "Saturn"],
    neutrals: ["Mars", "Jupiter"],
    enemies: ["Sun", "Moon", "Rahu", "Ketu"],
    owns: ["Taurus", "Libra"],
    exaltation: { sign: "Pisces", degree: 27 },
    debilitation: { sign: "Virgo", degree: 27 },
    moolatrikona: { sign: "Libra", from: 0, to: 15 },
    aspectAngles: [180],
    retrogradeSwaps: [],
    lunarNode: false,
  },
  Saturn: {
    name: "Saturn",
    sanskrit: "Shani",
    nature: "Malefic",
    friends: ["Mercury", "Venus"],
    neutrals: ["Jupiter"],
    enemies: ["Sun", "Moon", "Mars", "Rahu", "Ketu"],
    owns: ["Capricorn", "Aquarius"],
    exaltation: { sign: "Libra", degree: 20 },
    debilitation: { sign: "Aries", degree: 20 },
    moolatrikona: { sign: "Aquarius", from: 0, to: 20 },
    aspectAngles: [60, 180, 270],
    retrogradeSwaps: [
      [60, 300],
      [270, 90],
    ],
    lunarNode: false,
  },
  Rahu: {
    name: "Rahu",
    sanskrit: "Rahu",
    nature: "Malefic",
    friends: ["Mercury", "Venus", "Saturn"],
    neutrals: [],
    enemies: ["Sun", "Moon", "Mars", "Jupiter"],
    owns: [],
    exaltation: { sign: "Gemini", degree: 15 },
    debilitation: { sign: "Sagittarius", degree: 15 },
    moolatrikona: { sign: "Gemini", from: 0, to: 30 },
    aspectAngles: [120, 240],
    retrogradeSwaps: [],
    lunarNode: true,
  },
  Ketu: {
    name: "Ketu",
    sanskrit: "Ketu",
    nature: "Malefic",
    friends: ["Mars", "Venus", "Saturn"],
    neutrals: [],
    enemies: ["Sun", "Moon", "Mercury", "Jupiter"],
    owns: [],
    exaltation: { sign: "Sagittarius", degree: 15 },
    debilitation: { sign: "Gemini", degree: 15 },
    moolatrikona: { sign: "Sagittarius", from: 0, to: 30 },
    aspectAngles: [120, 240],
    retrogradeSwaps: [],
    lunarNode: true,
  },
};

export function isBodyName(value: string): value is BodyName {
  return Object.prototype.hasOwnProperty.call(BODIES, value);
}

export function getBody(name: string): BodyInfo {
  if (!isBodyName(name)) {
    throw new InvalidIdentifierError("UNKNOWN_BODY", name);
  }

  return BODIES[name];
}

export function bodyNature(name: string): NaturalNature {
  return getBody(name).nature;
}

/**
 * Looked up in the subject's own tables, which are not symmetric. Pairs
 * listed nowhere (node against node, a body against itself) are "Unknown".
 */
export function relationship(subject: string, other: string): Relationship {
  const info = getBody(subject);
  const target = getBody(other).name;

  if (info.friends.includes(target)) {
    return "Friend";
  }
  if (info.neutrals.includes(target)) {
    return "Neutral";
  }
  if (info.enemies.includes(target)) {
    return "Enemy";
  }

  return "Unknown";
}

export interface AspectAngleContext {
  retrograde: boolean;
  signIndex: number;
}

export function effectiveAspectAngles(name: string, context: AspectAngleContext): number[] {
  const info = getBody(name);

  const angles = info.aspectAngles.map((angle) => {
    if (!context.retrograde) {
      return angle;
    }

    const swap = info.retrogradeSwaps.find(([from]) => from === angle);
    return swap ? swap[1] : angle;
  });

  if (info.lunarNode) {
    angles.push(context.signIndex % 2 === 1 ? 30 : 330);
  }

  return angles;
}

function ordinal(value: number): string {
  const tens = value % 100;
  if (tens >= 11 && tens <= 13) {
    return `${value}th`;
  }

  switch (value % 10) {
    case 1:
      return `${value}st`;
    case 2:
      return `${value}nd`;
    case 3:
      return `${value}rd`;
    default:
      return `${value}th`;
  }
}

/** Display name only, e.g. 180 -> "7th Aspect". */
export function aspectLabel(angle: number): string {
  return `${ordinal(Math.round(angle / 30) + 1)} Aspect`;
}
