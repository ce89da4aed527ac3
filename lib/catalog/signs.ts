import { BODIES, BODY_NAMES } from "@/lib/catalog/bodies";
import { InvalidIdentifierError } from "@/lib/errors";
import { normalizeDegrees } from "@/lib/math/angles";
import type { BodyName, Element, Quality, SignInfo, SignName } from "@/lib/types/astro";

export const SIGN_NAMES = [
  "Aries",
  "Taurus",
  "Gemini",
  "Cancer",
  "Leo",
  "Virgo",
  "Libra",
  "Scorpio",
  "Sagittarius",
  "Capricorn",
  "Aquarius",
  "Pisces",
] as const satisfies readonly SignName[];

const SANSKRIT_NAMES = [
  "Mesha",
  "Vrishabha",
  "Mithuna",
  "Karka",
  "Simha",
  "Kanya",
  "Tula",
  "Vrischika",
  "Dhanu",
  "Makara",
  "Kumbha",
  "Meena",
];

const ELEMENT_CYCLE: readonly Element[] = ["Fire", "Earth", "Air", "Water"];
const QUALITY_CYCLE: readonly Quality[] = ["Cardinal", "Fixed", "Mutable"];

const RULERS: readonly BodyName[] = [
  "Mars",
  "Venus",
  "Mercury",
  "Moon",
  "Sun",
  "Mercury",
  "Venus",
  "Mars",
  "Jupiter",
  "Saturn",
  "Saturn",
  "Jupiter",
];

const FIERY_FRIENDS: readonly BodyName[] = ["Sun", "Moon", "Mars", "Jupiter"];
const EARTHY_FRIENDS: readonly BodyName[] = ["Mercury", "Venus", "Saturn"];
const AIRY_FRIENDS: readonly BodyName[] = ["Sun", "Mercury", "Venus"];

const SIGN_FRIENDSHIPS: Record<SignName, { friends: readonly BodyName[]; enemies: readonly BodyName[] }> = {
  Aries: { friends: FIERY_FRIENDS, enemies: EARTHY_FRIENDS },
  Taurus: { friends: EARTHY_FRIENDS, enemies: ["Sun", "Moon", "Mars"] },
  Gemini: { friends: AIRY_FRIENDS, enemies: ["Moon", "Mars", "Jupiter"] },
  Cancer: { friends: FIERY_FRIENDS, enemies: EARTHY_FRIENDS },
  Leo: { friends: FIERY_FRIENDS, enemies: EARTHY_FRIENDS },
  Virgo: { friends: AIRY_FRIENDS, enemies: ["Moon", "Mars", "Jupiter"] },
  Libra: { friends: EARTHY_FRIENDS, enemies: ["Sun", "Moon", "Mars"] },
  Scorpio: { friends: FIERY_FRIENDS, enemies: EARTHY_FRIENDS },
  Sagittarius: { friends: FIERY_FRIENDS, enemies: EARTHY_FRIENDS },
  Capricorn: { friends: EARTHY_FRIENDS, enemies: ["Sun", "Moon", "Mars"] },
  Aquarius: { friends: EARTHY_FRIENDS, enemies: ["Sun", "Moon", "Mars"] },
  Pisces: { friends: FIERY_FRIENDS, enemies: EARTHY_FRIENDS },
};

function bodyExaltedIn(sign: SignName): BodyName | null {
  return BODY_NAMES.find((body) => BODIES[body].exaltation.sign === sign) ?? null;
}

function bodyDebilitatedIn(sign: SignName): BodyName | null {
  return BODY_NAMES.find((body) => BODIES[body].debilitation.sign === sign) ?? null;
}

export const SIGNS: readonly SignInfo[] = SIGN_NAMES.map((name, index): SignInfo => ({
  index,
  name,
  sanskrit: SANSKRIT_NAMES[index],
  element: ELEMENT_CYCLE[index % 4],
  quality: QUALITY_CYCLE[index % 3],
  gender: index % 2 === 0 ? "Male" : "Female",
  ruler: RULERS[index],
  exaltation: bodyExaltedIn(name),
  debilitation: bodyDebilitatedIn(name),
  friends: SIGN_FRIENDSHIPS[name].friends,
  enemies: SIGN_FRIENDSHIPS[name].enemies,
}));

function wrapIndex(index: number): number {
  return ((Math.floor(index) % 12) + 12) % 12;
}

export function isSignName(value: string): value is SignName {
  return Object.prototype.hasOwnProperty.call(SIGN_FRIENDSHIPS, value);
}

export function getSign(name: string): SignInfo {
  if (!isSignName(name)) {
    throw new InvalidIdentifierError("UNKNOWN_SIGN", name);
  }

  return SIGNS[SIGN_NAMES.indexOf(name)];
}

/** Zero-based index, wrapped into the zodiac. */
export function signAt(index: number): SignInfo {
  return SIGNS[wrapIndex(index)];
}

/** One-based sign number as written in charts (1 = Aries). */
export function signByNumber(value: number): SignInfo {
  if (!Number.isInteger(value) || value < 1 || value > 12) {
    throw new InvalidIdentifierError("UNKNOWN_SIGN", value);
  }

  return SIGNS[value - 1];
}

export function signIndexOf(longitude: number): number {
  return Math.min(11, Math.floor(normalizeDegrees(longitude) / 30));
}

export function signOf(longitude: number): SignInfo {
  return SIGNS[signIndexOf(longitude)];
}

export function oppositeSign(index: number): number {
  return wrapIndex(index + 6);
}

export function trineSigns(index: number): number[] {
  return [0, 4, 8].map((offset) => wrapIndex(index + offset));
}

export function kendraSigns(index: number): number[] {
  return [0, 3, 6, 9].map((offset) => wrapIndex(index + offset));
}

/** Inclusive count from `from` to `to`, so the same sign is 1. */
export function signDistance(from: number, to: number): number {
  return wrapIndex(to - from) + 1;
}

/**
 * Whole-sign aspects: movable signs aspect the fixed signs except the next
 * one, fixed signs the movable signs except the previous one, dual signs
 * the other duals.
 */
export function signAspects(index: number): number[] {
  const sign = signAt(index);
  const offsets =
    sign.quality === "Cardinal" ? [4, 7, 10] : sign.quality === "Fixed" ? [2, 5, 8] : [3, 6, 9];

  return offsets.map((offset) => wrapIndex(sign.index + offset)).sort((a, b) => a - b);
}
