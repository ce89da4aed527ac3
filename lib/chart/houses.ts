import { BODY_NAMES } from "@/lib/catalog/bodies";
import { assertHouseNumber, getHouseSignification } from "@/lib/catalog/house-significations";
import { signAt, signIndexOf } from "@/lib/catalog/signs";
import { dignity } from "@/lib/chart/dignity";
import { degreesInSign } from "@/lib/chart/position";
import { InvalidIdentifierError } from "@/lib/errors";
import { angularDistance, normalizeDegrees } from "@/lib/math/angles";
import type {
  BodyName,
  BodyPosition,
  House,
  HouseNature,
  LordPlacement,
} from "@/lib/types/astro";

export const KENDRA_HOUSES: readonly number[] = [1, 4, 7, 10];
export const TRIKONA_HOUSES: readonly number[] = [1, 5, 9];
export const UPACHAYA_HOUSES: readonly number[] = [3, 6, 10, 11];
export const DUSTHANA_HOUSES: readonly number[] = [6, 8, 12];
export const MARAKA_HOUSES: readonly number[] = [2, 7];

export const DEFAULT_JUNCTION_ORB = 2;

export type BodyPositions = Partial<Record<BodyName, BodyPosition>>;

export function houseNature(house: number): HouseNature {
  const n = assertHouseNumber(house);

  return {
    kendra: KENDRA_HOUSES.includes(n),
    trikona: TRIKONA_HOUSES.includes(n),
    upachaya: UPACHAYA_HOUSES.includes(n),
    dusthana: DUSTHANA_HOUSES.includes(n),
    maraka: MARAKA_HOUSES.includes(n),
  };
}

/** Equal houses: each cusp 30° after the previous, house 1 at the ascendant. */
export function houseCusps(ascendant: number): number[] {
  return Array.from({ length: 12 }, (_, index) => normalizeDegrees(ascendant + index * 30));
}

export function houseOfLongitude(longitude: number, ascendant: number): number {
  return Math.min(12, Math.floor(angularDistance(ascendant, longitude, true) / 30) + 1);
}

function wrapHouse(value: number): number {
  return ((((value - 1) % 12) + 12) % 12) + 1;
}

export function oppositeHouse(house: number): number {
  return wrapHouse(assertHouseNumber(house) + 6);
}

export function kendraHouses(house: number): number[] {
  const n = assertHouseNumber(house);
  return [0, 3, 6, 9].map((offset) => wrapHouse(n + offset));
}

export function trikonaHouses(house: number): number[] {
  const n = assertHouseNumber(house);
  return [0, 4, 8].map((offset) => wrapHouse(n + offset));
}

/** Inclusive count, so a house is 1 from itself and the 7th is opposite. */
export function houseDistance(from: number, to: number): number {
  return wrapHouse(assertHouseNumber(to) - assertHouseNumber(from) + 1);
}

export function isInJunction(
  longitude: number,
  houses: readonly Pick<House, "cusp">[],
  orb = DEFAULT_JUNCTION_ORB,
): boolean {
  return houses.some((house) => angularDistance(house.cusp, longitude) <= orb);
}

export function buildHouses(
  ascendant: number,
  bodies: BodyPositions,
  junctionOrb = DEFAULT_JUNCTION_ORB,
): House[] {
  return houseCusps(ascendant).map((cusp, index) => {
    const number = index + 1;
    const sign = signAt(signIndexOf(cusp));
    const meta = getHouseSignification(number);

    const occupants = BODY_NAMES.filter((body) => {
      const position = bodies[body];
      return position !== undefined && houseOfLongitude(position.longitude, ascendant) === number;
    });

    return {
      number,
      cusp,
      signIndex: sign.index,
      sign: sign.name,
      degreesInSign: degreesInSign(cusp),
      midpoint: normalizeDegrees(cusp + 15),
      junction: {
        start: normalizeDegrees(cusp - junctionOrb),
        end: normalizeDegrees(cusp + junctionOrb),
      },
      lord: sign.ruler,
      occupants,
      nature: houseNature(number),
      name: meta.sanskrit,
      significations: meta.significations,
    };
  });
}

export function findHouse(houses: readonly House[], house: number): House {
  const n = assertHouseNumber(house);
  const found = houses.find((entry) => entry.number === n);

  if (!found) {
    throw new InvalidIdentifierError("INVALID_HOUSE", n);
  }

  return found;
}

export function houseOfBody(houses: readonly House[], body: BodyName): number | null {
  return houses.find((house) => house.occupants.includes(body))?.number ?? null;
}

/** Null when the lord's own position is missing from the chart. */
export function lordPlacement(
  houses: readonly House[],
  house: number,
  bodies: BodyPositions,
): LordPlacement | null {
  const target = findHouse(houses, house);
  const position = bodies[target.lord];
  const placedInHouse = houseOfBody(houses, target.lord);

  if (!position || placedInHouse === null) {
    return null;
  }

  return {
    house: target.number,
    lord: target.lord,
    placedInHouse,
    sign: position.sign,
    dignity: dignity(target.lord, position.longitude),
    retrograde: position.retrograde,
    distanceFromOwnHouse: houseDistance(target.number, placedInHouse),
  };
}
