import { getBody } from "@/lib/catalog/bodies";
import {
  degreesInMansion,
  getMansion,
  mansionIndexOf,
  mansionQuarter,
} from "@/lib/catalog/mansions";
import { signAt, signIndexOf } from "@/lib/catalog/signs";
import { normalizeDegrees } from "@/lib/math/angles";
import type {
  BodyPosition,
  Division,
  Element,
  PointPosition,
  SignName,
} from "@/lib/types/astro";

export const DIVISIONS: readonly Division[] = ["D1", "D2", "D3", "D9", "D10", "D12"];

export function degreesInSign(longitude: number): number {
  return normalizeDegrees(longitude) - signIndexOf(longitude) * 30;
}

export function pointPosition(longitude: number): PointPosition {
  const normalized = normalizeDegrees(longitude);
  const signIndex = signIndexOf(normalized);

  return {
    longitude: normalized,
    signIndex,
    sign: signAt(signIndex).name,
    degreesInSign: degreesInSign(normalized),
  };
}

/** `longitude` is already sidereal. */
export function derivePosition(
  body: string,
  longitude: number,
  latitude = 0,
  speed = 0,
): BodyPosition {
  const info = getBody(body);
  const point = pointPosition(longitude);
  const mansion = getMansion(mansionIndexOf(point.longitude));

  return {
    body: info.name,
    longitude: point.longitude,
    latitude,
    speed,
    retrograde: speed < 0,
    signIndex: point.signIndex,
    sign: point.sign,
    degreesInSign: point.degreesInSign,
    mansionIndex: mansion.index,
    mansion: mansion.name,
    mansionLord: mansion.lord,
    degreesInMansion: degreesInMansion(point.longitude),
    quarter: mansionQuarter(point.longitude),
  };
}

function part(longitude: number, size: number, parts: number): number {
  return Math.min(parts - 1, Math.floor(degreesInSign(longitude) / size));
}

function isOddSign(signIndex: number): boolean {
  return signIndex % 2 === 0;
}

/** Hora: odd signs give Leo then Cancer, even signs Cancer then Leo. */
export function horaSignIndex(longitude: number): number {
  const firstHalf = part(longitude, 15, 2) === 0;
  const leoFirst = isOddSign(signIndexOf(longitude));

  return firstHalf === leoFirst ? 4 : 3;
}

/** Drekkana: the sign itself, then the 5th and 9th from it. */
export function drekkanaSignIndex(longitude: number): number {
  return (signIndexOf(longitude) + part(longitude, 10, 3) * 4) % 12;
}

const NAVAMSA_START: Record<Element, number> = {
  Fire: 0,
  Earth: 9,
  Air: 6,
  Water: 3,
};

export function navamsaSignIndex(longitude: number): number {
  const sign = signAt(signIndexOf(longitude));
  return (NAVAMSA_START[sign.element] + part(longitude, 30 / 9, 9)) % 12;
}

/** Dasamsa: odd signs count from themselves, even signs from the 9th. */
export function dasamsaSignIndex(longitude: number): number {
  const signIndex = signIndexOf(longitude);
  const start = isOddSign(signIndex) ? signIndex : signIndex + 8;

  return (start + part(longitude, 3, 10)) % 12;
}

export function dwadasamsaSignIndex(longitude: number): number {
  return (signIndexOf(longitude) + part(longitude, 2.5, 12)) % 12;
}

const DIVISION_RESOLVERS: Record<Division, (longitude: number) => number> = {
  D1: signIndexOf,
  D2: horaSignIndex,
  D3: drekkanaSignIndex,
  D9: navamsaSignIndex,
  D10: dasamsaSignIndex,
  D12: dwadasamsaSignIndex,
};

export function divisionalSign(division: Division, longitude: number): SignName {
  return signAt(DIVISION_RESOLVERS[division](longitude)).name;
}

export function divisionalSigns(longitude: number): Record<Division, SignName> {
  return {
    D1: divisionalSign("D1", longitude),
    D2: divisionalSign("D2", longitude),
    D3: divisionalSign("D3", longitude),
    D9: divisionalSign("D9", longitude),
    D10: divisionalSign("D10", longitude),
    D12: divisionalSign("D12", longitude),
  };
}
