import { normalizeDegrees, toDegrees, toRadians } from "@/lib/math/angles";

export const J2000 = 2451545.0;
export const DAYS_PER_JULIAN_CENTURY = 36525;
export const DAYS_PER_JULIAN_YEAR = 365.25;

/** Arcseconds of general precession per year. */
export const PRECESSION_RATE = 50.29;

export const AYANAMSA_BASES = {
  Lahiri: 23.85,
  Raman: 22.5,
  Krishnamurti: 23.77,
  Fagan_Bradley: 24.04,
} as const;

export type AyanamsaSystem = keyof typeof AYANAMSA_BASES;

export const DEFAULT_AYANAMSA: AyanamsaSystem = "Lahiri";

export function isKnownAyanamsa(system: string): system is AyanamsaSystem {
  return Object.prototype.hasOwnProperty.call(AYANAMSA_BASES, system);
}

/**
 * Gregorian-calendar Julian Day (Meeus, ch. 7). The UTC fields of `utc`
 * are used as-is; resolving a local wall clock is the caller's job.
 */
export function julianDay(utc: Date): number {
  let year = utc.getUTCFullYear();
  let month = utc.getUTCMonth() + 1;
  const day =
    utc.getUTCDate() +
    (utc.getUTCHours() +
      utc.getUTCMinutes() / 60 +
      utc.getUTCSeconds() / 3600 +
      utc.getUTCMilliseconds() / 3_600_000) /
      24;

  if (month <= 2) {
    year -= 1;
    month += 12;
  }

  const a = Math.floor(year / 100);
  const b = 2 - a + Math.floor(a / 4);

  return (
    Math.floor(365.25 * (year + 4716)) +
    Math.floor(30.6001 * (month + 1)) +
    day +
    b -
    1524.5
  );
}

export function julianDayToDate(jd: number): Date {
  const shifted = jd + 0.5;
  const z = Math.floor(shifted);
  const f = shifted - z;

  let a = z;
  if (z >= 2299161) {
    const alpha = Math.floor((z - 1867216.25) / 36524.25);
    a = z + 1 + alpha - Math.floor(alpha / 4);
  }

  const b = a + 1524;
  const c = Math.floor((b - 122.1) / 365.25);
  const d = Math.floor(365.25 * c);
  const e = Math.floor((b - d) / 30.6001);

  const dayWithFraction = b - d - Math.floor(30.6001 * e) + f;
  const month = e < 14 ? e - 1 : e - 13;
  const year = month > 2 ? c - 4716 : c - 4715;
  const day = Math.floor(dayWithFraction);
  const millis = Math.round((dayWithFraction - day) * 86_400_000);

  return new Date(Date.UTC(year, month - 1, day) + millis);
}

export function julianCenturies(jd: number): number {
  return (jd - J2000) / DAYS_PER_JULIAN_CENTURY;
}

export function greenwichSiderealTime(jd: number): number {
  const t = julianCenturies(jd);
  return normalizeDegrees(
    280.46061837 +
      360.98564736629 * (jd - J2000) +
      0.000387933 * t * t -
      (t * t * t) / 38710000,
  );
}

export function localSiderealTime(jd: number, longitude: number): number {
  return normalizeDegrees(greenwichSiderealTime(jd) + longitude);
}

export function meanObliquity(jd: number): number {
  const t = julianCenturies(jd);
  return 23.43929111 - (46.815 * t + 0.00059 * t * t - 0.001813 * t * t * t) / 3600;
}

/**
 * Linear model: base offset at J2000 plus precession since then.
 * Unknown systems use the Lahiri base.
 */
export function ayanamsa(jd: number, system: string = DEFAULT_AYANAMSA): number {
  const base = isKnownAyanamsa(system)
    ? AYANAMSA_BASES[system]
    : AYANAMSA_BASES[DEFAULT_AYANAMSA];
  const years = (jd - J2000) / DAYS_PER_JULIAN_YEAR;

  return base + (PRECESSION_RATE / 3600) * years;
}

export function tropicalToSidereal(longitude: number, ayanamsaValue: number): number {
  return normalizeDegrees(longitude - ayanamsaValue);
}

export function siderealToTropical(longitude: number, ayanamsaValue: number): number {
  return normalizeDegrees(longitude + ayanamsaValue);
}

/** Tropical ascendant from local sidereal time, all angles in degrees. */
export function ascendantFromSiderealTime(
  lst: number,
  latitude: number,
  obliquity: number,
): number {
  const theta = toRadians(lst);
  const phi = toRadians(latitude);
  const eps = toRadians(obliquity);

  const y = Math.cos(theta);
  const x = -(Math.sin(theta) * Math.cos(eps) + Math.tan(phi) * Math.sin(eps));

  return normalizeDegrees(toDegrees(Math.atan2(y, x)));
}

export function midheavenFromSiderealTime(lst: number, obliquity: number): number {
  const theta = toRadians(lst);
  const eps = toRadians(obliquity);

  return normalizeDegrees(toDegrees(Math.atan2(Math.sin(theta), Math.cos(theta) * Math.cos(eps))));
}
