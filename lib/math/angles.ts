export function normalizeDegrees(value: number): number {
  const wrapped = value % 360;
  const normalized = wrapped < 0 ? wrapped + 360 : wrapped;

  // -1e-15 % 360 + 360 rounds to 360; -720 % 360 is -0
  return normalized >= 360 || normalized === 0 ? 0 : normalized;
}

/**
 * Closeness of two longitudes. With `forwardOnly`, the arc travelled from
 * `a` to `b` in zodiacal order, in [0, 360); otherwise the shorter arc,
 * in [0, 180].
 */
export function angularDistance(a: number, b: number, forwardOnly = false): number {
  if (forwardOnly) {
    return normalizeDegrees(b - a);
  }

  const diff = Math.abs(normalizeDegrees(b) - normalizeDegrees(a));
  return Math.min(diff, 360 - diff);
}

export interface Dms {
  degrees: number;
  minutes: number;
  seconds: number;
}

export function toDms(value: number): Dms {
  const sign = value < 0 ? -1 : 1;
  const totalSeconds = Math.round(Math.abs(value) * 3600);
  const degrees = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return { degrees: sign * degrees, minutes, seconds };
}

export function fromDms(degrees: number, minutes = 0, seconds = 0): number {
  const sign = degrees < 0 || Object.is(degrees, -0) ? -1 : 1;
  return sign * (Math.abs(degrees) + minutes / 60 + seconds / 3600);
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function clamp(value: number, min = 0, max = 1): number {
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
