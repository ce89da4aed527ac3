import { toDms } from "@/lib/math/angles";

export function formatDegree(value: number, precision = 2): string {
  if (!Number.isFinite(value)) {
    return "-";
  }

  return `${value.toFixed(precision)}°`;
}

/** 5.5 -> 5°30′00″ */
export function formatDms(value: number): string {
  if (!Number.isFinite(value)) {
    return "-";
  }

  const { degrees, minutes, seconds } = toDms(value);
  const sign = value < 0 && degrees === 0 ? "-" : "";

  return `${sign}${degrees}°${String(minutes).padStart(2, "0")}′${String(seconds).padStart(2, "0")}″`;
}

export function formatSignPosition(sign: string, degreesInSign: number): string {
  return `${formatDegree(degreesInSign)} ${sign}`;
}

export function toTitleCase(value: string): string {
  return value
    .replaceAll("_", " ")
    .replaceAll("-", " ")
    .split(" ")
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

export function formatOrdinalHouse(house: number): string {
  const suffix = house === 1 ? "st" : house === 2 ? "nd" : house === 3 ? "rd" : "th";
  return `${house}${suffix} house`;
}
