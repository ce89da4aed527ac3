import significationData from "@/data/house-significations.json";
import { ChartError, InvalidIdentifierError } from "@/lib/errors";
import { houseSignificationDataSchema } from "@/lib/schemas/astro";
import type { HouseSignification } from "@/lib/types/astro";

function loadSignifications(): HouseSignification[] {
  const parsed = houseSignificationDataSchema.safeParse(significationData);

  if (!parsed.success) {
    throw new ChartError(
      "INVALID_DATA",
      "House signification table failed validation.",
      parsed.error.flatten(),
    );
  }

  return parsed.data;
}

export const HOUSE_SIGNIFICATIONS: readonly HouseSignification[] = loadSignifications();

export function assertHouseNumber(value: number): number {
  if (!Number.isInteger(value) || value < 1 || value > 12) {
    throw new InvalidIdentifierError("INVALID_HOUSE", value);
  }

  return value;
}

export function getHouseSignification(house: number): HouseSignification {
  return HOUSE_SIGNIFICATIONS[assertHouseNumber(house) - 1];
}
