import { BODY_NAMES } from "@/lib/catalog/bodies";
import { ChartError } from "@/lib/errors";
import { type Logger, logger } from "@/lib/logger";
import type { BodyName, RawPosition } from "@/lib/types/astro";

/**
 * Source of raw tropical positions. Queried once per body per chart,
 * before any derivation starts.
 */
export interface EphemerisProvider {
  readonly name: string;
  getPosition(body: BodyName, utc: Date): Promise<RawPosition | null>;
  getAscendant(utc: Date, latitude: number, longitude: number): Promise<number | null>;
}

export interface EphemerisSnapshot {
  positions: Partial<Record<BodyName, RawPosition>>;
  ascendant: number | null;
  missing: BodyName[];
}

// Turns a synchronous throw into a rejection.
async function settle<T>(call: () => Promise<T>): Promise<T> {
  return call();
}

/**
 * Queries every body and the ascendant. A body the provider throws for,
 * rejects or returns nothing for is left out and listed in `missing`.
 */
export async function collectEphemeris(
  provider: EphemerisProvider,
  utc: Date,
  latitude: number,
  longitude: number,
  log: Logger = logger,
): Promise<EphemerisSnapshot> {
  const [bodyResults, ascendantResult] = await Promise.all([
    Promise.allSettled(BODY_NAMES.map((body) => settle(() => provider.getPosition(body, utc)))),
    settle(() => provider.getAscendant(utc, latitude, longitude)).then(
      (value) => ({ ok: true as const, value }),
      (reason: unknown) => ({ ok: false as const, reason }),
    ),
  ]);

  const positions: Partial<Record<BodyName, RawPosition>> = {};
  const missing: BodyName[] = [];

  bodyResults.forEach((result, index) => {
    const body = BODY_NAMES[index];

    if (result.status === "rejected") {
      log.error(
        `Ephemeris provider ${provider.name} failed for ${body}`,
        new ChartError("EPHEMERIS_FAILURE", undefined, {
          body,
          reason: result.reason instanceof Error ? result.reason.message : String(result.reason),
        }),
      );
      missing.push(body);
      return;
    }

    if (result.value === null) {
      missing.push(body);
      return;
    }

    positions[body] = result.value;
  });

  let ascendant: number | null = null;
  if (ascendantResult.ok) {
    ascendant = ascendantResult.value;
  } else {
    log.error(`Ephemeris provider ${provider.name} failed to compute the ascendant`, ascendantResult.reason);
  }

  return { positions, ascendant, missing };
}

/** Serves fixed positions; used for replaying stored charts and in tests. */
export class StaticEphemerisProvider implements EphemerisProvider {
  readonly name = "static";

  constructor(
    private readonly positions: Partial<Record<BodyName, RawPosition>>,
    private readonly ascendant: number | null = null,
  ) {}

  async getPosition(body: BodyName): Promise<RawPosition | null> {
    return this.positions[body] ?? null;
  }

  async getAscendant(): Promise<number | null> {
    return this.ascendant;
  }
}
