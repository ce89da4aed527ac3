import { buildChartContext } from "@/lib/chart/context";
import { loadConfig } from "@/lib/config";
import { type EphemerisProvider, collectEphemeris } from "@/lib/ephemeris/provider";
import { ChartError, type ErrorPayload, toErrorPayload } from "@/lib/errors";
import { type Logger, createLogger, logger } from "@/lib/logger";
import { resolveBirthInstant } from "@/lib/natal-request";
import { type ChartConfig, calculateChartPayloadSchema } from "@/lib/schemas/astro";
import type { ChartContext } from "@/lib/types/astro";

export interface ChartResponse {
  status: 200;
  body: { data: ChartContext };
}

/**
 * Request handler for a chart calculation. Positions missing from the
 * payload are fetched from `provider`; every failure is mapped to an
 * error payload rather than thrown.
 */
export async function calculateChart(
  payload: unknown,
  provider: EphemerisProvider,
  config?: ChartConfig,
): Promise<ChartResponse | ErrorPayload> {
  let log: Logger = logger;

  try {
    const resolvedConfig = config ?? loadConfig();
    log = createLogger(resolvedConfig.logLevel);

    const parsed = calculateChartPayloadSchema.safeParse(payload);

    if (!parsed.success) {
      throw new ChartError("INVALID_REQUEST", undefined, parsed.error.flatten());
    }

    const { birth, utc: requestedUtc, positions: requestedPositions, ...options } = parsed.data;

    let utc: Date;
    if (requestedUtc) {
      utc = requestedUtc;
    } else if (birth) {
      utc = resolveBirthInstant(birth);
    } else {
      throw new ChartError("INVALID_REQUEST", "Provide either utc or birth.");
    }

    let positions = requestedPositions;
    let ascendant = options.ascendant;

    if (!positions) {
      const snapshot = await collectEphemeris(
        provider,
        utc,
        options.latitude,
        options.longitude,
        log,
      );
      positions = snapshot.positions;
      if (ascendant === undefined) {
        ascendant = snapshot.ascendant;
      }
    }

    const context = buildChartContext(
      { ...options, utc, positions, ascendant },
      resolvedConfig,
    );

    return { status: 200, body: { data: context } };
  } catch (error) {
    log.error("Chart calculation failed", error);
    return toErrorPayload(error);
  }
}
