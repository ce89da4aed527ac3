import { ChartError } from "@/lib/errors";
import { type ChartConfig, chartConfigSchema } from "@/lib/schemas/astro";

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ChartConfig {
  const parsed = chartConfigSchema.safeParse(env);

  if (!parsed.success) {
    throw new ChartError("INVALID_CONFIG", undefined, parsed.error.flatten());
  }

  return parsed.data;
}
