import { z } from "zod";

import { BODY_NAMES } from "@/lib/catalog/bodies";
import { SIGN_NAMES } from "@/lib/catalog/signs";

export const bodyNameSchema = z.enum(BODY_NAMES);
export const signNameSchema = z.enum(SIGN_NAMES);
export const aspectModeSchema = z.enum(["rasi", "degree"]);
export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const rawPositionSchema = z.object({
  longitude: z.number().finite(),
  latitude: z.number().finite().default(0),
  speed: z.number().finite(),
});

const utcInstantSchema = z
  .union([z.string().datetime({ offset: true }), z.date()])
  .transform((value) => new Date(value))
  .refine((value) => Number.isFinite(value.getTime()), "Invalid instant");

const chartOptionsShape = {
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  ayanamsa: z.string().trim().min(1).optional(),
  aspectMode: aspectModeSchema.optional(),
  ascendant: z.number().finite().nullable().optional(),
  allowAscendantFallback: z.boolean().default(true),
  conjunctionOrb: z.number().positive().max(30).optional(),
  junctionOrb: z.number().min(0).max(15).optional(),
  includeAspects: z.boolean().default(true),
};

export const chartRequestSchema = z.object({
  utc: utcInstantSchema,
  positions: z.record(bodyNameSchema, rawPositionSchema),
  ...chartOptionsShape,
});

export const birthMomentSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD format for date"),
  time: z
    .string()
    .regex(/^\d{2}:\d{2}(:\d{2})?$/, "Use HH:mm or HH:mm:ss format for time"),
  timezone: z.string().trim().min(1),
});

export const calculateChartPayloadSchema = z
  .object({
    utc: utcInstantSchema.optional(),
    birth: birthMomentSchema.optional(),
    positions: z.record(bodyNameSchema, rawPositionSchema).optional(),
    ...chartOptionsShape,
  })
  .refine((value) => value.utc !== undefined || value.birth !== undefined, {
    message: "Provide either utc or birth",
    path: ["utc"],
  });

function envValue<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

export const chartConfigSchema = z
  .object({
    CHART_AYANAMSA: envValue(z.string().trim().min(1).default("Lahiri")),
    CHART_ASPECT_MODE: envValue(aspectModeSchema.default("rasi")),
    CHART_CONJUNCTION_ORB: envValue(z.coerce.number().positive().max(30).default(8)),
    CHART_JUNCTION_ORB: envValue(z.coerce.number().min(0).max(15).default(2)),
    LOG_LEVEL: envValue(logLevelSchema.default("info")),
  })
  .transform((env) => ({
    defaultAyanamsa: env.CHART_AYANAMSA,
    defaultAspectMode: env.CHART_ASPECT_MODE,
    conjunctionOrb: env.CHART_CONJUNCTION_ORB,
    junctionOrb: env.CHART_JUNCTION_ORB,
    logLevel: env.LOG_LEVEL,
  }));

export const mansionDataSchema = z
  .array(
    z.object({
      name: z.string().min(1),
      lord: bodyNameSchema,
    }),
  )
  .length(27);

export const houseSignificationDataSchema = z
  .array(
    z.object({
      number: z.number().int().min(1).max(12),
      name: z.string().min(1),
      sanskrit: z.string().min(1),
      karaka: z.string().min(1),
      significations: z.array(z.string().min(1)).min(1),
    }),
  )
  .length(12)
  .refine(
    (houses) => houses.every((house, index) => house.number === index + 1),
    "Houses must be listed in order 1 to 12",
  );

export type LogLevel = z.infer<typeof logLevelSchema>;
export type ChartConfig = z.infer<typeof chartConfigSchema>;
export type ChartRequestInput = z.input<typeof chartRequestSchema>;
export type ChartRequest = z.infer<typeof chartRequestSchema>;
export type BirthMoment = z.infer<typeof birthMomentSchema>;
export type CalculateChartPayload = z.input<typeof calculateChartPayloadSchema>;
