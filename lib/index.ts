export * from "@/lib/api/calculate-chart";
export * from "@/lib/catalog/bodies";
export * from "@/lib/catalog/house-significations";
export * from "@/lib/catalog/mansions";
export * from "@/lib/catalog/signs";
export * from "@/lib/chart/aspects";
export * from "@/lib/chart/context";
export * from "@/lib/chart/dignity";
export * from "@/lib/chart/houses";
export * from "@/lib/chart/position";
export * from "@/lib/chart/strength";
export * from "@/lib/config";
export * from "@/lib/ephemeris/astronomy-engine";
export * from "@/lib/ephemeris/provider";
export * from "@/lib/errors";
export * from "@/lib/formatters";
export * from "@/lib/interpretation";
export * from "@/lib/logger";
export * from "@/lib/math/angles";
export * from "@/lib/math/time";
export * from "@/lib/natal-request";
export * from "@/lib/schemas/astro";
export type * from "@/lib/types/astro";
