/**
 * Wire shapes of the FlagTier API, validated with zod and mapped into the
 * domain records the evaluators work on.
 */

import { z } from "zod";
import { ValidationError } from "@flagtier/sdk-core";
import type {
  ConfigValues,
  ExperimentDefinition,
  ExperimentMetric,
  FlagDefinition,
  HealthStatus,
  Targeting,
} from "@flagtier/sdk-core";

const serveValueSchema = z.enum(["A", "B"]);

const languageTargetSchema = z.object({
  language: z.string().min(1),
  serveValue: serveValueSchema.nullish(),
});

const countryTargetSchema = z.object({
  country: z.string().min(1),
  serveValue: serveValueSchema.nullish(),
  languages: z.array(languageTargetSchema).nullish(),
});

const targetingSchema = z.object({
  countries: z.array(countryTargetSchema).nullish(),
  forceIncludeUsers: z.array(z.string()).nullish(),
  forceExcludeUsers: z.array(z.string()).nullish(),
});

function toTargeting(raw: z.infer<typeof targetingSchema>): Targeting {
  return {
    countries: (raw.countries ?? []).map((country) => ({
      code: country.country,
      serveValue: country.serveValue ?? undefined,
      languages: (country.languages ?? []).map((language) => ({
        code: language.language,
        serveValue: language.serveValue ?? undefined,
      })),
    })),
    forceIncludeUsers: raw.forceIncludeUsers ?? [],
    forceExcludeUsers: raw.forceExcludeUsers ?? [],
  };
}

const percentageSchema = z.number().min(0).max(100);

export const flagSchema = z
  .object({
    flagKey: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    enabled: z.boolean(),
    flagType: z.enum(["boolean", "string", "number", "json"]).nullish(),
    valueA: z.unknown(),
    valueB: z.unknown(),
    defaultValue: serveValueSchema.nullish(),
    targeting: targetingSchema.nullish(),
    rolloutEnabled: z.boolean().nullish(),
    rolloutPercentageA: percentageSchema.nullish(),
    rolloutPercentageB: percentageSchema.nullish(),
    createdAt: z.string().nullish(),
    updatedAt: z.string().nullish(),
  })
  .transform(
    (raw): FlagDefinition => ({
      flagKey: raw.flagKey,
      name: raw.name,
      description: raw.description ?? undefined,
      enabled: raw.enabled,
      flagType: raw.flagType ?? "boolean",
      valueA: raw.valueA,
      valueB: raw.valueB,
      defaultValue: raw.defaultValue ?? undefined,
      targeting: raw.targeting ? toTargeting(raw.targeting) : undefined,
      rolloutEnabled: raw.rolloutEnabled ?? false,
      rolloutPercentageA: raw.rolloutPercentageA ?? 50,
      rolloutPercentageB: raw.rolloutPercentageB ?? 50,
      createdAt: raw.createdAt ?? undefined,
      updatedAt: raw.updatedAt ?? undefined,
    }),
  );

const metricSchema = z
  .object({
    name: z.string(),
    eventName: z.string().nullish(),
    metricType: z.string().nullish(),
  })
  .transform(
    (raw): ExperimentMetric => ({
      name: raw.name,
      eventName: raw.eventName ?? undefined,
      metricType: raw.metricType ?? undefined,
    }),
  );

export const experimentSchema = z
  .object({
    experimentKey: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    hypothesis: z.string().nullish(),
    status: z.enum(["draft", "running", "completed"]),
    variations: z.array(
      z.object({
        key: z.string().min(1),
        name: z.string().nullish(),
        value: z.unknown(),
        isControl: z.boolean().nullish(),
      }),
    ),
    controlVariation: z.string(),
    trafficAllocation: z.array(
      z.object({
        variationKey: z.string(),
        percentage: percentageSchema,
      }),
    ),
    targeting: targetingSchema.nullish(),
    primaryMetric: metricSchema.nullish(),
    secondaryMetrics: z.array(metricSchema).nullish(),
    confidenceLevel: z.number().gt(0).lt(1).nullish(),
    startedAt: z.string().nullish(),
    completedAt: z.string().nullish(),
    scheduledStartAt: z.string().nullish(),
    scheduledEndAt: z.string().nullish(),
    createdAt: z.string().nullish(),
    updatedAt: z.string().nullish(),
  })
  .transform(
    (raw): ExperimentDefinition => ({
      experimentKey: raw.experimentKey,
      name: raw.name,
      description: raw.description ?? undefined,
      hypothesis: raw.hypothesis ?? undefined,
      status: raw.status,
      variations: raw.variations.map((variation) => ({
        key: variation.key,
        name: variation.name ?? variation.key,
        value: variation.value,
        isControl: variation.isControl ?? undefined,
      })),
      controlVariation: raw.controlVariation,
      trafficAllocation: raw.trafficAllocation,
      targeting: raw.targeting ? toTargeting(raw.targeting) : undefined,
      primaryMetric: raw.primaryMetric ?? undefined,
      secondaryMetrics: raw.secondaryMetrics ?? undefined,
      confidenceLevel: raw.confidenceLevel ?? 0.95,
      startedAt: raw.startedAt ?? undefined,
      completedAt: raw.completedAt ?? undefined,
      scheduledStartAt: raw.scheduledStartAt ?? undefined,
      scheduledEndAt: raw.scheduledEndAt ?? undefined,
      createdAt: raw.createdAt ?? undefined,
      updatedAt: raw.updatedAt ?? undefined,
    }),
  );

export const flagListSchema = z.array(flagSchema);
export const experimentListSchema = z.array(experimentSchema);
export const configValuesSchema: z.ZodType<
  ConfigValues,
  z.ZodTypeDef,
  unknown
> = z.record(z.unknown());

/**
 * Every API response wraps its payload in `data`
 */
export const envelopeSchema = z.object({ data: z.unknown() });

export const healthSchema: z.ZodType<HealthStatus, z.ZodTypeDef, unknown> =
  z.object({
    status: z.string(),
    uptime: z.number().optional(),
  });

/**
 * Validate a payload, raising ValidationError with the failing paths
 */
export function parsePayload<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  payload: unknown,
  description: string,
): Output {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(`Malformed ${description} payload`, {
      details: result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; "),
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Unwrap `{ data }`, treating a missing or null `data` as absent
 */
export function unwrapData(body: unknown, path: string): unknown {
  const envelope = parsePayload(envelopeSchema, body, `response from ${path}`);
  return envelope.data ?? undefined;
}
