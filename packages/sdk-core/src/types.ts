/**
 * Shared types for FlagTier SDKs
 */

/**
 * Which of a flag's two values was served
 */
export type ServedValue = "A" | "B";

/**
 * Request context for flag and experiment evaluation.
 * Constructed per call by the caller; never mutated by the SDK.
 */
export interface RequestContext {
  /** Stable user identifier, required and non-empty */
  readonly userId: string;
  /** Country code, compared case-insensitively */
  readonly country?: string;
  /** Language code, compared case-insensitively */
  readonly language?: string;
}

export type FlagContext = RequestContext;
export type ExperimentContext = RequestContext;

export interface LanguageTarget {
  code: string;
  serveValue?: ServedValue;
}

export interface CountryTarget {
  code: string;
  serveValue?: ServedValue;
  languages: LanguageTarget[];
}

/**
 * Country/language targeting plus forced identity lists
 */
export interface Targeting {
  countries: CountryTarget[];
  forceIncludeUsers: string[];
  forceExcludeUsers: string[];
}

export type FlagType = "boolean" | "string" | "number" | "json";

/**
 * Two-value feature flag
 */
export interface FlagDefinition {
  flagKey: string;
  name: string;
  description?: string;
  enabled: boolean;
  flagType: FlagType;
  valueA: unknown;
  valueB: unknown;
  /** Side served when nothing else decides (B when unset) */
  defaultValue?: ServedValue;
  targeting?: Targeting;
  rolloutEnabled: boolean;
  rolloutPercentageA: number;
  rolloutPercentageB: number;
  createdAt?: string;
  updatedAt?: string;
}

export type ExperimentStatus = "draft" | "running" | "completed";

export interface Variation {
  key: string;
  name: string;
  value: unknown;
  isControl?: boolean;
}

export interface TrafficAllocation {
  variationKey: string;
  percentage: number;
}

export interface ExperimentMetric {
  name: string;
  eventName?: string;
  metricType?: string;
}

/**
 * Multi-variant experiment
 */
export interface ExperimentDefinition {
  experimentKey: string;
  name: string;
  description?: string;
  hypothesis?: string;
  status: ExperimentStatus;
  variations: Variation[];
  controlVariation: string;
  /** Ordered; the order defines the cumulative bucket ranges */
  trafficAllocation: TrafficAllocation[];
  targeting?: Targeting;
  primaryMetric?: ExperimentMetric;
  secondaryMetrics?: ExperimentMetric[];
  confidenceLevel: number;
  startedAt?: string;
  completedAt?: string;
  scheduledStartAt?: string;
  scheduledEndAt?: string;
  createdAt?: string;
  updatedAt?: string;
}

/**
 * Why a flag evaluated to its served value
 */
export type FlagReason =
  | "flag_disabled"
  | "force_excluded"
  | "force_included"
  | "country_not_targeted"
  | "language_not_targeted"
  | "targeting_match"
  | "rollout"
  | "default";

export interface FlagResult {
  flagKey: string;
  value: unknown;
  servedValue: ServedValue;
  reason: FlagReason;
}

export interface VariantAssignment {
  experimentKey: string;
  variationKey: string;
  variationName: string;
  value: unknown;
  isControl: boolean;
}

/**
 * Remote config values keyed by parameter name
 */
export type ConfigValues = Record<string, unknown>;

/**
 * "stable", "latest" or an explicit version id
 */
export type ConfigVersion = "stable" | "latest" | (string & {});

export interface ConversionData {
  metricName: string;
  value?: number;
}

/**
 * Optional fields a custom event may carry
 */
export interface TrackEventData {
  flagKey?: string;
  experimentKey?: string;
  variationKey?: string;
  value?: number;
  label?: string;
}

export interface HealthStatus {
  status: string;
  uptime?: number;
}
