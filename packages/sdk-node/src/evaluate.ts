/**
 * Local flag evaluation and experiment allocation.
 *
 * Both functions are pure: no I/O, no exceptions for non-matching
 * contexts. A miss is expressed as a reason code or a null assignment.
 */

import { bucket } from "@flagtier/sdk-core";
import type {
  CountryTarget,
  ExperimentContext,
  ExperimentDefinition,
  FlagContext,
  FlagDefinition,
  FlagReason,
  FlagResult,
  ServedValue,
  Targeting,
  VariantAssignment,
} from "@flagtier/sdk-core";

function sameCode(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function findCountry(
  targeting: Targeting,
  country: string,
): CountryTarget | undefined {
  return targeting.countries.find((target) => sameCode(target.code, country));
}

/**
 * Evaluate a two-value flag for a context.
 *
 * Evaluation order, first match wins:
 * 1. Flag disabled → defaultValue
 * 2. userId in forceExcludeUsers → B
 * 3. userId in forceIncludeUsers → A
 * 4. Countries targeted but context has no country → defaultValue
 * 5. Matching country → language target's, then country's serveValue
 *    (a language list the context misses → defaultValue)
 * 6. Countries targeted, none matched → defaultValue
 * 7. Rollout enabled → A when bucket < rolloutPercentageA, else B
 * 8. Otherwise → defaultValue
 */
export function evaluateFlag(
  flag: FlagDefinition,
  context: FlagContext,
): FlagResult {
  const fallback: ServedValue = flag.defaultValue ?? "B";
  const serve = (servedValue: ServedValue, reason: FlagReason): FlagResult => ({
    flagKey: flag.flagKey,
    value: servedValue === "A" ? flag.valueA : flag.valueB,
    servedValue,
    reason,
  });

  if (!flag.enabled) {
    return serve(fallback, "flag_disabled");
  }

  const targeting = flag.targeting;

  if (targeting?.forceExcludeUsers.includes(context.userId)) {
    return serve("B", "force_excluded");
  }

  if (targeting?.forceIncludeUsers.includes(context.userId)) {
    return serve("A", "force_included");
  }

  if (targeting && targeting.countries.length > 0) {
    if (!context.country) {
      return serve(fallback, "country_not_targeted");
    }

    const country = findCountry(targeting, context.country);
    if (!country) {
      return serve(fallback, "country_not_targeted");
    }

    if (country.languages.length > 0) {
      const language = context.language;
      if (!language) {
        return serve(fallback, "language_not_targeted");
      }

      const match = country.languages.find((target) =>
        sameCode(target.code, language),
      );
      if (!match) {
        return serve(fallback, "language_not_targeted");
      }

      return serve(match.serveValue ?? "A", "targeting_match");
    }

    return serve(country.serveValue ?? "A", "targeting_match");
  }

  if (flag.rolloutEnabled) {
    const position = bucket(context.userId, flag.flagKey);
    return serve(position < flag.rolloutPercentageA ? "A" : "B", "rollout");
  }

  return serve(fallback, "default");
}

/**
 * Whether `now` falls inside the experiment's optional schedule window.
 * A missing bound leaves that side open; an unparseable bound closes it.
 */
export function isWithinSchedule(
  experiment: ExperimentDefinition,
  now: Date = new Date(),
): boolean {
  const time = now.getTime();

  if (experiment.scheduledStartAt !== undefined) {
    const start = Date.parse(experiment.scheduledStartAt);
    if (Number.isNaN(start) || start > time) {
      return false;
    }
  }

  if (experiment.scheduledEndAt !== undefined) {
    const end = Date.parse(experiment.scheduledEndAt);
    if (Number.isNaN(end) || end < time) {
      return false;
    }
  }

  return true;
}

/**
 * Country/language gate for experiments. Force-included users still
 * pass through it; only exclusion short-circuits.
 */
function isTargeted(
  targeting: Targeting | undefined,
  context: ExperimentContext,
): boolean {
  if (!targeting) {
    return true;
  }

  if (targeting.forceExcludeUsers.includes(context.userId)) {
    return false;
  }

  if (targeting.countries.length === 0) {
    return true;
  }

  if (!context.country) {
    return false;
  }

  const country = findCountry(targeting, context.country);
  if (!country) {
    return false;
  }

  if (country.languages.length === 0) {
    return true;
  }

  const language = context.language;
  if (!language) {
    return false;
  }

  return country.languages.some((target) => sameCode(target.code, language));
}

/**
 * Assign a variation, or null when the experiment is not running, out of
 * schedule, the context is not targeted, or no allocation range covers the
 * user's bucket.
 *
 * Allocation walks `trafficAllocation` in order: the first entry whose
 * cumulative percentage exceeds the bucket wins.
 */
export function assignVariation(
  experiment: ExperimentDefinition,
  context: ExperimentContext,
  now: Date = new Date(),
): VariantAssignment | null {
  if (experiment.status !== "running") {
    return null;
  }

  if (!isWithinSchedule(experiment, now)) {
    return null;
  }

  if (!isTargeted(experiment.targeting, context)) {
    return null;
  }

  const position = bucket(context.userId, experiment.experimentKey);

  let cumulative = 0;
  for (const allocation of experiment.trafficAllocation) {
    cumulative += allocation.percentage;
    if (position >= cumulative) {
      continue;
    }

    const variation = experiment.variations.find(
      (candidate) => candidate.key === allocation.variationKey,
    );
    if (!variation) {
      // Allocation points at an unknown variation; later ranges may still match
      continue;
    }

    return {
      experimentKey: experiment.experimentKey,
      variationKey: variation.key,
      variationName: variation.name,
      value: variation.value,
      isControl:
        variation.isControl ?? variation.key === experiment.controlVariation,
    };
  }

  return null;
}
