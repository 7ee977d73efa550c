import { formatPercent } from "./format";
import type { AggregateStatus, AggregationPolicy, MetricSample, SeverityTier, UsageSnapshot } from "../models/usage";

export const STATUS_PREFIX = "Usage Meter";

// remaining-capacity: above NOMINAL_FLOOR is nominal, below CRITICAL_FLOOR is critical.
const REMAINING_NOMINAL_FLOOR = 50;
const REMAINING_CRITICAL_FLOOR = 20;

// consumption: below WARNING_FLOOR is nominal, at or above CRITICAL_FLOOR is critical.
const CONSUMPTION_WARNING_FLOOR = 50;
const CONSUMPTION_CRITICAL_FLOOR = 80;

export function severityForPercentage(percentage: number, policy: AggregationPolicy): SeverityTier {
  if (policy === "remaining-capacity") {
    if (percentage > REMAINING_NOMINAL_FLOOR) {
      return "nominal";
    }
    if (percentage >= REMAINING_CRITICAL_FLOOR) {
      return "warning";
    }
    return "critical";
  }

  if (percentage >= CONSUMPTION_CRITICAL_FLOOR) {
    return "critical";
  }
  if (percentage >= CONSUMPTION_WARNING_FLOOR) {
    return "warning";
  }
  return "nominal";
}

export function headlinePercentage(samples: readonly MetricSample[], policy: AggregationPolicy): number | undefined {
  if (samples.length === 0) {
    return undefined;
  }

  const percentages = samples.map((sample) => sample.percentage);
  return policy === "remaining-capacity" ? Math.min(...percentages) : Math.max(...percentages);
}

export function noDataStatus(): AggregateStatus {
  return { kind: "no-data", statusLine: `${STATUS_PREFIX} — no data` };
}

/**
 * Reduces a snapshot to its binding metric. The policy is never inferred from the samples:
 * header-derived percentages are "remaining" and plan-derived ones are "used".
 */
export function aggregateSnapshot(snapshot: UsageSnapshot, policy: AggregationPolicy): AggregateStatus {
  const headline = headlinePercentage(snapshot.samples, policy);
  if (headline === undefined) {
    return noDataStatus();
  }

  const suffix = policy === "remaining-capacity" ? "capacity left" : "used";
  return {
    kind: "metrics",
    headlinePercentage: headline,
    severityTier: severityForPercentage(headline, policy),
    statusLine: `${STATUS_PREFIX} — ${formatPercent(headline)} ${suffix}`,
  };
}
