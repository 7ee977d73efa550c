export type UsageSourceId = "rate-limit-headers" | "plan-usage";

export type SeverityTier = "nominal" | "warning" | "critical";

export type StatusIcon = SeverityTier | "neutral";

/**
 * How a sample's percentage should be read.
 * `remaining-capacity`: percentage is what is left, the smallest one binds.
 * `consumption`: percentage is what is used, the largest one binds.
 */
export type AggregationPolicy = "remaining-capacity" | "consumption";

export interface MetricSample {
  readonly key: string;
  readonly label: string;
  readonly used: number | null;
  readonly limit: number | null;
  readonly percentage: number;
  readonly resetAt: string | null;
}

export interface UsageSnapshot {
  readonly source: UsageSourceId;
  readonly samples: readonly MetricSample[];
  readonly fetchedAt: string;
}

export type AggregateStatus =
  | {
      kind: "metrics";
      headlinePercentage: number;
      severityTier: SeverityTier;
      statusLine: string;
    }
  | {
      kind: "no-data";
      statusLine: string;
    };

export type FetchOutcome =
  | { kind: "success"; snapshot: UsageSnapshot }
  | { kind: "auth-error" }
  | { kind: "rate-limited" }
  | { kind: "upstream-error"; status?: number; message: string }
  | { kind: "transport-error"; message: string; timedOut: boolean }
  | { kind: "no-credential" };

export type FetchOutcomeKind = FetchOutcome["kind"];

export interface MetricSlot {
  key: string;
  label: string;
}

export interface MetricLayout {
  policy: AggregationPolicy;
  slots: readonly MetricSlot[];
  resetPriority: readonly string[];
}

export interface MetricRow {
  key: string;
  text: string;
  bar: string;
}

export interface RenderPayload {
  headline: string;
  icon: StatusIcon;
  statusLine: string;
  metrics: MetricRow[];
  resetLine: string;
  lastCheckedLine: string;
}
