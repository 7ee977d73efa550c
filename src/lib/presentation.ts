import { describeResetTime, formatTimeOfDay } from "./date";
import { formatCompactNumber, formatPercent, renderBar, statusGlyph } from "./format";
import type {
  AggregateStatus,
  AggregationPolicy,
  FetchOutcome,
  MetricLayout,
  MetricRow,
  MetricSample,
  RenderPayload,
  UsageSnapshot,
} from "../models/usage";
import type { CredentialKind } from "../providers/types";

export const STATUS_MESSAGE_MAX_LENGTH = 80;

const EMPTY_VALUE = "—";

export interface PresentationOptions {
  layout: MetricLayout;
  /** Reference instant for reset countdowns, epoch milliseconds. */
  now?: number;
  /** IANA zone for the "last checked" time of day; the host zone when omitted. */
  timeZone?: string;
}

/** What the failure overlay needs to know about the active source. */
export interface OutcomeContext {
  policy: AggregationPolicy;
  credentialKind: CredentialKind;
}

const CREDENTIAL_WORDING: Record<CredentialKind, { short: string; invalid: string }> = {
  "api-key": { short: "Key", invalid: "Invalid API key" },
  "oauth-token": { short: "Token", invalid: "Invalid OAuth token" },
};

interface RowSpec {
  key: string;
  label: string;
  sample?: MetricSample;
}

function collectRows(samples: readonly MetricSample[], layout: MetricLayout): RowSpec[] {
  const byKey = new Map(samples.map((sample) => [sample.key, sample]));
  const rows: RowSpec[] = layout.slots.map((slot) => ({ key: slot.key, label: slot.label, sample: byKey.get(slot.key) }));

  for (const sample of samples) {
    if (!layout.slots.some((slot) => slot.key === sample.key)) {
      rows.push({ key: sample.key, label: sample.label, sample });
    }
  }

  return rows;
}

function resetPhrase(resetAt: string | null, now: number): string | undefined {
  const reset = describeResetTime(resetAt, now);
  if (!reset) {
    return undefined;
  }
  return reset.kind === "elapsed" ? reset.text : `resets ${reset.text}`;
}

function buildMetricRow(row: RowSpec, labelWidth: number, policy: AggregationPolicy, now: number): MetricRow {
  const label = row.label.padEnd(labelWidth);
  const sample = row.sample;
  if (!sample) {
    return { key: row.key, text: `${label}: ${EMPTY_VALUE}`, bar: "" };
  }

  const share = `${formatPercent(sample.percentage)} ${policy === "remaining-capacity" ? "left" : "used"}`;
  const barParts = [renderBar(sample.percentage)];

  if (sample.used !== null && sample.limit !== null) {
    barParts.push(`${formatCompactNumber(sample.limit - sample.used)} remaining`);
    return {
      key: row.key,
      text: `${label}: ${formatCompactNumber(sample.used)} used / ${formatCompactNumber(sample.limit)}  (${share})`,
      bar: `  ${barParts.join("  ")}`,
    };
  }

  const phrase = resetPhrase(sample.resetAt, now);
  if (phrase) {
    barParts.push(phrase);
  }
  return { key: row.key, text: `${label}: ${share}`, bar: `  ${barParts.join("  ")}` };
}

function pickResetSample(samples: readonly MetricSample[], layout: MetricLayout): MetricSample | undefined {
  for (const key of layout.resetPriority) {
    const match = samples.find((sample) => sample.key === key && sample.resetAt !== null);
    if (match) {
      return match;
    }
  }
  return samples.find((sample) => sample.resetAt !== null);
}

export function buildResetLine(samples: readonly MetricSample[], layout: MetricLayout, now: number): string {
  const reset = describeResetTime(pickResetSample(samples, layout)?.resetAt, now);
  if (!reset) {
    return `Resets: ${EMPTY_VALUE}`;
  }

  switch (reset.kind) {
    case "upcoming":
      return `Resets ${reset.text}`;
    case "elapsed":
      return "Limit window just reset";
    case "verbatim":
      return `Reset: ${reset.text}`;
  }
}

export function buildLastCheckedLine(lastFetchedAt: string | null, timeZone?: string): string {
  const date = lastFetchedAt ? new Date(lastFetchedAt) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    return "Last checked: never";
  }
  return `Last checked: ${formatTimeOfDay(date, timeZone)}`;
}

/**
 * Render payload for a snapshot. Rows follow the layout's slots, so a metric missing from the
 * snapshot still occupies its row; samples outside the layout are appended after the slots.
 */
export function buildRenderPayload(
  snapshot: UsageSnapshot | null,
  status: AggregateStatus,
  lastFetchedAt: string | null,
  options: PresentationOptions,
): RenderPayload {
  const now = options.now ?? Date.now();
  const samples = snapshot?.samples ?? [];
  const rows = collectRows(samples, options.layout);
  const labelWidth = Math.max(0, ...rows.map((row) => row.label.length));

  const headline =
    status.kind === "metrics"
      ? { icon: status.severityTier, text: `${statusGlyph(status.severityTier)} ${formatPercent(status.headlinePercentage)}` }
      : { icon: "neutral" as const, text: `${statusGlyph("neutral")} ${EMPTY_VALUE}` };

  return {
    headline: headline.text,
    icon: headline.icon,
    statusLine: status.statusLine,
    metrics: rows.map((row) => buildMetricRow(row, labelWidth, options.layout.policy, now)),
    resetLine: buildResetLine(samples, options.layout, now),
    lastCheckedLine: buildLastCheckedLine(lastFetchedAt, options.timeZone),
  };
}

function truncateMessage(message: string): string {
  return message.length > STATUS_MESSAGE_MAX_LENGTH ? message.slice(0, STATUS_MESSAGE_MAX_LENGTH) : message;
}

/**
 * Failed outcomes only replace the headline and status line; the rows of the previous
 * payload stay so the last good numbers remain visible.
 */
export function applyOutcome(previous: RenderPayload, outcome: FetchOutcome, context: OutcomeContext): RenderPayload {
  const neutral = statusGlyph("neutral");
  const credential = CREDENTIAL_WORDING[context.credentialKind];
  switch (outcome.kind) {
    case "success":
      return previous;
    case "auth-error":
      return {
        ...previous,
        headline: `${neutral} Bad ${credential.short}`,
        icon: "neutral",
        statusLine: `⚠ ${credential.invalid}`,
      };
    case "rate-limited": {
      // exhausted: nothing left, or everything used
      const exhausted = context.policy === "remaining-capacity" ? 0 : 100;
      return {
        ...previous,
        headline: `${statusGlyph("critical")} ${formatPercent(exhausted)}`,
        icon: "critical",
        statusLine: "⚠ Rate limited",
      };
    }
    case "upstream-error":
      return { ...previous, headline: `${neutral} ⚠`, icon: "neutral", statusLine: `⚠ ${truncateMessage(outcome.message)}` };
    case "transport-error":
      return {
        ...previous,
        headline: `${neutral} offline`,
        icon: "neutral",
        statusLine: outcome.timedOut ? "⚠ Request timed out" : "⚠ No connection",
      };
    case "no-credential":
      return {
        ...previous,
        headline: `${neutral} No ${credential.short}`,
        icon: "neutral",
        statusLine: "⚠ No credential configured",
      };
  }
}

/** Plain-text rendering of a payload, one entry per line; absent metrics keep their blank bar line. */
export function payloadToLines(payload: RenderPayload): string[] {
  return [
    payload.headline,
    payload.statusLine,
    "",
    ...payload.metrics.flatMap((row) => [row.text, row.bar]),
    "",
    payload.resetLine,
    payload.lastCheckedLine,
  ];
}
