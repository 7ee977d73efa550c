import { clampPercent, parseCount, safeString } from "../lib/normalize";
import type { MetricLayout, MetricSample, MetricSlot } from "../models/usage";
import type { UsageSource } from "./types";

export const RATE_LIMIT_HEADER_PREFIX = "anthropic-ratelimit-";

const MESSAGES_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";
const PROBE_MODEL = "claude-sonnet-4-5-20250929";

const KNOWN_METRICS: MetricSlot[] = [
  { key: "input-tokens", label: "Input Tokens" },
  { key: "output-tokens", label: "Output Tokens" },
  { key: "requests", label: "Requests" },
  { key: "tokens", label: "Total Tokens" },
];

export const RATE_LIMIT_LAYOUT: MetricLayout = {
  policy: "remaining-capacity",
  slots: KNOWN_METRICS,
  resetPriority: ["input-tokens", "tokens", "requests"],
};

const METRIC_KEY_PATTERN = /^(.+)-(limit|remaining|reset)$/;

interface RateLimitFields {
  limit?: string;
  remaining?: string;
  reset?: string;
}

/** Every `anthropic-ratelimit-*` header with the prefix stripped and the name lower-cased. */
export function parseRateLimitHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const limits: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const normalized = name.toLowerCase();
    if (normalized.startsWith(RATE_LIMIT_HEADER_PREFIX)) {
      limits[normalized.slice(RATE_LIMIT_HEADER_PREFIX.length)] = value;
    }
  }
  return limits;
}

function groupByMetric(limits: Record<string, string>): Map<string, RateLimitFields> {
  const groups = new Map<string, RateLimitFields>();
  for (const [key, value] of Object.entries(limits)) {
    const match = METRIC_KEY_PATTERN.exec(key);
    if (!match) {
      continue;
    }

    const [, metric, field] = match;
    const fields = groups.get(metric) ?? {};
    if (field === "limit") {
      fields.limit = value;
    } else if (field === "remaining") {
      fields.remaining = value;
    } else {
      fields.reset = value;
    }
    groups.set(metric, fields);
  }
  return groups;
}

export function labelForMetric(metric: string): string {
  const known = KNOWN_METRICS.find((slot) => slot.key === metric);
  if (known) {
    return known.label;
  }

  return metric
    .split("-")
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(" ");
}

function toSample(metric: string, fields: RateLimitFields): MetricSample | undefined {
  const limit = parseCount(fields.limit);
  const remaining = parseCount(fields.remaining);
  if (limit === undefined || remaining === undefined) {
    return undefined;
  }

  return {
    key: metric,
    label: labelForMetric(metric),
    used: Math.max(0, limit - remaining),
    limit,
    percentage: limit === 0 ? 0 : clampPercent((remaining / limit) * 100),
    resetAt: safeString(fields.reset) ?? null,
  };
}

function displayRank(metric: string): number {
  const index = KNOWN_METRICS.findIndex((slot) => slot.key === metric);
  return index === -1 ? KNOWN_METRICS.length : index;
}

export function mapRateLimitHeadersToSamples(headers: Readonly<Record<string, string>>): MetricSample[] {
  const samples: MetricSample[] = [];
  for (const [metric, fields] of groupByMetric(parseRateLimitHeaders(headers))) {
    const sample = toSample(metric, fields);
    if (sample) {
      samples.push(sample);
    }
  }

  return samples.sort((left, right) => {
    const rank = displayRank(left.key) - displayRank(right.key);
    return rank !== 0 ? rank : left.key.localeCompare(right.key);
  });
}

export const rateLimitHeadersSource: UsageSource = {
  id: "rate-limit-headers",
  title: "API rate limits",
  credentialKind: "api-key",
  layout: RATE_LIMIT_LAYOUT,
  buildRequest(apiKey) {
    return {
      method: "POST",
      url: MESSAGES_URL,
      headers: {
        "x-api-key": apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: PROBE_MODEL,
        max_tokens: 1,
        messages: [{ role: "user", content: "h" }],
      }),
    };
  },
  normalize(response) {
    return { ok: true, samples: mapRateLimitHeadersToSamples(response.headers) };
  },
};
