import { describe, expect, it } from "vitest";
import { aggregateSnapshot, noDataStatus } from "../src/lib/aggregate";
import { applyOutcome, buildRenderPayload, buildResetLine, payloadToLines } from "../src/lib/presentation";
import type { MetricSample, UsageSnapshot } from "../src/models/usage";
import { PLAN_USAGE_LAYOUT } from "../src/providers/plan-usage";
import { RATE_LIMIT_LAYOUT } from "../src/providers/rate-limit-headers";

const NOW = Date.parse("2026-03-01T12:00:00Z");

function headerSample(key: string, label: string, limit: number, remaining: number, resetAt: string | null = null): MetricSample {
  return { key, label, used: limit - remaining, limit, percentage: (remaining / limit) * 100, resetAt };
}

function planSample(key: string, label: string, percentage: number, resetAt: string | null = null): MetricSample {
  return { key, label, used: percentage, limit: null, percentage, resetAt };
}

function snapshot(source: UsageSnapshot["source"], samples: MetricSample[]): UsageSnapshot {
  return { source, samples, fetchedAt: "2026-03-01T15:04:05Z" };
}

describe("buildRenderPayload (rate-limit headers)", () => {
  const headerSnapshot = snapshot("rate-limit-headers", [
    headerSample("input-tokens", "Input Tokens", 1000, 250, "2026-03-01T12:05:30Z"),
  ]);
  const payload = buildRenderPayload(
    headerSnapshot,
    aggregateSnapshot(headerSnapshot, "remaining-capacity"),
    headerSnapshot.fetchedAt,
    { layout: RATE_LIMIT_LAYOUT, now: NOW, timeZone: "UTC" },
  );

  it("renders the headline from the severity tier", () => {
    expect(payload.headline).toBe("◐ 25%");
    expect(payload.icon).toBe("warning");
    expect(payload.statusLine).toBe("Usage Meter — 25% capacity left");
  });

  it("renders counts and a remaining bar for present metrics", () => {
    expect(payload.metrics[0]).toEqual({
      key: "input-tokens",
      text: "Input Tokens : 750 used / 1.0K  (25% left)",
      bar: `  ${"█".repeat(5)}${"░".repeat(15)}  250 remaining`,
    });
  });

  it("keeps a padded placeholder row for every absent metric", () => {
    expect(payload.metrics.slice(1)).toEqual([
      { key: "output-tokens", text: "Output Tokens: —", bar: "" },
      { key: "requests", text: "Requests     : —", bar: "" },
      { key: "tokens", text: "Total Tokens : —", bar: "" },
    ]);
  });

  it("renders the reset countdown and last-checked time", () => {
    expect(payload.resetLine).toBe("Resets in 5m 30s");
    expect(payload.lastCheckedLine).toBe("Last checked: 3:04:05 PM");
  });

  it("appends metrics outside the fixed layout", () => {
    const extra = snapshot("rate-limit-headers", [
      headerSample("input-tokens", "Input Tokens", 100, 80),
      headerSample("priority-input-tokens", "Priority Input Tokens", 100, 60),
    ]);
    const rendered = buildRenderPayload(extra, aggregateSnapshot(extra, "remaining-capacity"), null, {
      layout: RATE_LIMIT_LAYOUT,
      now: NOW,
    });

    expect(rendered.metrics.map((row) => row.key)).toEqual([
      "input-tokens",
      "output-tokens",
      "requests",
      "tokens",
      "priority-input-tokens",
    ]);
    expect(rendered.metrics[4].text).toBe("Priority Input Tokens: 40 used / 100  (60% left)");
    expect(rendered.metrics[1].text).toBe("Output Tokens        : —");
  });
});

describe("buildRenderPayload (plan usage)", () => {
  const planSnapshot = snapshot("plan-usage", [
    planSample("five_hour", "5 Hour Limit", 92, "2026-03-01T14:30:00Z"),
    planSample("seven_day", "Weekly Limit", 40),
  ]);
  const payload = buildRenderPayload(planSnapshot, aggregateSnapshot(planSnapshot, "consumption"), null, {
    layout: PLAN_USAGE_LAYOUT,
    now: NOW,
  });

  it("renders the most consumed window as critical", () => {
    expect(payload.headline).toBe("○ 92%");
    expect(payload.icon).toBe("critical");
    expect(payload.statusLine).toBe("Usage Meter — 92% used");
  });

  it("renders used-only rows with the window reset", () => {
    expect(payload.metrics).toEqual([
      {
        key: "five_hour",
        text: "5 Hour Limit: 92% used",
        bar: `  ${"█".repeat(18)}${"░".repeat(2)}  resets in 2 hr 30 min`,
      },
      {
        key: "seven_day",
        text: "Weekly Limit: 40% used",
        bar: `  ${"█".repeat(8)}${"░".repeat(12)}`,
      },
    ]);
    expect(payload.resetLine).toBe("Resets in 2 hr 30 min");
    expect(payload.lastCheckedLine).toBe("Last checked: never");
  });

  it("renders a no-data row for a missing window rather than an empty bar", () => {
    const partial = snapshot("plan-usage", [planSample("seven_day", "Weekly Limit", 10)]);
    const rendered = buildRenderPayload(partial, aggregateSnapshot(partial, "consumption"), null, {
      layout: PLAN_USAGE_LAYOUT,
      now: NOW,
    });

    expect(rendered.metrics[0]).toEqual({ key: "five_hour", text: "5 Hour Limit: —", bar: "" });
    expect(rendered.headline).toBe("● 10%");
  });
});

describe("buildRenderPayload (no data)", () => {
  it("renders a neutral placeholder instead of 0%", () => {
    const payload = buildRenderPayload(null, noDataStatus(), null, { layout: PLAN_USAGE_LAYOUT, now: NOW });

    expect(payloadToLines(payload)).toEqual([
      "◉ —",
      "Usage Meter — no data",
      "",
      "5 Hour Limit: —",
      "",
      "Weekly Limit: —",
      "",
      "",
      "Resets: —",
      "Last checked: never",
    ]);
    expect(payload.icon).toBe("neutral");
  });
});

describe("buildResetLine", () => {
  it("follows the layout's reset priority", () => {
    const samples = [
      headerSample("requests", "Requests", 10, 5, "2026-03-01T12:00:10Z"),
      headerSample("tokens", "Total Tokens", 10, 5, "2026-03-01T12:01:00Z"),
    ];

    expect(buildResetLine(samples, RATE_LIMIT_LAYOUT, NOW)).toBe("Resets in 1m 0s");
  });

  it("reports an elapsed window", () => {
    const samples = [headerSample("tokens", "Total Tokens", 10, 5, "2026-03-01T11:00:00Z")];

    expect(buildResetLine(samples, RATE_LIMIT_LAYOUT, NOW)).toBe("Limit window just reset");
  });

  it("shows an unparseable reset verbatim", () => {
    const samples = [headerSample("tokens", "Total Tokens", 10, 5, "whenever")];

    expect(buildResetLine(samples, RATE_LIMIT_LAYOUT, NOW)).toBe("Reset: whenever");
  });
});

describe("applyOutcome", () => {
  const base = buildRenderPayload(
    snapshot("rate-limit-headers", [headerSample("requests", "Requests", 50, 40)]),
    { kind: "metrics", headlinePercentage: 80, severityTier: "nominal", statusLine: "Usage Meter — 80% capacity left" },
    null,
    { layout: RATE_LIMIT_LAYOUT, now: NOW },
  );
  const headers = { policy: "remaining-capacity", credentialKind: "api-key" } as const;
  const plan = { policy: "consumption", credentialKind: "oauth-token" } as const;

  it("keeps the metric rows and replaces headline and status for an auth error", () => {
    const payload = applyOutcome(base, { kind: "auth-error" }, headers);

    expect(payload.headline).toBe("◉ Bad Key");
    expect(payload.statusLine).toBe("⚠ Invalid API key");
    expect(payload.icon).toBe("neutral");
    expect(payload.metrics).toEqual(base.metrics);
  });

  it("shows exhaustion when rate limited", () => {
    const payload = applyOutcome(base, { kind: "rate-limited" }, headers);

    expect(payload.headline).toBe("○ 0%");
    expect(payload.icon).toBe("critical");
    expect(payload.statusLine).toBe("⚠ Rate limited");
  });

  it("shows a fully used window when the plan source is rate limited", () => {
    const payload = applyOutcome(base, { kind: "rate-limited" }, plan);

    expect(payload.headline).toBe("○ 100%");
    expect(payload.icon).toBe("critical");
    expect(payload.statusLine).toBe("⚠ Rate limited");
  });

  it("words credential failures for OAuth tokens", () => {
    expect(applyOutcome(base, { kind: "auth-error" }, plan)).toMatchObject({
      headline: "◉ Bad Token",
      statusLine: "⚠ Invalid OAuth token",
    });
    expect(applyOutcome(base, { kind: "no-credential" }, plan)).toMatchObject({
      headline: "◉ No Token",
      statusLine: "⚠ No credential configured",
    });
  });

  it("tells a timeout apart from a connection failure", () => {
    expect(
      applyOutcome(base, { kind: "transport-error", message: "Request timed out after 15000ms", timedOut: true }, headers),
    ).toMatchObject({
      headline: "◉ offline",
      statusLine: "⚠ Request timed out",
    });
  });

  it("truncates upstream messages to 80 characters", () => {
    const payload = applyOutcome(base, { kind: "upstream-error", status: 500, message: "x".repeat(120) }, headers);

    expect(payload.headline).toBe("◉ ⚠");
    expect(payload.statusLine).toBe(`⚠ ${"x".repeat(80)}`);
  });

  it("describes offline and missing-credential states", () => {
    const offline = { kind: "transport-error", message: "getaddrinfo ENOTFOUND api.anthropic.com", timedOut: false } as const;
    expect(applyOutcome(base, offline, headers)).toMatchObject({
      headline: "◉ offline",
      statusLine: "⚠ No connection",
    });
    expect(applyOutcome(base, { kind: "no-credential" }, headers)).toMatchObject({
      headline: "◉ No Key",
      statusLine: "⚠ No credential configured",
    });
  });

  it("leaves a successful payload untouched", () => {
    const success = snapshot("rate-limit-headers", []);
    expect(applyOutcome(base, { kind: "success", snapshot: success }, headers)).toBe(base);
  });
});
