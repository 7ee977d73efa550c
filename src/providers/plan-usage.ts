import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { clampPercent, isRecord, safeString } from "../lib/normalize";
import type { MetricLayout, MetricSample } from "../models/usage";
import type { UsageSource } from "./types";

const PLAN_USAGE_URL = "https://api.anthropic.com/api/oauth/usage";
const OAUTH_BETA_HEADER = "oauth-2025-04-20";

interface PlanUsageWindow {
  utilization?: unknown;
  resets_at?: unknown;
}

export interface PlanUsageDocument {
  five_hour?: PlanUsageWindow;
  seven_day?: PlanUsageWindow;
}

const WINDOWS = [
  { key: "five_hour", label: "5 Hour Limit" },
  { key: "seven_day", label: "Weekly Limit" },
] as const;

export const PLAN_USAGE_LAYOUT: MetricLayout = {
  policy: "consumption",
  slots: WINDOWS,
  resetPriority: ["five_hour", "seven_day"],
};

function toSampleFromWindow(window: unknown, key: string, label: string): MetricSample | undefined {
  if (!isRecord(window)) {
    return undefined;
  }

  // Booleans and numeric strings are not utilization ratios.
  const utilization = window.utilization;
  if (typeof utilization !== "number" || !Number.isFinite(utilization)) {
    return undefined;
  }

  const percentage = clampPercent(Math.round(utilization * 100));
  return {
    key,
    label,
    used: percentage,
    limit: null,
    percentage,
    resetAt: safeString(window.resets_at) ?? null,
  };
}

export function mapPlanUsageToSamples(document: unknown): MetricSample[] {
  if (!isRecord(document)) {
    return [];
  }

  const samples: MetricSample[] = [];
  for (const { key, label } of WINDOWS) {
    const sample = toSampleFromWindow(document[key], key, label);
    if (sample) {
      samples.push(sample);
    }
  }
  return samples;
}

function splitConfigDirs(raw?: string): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function dedupePaths(paths: string[]): string[] {
  const seen = new Set<string>();
  const output: string[] = [];

  for (const value of paths) {
    const normalized = path.normalize(value);
    if (seen.has(normalized)) {
      continue;
    }
    seen.add(normalized);
    output.push(normalized);
  }

  return output;
}

function deepFindString(input: unknown, keys: string[]): string | undefined {
  const queue: unknown[] = [input];
  while (queue.length > 0) {
    const current = queue.shift();
    if (Array.isArray(current)) {
      queue.push(...current);
      continue;
    }
    if (!isRecord(current)) {
      continue;
    }

    for (const key of keys) {
      const maybe = safeString(current[key]);
      if (maybe) {
        return maybe;
      }
    }

    queue.push(...Object.values(current));
  }

  return undefined;
}

export function resolveCredentialPaths(env: NodeJS.ProcessEnv = process.env, home = os.homedir()): string[] {
  const inferredFromEnv = splitConfigDirs(env.CLAUDE_CONFIG_DIR).flatMap((root) => [
    path.join(root, ".credentials.json"),
    path.join(root, ".claude", ".credentials.json"),
  ]);

  return dedupePaths([
    ...inferredFromEnv,
    path.join(home, ".claude", ".credentials.json"),
    path.join(home, ".config", "claude", ".credentials.json"),
  ]);
}

/** First OAuth access token found in a readable credentials file, or null. */
export async function readOAuthAccessToken(candidates: string[]): Promise<string | null> {
  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(candidate, "utf8"));
    } catch {
      continue;
    }

    const token = deepFindString(parsed, ["accessToken", "access_token", "token"]);
    if (token) {
      return token.replace(/^Bearer\s+/i, "");
    }
  }

  return null;
}

export const planUsageSource: UsageSource = {
  id: "plan-usage",
  title: "Plan usage",
  credentialKind: "oauth-token",
  layout: PLAN_USAGE_LAYOUT,
  buildRequest(accessToken) {
    return {
      method: "GET",
      url: PLAN_USAGE_URL,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: "application/json",
        "anthropic-beta": OAUTH_BETA_HEADER,
        "User-Agent": "usage-meter",
      },
    };
  },
  normalize(response) {
    let document: unknown;
    try {
      document = JSON.parse(response.body);
    } catch {
      return { ok: false, reason: "Unreadable usage response" };
    }
    return { ok: true, samples: mapPlanUsageToSamples(document) };
  },
};
