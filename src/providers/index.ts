import type { UsageSourceId } from "../models/usage";
import { planUsageSource } from "./plan-usage";
import { rateLimitHeadersSource } from "./rate-limit-headers";
import type { UsageSource } from "./types";

export type { CredentialKind, NormalizeResult, UsageSource } from "./types";

export const USAGE_SOURCES: Record<UsageSourceId, UsageSource> = {
  "rate-limit-headers": rateLimitHeadersSource,
  "plan-usage": planUsageSource,
};

const SOURCE_ALIASES: Record<string, UsageSourceId> = {
  headers: "rate-limit-headers",
  "rate-limit-headers": "rate-limit-headers",
  plan: "plan-usage",
  "plan-usage": "plan-usage",
};

export const SOURCE_CHOICES = Object.keys(SOURCE_ALIASES);

export function resolveUsageSource(name: string | undefined): UsageSource {
  const id = name ? SOURCE_ALIASES[name.trim().toLowerCase()] : undefined;
  if (name && !id) {
    throw new Error(`Unknown usage source "${name}". Expected one of: ${SOURCE_CHOICES.join(", ")}.`);
  }
  return USAGE_SOURCES[id ?? "rate-limit-headers"];
}
