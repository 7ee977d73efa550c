import { z } from "zod";
import type { FetchOutcome, UsageSnapshot } from "../models/usage";
import type { UsageSource } from "../providers/types";
import type { CredentialProvider } from "./credentials";
import { getChildLogger } from "./logger";
import { redactHeaders } from "./redact";
import type { HttpResponse, HttpTransport } from "./transport";
import { TransportError } from "./transport";

const log = () => getChildLogger("fetch");

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().min(1),
  }),
});

export interface FetchUsageOptions {
  source: UsageSource;
  credentials: CredentialProvider;
  transport: HttpTransport;
  clock?: () => Date;
}

export function extractErrorMessage(response: HttpResponse): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(response.body));
    if (parsed.success) {
      return parsed.data.error.message;
    }
  } catch {
    log().debug(`Error body for HTTP ${response.status} is not JSON`);
  }
  return `HTTP ${response.status}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function resolveCredential(credentials: CredentialProvider): Promise<string | null> {
  try {
    return await credentials();
  } catch (error) {
    log().warn("Credential lookup failed", errorMessage(error));
    return null;
  }
}

export function classifyResponse(response: HttpResponse, source: UsageSource, fetchedAt: string): FetchOutcome {
  if (response.status === 401 || response.status === 403) {
    log().warn(`Credential rejected (${response.status})`);
    return { kind: "auth-error" };
  }

  if (response.status === 429) {
    log().warn("Rate limited (429)");
    return { kind: "rate-limited" };
  }

  if (response.status < 200 || response.status >= 300) {
    log().error(`Unexpected status ${response.status}: ${response.body.slice(0, 200)}`);
    return { kind: "upstream-error", status: response.status, message: extractErrorMessage(response) };
  }

  const normalized = source.normalize(response);
  if (!normalized.ok) {
    log().error(normalized.reason, response.body.slice(0, 200));
    return { kind: "upstream-error", status: response.status, message: normalized.reason };
  }

  const snapshot: UsageSnapshot = {
    source: source.id,
    samples: normalized.samples,
    fetchedAt,
  };
  log().info(`Parsed ${snapshot.samples.length} metric(s)`, snapshot.samples);
  return { kind: "success", snapshot };
}

/**
 * One credential lookup and at most one request. Every failure comes back as a FetchOutcome;
 * this never rejects and never retries.
 */
export async function fetchUsage(options: FetchUsageOptions): Promise<FetchOutcome> {
  const clock = options.clock ?? (() => new Date());

  const credential = await resolveCredential(options.credentials);
  if (!credential) {
    log().info("No credential available, skipping request");
    return { kind: "no-credential" };
  }

  try {
    const request = options.source.buildRequest(credential);
    log().info(`Fetching ${options.source.title}...`);
    log().debug(`${request.method} ${request.url}`, redactHeaders(request.headers));

    const response = await options.transport.send(request);
    log().info(`Response status: ${response.status}`);

    return classifyResponse(response, options.source, clock().toISOString());
  } catch (error) {
    if (error instanceof TransportError) {
      log().error(`Connection error: ${error.message}`);
      return { kind: "transport-error", message: error.message, timedOut: error.timedOut };
    }

    log().error("Unexpected error", error);
    return { kind: "upstream-error", message: errorMessage(error) };
  }
}
