import type { HttpRequest, HttpResponse } from "../lib/transport";
import type { MetricLayout, MetricSample, UsageSourceId } from "../models/usage";

export type NormalizeResult = { ok: true; samples: MetricSample[] } | { ok: false; reason: string };

export type CredentialKind = "api-key" | "oauth-token";

/** One upstream response shape, its request and how it is read. */
export interface UsageSource {
  id: UsageSourceId;
  title: string;
  credentialKind: CredentialKind;
  layout: MetricLayout;
  buildRequest(credential: string): HttpRequest;
  normalize(response: HttpResponse): NormalizeResult;
}
