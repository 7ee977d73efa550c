import { readOAuthAccessToken, resolveCredentialPaths } from "../providers/plan-usage";
import type { CredentialKind } from "../providers/types";
import { safeString } from "./normalize";

/** Resolves to an opaque credential, or null when none is available. */
export type CredentialProvider = () => Promise<string | null>;

export const API_KEY_ENV = "ANTHROPIC_API_KEY";
export const OAUTH_TOKEN_ENV = "CLAUDE_OAUTH_TOKEN";

export interface CredentialLookup {
  kind: CredentialKind;
  /** Saved API key; only consulted for `api-key` lookups. */
  savedApiKey: () => string | undefined;
  /** Key entered during this run; wins over the environment. */
  sessionApiKey?: () => string | undefined;
  env?: NodeJS.ProcessEnv;
  credentialFiles?: string[];
}

export function createCredentialProvider(lookup: CredentialLookup): CredentialProvider {
  const env = lookup.env ?? process.env;

  if (lookup.kind === "api-key") {
    return async () =>
      safeString(lookup.sessionApiKey?.()) ?? safeString(env[API_KEY_ENV]) ?? safeString(lookup.savedApiKey()) ?? null;
  }

  return async () => {
    const manual = safeString(env[OAUTH_TOKEN_ENV]);
    if (manual) {
      return manual.replace(/^Bearer\s+/i, "");
    }
    return readOAuthAccessToken(lookup.credentialFiles ?? resolveCredentialPaths(env));
  };
}
