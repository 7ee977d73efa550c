import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { createCredentialProvider } from "../src/lib/credentials";

describe("createCredentialProvider (api key)", () => {
  it("prefers the environment over the saved key", async () => {
    const provider = createCredentialProvider({
      kind: "api-key",
      savedApiKey: () => "saved-key",
      env: { ANTHROPIC_API_KEY: "env-key" },
    });

    await expect(provider()).resolves.toBe("env-key");
  });

  it("falls back to the saved key when the environment is blank", async () => {
    const provider = createCredentialProvider({
      kind: "api-key",
      savedApiKey: () => "saved-key",
      env: { ANTHROPIC_API_KEY: "  " },
    });

    await expect(provider()).resolves.toBe("saved-key");
  });

  it("prefers a key entered during the session over the environment", async () => {
    const provider = createCredentialProvider({
      kind: "api-key",
      savedApiKey: () => "saved-key",
      sessionApiKey: () => "session-key",
      env: { ANTHROPIC_API_KEY: "env-key" },
    });

    await expect(provider()).resolves.toBe("session-key");
  });

  it("returns null when neither is set", async () => {
    const provider = createCredentialProvider({ kind: "api-key", savedApiKey: () => undefined, env: {} });

    await expect(provider()).resolves.toBeNull();
  });
});

describe("createCredentialProvider (oauth token)", () => {
  it("uses a token from the environment without a Bearer prefix", async () => {
    const provider = createCredentialProvider({
      kind: "oauth-token",
      savedApiKey: () => "saved-key",
      env: { CLAUDE_OAUTH_TOKEN: "Bearer test-token" },
      credentialFiles: [],
    });

    await expect(provider()).resolves.toBe("test-token");
  });

  it("reads the credentials file and never the saved API key", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "usage-meter-oauth-"));
    const file = path.join(dir, ".credentials.json");
    await fs.writeFile(file, JSON.stringify({ claudeAiOauth: { accessToken: "file-token" } }));

    try {
      const fromFile = createCredentialProvider({
        kind: "oauth-token",
        savedApiKey: () => "saved-key",
        env: {},
        credentialFiles: [file],
      });
      const none = createCredentialProvider({
        kind: "oauth-token",
        savedApiKey: () => "saved-key",
        env: {},
        credentialFiles: [path.join(dir, "missing.json")],
      });

      await expect(fromFile()).resolves.toBe("file-token");
      await expect(none()).resolves.toBeNull();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
