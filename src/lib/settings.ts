import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { getChildLogger } from "./logger";
import { redactSensitive } from "./redact";

export const REFRESH_INTERVALS = [
  { label: "30 seconds", seconds: 30 },
  { label: "1 minute", seconds: 60 },
  { label: "5 minutes", seconds: 300 },
  { label: "15 minutes", seconds: 900 },
] as const;

export type RefreshSeconds = (typeof REFRESH_INTERVALS)[number]["seconds"];

export const DEFAULT_REFRESH_SECONDS: RefreshSeconds = 60;

export interface Settings {
  refreshSeconds: RefreshSeconds;
  apiKey?: string;
}

export function isRefreshSeconds(value: number): value is RefreshSeconds {
  return REFRESH_INTERVALS.some((interval) => interval.seconds === value);
}

const refreshSecondsSchema = z.number().refine(isRefreshSeconds, { message: "Unsupported refresh interval" });

// Each field falls back on its own so one bad value does not discard the other.
const settingsFileSchema = z.object({
  refresh_seconds: refreshSecondsSchema.optional().catch(undefined),
  api_key: z.string().trim().min(1).optional().catch(undefined),
});

export function defaultSettings(): Settings {
  return { refreshSeconds: DEFAULT_REFRESH_SECONDS };
}

export function defaultSettingsPath(home = os.homedir()): string {
  return path.join(home, ".config", "usage-meter", "config.json");
}

export class SettingsError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SettingsError";
  }
}

export function parseSettings(raw: unknown): Settings {
  const parsed = settingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    return defaultSettings();
  }

  const settings = defaultSettings();
  const { refresh_seconds: refreshSeconds, api_key: apiKey } = parsed.data;
  if (refreshSeconds !== undefined) {
    settings.refreshSeconds = refreshSeconds;
  }
  if (apiKey) {
    settings.apiKey = apiKey;
  }
  return settings;
}

export class SettingsStore {
  private get log() {
    return getChildLogger("settings");
  }

  constructor(readonly filePath: string = defaultSettingsPath()) {}

  /** Missing or corrupt files yield defaults; this never rejects. */
  async load(): Promise<Settings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      this.log.debug(`No settings at ${this.filePath}, using defaults`, error);
      return defaultSettings();
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.log.warn(`Settings file ${this.filePath} is not valid JSON, using defaults`, error);
      return defaultSettings();
    }

    const settings = parseSettings(document);
    this.log.debug("Loaded settings", redactSensitive(settings));
    return settings;
  }

  async save(settings: Settings): Promise<void> {
    const document = {
      refresh_seconds: settings.refreshSeconds,
      ...(settings.apiKey ? { api_key: settings.apiKey } : {}),
    };

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, `${JSON.stringify(document, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
      // `mode` only applies when the file is created.
      await fs.chmod(this.filePath, 0o600);
    } catch (error) {
      throw new SettingsError(`Could not write settings to ${this.filePath}`, { cause: error });
    }

    this.log.debug("Saved settings", redactSensitive(settings));
  }
}
