import { parseUtcTimestamp } from "./normalize";

export type ResetDescription =
  | { kind: "upcoming"; text: string }
  | { kind: "elapsed"; text: string }
  | { kind: "verbatim"; text: string };

const SECONDS_PER_HOUR = 60 * 60;

export function describeResetTime(value: string | null | undefined, referenceTimeMs = Date.now()): ResetDescription | null {
  if (value === null || value === undefined || !value.trim()) {
    return null;
  }

  const targetMs = parseUtcTimestamp(value);
  if (targetMs === undefined) {
    return { kind: "verbatim", text: value };
  }

  const deltaMs = targetMs - referenceTimeMs;
  if (deltaMs <= 0) {
    return { kind: "elapsed", text: "just reset" };
  }

  const totalSeconds = Math.floor(deltaMs / 1000);
  if (totalSeconds < SECONDS_PER_HOUR) {
    const minutes = Math.floor(totalSeconds / 60);
    const seconds = totalSeconds % 60;
    return { kind: "upcoming", text: `in ${minutes}m ${seconds}s` };
  }

  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const minutes = Math.floor((totalSeconds % SECONDS_PER_HOUR) / 60);
  return { kind: "upcoming", text: `in ${hours} hr ${minutes} min` };
}

export function formatResetTime(value: string | null | undefined, referenceTimeMs = Date.now()): string | null {
  return describeResetTime(value, referenceTimeMs)?.text ?? null;
}

export function formatTimeOfDay(value: Date, timeZone?: string): string {
  return (
    new Intl.DateTimeFormat("en-US", {
      hour: "numeric",
      minute: "2-digit",
      second: "2-digit",
      hour12: true,
      timeZone,
    })
      .format(value)
      // Newer ICU data separates the day period with a narrow no-break space.
      .replace(/[\u00a0\u202f]/g, " ")
  );
}
