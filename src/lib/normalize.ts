const INTEGER_PATTERN = /^\d+$/;

// Offset is mandatory: a naive timestamp cannot be placed on the UTC timeline.
const UTC_QUALIFIED_TIMESTAMP = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?([Zz]|[+-]\d{2}:?\d{2})$/;

/** Non-negative base-10 integer, or undefined for anything else ("1e3", "12.5", "-4", ""). */
export function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  if (value < 0) {
    return 0;
  }

  if (value > 100) {
    return 100;
  }

  return value;
}

/** Epoch milliseconds of an ISO-8601 timestamp that carries `Z` or an explicit offset. */
export function parseUtcTimestamp(value: string): number | undefined {
  const trimmed = value.trim();
  if (!UTC_QUALIFIED_TIMESTAMP.test(trimmed)) {
    return undefined;
  }

  const parsedMs = Date.parse(trimmed);
  if (Number.isNaN(parsedMs)) {
    return undefined;
  }

  return parsedMs;
}

export function safeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
