const SENSITIVE_KEY_PATTERN = /(token|authorization|secret|password|api[-_]?key)/i;

const REDACTED = "[REDACTED]";

export function redactSecret(value: string): string {
  if (value.length <= 12) {
    return REDACTED;
  }
  return `${value.slice(0, 4)}...${REDACTED}...${value.slice(-4)}`;
}

/** Deep copy with every value under a credential-looking key masked. */
export function redactSensitive(input: unknown): unknown {
  if (input === null || typeof input !== "object") {
    return input;
  }

  if (Array.isArray(input)) {
    return input.map((value) => redactSensitive(value));
  }

  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (SENSITIVE_KEY_PATTERN.test(key)) {
      output[key] = typeof value === "string" ? redactSecret(value) : REDACTED;
      continue;
    }
    output[key] = redactSensitive(value);
  }

  return output;
}

export function redactHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    output[name] = SENSITIVE_KEY_PATTERN.test(name) ? redactSecret(value) : value;
  }
  return output;
}
