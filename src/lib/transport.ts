export const REQUEST_TIMEOUT_MS = 15_000;

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.timedOut = options.timedOut ?? false;
  }
}

function withTimeoutSignal(timeoutMs: number): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  return { signal: controller.signal, clear: () => clearTimeout(timer) };
}

export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

export function createFetchTransport(timeoutMs = REQUEST_TIMEOUT_MS): HttpTransport {
  return {
    async send(request) {
      const timeout = withTimeoutSignal(timeoutMs);
      try {
        const response = await fetch(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
          signal: timeout.signal,
        });

        return {
          status: response.status,
          headers: headersToRecord(response.headers),
          body: await response.text(),
        };
      } catch (error) {
        if (timeout.signal.aborted) {
          throw new TransportError(`Request timed out after ${timeoutMs}ms`, { cause: error, timedOut: true });
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new TransportError(message, { cause: error });
      } finally {
        timeout.clear();
      }
    },
  };
}
