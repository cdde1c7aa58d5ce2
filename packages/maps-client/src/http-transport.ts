import { MapsClientError } from './errors';

const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpMethod = 'GET' | 'POST';

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
};

export type HttpResponse = {
  status: number;
  body: string;
};

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export interface FetchTransportConfig {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

const createTimeoutController = (timeoutMs: number): { controller: AbortController; cancel: () => void } => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  return {
    controller,
    cancel: () => clearTimeout(timeoutId)
  };
};

const isAbortError = (error: unknown): boolean =>
  (error instanceof DOMException || error instanceof Error) && error.name === 'AbortError';

/**
 * Replaces the `key` query parameter so URLs can be logged and attached to errors.
 */
export const redactApiKey = (url: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  if (!parsed.searchParams.has('key')) {
    return url;
  }

  parsed.searchParams.set('key', 'REDACTED');
  return parsed.toString();
};

/**
 * One HTTP exchange per call. Any failure to get a complete response becomes a `TRANSPORT` error;
 * statuses are left for the caller to interpret.
 */
export const createFetchTransport = (config: FetchTransportConfig = {}): HttpTransport => {
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async (request) => {
    const fetchImpl = config.fetchImpl ?? globalThis.fetch;
    const url = redactApiKey(request.url);
    const { controller, cancel } = createTimeoutController(timeoutMs);

    try {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal
      });
      const body = await response.text();

      return { status: response.status, body };
    } catch (error) {
      if (isAbortError(error)) {
        throw new MapsClientError(`Request timed out after ${timeoutMs}ms`, 'TRANSPORT', { url, cause: error });
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new MapsClientError(`Network request failed: ${message}`, 'TRANSPORT', { url, cause: error });
    } finally {
      cancel();
    }
  };
};
