import { loadEnv } from '@wayfarer/config';
import { createLogger, type Logger, setLogLevel } from '@wayfarer/logger';
import { z } from 'zod';

import type { Api } from './api';
import {
  type ApplicationFailure,
  MapsClientError,
  classifyMapsError,
  classifyStatus,
  toMapsClientError
} from './errors';
import { type HttpMethod, type HttpRequest, createFetchTransport, redactApiKey } from './http-transport';
import { RateLimitSettingSchema, RateLimiter } from './rate-limiter';
import { BackoffPolicySchema, executeWithRetry, sleep as defaultSleep } from './retry';

export const DEFAULT_BASE_URLS = {
  maps: 'https://maps.googleapis.com/maps/api',
  places: 'https://places.googleapis.com/v1',
  addressValidation: 'https://addressvalidation.googleapis.com'
} as const;

export type BaseUrls = { [K in keyof typeof DEFAULT_BASE_URLS]: string };

export const MapsClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'apiKey must be set'),
  baseUrls: z
    .object({
      maps: z.string().url(),
      places: z.string().url(),
      addressValidation: z.string().url()
    })
    .partial()
    .optional(),
  timeoutMs: z.number().int().positive().optional(),
  backoff: BackoffPolicySchema.partial().optional(),
  rateLimits: z.array(RateLimitSettingSchema).optional()
});

export type MapsClientConfig = z.input<typeof MapsClientConfigSchema> & {
  fetchImpl?: typeof fetch;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Everything the client needs to run one call against a Google endpoint.
 */
export interface EndpointRequest<T> {
  /** Human-readable API name used in logs and error messages. */
  title: string;
  apis: readonly Api[];
  method?: HttpMethod;
  service: keyof BaseUrls;
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  /** Legacy web services take the key as a query parameter, newer APIs as a header. */
  auth: 'query' | 'header';
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  applicationError?: (payload: T) => ApplicationFailure | null;
}

export interface MapsClient {
  readonly baseUrls: BaseUrls;
  readonly rateLimiter: RateLimiter;
  withRate: (api: Api, requests: number, perDurationMs: number) => MapsClient;
  request: <T>(endpoint: EndpointRequest<T>) => Promise<T>;
}

const GoogleErrorBodySchema = z.union([
  z.object({ error: z.object({ message: z.string() }) }),
  z.object({ error_message: z.string() }),
  z.object({ errorMessage: z.string() })
]);

const errorMessageFromBody = (body: string): string | undefined => {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return undefined;
  }

  const parsed = GoogleErrorBodySchema.safeParse(payload);
  if (!parsed.success) {
    return undefined;
  }

  const data = parsed.data;
  if ('error' in data) {
    return data.error.message;
  }
  return 'error_message' in data ? data.error_message : data.errorMessage;
};

const joinUrl = (base: string, path: string): string => `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;

/**
 * Validates caller input before anything is sent or counted against a rate limit.
 */
export const parseRequest = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, title: string): T => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new MapsClientError(`Invalid ${title} request`, 'INVALID_REQUEST', {
      details: parsed.error.flatten()
    });
  }
  return parsed.data;
};

export const createMapsClient = (config: MapsClientConfig): MapsClient => {
  const parsedConfig = MapsClientConfigSchema.safeParse(config);
  if (!parsedConfig.success) {
    throw new MapsClientError('Invalid maps client configuration', 'INVALID_REQUEST', {
      details: parsedConfig.error.flatten()
    });
  }

  const { apiKey, backoff, timeoutMs } = parsedConfig.data;
  const baseUrls: BaseUrls = { ...DEFAULT_BASE_URLS, ...parsedConfig.data.baseUrls };
  const log = createLogger('maps-client', config.logger);
  const sleep = config.sleep ?? defaultSleep;
  const now = config.now ?? Date.now;
  const transport = createFetchTransport({ fetchImpl: config.fetchImpl, timeoutMs });
  const rateLimiter = new RateLimiter({ now, sleep, logger: createLogger('rate-limiter', log) });

  for (const setting of parsedConfig.data.rateLimits ?? []) {
    rateLimiter.withRate(setting.api, setting.requests, setting.perDurationMs);
  }

  const buildHttpRequest = <T>(endpoint: EndpointRequest<T>): HttpRequest => {
    const url = new URL(joinUrl(baseUrls[endpoint.service], endpoint.path));
    for (const [name, value] of Object.entries(endpoint.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(name, String(value));
      }
    }

    const headers: Record<string, string> = { ...endpoint.headers };
    if (endpoint.auth === 'query') {
      url.searchParams.set('key', apiKey);
    } else {
      headers['X-Goog-Api-Key'] = apiKey;
    }

    let body: string | undefined;
    if (endpoint.body !== undefined) {
      body = JSON.stringify(endpoint.body);
      headers['content-type'] = 'application/json';
    }

    return { method: endpoint.method ?? 'GET', url: url.toString(), headers, body };
  };

  const attemptOnce = async <T>(endpoint: EndpointRequest<T>, httpRequest: HttpRequest, attempt: number): Promise<T> => {
    const url = redactApiKey(httpRequest.url);
    const response = await transport(httpRequest);

    if (response.status < 200 || response.status >= 300) {
      const detail = errorMessageFromBody(response.body);
      const message = `${endpoint.title} returned HTTP ${response.status}`;
      throw new MapsClientError(detail ? `${message}: ${detail}` : message, classifyStatus(response.status), {
        status: response.status,
        url,
        attempt
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new MapsClientError(`Failed to parse ${endpoint.title} response JSON`, 'MALFORMED_RESPONSE', {
        status: response.status,
        url,
        attempt,
        cause: error
      });
    }

    const parsed = endpoint.schema.safeParse(payload);
    if (!parsed.success) {
      throw new MapsClientError(`${endpoint.title} response did not match the expected shape`, 'MALFORMED_RESPONSE', {
        status: response.status,
        url,
        attempt,
        details: parsed.error.flatten()
      });
    }

    const failure = endpoint.applicationError?.(parsed.data);
    if (failure) {
      const message = `${endpoint.title} returned ${failure.apiStatus}`;
      throw new MapsClientError(
        failure.message ? `${message}: ${failure.message}` : message,
        failure.retryable ? 'APPLICATION_TRANSIENT' : 'APPLICATION_PERMANENT',
        { status: response.status, apiStatus: failure.apiStatus, url, attempt }
      );
    }

    log.debug({ attempt, status: response.status }, `${endpoint.title} attempt ${attempt} succeeded`);
    return parsed.data;
  };

  const client: MapsClient = {
    baseUrls,
    rateLimiter,
    withRate: (api, requests, perDurationMs) => {
      rateLimiter.withRate(api, requests, perDurationMs);
      return client;
    },
    request: async <T>(endpoint: EndpointRequest<T>): Promise<T> => {
      const httpRequest = buildHttpRequest(endpoint);
      const url = redactApiKey(httpRequest.url);

      await rateLimiter.limitApis(['All', ...endpoint.apis]);
      log.info({ method: httpRequest.method, url }, `${endpoint.title} ${httpRequest.method} request`);

      try {
        const operation = async (attempt: number): Promise<T> => {
          try {
            return await attemptOnce(endpoint, httpRequest, attempt);
          } catch (error) {
            const failure = toMapsClientError(error);
            log.debug(
              { attempt, code: failure.code, status: failure.status, apiStatus: failure.apiStatus },
              `${endpoint.title} attempt ${attempt} failed: ${failure.message}`
            );
            throw failure;
          }
        };

        return await executeWithRetry(operation, {
          classify: classifyMapsError,
          policy: backoff,
          sleep,
          now,
          onRetry: ({ attempt, delayMs, error }) => {
            log.warn(
              { attempt, delayMs, code: error.code, status: error.status, apiStatus: error.apiStatus },
              `${endpoint.title} attempt ${attempt} failed, retrying`
            );
          }
        });
      } catch (error) {
        const failure = classifyMapsError(error).error;
        log.error(
          { code: failure.code, status: failure.status, apiStatus: failure.apiStatus, url },
          `${endpoint.title} request failed: ${failure.message}`
        );
        throw failure;
      }
    }
  };

  return client;
};

/**
 * Builds a client from `GOOGLE_MAPS_API_KEY` and `GOOGLE_MAPS_TIMEOUT_MS`. A `LOG_LEVEL` there is applied
 * to the root logger.
 */
export const createMapsClientFromEnv = (
  raw: Record<string, string | undefined> = process.env,
  overrides: Omit<MapsClientConfig, 'apiKey'> = {}
): MapsClient => {
  const env = loadEnv(raw);
  if (env.LOG_LEVEL) {
    setLogLevel(env.LOG_LEVEL);
  }

  return createMapsClient({
    apiKey: env.GOOGLE_MAPS_API_KEY,
    timeoutMs: env.GOOGLE_MAPS_TIMEOUT_MS,
    ...overrides
  });
};
