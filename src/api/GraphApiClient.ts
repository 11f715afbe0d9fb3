/**
 * Thin Graph API client
 * Attaches the access token, enforces a request timeout and turns non-2xx replies into typed errors
 */

import { z } from 'zod';
import type { ApiConfig } from '../config/app';
import { graphErrorSchema } from '../schemas/graph';
import {
  ApiRequestError,
  AuthError,
  FatalError,
  RateLimitError,
  TransientError,
  describeError,
} from '../utils/error';

export type HttpMethod = 'GET' | 'DELETE';

export type QueryParams = Record<string, string | number | undefined>;

// OAuthException (expired/invalid token) and API session errors
const AUTH_ERROR_CODES: ReadonlySet<number> = new Set([102, 190]);

// Application, user, page and custom-level throttling
const RATE_LIMIT_ERROR_CODES: ReadonlySet<number> = new Set([4, 17, 32, 613]);

export class GraphApiClient {
  constructor(
    private readonly accessToken: string,
    private readonly config: ApiConfig
  ) {}

  public async get(path: string, params: QueryParams = {}): Promise<unknown> {
    return this.request('GET', path, params);
  }

  public async delete(path: string, params: QueryParams = {}): Promise<unknown> {
    return this.request('DELETE', path, params);
  }

  /**
   * Build the request URL; the token is always the last query parameter
   */
  public buildUrl(path: string, params: QueryParams = {}): URL {
    const url = new URL(`${this.config.baseUrl}/${path.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    url.searchParams.set('access_token', this.accessToken);
    return url;
  }

  private async request(method: HttpMethod, path: string, params: QueryParams): Promise<unknown> {
    const operation = `${method} /${path.replace(/^\/+/, '')}`;

    // The timeout also covers reading the body, so a stalled or reset stream is a network failure too
    let response: Response;
    let body: string;
    try {
      response = await fetch(this.buildUrl(path, params), {
        method,
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      throw new TransientError(
        `${operation} failed: ${describeError(error)}`,
        'NETWORK_FAILURE',
        error instanceof Error ? error : undefined
      );
    }

    const payload = parseJson(body);

    if (!response.ok) {
      throw toHttpError(operation, response, payload);
    }

    if (payload === undefined) {
      throw new FatalError(`${operation} returned a non-JSON body`, { status: response.status });
    }

    return payload;
  }
}

/**
 * Validate a response payload, raising FatalError on a malformed envelope
 */
export const parseResponse = <S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  operation: string
): z.output<S> => {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.errors.map(err => `${err.path.join('.') || '<root>'}: ${err.message}`);
    throw new FatalError(`Malformed response from ${operation}: ${issues.join(', ')}`, issues);
  }
  return result.data;
};

const parseJson = (body: string): unknown => {
  if (body.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
};

/**
 * Retry-After is either delay-seconds or an HTTP date
 */
export const parseRetryAfter = (header: string | null, now: number = Date.now()): number | undefined => {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
};

const toHttpError = (operation: string, response: Response, payload: unknown): Error => {
  const parsed = graphErrorSchema.safeParse(payload);
  const graphError = parsed.success ? parsed.data.error : undefined;
  const code = graphError?.code;
  const message = `${operation} failed with HTTP ${response.status}: ${graphError?.message ?? response.statusText}`;

  if (response.status === 401 || (code !== undefined && AUTH_ERROR_CODES.has(code))) {
    return new AuthError(message);
  }
  if (response.status === 429 || (code !== undefined && RATE_LIMIT_ERROR_CODES.has(code))) {
    return new RateLimitError(message, parseRetryAfter(response.headers.get('retry-after')));
  }
  if (response.status >= 500) {
    return new TransientError(message, 'SERVER_ERROR');
  }
  return new ApiRequestError(message, response.status, code);
};
