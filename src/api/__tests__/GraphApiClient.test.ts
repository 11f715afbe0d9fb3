import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { GraphApiClient, parseResponse, parseRetryAfter } from '../GraphApiClient';
import {
  ApiRequestError,
  AuthError,
  FatalError,
  RateLimitError,
  TransientError,
} from '../../utils/error';
import {
  TEST_BASE_URL,
  TEST_TOKEN,
  brokenBody,
  graphErrorResponse,
  jsonResponse,
  stubGraph,
} from '../../__tests__/helpers/graphStub';

describe('GraphApiClient', () => {
  const client = new GraphApiClient(TEST_TOKEN, { baseUrl: TEST_BASE_URL, timeoutMs: 5000 });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildUrl', () => {
    it('appends defined params and the access token last', () => {
      const url = client.buildUrl('/g1/members', { limit: 500, after: undefined });

      expect(url.toString()).toBe('https://graph.test/v16.0/g1/members?limit=500&access_token=test-token');
    });

    it('targets the version root for an empty path', () => {
      const url = client.buildUrl('', { ids: '1,2', fields: 'id,name,location' });

      expect(url.pathname).toBe('/v16.0/');
      expect(url.searchParams.get('ids')).toBe('1,2');
    });
  });

  describe('successful requests', () => {
    it('issues a GET and returns the parsed body', async () => {
      const fetchMock = stubGraph(() => jsonResponse({ data: [{ id: '1', name: 'Ann' }] }));

      const body = await client.get('g1/members', { limit: 2 });

      expect(body).toEqual({ data: [{ id: '1', name: 'Ann' }] });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe('https://graph.test/v16.0/g1/members?limit=2&access_token=test-token');
      expect(init?.method).toBe('GET');
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('issues a DELETE', async () => {
      const fetchMock = stubGraph(() => jsonResponse({ success: true }));

      await expect(client.delete('g1/members/42')).resolves.toEqual({ success: true });
      expect(fetchMock.mock.calls[0][1]?.method).toBe('DELETE');
    });

    it('rejects a 2xx reply that is not JSON with FatalError', async () => {
      stubGraph(() => new Response('<html>maintenance</html>', { status: 200 }));

      await expect(client.get('me')).rejects.toBeInstanceOf(FatalError);
    });
  });

  describe('error mapping', () => {
    it('maps HTTP 401 to AuthError', async () => {
      stubGraph(() => new Response('', { status: 401 }));

      await expect(client.get('me')).rejects.toBeInstanceOf(AuthError);
    });

    it('maps the expired-token code to AuthError regardless of status', async () => {
      stubGraph(() => graphErrorResponse(400, 190, 'Error validating access token'));

      await expect(client.get('me')).rejects.toMatchObject({
        name: 'AuthError',
        message: 'GET /me failed with HTTP 400: Error validating access token',
      });
    });

    it('maps HTTP 429 to RateLimitError with the Retry-After delay', async () => {
      stubGraph(() => graphErrorResponse(429, 0, 'Too many calls', { 'Retry-After': '2' }));

      const promise = client.get('g1/members');

      await expect(promise).rejects.toBeInstanceOf(RateLimitError);
      await expect(promise).rejects.toMatchObject({ retryAfterMs: 2000, code: 'RATE_LIMITED' });
    });

    it('maps throttling codes sent with HTTP 400 to RateLimitError', async () => {
      stubGraph(() => graphErrorResponse(400, 613, 'Calls to this api have exceeded the rate limit'));

      const promise = client.delete('g1/members/3');

      await expect(promise).rejects.toBeInstanceOf(RateLimitError);
      await expect(promise).rejects.toMatchObject({ retryAfterMs: undefined });
    });

    it('maps 5xx replies to a non-rate-limit TransientError', async () => {
      stubGraph(() => graphErrorResponse(503, 2, 'Service temporarily unavailable'));

      const promise = client.get('me');

      await expect(promise).rejects.toBeInstanceOf(TransientError);
      await expect(promise).rejects.not.toBeInstanceOf(RateLimitError);
      await expect(promise).rejects.toMatchObject({ code: 'SERVER_ERROR' });
    });

    it('maps other client errors to ApiRequestError', async () => {
      stubGraph(() => graphErrorResponse(400, 100, 'Invalid parameter'));

      const promise = client.delete('g1/members/9');

      await expect(promise).rejects.toBeInstanceOf(ApiRequestError);
      await expect(promise).rejects.toMatchObject({
        status: 400,
        graphCode: 100,
        message: 'DELETE /g1/members/9 failed with HTTP 400: Invalid parameter',
      });
    });

    it('wraps network failures in TransientError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => {
          throw new TypeError('fetch failed');
        })
      );

      await expect(client.get('me')).rejects.toMatchObject({
        name: 'TransientError',
        code: 'NETWORK_FAILURE',
        message: 'GET /me failed: fetch failed',
      });
    });

    it('wraps a body stream that breaks mid-read in TransientError', async () => {
      stubGraph(() => new Response(brokenBody('socket hang up'), { status: 200 }));

      const promise = client.get('me');

      await expect(promise).rejects.toBeInstanceOf(TransientError);
      await expect(promise).rejects.toMatchObject({ code: 'NETWORK_FAILURE' });
    });
  });
});

describe('parseRetryAfter', () => {
  it('reads delay-seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';

    expect(parseRetryAfter(date, Date.parse(date) - 1500)).toBe(1500);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('parseResponse', () => {
  const schema = z.object({ data: z.array(z.string()) });

  it('returns the validated payload', () => {
    expect(parseResponse(schema, { data: ['a'] }, 'GET /x')).toEqual({ data: ['a'] });
  });

  it('raises FatalError naming the operation and the offending field', () => {
    expect(() => parseResponse(schema, { items: [] }, 'GET /g1/members')).toThrow(
      'Malformed response from GET /g1/members: data: Required'
    );
    expect(() => parseResponse(schema, null, 'GET /g1/members')).toThrow(FatalError);
  });
});
