/**
 * Retrieval Client Tests
 *
 * `fetch` is stubbed per test; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import { HydrometRetrievalClient } from '../../../retrieval/client.js';
import { endpoint } from '../../../retrieval/endpoints.js';
import { HTTPClient } from '../../../core/http-client.js';
import { RetrievalError } from '../../../core/errors.js';
import { Regime } from '../../../core/types.js';

const BASE_URL = 'https://service.test/api';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(...responses: Array<() => Response>) {
  let call = 0;
  const mock = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    if (!next) throw new Error('No stubbed response');
    return next();
  });
  vi.stubGlobal('fetch', mock);
  return mock;
}

async function captureError(promise: Promise<unknown>): Promise<RetrievalError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RetrievalError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('HydrometRetrievalClient', () => {
  const client = new HydrometRetrievalClient({ baseUrl: BASE_URL });

  describe('successful responses', () => {
    it('should normalize zone list entries', async () => {
      const mock = stubFetch(() =>
        jsonResponse(['Z1', { id: 2, nombre: 'Centro' }, { nombre: 'Sur' }])
      );

      const zones = await client.fetch(endpoint('zone-list', { family: 'heads' }));

      expect(zones).toEqual([
        { id: 'Z1', name: 'Z1' },
        { id: '2', name: 'Centro' },
        { id: 'Sur', name: 'Sur' },
      ]);
      expect(mock).toHaveBeenCalledTimes(1);
      expect(mock.mock.calls[0]?.[0]).toBe(`${BASE_URL}/metamodelos/zonas`);
    });

    it('should unwrap series records', async () => {
      stubFetch(() => jsonResponse({ data: [{ date: '2020-01-01', value: 12.5 }], zona: 'Z1' }));

      const records = await client.fetch(
        endpoint('zone-series', {
          family: 'heads',
          dataset: 'head-absoluto',
          zone: 'Z1',
          regime: Regime.HISTORICAL,
        })
      );

      expect(records).toEqual([{ date: '2020-01-01', value: 12.5 }]);
    });

    it('should default missing well info to an empty object', async () => {
      stubFetch(() => jsonResponse({ data: [] }));

      const response = await client.fetch(endpoint('well-history', { wellId: 'P1' }));

      expect(response).toEqual({ info: {}, records: [] });
    });

    it('should read the well list from its envelope', async () => {
      stubFetch(() => jsonResponse({ pozos: ['P1', { id: 'P2', nombre: 'Pozo Dos' }] }));

      const wells = await client.fetch(endpoint('well-list', {}));

      expect(wells).toEqual([
        { id: 'P1', name: 'P1' },
        { id: 'P2', name: 'Pozo Dos' },
      ]);
    });
  });

  describe('failures', () => {
    it('should turn an error status into a RetrievalError with the status code', async () => {
      stubFetch(() => jsonResponse({ detail: 'boom' }, 500, 'Internal Server Error'));

      const error = await captureError(client.fetch(endpoint('zone-list', { family: 'heads' })));

      expect(error.statusCode).toBe(500);
      expect(error.endpoint).toBe('zone-list');
      expect(error.kind).toBe('RetrievalError');
      expect(error.message).toBe(
        `zone-list request to ${BASE_URL}/metamodelos/zonas failed: HTTP 500: Internal Server Error`
      );
    });

    it('should report a response of the wrong shape', async () => {
      stubFetch(() => jsonResponse({ zonas: [] }));

      const error = await captureError(client.fetch(endpoint('zone-list', { family: 'balance' })));

      expect(error.statusCode).toBeUndefined();
      expect(error.message).toBe(
        `zone-list response from ${BASE_URL}/metamodelos/balance/zones has an unexpected shape: ` +
          '(root): Expected array, received object'
      );
    });

    it('should report a body that is not JSON', async () => {
      stubFetch(() => new Response('<html>maintenance</html>', { status: 200 }));

      const error = await captureError(client.fetch(endpoint('well-list', {})));

      expect(error.message).toContain('Failed to parse JSON response');
      expect(error.statusCode).toBeUndefined();
    });

    it('should report network failures', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async (..._args: FetchArgs): Promise<Response> => {
          throw new TypeError('fetch failed');
        })
      );

      const error = await captureError(client.fetch(endpoint('well-levels', {})));

      expect(error.message).toBe(
        `well-levels request to ${BASE_URL}/plataforma-pozos/pozos-nivel-geojson failed: ` +
          'Network error: fetch failed'
      );
    });

    it('should not retry by default', async () => {
      const mock = stubFetch(() => jsonResponse({}, 503, 'Service Unavailable'));

      await captureError(client.fetch(endpoint('well-list', {})));

      expect(mock).toHaveBeenCalledTimes(1);
    });
  });

  describe('retries', () => {
    const retrying = new HydrometRetrievalClient({
      baseUrl: BASE_URL,
      http: new HTTPClient({ maxRetries: 2, initialDelayMs: 0, jitterFactor: 0 }),
    });

    it('should retry retryable statuses up to the configured count', async () => {
      const mock = stubFetch(
        () => jsonResponse({}, 503, 'Service Unavailable'),
        () => jsonResponse(['Z1'])
      );

      const zones = await retrying.fetch(endpoint('zone-list', { family: 'heads' }));

      expect(zones).toEqual([{ id: 'Z1', name: 'Z1' }]);
      expect(mock).toHaveBeenCalledTimes(2);
    });

    it('should not retry a 404', async () => {
      const mock = stubFetch(() => jsonResponse({}, 404, 'Not Found'));

      const error = await captureError(retrying.fetch(endpoint('well-forecast', { wellId: 'P9' })));

      expect(error.statusCode).toBe(404);
      expect(mock).toHaveBeenCalledTimes(1);
    });

    it('should give up after the last retry', async () => {
      const mock = stubFetch(() => jsonResponse({}, 502, 'Bad Gateway'));

      const error = await captureError(retrying.fetch(endpoint('well-list', {})));

      expect(error.statusCode).toBe(502);
      expect(mock).toHaveBeenCalledTimes(3);
    });
  });
});
