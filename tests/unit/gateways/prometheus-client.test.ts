import { PrometheusClient } from '../../../src/services/prometheus/client.js';
import { fetchCall, jsonResponse, mockFetch, type FetchSpy } from '../../utils/fetch-mock.js';

describe('PrometheusClient', () => {
  const client = new PrometheusClient('http://prom.test:9090/', 50);
  let fetchSpy: FetchSpy;

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe('fetchMetadata', () => {
    test('returns the first metadata entry', async () => {
      fetchSpy = mockFetch(() => jsonResponse({
        status: 'success',
        data: { http_requests_total: [{ type: 'counter', help: 'Total requests', unit: '' }] }
      }));

      await expect(client.fetchMetadata('http_requests_total')).resolves.toEqual({ type: 'counter', help: 'Total requests' });
      expect(fetchCall(fetchSpy).url).toBe('http://prom.test:9090/api/v1/metadata?metric=http_requests_total');
    });

    test('returns null when the metric is unknown', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'success', data: {} }));
      await expect(client.fetchMetadata('missing')).resolves.toBeNull();
    });

    test('maps types outside the engine vocabulary to unknown', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'success', data: { build_info: [{ type: 'info', help: 'Build' }] } }));
      await expect(client.fetchMetadata('build_info')).resolves.toEqual({ type: 'unknown', help: 'Build' });
    });

    test('fails on a non-200 status', async () => {
      fetchSpy = mockFetch(() => new Response('unavailable', { status: 503 }));
      await expect(client.fetchMetadata('up')).rejects.toMatchObject({
        code: 'UPSTREAM_ERROR',
        message: 'prometheus returned status 503'
      });
    });

    test('releases the body of a non-200 response', async () => {
      const response = new Response('unavailable', { status: 503 });
      fetchSpy = mockFetch(() => response);
      await expect(client.fetchMetadata('up')).rejects.toThrow('prometheus returned status 503');
      expect(response.bodyUsed).toBe(true);
    });

    test('fails on a non-success API status', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'error', error: 'overloaded' }));
      await expect(client.fetchMetadata('up')).rejects.toThrow('prometheus API returned non-success status: error');
    });

    test('fails on a malformed body', async () => {
      fetchSpy = mockFetch(() => new Response('not json', { status: 200 }));
      await expect(client.fetchMetadata('up')).rejects.toMatchObject({
        code: 'DECODE_ERROR',
        message: expect.stringMatching(/^failed to decode metadata response: /)
      });
    });

    test('reports timeouts', async () => {
      fetchSpy = jest.spyOn(globalThis, 'fetch').mockRejectedValue(
        Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
      );
      await expect(client.fetchMetadata('up')).rejects.toThrow('prometheus request timed out after 50ms');
    });

    test('reports transport failures', async () => {
      fetchSpy = jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
      await expect(client.fetchMetadata('up')).rejects.toThrow('failed to reach prometheus: fetch failed');
    });
  });

  describe('fetchLabels', () => {
    test('queries labels for the metric series', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'success', data: ['__name__', 'instance', 'job'] }));

      await expect(client.fetchLabels('up')).resolves.toEqual(['__name__', 'instance', 'job']);
      expect(fetchCall(fetchSpy).url).toBe('http://prom.test:9090/api/v1/labels?match%5B%5D=up');
    });

    test('fails on a non-success API status', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'error' }));
      await expect(client.fetchLabels('up')).rejects.toThrow('labels API returned non-success status: error');
    });
  });

  describe('validate', () => {
    test('posts the query as a form', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'success', data: { resultType: 'vector', result: [] } }));

      await expect(client.validate('up')).resolves.toBeUndefined();
      const { url, init } = fetchCall(fetchSpy);
      expect(url).toBe('http://prom.test:9090/api/v1/query');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('query=up&time=0');
    });

    test('reads the error envelope of a rejected query', async () => {
      fetchSpy = mockFetch(() => jsonResponse({ status: 'error', errorType: 'bad_data', error: 'parse error at char 5' }, 400));
      await expect(client.validate('rate(')).rejects.toMatchObject({
        code: 'QUERY_INVALID',
        message: 'query validation failed: parse error at char 5 (bad_data)'
      });
    });
  });

  describe('listMetadata', () => {
    test('returns every metric', async () => {
      fetchSpy = mockFetch(() => jsonResponse({
        status: 'success',
        data: {
          queue_size: [{ type: 'gauge', help: 'Queue' }],
          feature_flags: [{ type: 'stateset', help: 'Flags' }]
        }
      }));

      const metrics = await client.listMetadata();
      expect([...metrics.entries()]).toEqual([
        ['queue_size', { type: 'gauge', help: 'Queue' }],
        ['feature_flags', { type: 'unknown', help: 'Flags' }]
      ]);
      expect(fetchCall(fetchSpy).url).toBe('http://prom.test:9090/api/v1/metadata');
    });
  });
});
