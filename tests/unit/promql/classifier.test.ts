import { inferMetricType } from '../../../src/services/promql/classifier.js';

describe('inferMetricType', () => {
  test.each([
    ['http_requests_total', 'counter'],
    ['disk_errors', 'counter'],
    ['request_count_bucket', 'counter'],
    ['http_duration_bucket', 'histogram'],
    ['rpc_latency', 'histogram'],
    ['process_memory_bytes', 'gauge'],
    ['queue_size', 'gauge'],
    ['node_load1', 'unknown']
  ])('%s is inferred as %s', (name, expected) => {
    expect(inferMetricType(name)).toBe(expected);
  });

  test('counter naming wins over histogram naming', () => {
    // _count matches before _bucket is looked at
    expect(inferMetricType('api_request_count_bucket')).toBe('counter');
  });
});
