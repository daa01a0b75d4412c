import { generateQueries } from '../../../src/services/promql/generator.js';
import type { MetricInfo } from '../../../src/services/promql/types.js';

function metric(name: string, type: MetricInfo['type'], labels: string[] = []): MetricInfo {
  return { name, type, help: '', labels };
}

describe('generateQueries', () => {
  test('counter yields rate, increase and per-label breakdowns', () => {
    const suggestions = generateQueries(metric('http_requests_total', 'counter', ['method', 'status', '__name__']));
    expect(suggestions.map(s => s.query)).toEqual([
      'rate(http_requests_total[5m])',
      'increase(http_requests_total[1h])',
      'sum by (method) (rate(http_requests_total[5m]))',
      'sum by (status) (rate(http_requests_total[5m]))'
    ]);
    expect(suggestions[0]).toEqual({
      query: 'rate(http_requests_total[5m])',
      description: 'Rate per second over 5 minutes',
      visualizationType: 'timeseries',
      yAxisLabel: 'per second'
    });
    expect(suggestions[3]?.description).toBe('Rate per second grouped by status');
  });

  test('reserved labels are never grouped on', () => {
    const suggestions = generateQueries(metric('jobs_total', 'counter', ['__name__', '__meta_job']));
    expect(suggestions).toHaveLength(2);
  });

  test('gauge without labels yields current value and hourly average', () => {
    const suggestions = generateQueries(metric('queue_size', 'gauge'));
    expect(suggestions.map(s => s.query)).toEqual(['queue_size', 'avg_over_time(queue_size[1h])']);
  });

  test('gauge with labels adds aggregates and per-label averages', () => {
    const suggestions = generateQueries(metric('queue_size', 'gauge', ['instance']));
    expect(suggestions).toHaveLength(6);
    expect(suggestions[2]).toEqual({
      query: 'avg(queue_size)',
      description: 'Average across all instances',
      visualizationType: 'stat',
      yAxisLabel: 'avg value'
    });
    expect(suggestions[5]?.query).toBe('avg by (instance) (queue_size)');
  });

  test('histogram strips the series suffix and builds quantiles', () => {
    const suggestions = generateQueries(metric('http_duration_bucket', 'histogram'));
    expect(suggestions).toHaveLength(5);
    expect(suggestions[0]?.query).toBe('histogram_quantile(0.50, rate(http_duration_bucket[5m]))');
    expect(suggestions[0]?.description).toBe('50th percentile (median) over 5 minutes');
    expect(suggestions[3]?.query).toBe('rate(http_duration_count[5m])');
    expect(suggestions[4]?.query).toBe('rate(http_duration_sum[5m]) / rate(http_duration_count[5m])');
  });

  test('summary emits quantile selectors', () => {
    const suggestions = generateQueries(metric('gc_pause_seconds_sum', 'summary'));
    expect(suggestions).toHaveLength(6);
    expect(suggestions[0]?.query).toBe('rate(gc_pause_seconds_count[5m])');
    expect(suggestions[2]).toEqual({
      query: 'gc_pause_seconds{quantile="0.5"}',
      description: '0.5 quantile',
      visualizationType: 'timeseries',
      yAxisLabel: 'value'
    });
    expect(suggestions[5]?.query).toBe('gc_pause_seconds{quantile="0.99"}');
  });

  test('summary without a series suffix still emits every quantile', () => {
    const suggestions = generateQueries(metric('rpc_seconds', 'summary'));
    expect(suggestions.map(s => s.query)).toEqual([
      'rate(rpc_seconds_count[5m])',
      'rate(rpc_seconds_sum[5m]) / rate(rpc_seconds_count[5m])',
      'rpc_seconds{quantile="0.5"}',
      'rpc_seconds{quantile="0.9"}',
      'rpc_seconds{quantile="0.95"}',
      'rpc_seconds{quantile="0.99"}'
    ]);
  });

  test('unknown type falls back to raw value and rate', () => {
    const suggestions = generateQueries(metric('node_load1', 'unknown'));
    expect(suggestions.map(s => s.query)).toEqual(['node_load1', 'rate(node_load1[5m])']);
    expect(suggestions[0]?.description).toBe('Raw metric value');
  });

  test('unknown type with counter naming uses counter queries', () => {
    const suggestions = generateQueries(metric('cache_misses_total', 'unknown'));
    expect(suggestions[0]?.query).toBe('rate(cache_misses_total[5m])');
    expect(suggestions[1]?.query).toBe('increase(cache_misses_total[1h])');
  });
});
