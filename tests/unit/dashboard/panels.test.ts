import { generatePanelsFromMetrics, inferUnit, mapVisualizationType } from '../../../src/services/dashboard/panels.js';
import { PromQLService } from '../../../src/services/promql/service.js';
import { FakePrometheus, PROMETHEUS_URL } from '../../utils/fakes.js';

describe('inferUnit', () => {
  test.each([
    ['api_latency_seconds', 'value', 's'],
    ['jobs', 'avg duration', 's'],
    ['jobs', 'requests/sec', 'reqps'],
    ['cache_hit_ratio', 'value', 'percent'],
    ['heap_bytes', 'value', 'bytes'],
    ['node_cpu', 'value', 'percent'],
    ['node_load1', 'value', 'short']
  ])('%s with axis %s uses %s', (name, axis, unit) => {
    expect(inferUnit(name, axis)).toBe(unit);
  });
});

describe('mapVisualizationType', () => {
  test('keeps known types and defaults the rest', () => {
    expect(mapVisualizationType('stat')).toBe('stat');
    expect(mapVisualizationType('bar')).toBe('timeseries');
  });
});

describe('generatePanelsFromMetrics', () => {
  let prometheus: FakePrometheus;
  let service: PromQLService;

  beforeEach(() => {
    prometheus = new FakePrometheus();
    service = new PromQLService(() => prometheus);
    prometheus.addMetric('http_requests_total', { type: 'counter', help: 'Total HTTP requests' }, ['method']);
  });

  test('builds a panel from the best query with extra targets', async () => {
    const [panel] = await generatePanelsFromMetrics(service, ['http_requests_total'], PROMETHEUS_URL);

    expect(panel).toEqual({
      title: 'http_requests_total - HTTP rate per second over 5 minutes',
      type: 'timeseries',
      description: 'Total HTTP requests',
      fieldConfig: { defaults: { unit: 'reqps', color: { mode: 'palette-classic' } } },
      targets: [
        { refId: 'A', expr: 'rate(http_requests_total[2m])', legendFormat: 'HTTP rate per second over 5 minutes' },
        { refId: 'B', expr: 'increase(http_requests_total[1h])', legendFormat: 'Total total increase over 1 hour' },
        { refId: 'C', expr: 'sum by (method) (rate(http_requests_total[2m]))', legendFormat: 'HTTP rate per second grouped by method' },
        {
          refId: 'D',
          expr: 'rate(http_requests_total{status=~"5.."}[5m]) / rate(http_requests_total[5m])',
          legendFormat: 'Error rate (5xx responses)'
        }
      ]
    });
  });

  test('skips invalid extra queries without leaving refId gaps', async () => {
    prometheus.invalidQueries.add('increase(http_requests_total[1h])');
    const [panel] = await generatePanelsFromMetrics(service, ['http_requests_total'], PROMETHEUS_URL);

    expect(panel?.['targets']).toEqual([
      { refId: 'A', expr: 'rate(http_requests_total[2m])', legendFormat: 'HTTP rate per second over 5 minutes' },
      { refId: 'B', expr: 'sum by (method) (rate(http_requests_total[2m]))', legendFormat: 'HTTP rate per second grouped by method' },
      {
        refId: 'C',
        expr: 'rate(http_requests_total{status=~"5.."}[5m]) / rate(http_requests_total[5m])',
        legendFormat: 'Error rate (5xx responses)'
      }
    ]);
  });

  test('falls back to the bare metric when the best query is invalid', async () => {
    prometheus.invalidQueries.add('rate(http_requests_total[2m])');
    const [panel] = await generatePanelsFromMetrics(service, ['http_requests_total'], PROMETHEUS_URL);

    expect(panel?.['title']).toBe('http_requests_total - HTTP rate per second over 5 minutes');
    expect(panel?.['targets']).toContainEqual({
      refId: 'A',
      expr: 'http_requests_total',
      legendFormat: 'HTTP rate per second over 5 minutes'
    });
  });

  test('falls back to the bare metric for an unbalanced histogram query', async () => {
    const best = 'histogram_quantile(0.50, sum(rate(http_request_duration_seconds_bucket[2m])) by (le)';
    prometheus.addMetric('http_request_duration_seconds_bucket', { type: 'histogram', help: 'Request latency' });
    prometheus.invalidQueries.add(best);

    const [panel] = await generatePanelsFromMetrics(service, ['http_request_duration_seconds_bucket'], PROMETHEUS_URL);

    expect(prometheus.validated[0]).toBe(best);
    expect(panel?.['title']).toBe('http_request_duration_seconds_bucket - HTTP 50th percentile (median) over 5 minutes');
    expect(panel?.['targets']).toContainEqual({
      refId: 'A',
      expr: 'http_request_duration_seconds_bucket',
      legendFormat: 'HTTP 50th percentile (median) over 5 minutes'
    });
  });

  test('uses a basic panel when metadata cannot be read', async () => {
    prometheus.failingMetadata.add('broken_metric');
    const panels = await generatePanelsFromMetrics(service, ['broken_metric'], PROMETHEUS_URL);

    expect(panels).toEqual([
      { title: 'broken_metric', type: 'timeseries', targets: [{ refId: 'A', expr: 'broken_metric' }] }
    ]);
  });

  test('infers unknown metrics and omits placeholder help', async () => {
    const [panel] = await generatePanelsFromMetrics(service, ['mystery_value'], PROMETHEUS_URL);

    expect(panel?.['title']).toBe('mystery_value - Raw metric value');
    expect(panel && 'description' in panel).toBe(false);
    expect(panel?.['fieldConfig']).toEqual({ defaults: { unit: 'short', color: { mode: 'palette-classic' } } });
    expect(panel?.['targets']).toEqual([
      { refId: 'A', expr: 'mystery_value', legendFormat: 'Raw metric value' },
      { refId: 'B', expr: 'rate(mystery_value[5m])', legendFormat: 'Rate of change over 5 minutes' }
    ]);
  });

  test('skips non-string names and fails when nothing is left', async () => {
    await expect(generatePanelsFromMetrics(service, [1, null], PROMETHEUS_URL))
      .rejects.toThrow('no valid panels could be generated from the provided metric names');
  });
});
