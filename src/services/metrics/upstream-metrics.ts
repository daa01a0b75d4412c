import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Upstream Metrics
 *
 * Calls made to Prometheus and Grafana on behalf of tool requests.
 */

export type UpstreamTarget = 'prometheus' | 'grafana';
export type UpstreamOutcome = 'success' | 'error' | 'timeout';

export const upstreamRequests = new Counter({
  name: 'promdash_upstream_requests_total',
  help: 'Total number of requests sent to Prometheus or Grafana',
  labelNames: ['target', 'operation', 'outcome'],
  registers: [register]
});

export const upstreamRequestDuration = new Histogram({
  name: 'promdash_upstream_request_duration_seconds',
  help: 'Duration of requests sent to Prometheus or Grafana in seconds',
  labelNames: ['target', 'operation', 'outcome'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register]
});
