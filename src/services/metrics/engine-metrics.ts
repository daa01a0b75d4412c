import { Counter } from 'prom-client';
import { register } from './registry.js';

/**
 * Query Engine Metrics
 */

export const suggestionsGenerated = new Counter({
  name: 'promdash_query_suggestions_generated_total',
  help: 'Query suggestions produced by the generator, by metric type',
  labelNames: ['metric_type'],
  registers: [register]
});

export const metricTypeInferences = new Counter({
  name: 'promdash_metric_type_inferences_total',
  help: 'Metric types inferred from names because Prometheus had no metadata',
  labelNames: ['metric_type'],
  registers: [register]
});

export const queryValidations = new Counter({
  name: 'promdash_query_validations_total',
  help: 'PromQL validations against Prometheus by result',
  labelNames: ['result'],
  registers: [register]
});
