import type { MetricType } from './types.js';

/**
 * Counter naming heuristic, shared with the generator's fallback branch.
 */
export function matchesCounterNaming(metricName: string): boolean {
    return metricName.endsWith('_total') ||
        metricName.includes('_count') ||
        metricName.includes('requests') ||
        metricName.includes('errors');
}

function matchesHistogramNaming(metricName: string): boolean {
    return metricName.includes('_bucket') ||
        metricName.includes('_duration') ||
        metricName.includes('_latency');
}

function matchesGaugeNaming(metricName: string): boolean {
    return metricName.includes('size') ||
        metricName.includes('usage') ||
        metricName.includes('memory') ||
        metricName.includes('cpu');
}

/**
 * Infer a metric type from its name when Prometheus has no metadata for it.
 *
 * Rules are checked in order and the first match wins, so a name such as
 * `request_count_bucket` is a counter, not a histogram.
 */
export function inferMetricType(metricName: string): MetricType {
    if (matchesCounterNaming(metricName)) {
        return 'counter';
    }
    if (matchesHistogramNaming(metricName)) {
        return 'histogram';
    }
    if (matchesGaugeNaming(metricName)) {
        return 'gauge';
    }
    return 'unknown';
}
