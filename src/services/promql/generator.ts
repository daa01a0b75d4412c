import { matchesCounterNaming } from './classifier.js';
import type { MetricInfo, QuerySuggestion } from './types.js';

const HISTOGRAM_QUANTILES = ['0.50', '0.95', '0.99'] as const;
const SUMMARY_QUANTILES = ['0.5', '0.9', '0.95', '0.99'] as const;

const HISTOGRAM_QUANTILE_DESCRIPTIONS: Record<typeof HISTOGRAM_QUANTILES[number], string> = {
    '0.50': '50th percentile (median) over 5 minutes',
    '0.95': '95th percentile over 5 minutes',
    '0.99': '99th percentile over 5 minutes'
};

/** Reserved labels (`__name__` and other `__`-prefixed names) are never grouped on. */
function groupableLabels(labels: readonly string[]): string[] {
    return labels.filter(label => label !== '__name__' && !label.startsWith('__'));
}

function trimSuffix(value: string, suffix: string): string {
    return value.endsWith(suffix) ? value.slice(0, -suffix.length) : value;
}

function generateCounterQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    const metricName = metricInfo.name;

    const suggestions: QuerySuggestion[] = [
        {
            query: `rate(${metricName}[5m])`,
            description: 'Rate per second over 5 minutes',
            visualizationType: 'timeseries',
            yAxisLabel: 'per second'
        },
        {
            query: `increase(${metricName}[1h])`,
            description: 'Total increase over 1 hour',
            visualizationType: 'timeseries',
            yAxisLabel: 'total'
        }
    ];

    for (const label of groupableLabels(metricInfo.labels)) {
        suggestions.push({
            query: `sum by (${label}) (rate(${metricName}[5m]))`,
            description: `Rate per second grouped by ${label}`,
            visualizationType: 'timeseries',
            yAxisLabel: 'per second'
        });
    }

    return suggestions;
}

function generateGaugeQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    const metricName = metricInfo.name;

    const suggestions: QuerySuggestion[] = [
        {
            query: metricName,
            description: 'Current value',
            visualizationType: 'timeseries',
            yAxisLabel: 'value'
        },
        {
            query: `avg_over_time(${metricName}[1h])`,
            description: 'Average over 1 hour',
            visualizationType: 'timeseries',
            yAxisLabel: 'avg value'
        }
    ];

    if (metricInfo.labels.length === 0) {
        return suggestions;
    }

    suggestions.push(
        {
            query: `avg(${metricName})`,
            description: 'Average across all instances',
            visualizationType: 'stat',
            yAxisLabel: 'avg value'
        },
        {
            query: `max(${metricName})`,
            description: 'Maximum value',
            visualizationType: 'stat',
            yAxisLabel: 'max value'
        },
        {
            query: `min(${metricName})`,
            description: 'Minimum value',
            visualizationType: 'stat',
            yAxisLabel: 'min value'
        }
    );

    for (const label of groupableLabels(metricInfo.labels)) {
        suggestions.push({
            query: `avg by (${label}) (${metricName})`,
            description: `Average grouped by ${label}`,
            visualizationType: 'timeseries',
            yAxisLabel: 'avg value'
        });
    }

    return suggestions;
}

function generateHistogramQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    let baseName = trimSuffix(metricInfo.name, '_bucket');
    baseName = trimSuffix(baseName, '_count');
    baseName = trimSuffix(baseName, '_sum');

    const quantiles: QuerySuggestion[] = HISTOGRAM_QUANTILES.map(quantile => ({
        query: `histogram_quantile(${quantile}, rate(${baseName}_bucket[5m]))`,
        description: HISTOGRAM_QUANTILE_DESCRIPTIONS[quantile],
        visualizationType: 'timeseries',
        yAxisLabel: 'duration'
    }));

    return [
        ...quantiles,
        {
            query: `rate(${baseName}_count[5m])`,
            description: 'Request rate (requests per second)',
            visualizationType: 'timeseries',
            yAxisLabel: 'requests/sec'
        },
        {
            query: `rate(${baseName}_sum[5m]) / rate(${baseName}_count[5m])`,
            description: 'Average duration',
            visualizationType: 'timeseries',
            yAxisLabel: 'avg duration'
        }
    ];
}

// Quantile selectors are emitted whether or not the series carries a
// `quantile` label; metadata does not expose label values.
function generateSummaryQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    let baseName = trimSuffix(metricInfo.name, '_count');
    baseName = trimSuffix(baseName, '_sum');

    const suggestions: QuerySuggestion[] = [
        {
            query: `rate(${baseName}_count[5m])`,
            description: 'Request rate (requests per second)',
            visualizationType: 'timeseries',
            yAxisLabel: 'requests/sec'
        },
        {
            query: `rate(${baseName}_sum[5m]) / rate(${baseName}_count[5m])`,
            description: 'Average value',
            visualizationType: 'timeseries',
            yAxisLabel: 'avg value'
        }
    ];

    for (const quantile of SUMMARY_QUANTILES) {
        suggestions.push({
            query: `${baseName}{quantile="${quantile}"}`,
            description: `${quantile} quantile`,
            visualizationType: 'timeseries',
            yAxisLabel: 'value'
        });
    }

    return suggestions;
}

function generateDefaultQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    const metricName = metricInfo.name;

    if (matchesCounterNaming(metricName)) {
        return generateCounterQueries(metricInfo);
    }

    return [
        {
            query: metricName,
            description: 'Raw metric value',
            visualizationType: 'timeseries',
            yAxisLabel: 'value'
        },
        {
            query: `rate(${metricName}[5m])`,
            description: 'Rate of change over 5 minutes',
            visualizationType: 'timeseries',
            yAxisLabel: 'per second'
        }
    ];
}

/**
 * Produce type-specific PromQL candidates for a metric.
 *
 * The result is never empty and its first element is the primary query for
 * the metric's type; callers rely on that ordering when picking a query.
 */
export function generateQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    switch (metricInfo.type) {
        case 'counter':
            return generateCounterQueries(metricInfo);
        case 'gauge':
            return generateGaugeQueries(metricInfo);
        case 'histogram':
            return generateHistogramQueries(metricInfo);
        case 'summary':
            return generateSummaryQueries(metricInfo);
        default:
            return generateDefaultQueries(metricInfo);
    }
}
