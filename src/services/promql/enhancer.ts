import type { MetricInfo, QuerySuggestion, VisualizationType } from './types.js';

/**
 * Rule-based refinement of generated suggestions.
 *
 * Every rule is a substring check on the metric name or the query text and
 * the rule chains are first-match-wins; the order below is part of the
 * behaviour, not incidental structure.
 */

const PERCENTILE_MARKERS: ReadonlyArray<readonly [string, string]> = [
    ['0.50', '50th'],
    ['0.95', '95th'],
    ['0.99', '99th'],
    ['0.90', '90th']
];

/**
 * Percentile ordinal for a `histogram_quantile` query, or '' when none of
 * the known quantiles appears in the text.
 */
export function extractPercentile(query: string): string {
    for (const [marker, ordinal] of PERCENTILE_MARKERS) {
        if (query.includes(marker)) {
            return ordinal;
        }
    }
    return '';
}

/**
 * Base metric name of the first `<name>_bucket` reference in a query.
 *
 * `sum(rate(api_latency_bucket[2m])) by (le)` gives `api_latency`.
 */
export function extractMetricNameFromHistogramQuery(query: string): string {
    const bucketIndex = query.indexOf('_bucket');
    if (bucketIndex === -1) {
        return '';
    }

    const words = query.slice(0, bucketIndex).split(/[ (,)]/).filter(word => word.length > 0);
    const lastWord = words[words.length - 1];
    if (lastWord === undefined) {
        return '';
    }

    return lastWord.replace(/^[()[\], ]+|[()[\], ]+$/g, '');
}

function countOccurrences(text: string, needle: string): number {
    return text.split(needle).length - 1;
}

export function enhanceDescription(metricInfo: MetricInfo, suggestion: QuerySuggestion): string {
    const name = metricInfo.name;
    const { query, description } = suggestion;

    if (name.includes('http') && query.includes('rate(')) {
        return `HTTP ${description.toLowerCase()}`;
    }

    if ((name.includes('error') || name.includes('fail')) && query.includes('rate(')) {
        return `Error ${description.toLowerCase()}`;
    }

    if (name.includes('memory') || name.includes('cpu')) {
        return `Resource Usage: ${description}`;
    }

    if (name.includes('latency') || name.includes('duration')) {
        return `Performance: ${description}`;
    }

    if (query.includes('histogram_quantile')) {
        const percentile = extractPercentile(query);
        if (percentile !== '') {
            return `${percentile} percentile (${percentile} of requests are faster)`;
        }
    }

    if (query.includes('increase(')) {
        return `Total ${description.toLowerCase()}`;
    }

    return description;
}

/**
 * Textual query rewrites. The histogram aggregation rewrite only applies to
 * the exact `rate(<name>_bucket[...])` shape and silently leaves any other
 * text untouched.
 */
export function optimizeQuery(metricInfo: MetricInfo, query: string): string {
    let optimized = query;

    // High-frequency request series read better over a shorter window.
    if (query.includes('rate(') && query.includes('[5m]')) {
        if (metricInfo.name.includes('request') || metricInfo.name.includes('http')) {
            optimized = optimized.replaceAll('[5m]', '[2m]');
        }
    }

    if (query.includes('histogram_quantile') && !query.includes('sum(rate(') && !query.includes('sum by')) {
        const metricName = extractMetricNameFromHistogramQuery(query);
        if (metricName !== '') {
            optimized = optimized.replaceAll(`rate(${metricName}_bucket[`, `sum(rate(${metricName}_bucket[`);
            if (countOccurrences(optimized, 'sum(') === 1) {
                optimized = optimized.replaceAll(']))', '])) by (le)');
            }
        }
    }

    return optimized;
}

export function suggestVisualizationType(metricInfo: MetricInfo, suggestion: QuerySuggestion): VisualizationType {
    const { query } = suggestion;

    if (query.includes('histogram_quantile')) {
        return 'timeseries';
    }

    if (query.includes('avg(') && !query.includes('over_time')) {
        return 'stat';
    }

    if (query.includes('max(') || query.includes('min(')) {
        return 'stat';
    }

    if (metricInfo.name.includes('ratio') || metricInfo.name.includes('percent')) {
        return 'gauge';
    }

    return suggestion.visualizationType;
}

/**
 * SLO and alerting patterns derived from the metric alone.
 */
export function generateContextualQueries(metricInfo: MetricInfo): QuerySuggestion[] {
    const contextual: QuerySuggestion[] = [];
    const metricName = metricInfo.name;

    if ((metricName.includes('http_request') || metricName.includes('request')) && metricInfo.type === 'counter') {
        contextual.push(
            {
                query: `rate(${metricName}{status=~"5.."}[5m]) / rate(${metricName}[5m])`,
                description: 'Error rate (5xx responses)',
                visualizationType: 'timeseries',
                yAxisLabel: 'error ratio'
            },
            {
                query: `rate(${metricName}{status=~"2.."}[5m]) / rate(${metricName}[5m])`,
                description: 'Success rate (2xx responses)',
                visualizationType: 'stat',
                yAxisLabel: 'success ratio'
            }
        );
    }

    if (metricInfo.type === 'counter' && (metricName.includes('error') || metricName.includes('fail'))) {
        contextual.push({
            query: `increase(${metricName}[1h]) > 10`,
            description: 'High error count alert (>10/hour)',
            visualizationType: 'table',
            yAxisLabel: 'count'
        });
    }

    if (metricName.includes('cpu') && metricInfo.type === 'gauge') {
        contextual.push({
            query: `(${metricName} > 80)`,
            description: 'High CPU usage alert (>80%)',
            visualizationType: 'table',
            yAxisLabel: 'percent'
        });
    }

    if (metricName.includes('memory') && metricInfo.type === 'gauge') {
        contextual.push({
            query: `(${metricName} / 1024 / 1024 / 1024)`,
            description: 'Memory usage in GB',
            visualizationType: 'timeseries',
            yAxisLabel: 'GB'
        });
    }

    return contextual;
}

export function enhanceQuery(metricInfo: MetricInfo, suggestion: QuerySuggestion): QuerySuggestion {
    return {
        query: optimizeQuery(metricInfo, suggestion.query),
        description: enhanceDescription(metricInfo, suggestion),
        visualizationType: suggestVisualizationType(metricInfo, suggestion),
        yAxisLabel: suggestion.yAxisLabel
    };
}

/**
 * Enhanced copies of every input suggestion, in input order, followed by the
 * contextual suggestions. The result is never shorter than the input.
 */
export function enhanceQueries(metricInfo: MetricInfo, suggestions: readonly QuerySuggestion[]): QuerySuggestion[] {
    const enhanced = suggestions.map(suggestion => enhanceQuery(metricInfo, suggestion));
    return [...enhanced, ...generateContextualQueries(metricInfo)];
}
