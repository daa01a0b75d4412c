/**
 * Core value types shared by the query engine, the gateways and the tools.
 */

export const METRIC_TYPES = ['counter', 'gauge', 'histogram', 'summary', 'unknown'] as const;

export type MetricType = typeof METRIC_TYPES[number];

export const VISUALIZATION_TYPES = ['timeseries', 'stat', 'gauge', 'table'] as const;

export type VisualizationType = typeof VISUALIZATION_TYPES[number];

/** Help text recorded when Prometheus has no metadata entry for a metric. */
export const NO_METADATA_HELP = 'No metadata available';

export interface MetricInfo {
    readonly name: string;
    readonly type: MetricType;
    readonly help: string;
    readonly labels: readonly string[];
}

export interface QuerySuggestion {
    readonly query: string;
    readonly description: string;
    readonly visualizationType: VisualizationType;
    readonly yAxisLabel: string;
}

/** Wire shape of a suggestion inside tool responses. */
export interface QuerySuggestionJson {
    query: string;
    description: string;
    visualization_type: VisualizationType;
    y_axis_label: string;
}

export function isMetricType(value: unknown): value is MetricType {
    return typeof value === 'string' && METRIC_TYPES.some(type => type === value);
}

export function isVisualizationType(value: unknown): value is VisualizationType {
    return typeof value === 'string' && VISUALIZATION_TYPES.some(type => type === value);
}

/**
 * Prometheus reports a few types outside the engine's vocabulary
 * (info, stateset, gaugehistogram); those are treated as unknown.
 */
export function normalizeMetricType(value: string): MetricType {
    return isMetricType(value) ? value : 'unknown';
}

export function toSuggestionJson(suggestion: QuerySuggestion): QuerySuggestionJson {
    return {
        query: suggestion.query,
        description: suggestion.description,
        visualization_type: suggestion.visualizationType,
        y_axis_label: suggestion.yAxisLabel
    };
}
