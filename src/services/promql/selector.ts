import type { QuerySuggestion } from './types.js';

export const DEFAULT_QUERY: QuerySuggestion = Object.freeze({
    query: 'up',
    description: 'Default query',
    visualizationType: 'timeseries',
    yAxisLabel: 'value'
});

/**
 * "Best" is the generator's ordering: the first suggestion wins, and an
 * empty list falls back to `up`.
 */
export function getBestQuery(suggestions: readonly QuerySuggestion[]): QuerySuggestion {
    return suggestions[0] ?? DEFAULT_QUERY;
}
