export * from './types.js';
export { inferMetricType, matchesCounterNaming } from './classifier.js';
export { generateQueries } from './generator.js';
export {
    enhanceQueries,
    enhanceQuery,
    enhanceDescription,
    optimizeQuery,
    suggestVisualizationType,
    generateContextualQueries,
    extractPercentile,
    extractMetricNameFromHistogramQuery
} from './enhancer.js';
export { getBestQuery, DEFAULT_QUERY } from './selector.js';
export { PromQLService } from './service.js';
