import { structuredLogger } from '../../utils/structured-logger.js';
import { errorMessage, invalidInput } from '../../types/index.js';
import { metricTypeInferences, queryValidations, suggestionsGenerated } from '../metrics/engine-metrics.js';
import { createPrometheusClient } from '../prometheus/client.js';
import type { PrometheusGateway, PrometheusGatewayFactory } from '../prometheus/types.js';
import { inferMetricType } from './classifier.js';
import { enhanceQueries } from './enhancer.js';
import { generateQueries } from './generator.js';
import { getBestQuery } from './selector.js';
import { NO_METADATA_HELP, type MetricInfo, type MetricType, type QuerySuggestion } from './types.js';

/**
 * Façade over the query engine and the Prometheus gateway.
 *
 * The engine functions are pure; this class adds the network lookups,
 * debug logging and engine metrics around them. Gateways are created per
 * Prometheus URL through the injected factory.
 */
export class PromQLService {
    constructor(private readonly gatewayFor: PrometheusGatewayFactory = createPrometheusClient) {}

    private gateway(prometheusUrl: string): PrometheusGateway {
        return this.gatewayFor(prometheusUrl);
    }

    async getMetricMetadata(prometheusUrl: string, metricName: string, signal?: AbortSignal): Promise<MetricInfo> {
        const gateway = this.gateway(prometheusUrl);
        const metadata = await gateway.fetchMetadata(metricName, signal);

        if (!metadata) {
            const type = inferMetricType(metricName);
            metricTypeInferences.inc({ metric_type: type });
            structuredLogger.debug('No metadata found, inferred metric type from name', { metric: metricName, type });
            return { name: metricName, type, help: NO_METADATA_HELP, labels: [] };
        }

        let labels: string[] = [];
        try {
            labels = await gateway.fetchLabels(metricName, signal);
        } catch (error) {
            structuredLogger.warn('Failed to fetch labels, continuing without them', {
                metric: metricName,
                error: errorMessage(error)
            });
        }

        structuredLogger.debug('Fetched metric metadata', { metric: metricName, type: metadata.type, labels: labels.length });
        return { name: metricName, type: metadata.type, help: metadata.help, labels };
    }

    generateQueries(metricInfo: MetricInfo): QuerySuggestion[] {
        const suggestions = generateQueries(metricInfo);
        suggestionsGenerated.inc({ metric_type: metricInfo.type }, suggestions.length);
        structuredLogger.debug('Generated query suggestions', {
            metric: metricInfo.name,
            type: metricInfo.type,
            count: suggestions.length
        });
        return suggestions;
    }

    enhanceQueries(metricInfo: MetricInfo, suggestions: readonly QuerySuggestion[]): QuerySuggestion[] {
        const enhanced = enhanceQueries(metricInfo, suggestions);
        structuredLogger.debug('Enhanced query suggestions', {
            metric: metricInfo.name,
            original: suggestions.length,
            enhanced: enhanced.length
        });
        return enhanced;
    }

    getBestQuery(suggestions: readonly QuerySuggestion[]): QuerySuggestion {
        return getBestQuery(suggestions);
    }

    async validateQuery(prometheusUrl: string, query: string, signal?: AbortSignal): Promise<void> {
        try {
            await this.gateway(prometheusUrl).validate(query, signal);
            queryValidations.inc({ result: 'valid' });
        } catch (error) {
            queryValidations.inc({ result: 'invalid' });
            structuredLogger.debug('Query validation failed', { query, error: errorMessage(error) });
            throw error;
        }
    }

    /**
     * Metrics known to Prometheus, optionally filtered by a name regex and a
     * metric type, sorted by name. Labels are not fetched per metric.
     */
    async discoverMetrics(
        prometheusUrl: string,
        namePattern: string,
        metricType?: MetricType,
        signal?: AbortSignal
    ): Promise<MetricInfo[]> {
        let matcher: RegExp | undefined;
        if (namePattern !== '') {
            try {
                matcher = new RegExp(namePattern);
            } catch {
                throw invalidInput('name_pattern must be a valid regular expression');
            }
        }

        const catalogue = await this.gateway(prometheusUrl).listMetadata(signal);
        const metrics: MetricInfo[] = [];
        for (const [name, entry] of catalogue) {
            if (matcher && !matcher.test(name)) continue;
            if (metricType && entry.type !== metricType) continue;
            metrics.push({ name, type: entry.type, help: entry.help, labels: [] });
        }
        metrics.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        structuredLogger.debug('Discovered metrics', { prometheusUrl, total: catalogue.size, matched: metrics.length });
        return metrics;
    }
}
