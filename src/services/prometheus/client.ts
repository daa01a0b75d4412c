import { PromdashError } from '../../types/index.js';
import { PROMETHEUS_TIMEOUT_MS } from '../../config.js';
import { normalizeMetricType } from '../promql/types.js';
import { decodeJson, discardBody, trimTrailingSlash, upstreamFetch } from '../upstream/request.js';
import {
    labelsResponseSchema,
    metadataResponseSchema,
    queryResponseSchema,
    type PrometheusGateway,
    type PrometheusMetadataEntry
} from './types.js';

/**
 * PrometheusGateway over the Prometheus HTTP API (v1).
 *
 * Every call is bounded by the configured timeout and the caller's signal.
 * Nothing is retried.
 */
export class PrometheusClient implements PrometheusGateway {
    readonly baseUrl: string;

    constructor(baseUrl: string, private readonly timeoutMs: number = PROMETHEUS_TIMEOUT_MS) {
        this.baseUrl = trimTrailingSlash(baseUrl);
    }

    private async get(operation: string, path: string, signal?: AbortSignal): Promise<Response> {
        const response = await upstreamFetch({
            target: 'prometheus',
            operation,
            url: `${this.baseUrl}${path}`,
            init: { method: 'GET', headers: { Accept: 'application/json' } },
            timeoutMs: this.timeoutMs,
            signal
        });

        if (response.status !== 200) {
            await discardBody(response);
            throw new PromdashError(`prometheus returned status ${response.status}`, 'UPSTREAM_ERROR', 502, { operation });
        }
        return response;
    }

    async fetchMetadata(metricName: string, signal?: AbortSignal): Promise<PrometheusMetadataEntry | null> {
        const response = await this.get('metadata', `/api/v1/metadata?metric=${encodeURIComponent(metricName)}`, signal);
        const body = await decodeJson(response, metadataResponseSchema, 'metadata');

        if (body.status !== 'success') {
            throw new PromdashError(`prometheus API returned non-success status: ${body.status}`, 'UPSTREAM_ERROR', 502);
        }

        const entry = body.data?.[metricName]?.[0];
        if (!entry) {
            return null;
        }
        return { type: normalizeMetricType(entry.type), help: entry.help };
    }

    async fetchLabels(metricName: string, signal?: AbortSignal): Promise<string[]> {
        const params = new URLSearchParams({ 'match[]': metricName });
        const response = await this.get('labels', `/api/v1/labels?${params.toString()}`, signal);
        const body = await decodeJson(response, labelsResponseSchema, 'labels');

        if (body.status !== 'success') {
            throw new PromdashError(`labels API returned non-success status: ${body.status}`, 'UPSTREAM_ERROR', 502);
        }
        return body.data ?? [];
    }

    async validate(query: string, signal?: AbortSignal): Promise<void> {
        const form = new URLSearchParams();
        form.set('query', query);
        // Evaluating at the epoch is enough for Prometheus to parse the expression
        form.set('time', '0');

        // Bad queries come back as 400 with a JSON error envelope, so the status is not checked
        const response = await upstreamFetch({
            target: 'prometheus',
            operation: 'query',
            url: `${this.baseUrl}/api/v1/query`,
            init: {
                method: 'POST',
                headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
                body: form.toString()
            },
            timeoutMs: this.timeoutMs,
            signal
        });
        const body = await decodeJson(response, queryResponseSchema, 'validation');

        if (body.status !== 'success') {
            throw new PromdashError(
                `query validation failed: ${body.error ?? ''} (${body.errorType ?? ''})`,
                'QUERY_INVALID',
                422
            );
        }
    }

    async listMetadata(signal?: AbortSignal): Promise<Map<string, PrometheusMetadataEntry>> {
        const response = await this.get('metadata', '/api/v1/metadata', signal);
        const body = await decodeJson(response, metadataResponseSchema, 'metadata');

        if (body.status !== 'success') {
            throw new PromdashError(`prometheus API returned non-success status: ${body.status}`, 'UPSTREAM_ERROR', 502);
        }

        const metrics = new Map<string, PrometheusMetadataEntry>();
        for (const [name, entries] of Object.entries(body.data ?? {})) {
            const entry = entries[0];
            metrics.set(name, {
                type: entry ? normalizeMetricType(entry.type) : 'unknown',
                help: entry?.help ?? ''
            });
        }
        return metrics;
    }
}

export function createPrometheusClient(baseUrl: string): PrometheusGateway {
    return new PrometheusClient(baseUrl);
}
