import { z } from 'zod';
import type { MetricType } from '../promql/types.js';

export interface PrometheusMetadataEntry {
    type: MetricType;
    help: string;
}

/**
 * Capability interface onto one Prometheus server. The engine only ever sees
 * this interface; the HTTP implementation lives in client.ts and tests use
 * in-process fakes.
 */
export interface PrometheusGateway {
    readonly baseUrl: string;

    /** Metadata for one metric, or null when Prometheus has no entry for it. */
    fetchMetadata(metricName: string, signal?: AbortSignal): Promise<PrometheusMetadataEntry | null>;

    /** Label names carried by series of the metric. */
    fetchLabels(metricName: string, signal?: AbortSignal): Promise<string[]>;

    /** Resolves when Prometheus accepts the query; rejects with its error otherwise. */
    validate(query: string, signal?: AbortSignal): Promise<void>;

    /** Metadata for every metric the server knows about. */
    listMetadata(signal?: AbortSignal): Promise<Map<string, PrometheusMetadataEntry>>;
}

export type PrometheusGatewayFactory = (baseUrl: string) => PrometheusGateway;

// Prometheus HTTP API envelopes
export const metadataResponseSchema = z.object({
    status: z.string(),
    data: z.record(z.array(z.object({
        type: z.string(),
        help: z.string().default(''),
        unit: z.string().optional()
    }))).optional(),
    error: z.string().optional()
});

export const labelsResponseSchema = z.object({
    status: z.string(),
    data: z.array(z.string()).optional(),
    error: z.string().optional()
});

export const queryResponseSchema = z.object({
    status: z.string(),
    error: z.string().optional(),
    errorType: z.string().optional()
});
