/**
 * API Client for the PromDash REST API
 */

import { getApiUrl } from '../config.js';
import { isRecord } from '../types/index.js';

export type ApiResponse = Record<string, unknown>;

export class ApiError extends Error {
    constructor(message: string, public readonly status: number, public readonly code?: string) {
        super(message);
        this.name = 'ApiError';
    }
}

export class ApiClient {
    private baseUrl: string;

    constructor(baseUrl?: string) {
        // Parameter first, then PROMDASH_API_URL (also set by the --url hook), then default
        this.baseUrl = (baseUrl || getApiUrl()).replace(/\/$/, '');
    }

    private async request(endpoint: string, body: Record<string, unknown>): Promise<ApiResponse> {
        const url = `${this.baseUrl}${endpoint}`;
        const response = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body)
        });

        let data: unknown;
        try {
            data = await response.json();
        } catch {
            throw new ApiError(`Failed to parse response from ${url}`, response.status);
        }

        if (!response.ok) {
            const message = isRecord(data) && typeof data['message'] === 'string'
                ? data['message']
                : `HTTP ${response.status}: ${response.statusText}`;
            const code = isRecord(data) && typeof data['error'] === 'string' ? data['error'] : undefined;
            throw new ApiError(message, response.status, code);
        }

        if (!isRecord(data)) {
            throw new ApiError(`Unexpected response from ${url}`, response.status);
        }
        return data;
    }

    async generateQueries(prometheusUrl: string, metricNames: string[]): Promise<ApiResponse> {
        return this.request('/api/generate_promql_queries', {
            prometheus_url: prometheusUrl,
            metric_names: metricNames
        });
    }

    async validateQuery(prometheusUrl: string, query: string): Promise<ApiResponse> {
        return this.request('/api/validate_promql_query', { prometheus_url: prometheusUrl, query });
    }

    async discoverMetrics(prometheusUrl: string, filters: { namePattern?: string; metricType?: string } = {}): Promise<ApiResponse> {
        return this.request('/api/discover_metrics', {
            prometheus_url: prometheusUrl,
            name_pattern: filters.namePattern,
            metric_type: filters.metricType
        });
    }

    async createDashboard(args: Record<string, unknown>): Promise<ApiResponse> {
        return this.request('/api/create_dashboard', args);
    }

    async deployDashboard(args: Record<string, unknown>): Promise<ApiResponse> {
        return this.request('/api/deploy_dashboard', args);
    }
}
