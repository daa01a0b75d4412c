import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { PromdashError, errorMessage, type ToolArgs, type ToolCallOptions, type ToolDefinition } from '../types/index.js';
import { METRIC_TYPES, normalizeMetricType, type MetricInfo, type MetricType } from '../services/promql/index.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { optionalString, requirePrometheusUrl } from './tool-args.js';
import { instrumentTool, toCallToolResult } from './tool-runner.js';
import type { ToolDeps } from './types.js';

export const discoverMetricsTool: ToolDefinition = {
    name: 'discover_metrics',
    title: 'Discover Metrics',
    description: 'Discovers available metrics from a Prometheus endpoint with optional filtering'
};

export type DiscoveredMetric = {
    name: string;
    type: MetricType;
    help: string;
    labels: string[];
};

export type DiscoverMetricsResult = {
    prometheus_url: string;
    total_metrics: number;
    metrics: DiscoveredMetric[];
    filters?: { name_pattern?: string; metric_type?: string };
};

export async function discoverMetrics(
    args: ToolArgs,
    deps: ToolDeps,
    options: ToolCallOptions = {}
): Promise<DiscoverMetricsResult> {
    const prometheusUrl = requirePrometheusUrl(args);
    const namePattern = optionalString(args, 'name_pattern');
    const metricTypeFilter = optionalString(args, 'metric_type');
    // Unrecognised type names filter for metrics of unknown type
    const metricType = metricTypeFilter === '' ? undefined : normalizeMetricType(metricTypeFilter);
    structuredLogger.tool(discoverMetricsTool.name, 'discover', prometheusUrl);

    let metrics: MetricInfo[];
    try {
        metrics = await deps.promql.discoverMetrics(prometheusUrl, namePattern, metricType, options.signal);
    } catch (error) {
        if (error instanceof PromdashError && error.code === 'INVALID_INPUT') {
            throw error;
        }
        const code = error instanceof PromdashError ? error.code : 'UPSTREAM_ERROR';
        const status = error instanceof PromdashError ? error.statusCode : 502;
        throw new PromdashError(`failed to discover metrics: ${errorMessage(error)}`, code, status);
    }

    const result: DiscoverMetricsResult = {
        prometheus_url: prometheusUrl,
        total_metrics: metrics.length,
        metrics: metrics.map(metric => ({ name: metric.name, type: metric.type, help: metric.help, labels: [...metric.labels] }))
    };

    if (namePattern !== '' || metricTypeFilter !== '') {
        result.filters = {};
        if (namePattern !== '') result.filters.name_pattern = namePattern;
        if (metricTypeFilter !== '') result.filters.metric_type = metricTypeFilter;
    }

    structuredLogger.success(discoverMetricsTool.name, `discovered ${metrics.length} metric(s)`);
    return result;
}

export function registerDiscoverMetricsTool(server: McpServer, deps: ToolDeps): void {
    const { name, title, description } = discoverMetricsTool;
    server.registerTool(
        name,
        {
            title,
            description,
            inputSchema: {
                prometheus_url: z.string().describe('Prometheus server URL to discover metrics from'),
                name_pattern: z.string().optional().describe('Optional regex pattern to filter metrics by name'),
                metric_type: z.enum(['counter', 'gauge', 'histogram', 'summary']).optional()
                    .describe('Optional metric type filter')
            },
            outputSchema: {
                prometheus_url: z.string(),
                total_metrics: z.number(),
                metrics: z.array(z.object({
                    name: z.string(),
                    type: z.enum(METRIC_TYPES),
                    help: z.string(),
                    labels: z.array(z.string())
                })),
                filters: z.object({
                    name_pattern: z.string().optional(),
                    metric_type: z.string().optional()
                }).optional()
            }
        },
        async (args, extra) => toCallToolResult(
            await instrumentTool(name, args, () => discoverMetrics(args, deps, { signal: extra.signal }))
        )
    );
}
