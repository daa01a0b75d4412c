import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage, invalidInput, type ToolArgs, type ToolCallOptions, type ToolDefinition } from '../types/index.js';
import { METRIC_TYPES, VISUALIZATION_TYPES, toSuggestionJson, type MetricInfo, type MetricType, type QuerySuggestionJson } from '../services/promql/index.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { requirePrometheusUrl } from './tool-args.js';
import { instrumentTool, toCallToolResult } from './tool-runner.js';
import type { ToolDeps } from './types.js';

export const generatePromqlQueriesTool: ToolDefinition = {
    name: 'generate_promql_queries',
    title: 'Generate PromQL Queries',
    description: 'Generates PromQL queries for the given metrics based on their type, metadata and labels'
};

export type QueryGenerationResult = {
    metric_name: string;
    metric_type: MetricType;
    metric_help: string;
    labels: string[];
    suggestions: QuerySuggestionJson[];
    error?: string;
};

export type GeneratePromqlQueriesResult = {
    prometheus_url: string;
    results: QueryGenerationResult[];
};

function requireMetricNames(args: ToolArgs): string[] {
    if (!('metric_names' in args) || args['metric_names'] === undefined) {
        throw invalidInput('metric_names is required');
    }
    const raw = args['metric_names'];
    if (!Array.isArray(raw)) {
        throw invalidInput('metric_names must be an array');
    }
    if (raw.length === 0) {
        throw invalidInput('metric_names cannot be empty');
    }
    return raw.filter((name): name is string => typeof name === 'string');
}

/**
 * Metrics are handled one after another; a failed lookup is reported on
 * that metric's result and never aborts the batch.
 */
export async function generatePromqlQueries(
    args: ToolArgs,
    deps: ToolDeps,
    options: ToolCallOptions = {}
): Promise<GeneratePromqlQueriesResult> {
    const prometheusUrl = requirePrometheusUrl(args);
    const metricNames = requireMetricNames(args);
    structuredLogger.tool(generatePromqlQueriesTool.name, 'generate', `${metricNames.length} metric(s) from ${prometheusUrl}`);

    const results: QueryGenerationResult[] = [];
    for (const metricName of metricNames) {
        const result: QueryGenerationResult = {
            metric_name: metricName,
            metric_type: 'unknown',
            metric_help: '',
            labels: [],
            suggestions: []
        };

        let metricInfo: MetricInfo;
        try {
            metricInfo = await deps.promql.getMetricMetadata(prometheusUrl, metricName, options.signal);
        } catch (error) {
            structuredLogger.warn('Failed to get metric metadata', { metric: metricName, error: errorMessage(error) });
            result.error = `failed to get metadata: ${errorMessage(error)}`;
            results.push(result);
            continue;
        }

        result.metric_type = metricInfo.type;
        result.metric_help = metricInfo.help;
        result.labels = [...metricInfo.labels];

        const suggestions = deps.promql.generateQueries(metricInfo);
        if (suggestions.length === 0) {
            result.error = 'no query suggestions could be generated';
        } else {
            result.suggestions = suggestions.map(toSuggestionJson);
        }
        results.push(result);
    }

    structuredLogger.success(generatePromqlQueriesTool.name, `generated queries for ${results.length} metric(s)`);
    return { prometheus_url: prometheusUrl, results };
}

const suggestionShape = z.object({
    query: z.string(),
    description: z.string(),
    visualization_type: z.enum(VISUALIZATION_TYPES),
    y_axis_label: z.string()
});

export function registerGeneratePromqlQueriesTool(server: McpServer, deps: ToolDeps): void {
    const { name, title, description } = generatePromqlQueriesTool;
    server.registerTool(
        name,
        {
            title,
            description,
            inputSchema: {
                prometheus_url: z.string().describe('Prometheus server URL to read metric metadata from'),
                metric_names: z.array(z.string()).describe('Metric names to generate queries for')
            },
            outputSchema: {
                prometheus_url: z.string(),
                results: z.array(z.object({
                    metric_name: z.string(),
                    metric_type: z.enum(METRIC_TYPES),
                    metric_help: z.string(),
                    labels: z.array(z.string()),
                    suggestions: z.array(suggestionShape),
                    error: z.string().optional()
                }))
            }
        },
        async (args, extra) => toCallToolResult(
            await instrumentTool(name, args, () => generatePromqlQueries(args, deps, { signal: extra.signal }))
        )
    );
}
