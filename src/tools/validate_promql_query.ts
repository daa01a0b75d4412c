import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage, type ToolArgs, type ToolCallOptions, type ToolDefinition } from '../types/index.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { requirePrometheusUrl, requireString } from './tool-args.js';
import { instrumentTool, toCallToolResult } from './tool-runner.js';
import type { ToolDeps } from './types.js';

export const validatePromqlQueryTool: ToolDefinition = {
    name: 'validate_promql_query',
    title: 'Validate PromQL Query',
    description: 'Validates a PromQL query by asking a Prometheus server to evaluate it'
};

export type ValidatePromqlQueryResult = {
    prometheus_url: string;
    query: string;
    valid: boolean;
    error?: string;
};

// Any failure, including an unreachable Prometheus, reports the query as invalid
export async function validatePromqlQuery(
    args: ToolArgs,
    deps: ToolDeps,
    options: ToolCallOptions = {}
): Promise<ValidatePromqlQueryResult> {
    const prometheusUrl = requirePrometheusUrl(args);
    const query = requireString(args, 'query');
    structuredLogger.tool(validatePromqlQueryTool.name, 'validate', query);

    const result: ValidatePromqlQueryResult = { prometheus_url: prometheusUrl, query, valid: false };
    try {
        await deps.promql.validateQuery(prometheusUrl, query, options.signal);
        result.valid = true;
    } catch (error) {
        structuredLogger.warn('Query validation failed', { query, error: errorMessage(error) });
        result.error = errorMessage(error);
    }
    return result;
}

export function registerValidatePromqlQueryTool(server: McpServer, deps: ToolDeps): void {
    const { name, title, description } = validatePromqlQueryTool;
    server.registerTool(
        name,
        {
            title,
            description,
            inputSchema: {
                prometheus_url: z.string().describe('Prometheus server URL to validate against'),
                query: z.string().describe('PromQL query to validate')
            },
            outputSchema: {
                prometheus_url: z.string(),
                query: z.string(),
                valid: z.boolean(),
                error: z.string().optional()
            }
        },
        async (args, extra) => toCallToolResult(
            await instrumentTool(name, args, () => validatePromqlQuery(args, deps, { signal: extra.signal }))
        )
    );
}
