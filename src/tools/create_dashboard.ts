import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
    PromdashError,
    errorMessage,
    invalidInput,
    type ToolArgs,
    type ToolCallOptions,
    type ToolDefinition
} from '../types/index.js';
import { buildDashboard, generatePanelsFromMetrics, type DashboardEnvelope } from '../services/dashboard/index.js';
import type { DashboardResponse } from '../services/grafana/types.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { optionalString, requireString } from './tool-args.js';
import { instrumentTool, toCallToolResult } from './tool-runner.js';
import type { ToolDeps } from './types.js';

export const createDashboardTool: ToolDefinition = {
    name: 'create_dashboard',
    title: 'Create Grafana Dashboard',
    description: 'Creates a Grafana dashboard with specified panels, queries, and configurations. ' +
        'Panels can be given directly or generated from metric names; set deploy to push the result to Grafana.'
};

export const DEPLOY_DISABLED_MESSAGE =
    'grafana deployment is disabled - set GRAFANA_DEPLOY_ENABLED=true to enable dashboard deployments';

const DEPLOY_MESSAGE = 'Dashboard created via promdash';

export type CreateDashboardDeployment = {
    status: 'deployed';
    grafana_url: string;
    dashboard: { id: number; uid: string; url: string };
    dashboard_json: DashboardEnvelope;
};

export type CreateDashboardResult = DashboardEnvelope | CreateDashboardDeployment;

function wrapFailure(prefix: string, error: unknown): PromdashError {
    const code = error instanceof PromdashError ? error.code : 'UPSTREAM_ERROR';
    const status = error instanceof PromdashError ? error.statusCode : 502;
    return new PromdashError(`${prefix}: ${errorMessage(error)}`, code, status);
}

async function resolvePanels(args: ToolArgs, deps: ToolDeps, options: ToolCallOptions): Promise<unknown[]> {
    const metricNames = args['metric_names'];
    if (Array.isArray(metricNames) && metricNames.length > 0) {
        const prometheusUrl = optionalString(args, 'prometheus_url');
        if (prometheusUrl === '') {
            throw invalidInput('prometheus_url is required when using metric_names');
        }
        try {
            return await generatePanelsFromMetrics(deps.promql, metricNames, prometheusUrl, options.signal);
        } catch (error) {
            throw wrapFailure('failed to generate panels from metrics', error);
        }
    }

    const panels = args['panels'];
    return Array.isArray(panels) ? panels : [];
}

/**
 * Deployment prerequisites are checked before any panel generation so a
 * misconfigured deploy fails without touching Prometheus. The API key is
 * only checked once the dashboard has been assembled.
 */
export async function createDashboard(
    args: ToolArgs,
    deps: ToolDeps,
    options: ToolCallOptions = {}
): Promise<CreateDashboardResult> {
    const title = requireString(args, 'dashboard_title');
    const deploy = args['deploy'] === true;
    const config = deps.grafanaConfig();

    let grafanaUrl = '';
    if (deploy) {
        if (!config.deployEnabled) {
            structuredLogger.warn('Grafana deployment attempted but GRAFANA_DEPLOY_ENABLED=false');
            throw new PromdashError(DEPLOY_DISABLED_MESSAGE, 'DEPLOY_DISABLED', 403);
        }
        grafanaUrl = optionalString(args, 'grafana_url') || config.url;
        if (grafanaUrl === '') {
            throw new PromdashError('deployment requested but no grafana_url provided', 'DEPLOY_NOT_CONFIGURED', 400);
        }
    }

    const panels = await resolvePanels(args, deps, options);
    if (panels.length === 0) {
        throw invalidInput("panels are required - provide either 'panels' array or 'metric_names' with 'prometheus_url'");
    }

    structuredLogger.tool(createDashboardTool.name, 'create', `"${title}" with ${panels.length} panel(s)`);
    const envelope = buildDashboard(title, panels, args);

    if (!deploy) {
        return envelope;
    }

    if (config.apiKey === '') {
        throw new PromdashError('deployment requested but no API key configured - set GRAFANA_API_KEY', 'DEPLOY_NOT_CONFIGURED', 400);
    }

    let saved: DashboardResponse;
    try {
        saved = await deps.grafana.createDashboard(
            { dashboard: envelope.dashboard, folderUid: '', message: DEPLOY_MESSAGE, overwrite: true },
            grafanaUrl,
            config.apiKey,
            options.signal
        );
    } catch (error) {
        throw wrapFailure('failed to deploy dashboard to Grafana', error);
    }

    structuredLogger.success(createDashboardTool.name, `deployed ${saved.uid} to ${grafanaUrl}`);
    return {
        status: 'deployed',
        grafana_url: grafanaUrl,
        dashboard: { id: saved.id, uid: saved.uid, url: saved.url },
        dashboard_json: envelope
    };
}

export function registerCreateDashboardTool(server: McpServer, deps: ToolDeps): void {
    const { name, title, description } = createDashboardTool;
    server.registerTool(
        name,
        {
            title,
            description,
            inputSchema: {
                dashboard_title: z.string().describe('The title of the Grafana dashboard'),
                description: z.string().optional().describe('Description of what the dashboard monitors'),
                panels: z.array(z.record(z.unknown())).optional()
                    .describe('Panel configurations (title, type, targets, gridPos, options, fieldConfig)'),
                metric_names: z.array(z.string()).optional()
                    .describe('Metric names to create panels for with generated PromQL queries'),
                prometheus_url: z.string().optional()
                    .describe('Prometheus server URL, required with metric_names'),
                deploy: z.boolean().optional()
                    .describe('Deploy the dashboard to Grafana (requires GRAFANA_DEPLOY_ENABLED=true)'),
                grafana_url: z.string().optional().describe('Grafana server URL, overriding GRAFANA_URL'),
                tags: z.array(z.string()).optional().describe('Tags to categorize the dashboard'),
                time_range: z.object({
                    from: z.string().optional(),
                    to: z.string().optional()
                }).optional().describe('Default time range for the dashboard'),
                refresh_interval: z.string().optional().describe('Auto-refresh interval (e.g. "5s", "1m")'),
                variables: z.array(z.record(z.unknown())).optional()
                    .describe('Dashboard template variables (name, type, label, query, datasource)')
            }
        },
        async (args, extra) => toCallToolResult(
            await instrumentTool(name, args, () => createDashboard(args, deps, { signal: extra.signal }))
        )
    );
}
