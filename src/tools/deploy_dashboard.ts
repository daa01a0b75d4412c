import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
    PromdashError,
    errorMessage,
    invalidInput,
    isRecord,
    type ToolArgs,
    type ToolCallOptions,
    type ToolDefinition
} from '../types/index.js';
import type { DashboardResponse } from '../services/grafana/types.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { DEPLOY_DISABLED_MESSAGE } from './create_dashboard.js';
import { optionalBoolean, optionalString } from './tool-args.js';
import { instrumentTool, toCallToolResult } from './tool-runner.js';
import type { ToolDeps } from './types.js';

export const deployDashboardTool: ToolDefinition = {
    name: 'deploy_dashboard',
    title: 'Deploy Grafana Dashboard',
    description: 'Deploys a dashboard JSON document to a Grafana instance'
};

const DEFAULT_MESSAGE = 'Dashboard deployed via promdash';

export type DeployDashboardResult = {
    status: 'deployed';
    grafana_url: string;
    dashboard: { id: number; uid: string; url: string; version: number; slug: string };
    message: string;
};

export async function deployDashboard(
    args: ToolArgs,
    deps: ToolDeps,
    options: ToolCallOptions = {}
): Promise<DeployDashboardResult> {
    const config = deps.grafanaConfig();
    if (!config.deployEnabled) {
        structuredLogger.warn('Grafana deployment attempted but GRAFANA_DEPLOY_ENABLED=false');
        throw new PromdashError(DEPLOY_DISABLED_MESSAGE, 'DEPLOY_DISABLED', 403);
    }

    const dashboardJson = args['dashboard_json'];
    if (!isRecord(dashboardJson) || Object.keys(dashboardJson).length === 0) {
        throw invalidInput('dashboard_json is required and must be a valid object');
    }

    const grafanaUrl = optionalString(args, 'grafana_url') || config.url;
    if (grafanaUrl === '') {
        throw new PromdashError(
            'grafana_url must be provided either as a parameter or in configuration (GRAFANA_URL)',
            'DEPLOY_NOT_CONFIGURED',
            400
        );
    }

    if (config.apiKey === '') {
        throw new PromdashError('grafana API key is required - set GRAFANA_API_KEY', 'DEPLOY_NOT_CONFIGURED', 400);
    }

    const folderUid = optionalString(args, 'folder_uid');
    const overwrite = optionalBoolean(args, 'overwrite', true);
    const message = optionalString(args, 'message') || DEFAULT_MESSAGE;
    structuredLogger.tool(deployDashboardTool.name, 'deploy', `${grafanaUrl} folder=${folderUid || '-'} overwrite=${overwrite}`);

    let saved: DashboardResponse;
    try {
        saved = await deps.grafana.createDashboard(
            { dashboard: dashboardJson, folderUid, message, overwrite },
            grafanaUrl,
            config.apiKey,
            options.signal
        );
    } catch (error) {
        const code = error instanceof PromdashError ? error.code : 'UPSTREAM_ERROR';
        const status = error instanceof PromdashError ? error.statusCode : 502;
        throw new PromdashError(`failed to deploy dashboard to Grafana: ${errorMessage(error)}`, code, status);
    }

    structuredLogger.success(deployDashboardTool.name, `deployed ${saved.uid} to ${grafanaUrl}`);
    return {
        status: 'deployed',
        grafana_url: grafanaUrl,
        dashboard: { id: saved.id, uid: saved.uid, url: saved.url, version: saved.version, slug: saved.slug },
        message
    };
}

export function registerDeployDashboardTool(server: McpServer, deps: ToolDeps): void {
    const { name, title, description } = deployDashboardTool;
    server.registerTool(
        name,
        {
            title,
            description,
            inputSchema: {
                dashboard_json: z.record(z.unknown()).describe('Dashboard model to deploy (the "dashboard" object)'),
                grafana_url: z.string().optional().describe('Grafana server URL, overriding GRAFANA_URL'),
                folder_uid: z.string().optional().describe('UID of the folder to save the dashboard in'),
                message: z.string().optional().describe('Version history message'),
                overwrite: z.boolean().optional().describe('Overwrite an existing dashboard with the same uid (default true)')
            },
            outputSchema: {
                status: z.literal('deployed'),
                grafana_url: z.string(),
                dashboard: z.object({
                    id: z.number(),
                    uid: z.string(),
                    url: z.string(),
                    version: z.number(),
                    slug: z.string()
                }),
                message: z.string()
            }
        },
        async (args, extra) => toCallToolResult(
            await instrumentTool(name, args, () => deployDashboard(args, deps, { signal: extra.signal }))
        )
    );
}
