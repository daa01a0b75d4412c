import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../types/index.js';
import { createDashboard, createDashboardTool, registerCreateDashboardTool } from './create_dashboard.js';
import { deployDashboard, deployDashboardTool, registerDeployDashboardTool } from './deploy_dashboard.js';
import { discoverMetrics, discoverMetricsTool, registerDiscoverMetricsTool } from './discover_metrics.js';
import { generatePromqlQueries, generatePromqlQueriesTool, registerGeneratePromqlQueriesTool } from './generate_promql_queries.js';
import { registerValidatePromqlQueryTool, validatePromqlQuery, validatePromqlQueryTool } from './validate_promql_query.js';
import type { ToolDeps, ToolHandler } from './types.js';

export type { ToolDeps, ToolHandler, ToolResult } from './types.js';

interface ToolEntry {
    definition: ToolDefinition;
    handler: ToolHandler;
    register: (server: McpServer, deps: ToolDeps) => void;
}

export const TOOLS: readonly ToolEntry[] = [
    { definition: generatePromqlQueriesTool, handler: generatePromqlQueries, register: registerGeneratePromqlQueriesTool },
    { definition: validatePromqlQueryTool, handler: validatePromqlQuery, register: registerValidatePromqlQueryTool },
    { definition: discoverMetricsTool, handler: discoverMetrics, register: registerDiscoverMetricsTool },
    { definition: createDashboardTool, handler: createDashboard, register: registerCreateDashboardTool },
    { definition: deployDashboardTool, handler: deployDashboard, register: registerDeployDashboardTool }
];

export function registerTools(server: McpServer, deps: ToolDeps): void {
    for (const tool of TOOLS) {
        tool.register(server, deps);
    }
}
