import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { structuredLogger } from './utils/structured-logger.js';
import { getBuildVersion } from './utils/build-version.js';
import { GrafanaClient } from './services/grafana/client.js';
import { PromQLService } from './services/promql/index.js';
import { registerTools, TOOLS, type ToolDeps } from './tools/index.js';
import {
    LOG_FORMAT,
    LOG_LEVEL,
    METRICS_PORT,
    PORT,
    PROMETHEUS_TIMEOUT_MS,
    GRAFANA_TIMEOUT_MS,
    TRANSPORT_TYPE,
    getGrafanaConfig
} from './config.js';

/** Secret shown as its first and last two characters; short ones only as `***`. */
export function maskSecret(value?: string): string | undefined {
    if (!value) return undefined;
    return value.length < 8 ? '***' : `${value.slice(0, 2)}***${value.slice(-2)}`;
}

/** Production wiring: HTTP gateways and live Grafana configuration. */
export function createToolDeps(): ToolDeps {
    return {
        promql: new PromQLService(),
        grafana: new GrafanaClient(),
        grafanaConfig: getGrafanaConfig
    };
}

// Create and configure the MCP server
export function createServer(deps: ToolDeps = createToolDeps()): McpServer {
    const server = new McpServer(
        {
            name: 'promdash',
            version: getBuildVersion()
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    registerTools(server, deps);

    // Log runtime configuration (mask secrets)
    const grafana = deps.grafanaConfig();
    const config = {
        log: {
            level: LOG_LEVEL,
            format: LOG_FORMAT
        },
        transport: {
            type: TRANSPORT_TYPE,
            port: PORT,
            metricsPort: METRICS_PORT
        },
        prometheus: {
            timeoutMs: PROMETHEUS_TIMEOUT_MS
        },
        grafana: {
            url: grafana.url || undefined,
            apiKey: maskSecret(grafana.apiKey),
            deployEnabled: grafana.deployEnabled,
            timeoutMs: GRAFANA_TIMEOUT_MS
        },
        tools: TOOLS.map(tool => tool.definition.name)
    };
    structuredLogger.debug(`runtime config ${JSON.stringify(config)}`);

    structuredLogger.info('MCP server created and configured');
    return server;
}
