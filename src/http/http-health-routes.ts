import express from 'express';
import { getBuildVersion } from '../utils/build-version.js';
import { TOOLS, type ToolDeps } from '../tools/index.js';
import { activeSessionCount } from './http-mcp-handler.js';

/**
 * Set up health check and basic info routes
 * @param app Express application instance
 * @param deps Tool dependencies, read for the deployment status
 */
export function setupHealthRoutes(app: express.Express, deps: ToolDeps) {
    // Prometheus and Grafana are per-request upstreams, so health only covers this process
    app.get('/health', (req, res) => {
        const grafana = deps.grafanaConfig();
        res.status(200).json({
            status: 'healthy',
            service: 'promdash',
            version: getBuildVersion(),
            transport: 'http',
            uptime: Math.floor(process.uptime()),
            mcp_sessions: activeSessionCount(),
            grafana: {
                configured: grafana.url !== '',
                deploy_enabled: grafana.deployEnabled
            }
        });
    });

    app.get('/', (req, res) => {
        res.json({
            service: 'PromDash MCP Server',
            version: getBuildVersion(),
            transports: ['http'],
            endpoints: {
                health: '/health',
                mcp: '/mcp',
                api: '/api'
            },
            note: 'Use POST /mcp for MCP protocol communication'
        });
    });

    app.get('/api', (req, res) => {
        const endpoints: Record<string, string> = {};
        for (const { definition } of TOOLS) {
            endpoints[definition.name] = `POST /api/${definition.name}`;
        }
        res.json({
            service: 'PromDash API',
            version: getBuildVersion(),
            endpoints
        });
    });
}
