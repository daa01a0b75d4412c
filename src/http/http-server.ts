import express from 'express';
import type { Server } from 'node:http';
import { structuredLogger } from '../utils/structured-logger.js';
import { PORT } from '../config.js';
import type { ToolDeps } from '../tools/index.js';

// Import modular components
import { configureMiddleware } from './http-server-config.js';
import { setupHealthRoutes } from './http-health-routes.js';
import { setupApiRoutes } from './http-api-routes.js';
import { setupMcpRoutes, type McpServerFactory } from './http-mcp-handler.js';
import { setupErrorHandlers } from './http-error-handlers.js';
import { startHttpServerWithErrorHandling } from './http-server-startup.js';

/**
 * Express app serving the MCP endpoint, the REST mirror and health routes.
 * Separate from listening so tests can drive it in process.
 */
export function createHttpApp(serverFactory: McpServerFactory, deps: ToolDeps): express.Express {
    const app = express();

    configureMiddleware(app);
    setupHealthRoutes(app, deps);
    setupApiRoutes(app, deps);
    setupMcpRoutes(app, serverFactory);
    setupErrorHandlers(app);

    return app;
}

export function startHttpServer(port: number, serverFactory: McpServerFactory, deps: ToolDeps): Server {
    return startHttpServerWithErrorHandling(createHttpApp(serverFactory, deps), port);
}

export function startServer(serverFactory: McpServerFactory, deps: ToolDeps, port: number = PORT): Server {
    structuredLogger.success('PromDash MCP Server starting', 'HTTP transport');
    structuredLogger.info('Port: ' + port);

    return startHttpServer(port, serverFactory, deps);
}
