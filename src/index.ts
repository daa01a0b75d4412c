/**
 * PromDash MCP Server
 *
 * Serves the tools over stdio (default) or streamable HTTP with the REST
 * mirror, selected by TRANSPORT_TYPE.
 */

import type { Server } from 'node:http';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { structuredLogger } from './utils/structured-logger.js';
import { installGlobalErrorHandlers } from './utils/global-error-handlers.js';
import { createServer, createToolDeps } from './server.js';
import { startServer } from './http/http-server.js';
import { closeAllSessions } from './http/http-mcp-handler.js';
import { startMetricsServer } from './metrics-server.js';
import { TRANSPORT_TYPE } from './config.js';

async function shutdown(signal: NodeJS.Signals, httpServer: Server): Promise<void> {
    structuredLogger.info(`${signal} received, closing MCP sessions`);
    try {
        await closeAllSessions();
    } catch (err) {
        structuredLogger.error('Error while closing MCP sessions', err);
        process.exitCode = 1;
    }
    httpServer.close();
    process.exit();
}

async function main(): Promise<void> {
    // Install once at startup to capture any background errors/warnings
    installGlobalErrorHandlers();

    const deps = createToolDeps();
    startMetricsServer();

    if (TRANSPORT_TYPE === 'http') {
        // One McpServer per HTTP session
        const httpServer = startServer(() => createServer(deps), deps);
        for (const signal of ['SIGTERM', 'SIGINT'] as const) {
            process.once(signal, () => {
                shutdown(signal, httpServer).catch((err: unknown) => {
                    structuredLogger.error('Shutdown failed', err);
                    process.exit(1);
                });
            });
        }
        return;
    }

    const server = createServer(deps);
    await server.connect(new StdioServerTransport());
    structuredLogger.success('PromDash MCP Server started', 'stdio transport');
}

main().catch((err: unknown) => {
    structuredLogger.error('Fatal error during PromDash MCP startup', err);
    // Ensure non-zero exit so supervisors can detect failure
    process.exitCode = 1;
});
