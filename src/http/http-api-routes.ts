import express from 'express';
import { PromdashError, errorMessage, isRecord, type ToolArgs } from '../types/index.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { TOOLS, type ToolDeps } from '../tools/index.js';
import { instrumentTool } from '../tools/tool-runner.js';

/**
 * REST mirror of the MCP tools: `POST /api/<tool>` with the tool arguments
 * as the JSON body. Classified errors keep their HTTP status and code.
 * @param app Express application instance
 * @param deps Services shared with the MCP tools
 */
export function setupApiRoutes(app: express.Express, deps: ToolDeps) {
    for (const { definition, handler } of TOOLS) {
        const name = definition.name;

        app.post(`/api/${name}`, async (req, res) => {
            const startTime = Date.now();
            const body: unknown = req.body;
            const args: ToolArgs = isRecord(body) ? body : {};

            // Abandoned requests cancel their upstream calls
            const controller = new AbortController();
            res.on('close', () => {
                if (!res.writableFinished) controller.abort();
            });

            structuredLogger.info(`→ POST /api/${name}`);

            try {
                const result = await instrumentTool(name, args, () => handler(args, deps, { signal: controller.signal }));
                structuredLogger.info(`✓ ${name} completed in ${Date.now() - startTime}ms`);
                res.status(200).json(result);
            } catch (error) {
                const duration = Date.now() - startTime;
                if (error instanceof PromdashError) {
                    structuredLogger.warn(`✗ ${name} failed in ${duration}ms`, { code: error.code, message: error.message });
                    res.status(error.statusCode).json({ error: error.code, message: error.message });
                    return;
                }
                structuredLogger.error(`✗ ${name} failed in ${duration}ms`, error);
                res.status(500).json({ error: 'INTERNAL_ERROR', message: errorMessage(error) });
            }
        });
    }
}
