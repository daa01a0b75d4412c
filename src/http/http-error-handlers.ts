import express from 'express';
import { structuredLogger } from '../utils/structured-logger.js';
import { errorMessage, isRecord } from '../types/index.js';

// body-parser errors carry their own 4xx status (413 for oversized bodies)
function clientErrorStatus(err: unknown): number | undefined {
    if (!isRecord(err)) return undefined;
    const status = err['status'] ?? err['statusCode'];
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Set up error handlers and additional routes
 * @param app Express application instance
 */
export function setupErrorHandlers(app: express.Express) {
    // Global error handler for Express routes; express recognises it by its four parameters
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        const rid = req.headers['x-request-id'] ?? 'unknown';
        structuredLogger.error(`HTTP error on ${req.method} ${req.url} [id: ${String(rid)}]`, err);

        if (res.headersSent) {
            res.end();
            return;
        }
        // Malformed JSON bodies surface here from express.json()
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'INVALID_INPUT', message: 'request body must be valid JSON' });
            return;
        }
        const status = clientErrorStatus(err);
        if (status !== undefined) {
            res.status(status).json({ error: 'INVALID_INPUT', message: errorMessage(err) });
            return;
        }
        res.status(500).json({ error: 'Internal server error' });
    });

    // Catch-all 404 handler (must be last)
    app.use((req, res) => {
        res.status(404).json({ error: 'Not found' });
    });
}
