import express from 'express';
import type { Server } from 'node:http';
import { register, collectSystemMetrics } from './services/metrics/index.js';
import { structuredLogger } from './utils/structured-logger.js';
import { METRICS_PORT } from './config.js';

/**
 * Express app exposing only /metrics and its own /health.
 */
export function createMetricsApp(): express.Express {
  const app = express();

  app.get('/metrics', async (req, res) => {
    try {
      res.set('Content-Type', register.contentType);
      const metrics = await register.metrics();
      res.end(metrics);
    } catch (error) {
      structuredLogger.error('Error generating metrics', error);
      res.status(500).end('Error generating metrics');
    }
  });

  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok', service: 'metrics' });
  });

  return app;
}

/**
 * Start dedicated metrics server on separate port.
 *
 * Kept apart from the MCP and REST listener so it can be restricted to
 * internal networks. A port of 0 disables it.
 */
export function startMetricsServer(port: number = METRICS_PORT): Server | undefined {
  if (port === 0) {
    structuredLogger.info('Metrics server disabled (METRICS_PORT=0)');
    return undefined;
  }

  collectSystemMetrics();
  const server = createMetricsApp().listen(port, () => {
    structuredLogger.info(`Metrics server listening on port ${port}`);
    structuredLogger.info(`Metrics endpoint: http://localhost:${port}/metrics`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    structuredLogger.error(`Metrics server failed on port ${port}`, error);
  });

  return server;
}
