import express from 'express';
import {
  httpRequests,
  httpRequestDuration,
  httpRequestSize,
  httpActiveConnections
} from '../services/metrics/http-metrics.js';

/**
 * HTTP metrics middleware for Prometheus
 * Tracks requests, response times, payload sizes, and in-flight requests
 */
export function httpMetricsMiddleware(req: express.Request, res: express.Response, next: express.NextFunction) {
  const method = req.method;
  // Mounted before routing, so the path is the only route label available
  const route = req.path;

  const requestSize = req.headers['content-length'] ? parseInt(req.headers['content-length'], 10) : 0;
  if (requestSize > 0) {
    httpRequestSize.observe({ method, route }, requestSize);
  }

  httpActiveConnections.inc();

  const timer = httpRequestDuration.startTimer({ method, route });

  res.on('finish', () => {
    const status = res.statusCode.toString();
    httpRequests.inc({ method, route, status });
    timer({ status });
    httpActiveConnections.dec();
  });

  next();
}
