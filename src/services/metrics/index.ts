/**
 * Metrics service for PromDash.
 *
 * Metrics are organized by category:
 * - MCP tool metrics (mcp-metrics.ts)
 * - Query engine metrics (engine-metrics.ts)
 * - Upstream Prometheus/Grafana calls (upstream-metrics.ts)
 * - HTTP metrics (http-metrics.ts)
 * - Process metrics (system-metrics.ts)
 */

export { register } from './registry.js';
export { collectSystemMetrics } from './system-metrics.js';
