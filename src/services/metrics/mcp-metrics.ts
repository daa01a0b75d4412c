import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * MCP Tool Metrics
 *
 * Tracks tool invocations, duration, errors, and payload sizes.
 */

export const mcpToolCalls = new Counter({
  name: 'promdash_mcp_tool_calls_total',
  help: 'Total number of MCP tool invocations',
  labelNames: ['tool', 'status'],
  registers: [register]
});

export const mcpToolDuration = new Histogram({
  name: 'promdash_mcp_tool_duration_seconds',
  help: 'MCP tool execution duration in seconds',
  labelNames: ['tool', 'status'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register]
});

export const mcpToolErrors = new Counter({
  name: 'promdash_mcp_tool_errors_total',
  help: 'Total number of MCP tool execution errors by error code',
  labelNames: ['tool', 'error_code'],
  registers: [register]
});

export const mcpToolInputSize = new Histogram({
  name: 'promdash_mcp_tool_input_size_bytes',
  help: 'MCP tool input payload size in bytes',
  labelNames: ['tool'],
  buckets: [100, 500, 1000, 5000, 10000, 50000, 100000, 500000],
  registers: [register]
});

export const mcpToolOutputSize = new Histogram({
  name: 'promdash_mcp_tool_output_size_bytes',
  help: 'MCP tool output payload size in bytes',
  labelNames: ['tool'],
  buckets: [100, 500, 1000, 5000, 10000, 50000, 100000, 500000, 1000000],
  registers: [register]
});
