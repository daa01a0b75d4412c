import type { GrafanaConfig } from '../config.js';
import type { GrafanaGateway } from '../services/grafana/types.js';
import type { PromQLService } from '../services/promql/index.js';
import type { ToolArgs, ToolCallOptions } from '../types/index.js';

/** Services every tool handler is built from. */
export interface ToolDeps {
    promql: PromQLService;
    grafana: GrafanaGateway;
    grafanaConfig: () => GrafanaConfig;
}

/** Tool output; a plain object so it can travel as MCP structured content. */
export type ToolResult = Record<string, unknown>;

/**
 * Transport-neutral tool implementation shared by the MCP server and the
 * REST mirror. Arguments arrive unvalidated.
 */
export type ToolHandler = (args: ToolArgs, deps: ToolDeps, options: ToolCallOptions) => Promise<ToolResult>;
