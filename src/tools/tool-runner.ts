import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PromdashError } from '../types/index.js';
import { mcpToolCalls, mcpToolDuration, mcpToolErrors, mcpToolInputSize, mcpToolOutputSize } from '../services/metrics/mcp-metrics.js';
import { structuredLogger } from '../utils/structured-logger.js';
import type { ToolResult } from './types.js';

function errorCode(error: unknown): string {
    return error instanceof PromdashError ? error.code : 'INTERNAL_ERROR';
}

/**
 * Runs one tool invocation with call, duration, error and payload-size
 * metrics. Errors are rethrown for the transport to report.
 */
export async function instrumentTool<T extends ToolResult>(
    toolName: string,
    args: unknown,
    execute: () => Promise<T>
): Promise<T> {
    mcpToolInputSize.observe({ tool: toolName }, JSON.stringify(args ?? {}).length);
    const timer = mcpToolDuration.startTimer({ tool: toolName });

    try {
        const result = await execute();
        mcpToolCalls.inc({ tool: toolName, status: 'success' });
        mcpToolOutputSize.observe({ tool: toolName }, JSON.stringify(result).length);
        timer({ status: 'success' });
        return result;
    } catch (error) {
        mcpToolCalls.inc({ tool: toolName, status: 'error' });
        mcpToolErrors.inc({ tool: toolName, error_code: errorCode(error) });
        timer({ status: 'error' });
        structuredLogger.error(`[${toolName}] failed`, error);
        throw error;
    }
}

/** MCP result carrying the tool output as pretty JSON text and as structured content. */
export function toCallToolResult(result: ToolResult): CallToolResult {
    return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result
    };
}
