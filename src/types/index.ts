/**
 * PromDash shared type definitions
 */

export type ErrorCode =
    | 'INVALID_INPUT'
    | 'DEPLOY_DISABLED'
    | 'DEPLOY_NOT_CONFIGURED'
    | 'UPSTREAM_ERROR'
    | 'DECODE_ERROR'
    | 'NOT_FOUND'
    | 'QUERY_INVALID'
    | 'NO_PANELS';

export class PromdashError extends Error {
    constructor(
        message: string,
        public code: ErrorCode,
        public statusCode: number = 500,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'PromdashError';
    }
}

export function invalidInput(message: string): PromdashError {
    return new PromdashError(message, 'INVALID_INPUT', 400);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Loosely-typed tool arguments as they arrive from MCP clients or the REST mirror
export type ToolArgs = Record<string, unknown>;

export interface ToolCallOptions {
    signal?: AbortSignal | undefined;
}

// MCP tool definitions
export interface ToolDefinition {
    name: string;
    title: string;
    description: string;
}
