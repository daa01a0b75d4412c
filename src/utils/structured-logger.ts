/**
 * Structured logging for PromDash
 *
 * Wraps the shared pino logger with the call shapes used across the
 * codebase and provides the express access-log middleware.
 */

import type { Request, Response, NextFunction } from 'express';
import { getBaseLogger } from './log-core.js';
import { NODE_ENV } from '../config.js';

export type ToolOperation = 'generate' | 'validate' | 'discover' | 'create' | 'deploy';

function requestId(req: Request): string {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && header) return header;
  return `req-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

// Simple HTTP logging middleware
const httpLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  const rid = requestId(req);

  res.on('finish', () => {
    const duration = Date.now() - start;
    const data = {
      http: {
        method: req.method,
        path: req.originalUrl,
        protocol: `HTTP/${req.httpVersion}`
      },
      status: res.statusCode,
      response_time_ms: duration,
      client: { ip: req.socket.remoteAddress ?? 'unknown' },
      user_agent: req.headers['user-agent'],
      request_id: rid
    };
    const message = `${req.method} ${req.originalUrl} -> ${res.statusCode}`;
    const base = getBaseLogger();
    if (res.statusCode >= 500) {
      base.error(data, message);
    } else if (res.statusCode >= 400) {
      base.warn(data, message);
    } else {
      base.info(data, message);
    }
  });

  next();
};

class StructuredLogger {
  /**
   * Log debug messages
   */
  debug(message: string, context?: Record<string, unknown>): void {
    getBaseLogger().debug({ category: 'debug', ...context }, message);
  }

  /**
   * Format tool operations with concise, clean output
   */
  tool(toolName: string, operation: ToolOperation, details: string): void {
    const logData = {
      tool: toolName,
      operation: operation.toUpperCase(),
      details,
      category: 'tool_operation'
    };
    getBaseLogger().info(logData, `[${toolName}] ${operation.toUpperCase()} ${details}`);
  }

  /**
   * Log success status
   */
  success(operation: string, details: string): void {
    getBaseLogger().info({ operation, details, category: 'success' }, `[${operation}] ${details}`);
  }

  /**
   * Log error messages with full context
   */
  error(message: string, error?: unknown): void {
    const errorData: Record<string, unknown> = { category: 'error' };

    if (error !== undefined) {
      errorData['error'] = error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: NODE_ENV === 'development' ? error.stack : undefined
      } : error;
    }

    const suffix = error instanceof Error ? ` | ${error.message}` : '';
    getBaseLogger().error(errorData, `${message}${suffix}`);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    getBaseLogger().warn({ category: 'warning', ...context }, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    getBaseLogger().info({ category: 'info', ...context }, message);
  }

}

// Export singleton instance
export const structuredLogger = new StructuredLogger();

// Export HTTP logger middleware for Express
export { httpLogger };
