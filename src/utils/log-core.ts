/**
 * Shared Pino-based logging core for PromDash.
 * Single source of truth for LOG_LEVEL, LOG_FORMAT, TRANSPORT_TYPE.
 */

import pino from 'pino';
import type { Request, Response } from 'express';
import { Writable } from 'stream';
import { LOG_LEVEL, LOG_FORMAT, TRANSPORT_TYPE, type TransportType } from '../config.js';
import { isRecord } from '../types/index.js';

const REDACT_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  '*.apiKey',
  '*.password',
  '*.secret'
];

// Under stdio, stdout carries MCP frames; logs must go to stderr.
function outputFor(transportType: TransportType): NodeJS.WritableStream {
  return transportType === 'stdio' ? process.stderr : process.stdout;
}

export function formatTextLine(line: string): string {
  const parsed: unknown = JSON.parse(line);
  const data: Record<string, unknown> = isRecord(parsed) ? parsed : {};
  const time = typeof data['time'] === 'string' ? data['time'].slice(11, 19) : '00:00:00';
  const level = String(data['level'] ?? 'info').toUpperCase().padEnd(7);
  const msg = String(data['msg'] ?? '');
  return `[${time}] [${level}] ${msg}\n`;
}

function textFormatStream(transportType: TransportType): Writable {
  const out = outputFor(transportType);
  return new Writable({
    write(chunk: Buffer, _enc, cb) {
      const line = chunk.toString();
      if (!line.trim()) {
        cb();
        return;
      }
      try {
        out.write(formatTextLine(line));
      } catch {
        out.write(line);
      }
      cb();
    }
  });
}

function createBaseLogger(): pino.Logger {
  const dest = LOG_FORMAT === 'text'
    ? textFormatStream(TRANSPORT_TYPE)
    : outputFor(TRANSPORT_TYPE);

  return pino({
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    // Text output prints the level name, not pino's number
    formatters: {
      level(label) {
        return { level: label };
      }
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    serializers: {
      req(req: Request) {
        return {
          method: req.method,
          url: req.url,
          headers: {
            'user-agent': req.headers['user-agent'],
            'x-request-id': req.headers['x-request-id']
          }
        };
      },
      res(res: Response) {
        return { statusCode: res.statusCode };
      }
    }
  }, dest);
}

let baseLoggerInstance: pino.Logger | null = null;

/**
 * Returns the shared Pino logger. Creates it on first call.
 */
export function getBaseLogger(): pino.Logger {
  if (!baseLoggerInstance) {
    baseLoggerInstance = createBaseLogger();
  }
  return baseLoggerInstance;
}
