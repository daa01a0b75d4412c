/**
 * Global process-level error handlers for PromDash
 * Captures uncaught exceptions, unhandled rejections, and Node warnings
 * and forwards them to the structured logger.
 */

import { structuredLogger } from './structured-logger.js';

let installed = false;

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function installGlobalErrorHandlers() {
  if (installed) return;
  installed = true;

  process.on('uncaughtException', (err: unknown) => {
    structuredLogger.error('Uncaught exception', asError(err));
    // Do not exit immediately; allow supervisor to decide. Mark non-zero.
    process.exitCode = 1;
  });

  process.on('unhandledRejection', (reason: unknown) => {
    structuredLogger.error('Unhandled promise rejection', asError(reason));
  });

  process.on('rejectionHandled', () => {
    structuredLogger.warn('Promise rejection handled asynchronously');
  });

  // Log Node warnings (e.g., ExperimentalWarning, DeprecationWarning)
  process.on('warning', (warning) => {
    structuredLogger.warn(`Node warning: ${warning.name} - ${warning.message}`);
  });
}
