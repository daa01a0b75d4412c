/**
 * Centralized configuration for environment variables.
 * This file contains all environment variable parsing logic.
 */

import os from 'os';

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  return val === 'true' || val === '1';
}

export type TransportType = 'stdio' | 'http';
export type LogFormat = 'text' | 'json';

// String configurations
export const LOG_LEVEL = getEnvString('LOG_LEVEL', 'info');
export const LOG_FORMAT: LogFormat = getEnvString('LOG_FORMAT', 'text') === 'json' ? 'json' : 'text';
export const TRANSPORT_TYPE: TransportType = getEnvString('TRANSPORT_TYPE', 'stdio') === 'http' ? 'http' : 'stdio';
export const NODE_ENV = getEnvString('NODE_ENV', '');
export const INSTANCE_ID = getEnvString('INSTANCE_ID', os.hostname() || 'unknown');

// Int configurations
export const PORT = getEnvInt('PORT', 3300);
export const METRICS_PORT = getEnvInt('METRICS_PORT', 9464);
export const PROMETHEUS_TIMEOUT_MS = getEnvInt('PROMETHEUS_TIMEOUT_MS', 30000);
export const GRAFANA_TIMEOUT_MS = getEnvInt('GRAFANA_TIMEOUT_MS', 30000);

export interface GrafanaConfig {
  url: string;
  apiKey: string;
  deployEnabled: boolean;
}

// Read on demand so tests and the CLI can adjust the environment before use
export function getGrafanaConfig(): GrafanaConfig {
  return {
    url: getEnvString('GRAFANA_URL', ''),
    apiKey: getEnvString('GRAFANA_API_KEY', ''),
    deployEnabled: getEnvBoolean('GRAFANA_DEPLOY_ENABLED', false)
  };
}

export function getPrometheusUrl(defaultValue = ''): string {
  return getEnvString('PROMETHEUS_URL', defaultValue);
}

export function getApiUrl(defaultValue = 'http://localhost:3300'): string {
  return getEnvString('PROMDASH_API_URL', defaultValue);
}
