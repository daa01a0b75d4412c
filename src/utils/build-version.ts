/**
 * Simple build version helper for PromDash.
 *
 * Format (semantic build version):
 *   v0.3.0+20251129.204700
 *
 * Computed once at process startup so it is stable
 * for the lifetime of the running server.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { isRecord } from '../types/index.js';

const getPackageVersion = (): string => {
  // src/utils (ts-jest) and dist/utils (build) both sit two levels below the package root
  const packageJsonPath = join(__dirname, '../../package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson['version'] === 'string' ? packageJson['version'] : '0.0.0';
  } catch {
    return '0.0.0';
  }
};

const packageVersion = getPackageVersion();

const buildVersion: string = (() => {
  const now = new Date();
  const dateStr = String(now.getFullYear()) +
    String(now.getMonth() + 1).padStart(2, '0') +
    String(now.getDate()).padStart(2, '0');
  const timeStr = String(now.getHours()).padStart(2, '0') +
    String(now.getMinutes()).padStart(2, '0') +
    String(now.getSeconds()).padStart(2, '0');
  return `v${packageVersion}+${dateStr}.${timeStr}`;
})();

export function getPackageVersionString(): string {
  return packageVersion;
}

export function getBuildVersion(): string {
  return buildVersion;
}
