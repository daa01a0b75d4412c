import { collectDefaultMetrics, Gauge } from 'prom-client';
import { register } from './registry.js';

/**
 * System Metrics
 *
 * Process CPU, memory, event-loop and GC metrics from prom-client's default
 * collectors, plus application uptime computed at scrape time.
 */

export const systemUptime = new Gauge({
  name: 'promdash_system_uptime_seconds',
  help: 'Application uptime in seconds',
  registers: [register],
  collect() {
    this.set(process.uptime());
  }
});

let collecting = false;

export function collectSystemMetrics(): void {
  if (collecting) return;
  collecting = true;
  collectDefaultMetrics({ register, prefix: 'promdash_' });
}
