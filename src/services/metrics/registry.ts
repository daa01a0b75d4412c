import { Registry } from 'prom-client';
import { getBuildVersion } from '../../utils/build-version.js';
import { INSTANCE_ID } from '../../config.js';

/**
 * Prometheus metrics registry for PromDash.
 *
 * All metrics are registered here and exposed via /metrics endpoint.
 * Default labels are automatically applied to all metrics.
 */
export const register = new Registry();

register.setDefaultLabels({
  service: 'promdash',
  version: getBuildVersion(),
  instance: INSTANCE_ID
});
