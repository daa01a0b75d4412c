// Global Jest setup for PromDash tests
// Set env vars before any test file imports config (config reads them at import time).
process.env.LOG_LEVEL = 'silent';
process.env.LOG_FORMAT = 'json';
process.env.TRANSPORT_TYPE = 'stdio';

// Tests configure Grafana explicitly through fake deps
delete process.env.GRAFANA_URL;
delete process.env.GRAFANA_API_KEY;
delete process.env.GRAFANA_DEPLOY_ENABLED;
delete process.env.PROMDASH_API_URL;

export {};
