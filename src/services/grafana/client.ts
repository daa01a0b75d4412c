import { PromdashError } from '../../types/index.js';
import { GRAFANA_TIMEOUT_MS } from '../../config.js';
import { structuredLogger } from '../../utils/structured-logger.js';
import { decodeJson, discardBody, trimTrailingSlash, upstreamFetch } from '../upstream/request.js';
import {
    dashboardLookupSchema,
    dashboardResponseSchema,
    type DashboardModel,
    type DashboardPayload,
    type DashboardResponse,
    type GrafanaGateway
} from './types.js';

function authHeaders(apiKey: string): Record<string, string> {
    return { Authorization: `Bearer ${apiKey}`, Accept: 'application/json' };
}

async function expectOk(response: Response): Promise<void> {
    if (response.status !== 200) {
        await discardBody(response);
        throw new PromdashError(`grafana returned status ${response.status}`, 'UPSTREAM_ERROR', 502);
    }
}

/**
 * GrafanaGateway over the Grafana dashboards HTTP API, authenticated with a
 * service-account token.
 */
export class GrafanaClient implements GrafanaGateway {
    constructor(private readonly timeoutMs: number = GRAFANA_TIMEOUT_MS) {}

    async createDashboard(
        payload: DashboardPayload,
        grafanaUrl: string,
        apiKey: string,
        signal?: AbortSignal
    ): Promise<DashboardResponse> {
        const response = await upstreamFetch({
            target: 'grafana',
            operation: 'save_dashboard',
            url: `${trimTrailingSlash(grafanaUrl)}/api/dashboards/db`,
            init: {
                method: 'POST',
                headers: { ...authHeaders(apiKey), 'Content-Type': 'application/json' },
                body: JSON.stringify(payload)
            },
            timeoutMs: this.timeoutMs,
            signal
        });
        await expectOk(response);

        const saved = await decodeJson(response, dashboardResponseSchema, 'dashboard');
        structuredLogger.info('Dashboard saved to Grafana', { id: saved.id, uid: saved.uid, url: saved.url });
        return saved;
    }

    async updateDashboard(
        payload: DashboardPayload,
        grafanaUrl: string,
        apiKey: string,
        signal?: AbortSignal
    ): Promise<DashboardResponse> {
        return this.createDashboard({ ...payload, overwrite: true }, grafanaUrl, apiKey, signal);
    }

    async getDashboard(uid: string, grafanaUrl: string, apiKey: string, signal?: AbortSignal): Promise<DashboardModel> {
        const response = await upstreamFetch({
            target: 'grafana',
            operation: 'get_dashboard',
            url: `${trimTrailingSlash(grafanaUrl)}/api/dashboards/uid/${encodeURIComponent(uid)}`,
            init: { method: 'GET', headers: authHeaders(apiKey) },
            timeoutMs: this.timeoutMs,
            signal
        });

        if (response.status === 404) {
            await discardBody(response);
            throw new PromdashError('dashboard not found', 'NOT_FOUND', 404, { uid });
        }
        await expectOk(response);

        const body = await decodeJson(response, dashboardLookupSchema, 'dashboard');
        return body.dashboard;
    }

    async deleteDashboard(uid: string, grafanaUrl: string, apiKey: string, signal?: AbortSignal): Promise<void> {
        const response = await upstreamFetch({
            target: 'grafana',
            operation: 'delete_dashboard',
            url: `${trimTrailingSlash(grafanaUrl)}/api/dashboards/uid/${encodeURIComponent(uid)}`,
            init: { method: 'DELETE', headers: authHeaders(apiKey) },
            timeoutMs: this.timeoutMs,
            signal
        });
        await expectOk(response);
        structuredLogger.info('Dashboard deleted from Grafana', { uid });
    }
}
