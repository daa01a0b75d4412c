import { z } from 'zod';

/** Dashboard document as sent to and read from Grafana. */
export type DashboardModel = Record<string, unknown>;

/** Envelope accepted by `POST /api/dashboards/db`. */
export interface DashboardPayload {
    dashboard: DashboardModel;
    folderUid: string;
    message: string;
    overwrite: boolean;
}

export const dashboardResponseSchema = z.object({
    id: z.number().default(0),
    uid: z.string().default(''),
    url: z.string().default(''),
    status: z.string().default(''),
    version: z.number().default(0),
    slug: z.string().default('')
});

export type DashboardResponse = z.infer<typeof dashboardResponseSchema>;

export const dashboardLookupSchema = z.object({
    dashboard: z.record(z.unknown()),
    meta: z.record(z.unknown()).optional()
});

export interface GrafanaGateway {
    createDashboard(payload: DashboardPayload, grafanaUrl: string, apiKey: string, signal?: AbortSignal): Promise<DashboardResponse>;
    updateDashboard(payload: DashboardPayload, grafanaUrl: string, apiKey: string, signal?: AbortSignal): Promise<DashboardResponse>;
    getDashboard(uid: string, grafanaUrl: string, apiKey: string, signal?: AbortSignal): Promise<DashboardModel>;
    deleteDashboard(uid: string, grafanaUrl: string, apiKey: string, signal?: AbortSignal): Promise<void>;
}
