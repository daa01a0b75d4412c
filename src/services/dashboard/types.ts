export type PanelModel = Record<string, unknown>;

export type GridPos = {
    x: number;
    y: number;
    w: number;
    h: number;
};

export type PanelTarget = {
    refId: string;
    expr: string;
    legendFormat?: string;
};

export type TimeRange = {
    from: string;
    to: string;
};

export type TemplateVariable = {
    name: string;
    type: string;
    label: string;
    query?: string;
    datasource?: string;
};

// Type aliases rather than interfaces so the document stays assignable to Grafana's record model
export type DashboardDocument = {
    title: string;
    tags: string[];
    timezone: 'browser';
    panels: PanelModel[];
    time: TimeRange;
    refresh: string;
    schemaVersion: number;
    version: number;
    editable: boolean;
    fiscalYearStartMonth: number;
    graphTooltip: number;
    links: unknown[];
    liveNow: boolean;
    description?: string;
    templating?: { list: TemplateVariable[] };
};

/** Assignable to the Grafana gateway's DashboardPayload. */
export type DashboardEnvelope = {
    dashboard: DashboardDocument;
    folderUid: string;
    message: string;
    overwrite: boolean;
};
