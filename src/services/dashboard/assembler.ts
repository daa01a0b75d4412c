import { isRecord, type ToolArgs } from '../../types/index.js';
import type {
    DashboardDocument,
    DashboardEnvelope,
    GridPos,
    PanelModel,
    TemplateVariable,
    TimeRange
} from './types.js';

const DEFAULT_TIME_RANGE: TimeRange = { from: 'now-6h', to: 'now' };
const DEFAULT_REFRESH = '5s';
const SCHEMA_VERSION = 36;

/** Non-empty string at `key`, otherwise the default. */
export function getStringOrDefault(source: Record<string, unknown>, key: string, defaultValue: string): string {
    const value = source[key];
    return typeof value === 'string' && value !== '' ? value : defaultValue;
}

export function extractTags(args: ToolArgs): string[] {
    const tags = args['tags'];
    if (!Array.isArray(tags)) return [];
    return tags.filter((tag): tag is string => typeof tag === 'string');
}

export function extractTimeRange(args: ToolArgs): TimeRange {
    const range = args['time_range'];
    if (!isRecord(range)) {
        return { ...DEFAULT_TIME_RANGE };
    }
    return {
        from: getStringOrDefault(range, 'from', DEFAULT_TIME_RANGE.from),
        to: getStringOrDefault(range, 'to', DEFAULT_TIME_RANGE.to)
    };
}

export function extractRefreshInterval(args: ToolArgs): string {
    return getStringOrDefault(args, 'refresh_interval', DEFAULT_REFRESH);
}

/** Panels are laid out two per row, each half the grid wide and 8 units tall. */
export function extractGridPos(panel: Record<string, unknown>, index: number): GridPos | Record<string, unknown> {
    const gridPos = panel['gridPos'];
    if (isRecord(gridPos)) {
        return gridPos;
    }
    return {
        x: (index % 2) * 12,
        y: Math.floor(index / 2) * 8,
        w: 12,
        h: 8
    };
}

export function extractTargets(panel: Record<string, unknown>): unknown[] {
    const targets = panel['targets'];
    if (Array.isArray(targets)) {
        return targets;
    }
    return [{ refId: 'A', expr: '' }];
}

export function extractOptions(panel: Record<string, unknown>): Record<string, unknown> {
    const options = panel['options'];
    if (isRecord(options)) {
        return options;
    }
    return {
        legend: {
            displayMode: 'list',
            placement: 'bottom'
        }
    };
}

export function extractFieldConfig(panel: Record<string, unknown>): Record<string, unknown> {
    const fieldConfig = panel['fieldConfig'];
    if (isRecord(fieldConfig)) {
        return fieldConfig;
    }
    return {
        defaults: {
            color: { mode: 'palette-classic' },
            custom: {
                drawStyle: 'line',
                lineInterpolation: 'linear',
                fillOpacity: 0
            }
        },
        overrides: []
    };
}

/**
 * Grafana panels from loosely-shaped definitions. Entries that are not
 * objects are dropped, but ids and default positions still follow the
 * input index.
 */
export function processPanels(panels: readonly unknown[]): PanelModel[] {
    const result: PanelModel[] = [];

    panels.forEach((raw, index) => {
        if (!isRecord(raw)) return;

        const panel: PanelModel = {
            id: index + 1,
            type: getStringOrDefault(raw, 'type', 'timeseries'),
            title: getStringOrDefault(raw, 'title', `Panel ${index + 1}`),
            gridPos: extractGridPos(raw, index),
            targets: extractTargets(raw),
            options: extractOptions(raw),
            fieldConfig: extractFieldConfig(raw)
        };

        const description = raw['description'];
        if (typeof description === 'string' && description !== '') {
            panel['description'] = description;
        }

        result.push(panel);
    });

    return result;
}

export function processVariables(variables: readonly unknown[]): TemplateVariable[] {
    const result: TemplateVariable[] = [];

    for (const raw of variables) {
        if (!isRecord(raw)) continue;

        const variable: TemplateVariable = {
            name: getStringOrDefault(raw, 'name', 'var'),
            type: getStringOrDefault(raw, 'type', 'query'),
            label: getStringOrDefault(raw, 'label', '')
        };

        const query = getStringOrDefault(raw, 'query', '');
        if (query) variable.query = query;

        const datasource = getStringOrDefault(raw, 'datasource', '');
        if (datasource) variable.datasource = datasource;

        result.push(variable);
    }

    return result;
}

/**
 * Dashboard document wrapped in the envelope Grafana's save endpoint takes.
 * Optional inputs are read from the raw tool arguments.
 */
export function buildDashboard(title: string, panels: readonly unknown[], args: ToolArgs): DashboardEnvelope {
    const dashboard: DashboardDocument = {
        title,
        tags: extractTags(args),
        timezone: 'browser',
        panels: processPanels(panels),
        time: extractTimeRange(args),
        refresh: extractRefreshInterval(args),
        schemaVersion: SCHEMA_VERSION,
        version: 0,
        editable: true,
        fiscalYearStartMonth: 0,
        graphTooltip: 0,
        links: [],
        liveNow: false
    };

    const description = getStringOrDefault(args, 'description', '');
    if (description) {
        dashboard.description = description;
    }

    const variables = args['variables'];
    if (Array.isArray(variables) && variables.length > 0) {
        dashboard.templating = { list: processVariables(variables) };
    }

    return {
        dashboard,
        folderUid: '',
        message: '',
        overwrite: false
    };
}
