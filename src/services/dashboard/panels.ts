import { PromdashError, errorMessage } from '../../types/index.js';
import { structuredLogger } from '../../utils/structured-logger.js';
import type { PromQLService } from '../promql/service.js';
import { NO_METADATA_HELP, isVisualizationType, type MetricInfo, type QuerySuggestion, type VisualizationType } from '../promql/types.js';
import type { PanelModel, PanelTarget } from './types.js';

const MAX_EXTRA_TARGETS = 3;
const EXTRA_REF_IDS = ['B', 'C', 'D'] as const;

export function mapVisualizationType(visualizationType: string): VisualizationType {
    return isVisualizationType(visualizationType) ? visualizationType : 'timeseries';
}

/** Grafana unit id guessed from the metric name and the suggestion's axis label. */
export function inferUnit(metricName: string, yAxisLabel: string): string {
    if (metricName.includes('duration') || metricName.includes('latency') ||
        yAxisLabel.includes('duration') || yAxisLabel.includes('time')) {
        return 's';
    }

    if (yAxisLabel.includes('per second') || yAxisLabel.includes('requests/sec')) {
        return 'reqps';
    }

    if (metricName.includes('ratio') || metricName.includes('percent') || yAxisLabel.includes('percent')) {
        return 'percent';
    }

    if (metricName.includes('bytes') || metricName.includes('size') || metricName.includes('memory')) {
        return 'bytes';
    }

    if (metricName.includes('cpu')) {
        return 'percent';
    }

    return 'short';
}

function basicPanel(metricName: string): PanelModel {
    return {
        title: metricName,
        type: 'timeseries',
        targets: [{ refId: 'A', expr: metricName }]
    };
}

async function isValid(service: PromQLService, prometheusUrl: string, query: string, signal?: AbortSignal): Promise<boolean> {
    try {
        await service.validateQuery(prometheusUrl, query, signal);
        return true;
    } catch (error) {
        structuredLogger.debug('Skipping query that failed validation', { query, error: errorMessage(error) });
        return false;
    }
}

async function panelForMetric(
    service: PromQLService,
    metricInfo: MetricInfo,
    prometheusUrl: string,
    signal?: AbortSignal
): Promise<PanelModel> {
    const metricName = metricInfo.name;
    const enhanced = service.enhanceQueries(metricInfo, service.generateQueries(metricInfo));
    const best: QuerySuggestion = service.getBestQuery(enhanced);

    let bestExpr = best.query;
    if (!(await isValid(service, prometheusUrl, bestExpr, signal))) {
        structuredLogger.warn('Generated query failed validation, using the bare metric', { metric: metricName, query: bestExpr });
        bestExpr = metricName;
    }

    const panel: PanelModel = {
        title: `${metricName} - ${best.description}`,
        type: mapVisualizationType(best.visualizationType),
        targets: [{ refId: 'A', expr: bestExpr }],
        fieldConfig: {
            defaults: {
                unit: inferUnit(metricName, best.yAxisLabel),
                color: { mode: 'palette-classic' }
            }
        }
    };

    if (metricInfo.help !== '' && metricInfo.help !== NO_METADATA_HELP) {
        panel['description'] = metricInfo.help;
    }

    if (enhanced.length > 1) {
        const targets: PanelTarget[] = [{ refId: 'A', expr: bestExpr, legendFormat: best.description }];

        for (const suggestion of enhanced.slice(1, 1 + MAX_EXTRA_TARGETS)) {
            if (!(await isValid(service, prometheusUrl, suggestion.query, signal))) continue;
            const refId = EXTRA_REF_IDS[targets.length - 1];
            if (refId === undefined) break;
            targets.push({ refId, expr: suggestion.query, legendFormat: suggestion.description });
        }

        panel['targets'] = targets;
    }

    return panel;
}

/**
 * One panel per metric name, built from generated and enhanced suggestions.
 * Metrics whose metadata cannot be read still get a basic raw-series panel;
 * non-string names are skipped.
 */
export async function generatePanelsFromMetrics(
    service: PromQLService,
    metricNames: readonly unknown[],
    prometheusUrl: string,
    signal?: AbortSignal
): Promise<PanelModel[]> {
    const panels: PanelModel[] = [];

    for (const raw of metricNames) {
        if (typeof raw !== 'string') {
            structuredLogger.warn('Skipping non-string metric name', { metric: String(raw) });
            continue;
        }

        let metricInfo: MetricInfo;
        try {
            metricInfo = await service.getMetricMetadata(prometheusUrl, raw, signal);
        } catch (error) {
            structuredLogger.warn('Failed to get metadata for metric, using a basic panel', {
                metric: raw,
                error: errorMessage(error)
            });
            panels.push(basicPanel(raw));
            continue;
        }

        panels.push(await panelForMetric(service, metricInfo, prometheusUrl, signal));
    }

    if (panels.length === 0) {
        throw new PromdashError('no valid panels could be generated from the provided metric names', 'NO_PANELS', 400);
    }

    structuredLogger.info('Generated panels from metrics', { metric_count: metricNames.length, panel_count: panels.length });
    return panels;
}
