/**
 * promdash dashboard command
 */

import { Command } from 'commander';
import { readFileSync, writeFileSync } from 'fs';
import { ApiClient } from '../api-client.js';
import { getPrometheusUrl } from '../../config.js';
import { fail, writeJson, writeStdout } from '../output.js';

export interface DashboardOptions {
    metrics?: string[];
    panels?: string;
    prometheus: string;
    description?: string;
    tags?: string[];
    from?: string;
    to?: string;
    refresh?: string;
    deploy?: boolean;
    grafana?: string;
    output?: string;
}

/** create_dashboard arguments from the command line. */
export function dashboardArgs(title: string, options: DashboardOptions): Record<string, unknown> {
    const args: Record<string, unknown> = { dashboard_title: title };

    if (options.metrics && options.metrics.length > 0) {
        args['metric_names'] = options.metrics;
        args['prometheus_url'] = options.prometheus;
    }
    if (options.panels) {
        const panels: unknown = JSON.parse(readFileSync(options.panels, 'utf-8'));
        args['panels'] = panels;
    }
    if (options.description) args['description'] = options.description;
    if (options.tags) args['tags'] = options.tags;
    if (options.from || options.to) args['time_range'] = { from: options.from, to: options.to };
    if (options.refresh) args['refresh_interval'] = options.refresh;
    if (options.deploy) args['deploy'] = true;
    if (options.grafana) args['grafana_url'] = options.grafana;

    return args;
}

export function dashboardCommand(program: Command): void {
    program
        .command('dashboard')
        .description('Build a Grafana dashboard from metric names or a panels file, optionally deploying it')
        .argument('<title>', 'Dashboard title')
        .option('-m, --metrics <names...>', 'Metric names to generate panels for')
        .option('--panels <file>', 'JSON file with an array of panel definitions')
        .option('-p, --prometheus <url>', 'Prometheus server URL', getPrometheusUrl())
        .option('--description <text>', 'Dashboard description')
        .option('--tags <tags...>', 'Dashboard tags')
        .option('--from <time>', 'Default time range start (e.g. now-1h)')
        .option('--to <time>', 'Default time range end')
        .option('--refresh <interval>', 'Auto-refresh interval (e.g. 30s)')
        .option('--deploy', 'Deploy the dashboard to Grafana')
        .option('--grafana <url>', 'Grafana URL, overriding the server configuration')
        .option('-o, --output <file>', 'Write the result to a file instead of stdout')
        .action(async (title: string, options: DashboardOptions) => {
            try {
                const response = await new ApiClient().createDashboard(dashboardArgs(title, options));
                if (options.output) {
                    writeFileSync(options.output, JSON.stringify(response, null, 2) + '\n');
                    writeStdout(`Dashboard written to ${options.output}`);
                    return;
                }
                writeJson(response);
            } catch (error) {
                fail(error);
            }
        });
}
