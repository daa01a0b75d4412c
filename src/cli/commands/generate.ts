/**
 * promdash generate command
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { getPrometheusUrl } from '../../config.js';
import { fail, writeJson } from '../output.js';

export function generateCommand(program: Command): void {
    program
        .command('generate')
        .description('Generate PromQL queries for one or more metrics')
        .argument('<metrics...>', 'Metric names')
        .option('-p, --prometheus <url>', 'Prometheus server URL', getPrometheusUrl())
        .action(async (metrics: string[], options: { prometheus: string }) => {
            try {
                const response = await new ApiClient().generateQueries(options.prometheus, metrics);
                writeJson(response);
            } catch (error) {
                fail(error);
            }
        });
}
