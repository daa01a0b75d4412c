/**
 * promdash discover command
 */

import { Command, Option } from 'commander';
import { ApiClient } from '../api-client.js';
import { getPrometheusUrl } from '../../config.js';
import { fail, writeJson } from '../output.js';

interface DiscoverOptions {
    prometheus: string;
    pattern?: string;
    type?: string;
}

export function discoverCommand(program: Command): void {
    program
        .command('discover')
        .description('List metrics known to Prometheus')
        .option('-p, --prometheus <url>', 'Prometheus server URL', getPrometheusUrl())
        .option('--pattern <regex>', 'Only metrics whose name matches this regular expression')
        .addOption(new Option('--type <type>', 'Only metrics of this type').choices(['counter', 'gauge', 'histogram', 'summary']))
        .action(async (options: DiscoverOptions) => {
            try {
                const response = await new ApiClient().discoverMetrics(options.prometheus, {
                    namePattern: options.pattern,
                    metricType: options.type
                });
                writeJson(response);
            } catch (error) {
                fail(error);
            }
        });
}
