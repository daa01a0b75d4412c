/**
 * promdash validate command
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { getPrometheusUrl } from '../../config.js';
import { fail, writeJson } from '../output.js';

export function validateCommand(program: Command): void {
    program
        .command('validate')
        .description('Validate a PromQL query against Prometheus')
        .argument('<query>', 'PromQL query')
        .option('-p, --prometheus <url>', 'Prometheus server URL', getPrometheusUrl())
        .action(async (query: string, options: { prometheus: string }) => {
            try {
                const response = await new ApiClient().validateQuery(options.prometheus, query);
                writeJson(response);
                // Invalid queries still print the result, but fail the command
                if (response['valid'] !== true) {
                    process.exitCode = 1;
                }
            } catch (error) {
                fail(error);
            }
        });
}
