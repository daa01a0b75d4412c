#!/usr/bin/env node
/**
 * PromDash CLI - command-line interface for the PromDash REST API
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { validateCommand } from './commands/validate.js';
import { discoverCommand } from './commands/discover.js';
import { dashboardCommand } from './commands/dashboard.js';
import { deployCommand } from './commands/deploy.js';
import { getApiUrl } from '../config.js';
import { getPackageVersionString } from '../utils/build-version.js';

export function createProgram(): Command {
    const program = new Command();

    program
        .name('promdash')
        .description('Generate PromQL queries and Grafana dashboards through the PromDash REST API')
        .version(getPackageVersionString())
        .option('-u, --url <url>', 'PromDash API base URL', getApiUrl())
        .hook('preAction', (thisCommand) => {
            // Store the URL option globally for use in commands
            const url: unknown = thisCommand.opts()['url'];
            if (typeof url === 'string' && url) {
                process.env['PROMDASH_API_URL'] = url;
            }
        });

    // Register commands (matching MCP tool names 1:1)
    generateCommand(program);   // generate_promql_queries
    validateCommand(program);   // validate_promql_query
    discoverCommand(program);   // discover_metrics
    dashboardCommand(program);  // create_dashboard
    deployCommand(program);     // deploy_dashboard

    return program;
}

if (require.main === module) {
    createProgram().parseAsync().catch((error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exitCode = 1;
    });
}
