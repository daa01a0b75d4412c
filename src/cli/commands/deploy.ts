/**
 * promdash deploy command
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { ApiClient } from '../api-client.js';
import { isRecord } from '../../types/index.js';
import { fail, writeJson } from '../output.js';

interface DeployOptions {
    grafana?: string;
    folder?: string;
    message?: string;
    overwrite: boolean;
}

/**
 * Dashboard model from a file. Files written by `promdash dashboard` hold the
 * save envelope, whose `dashboard` member is the model, or a deployment
 * result carrying that envelope as `dashboard_json`.
 */
export function readDashboardModel(file: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (!isRecord(parsed)) {
        throw new Error(`${file} does not contain a JSON object`);
    }
    const deployed = parsed['dashboard_json'];
    const envelope = isRecord(deployed) ? deployed : parsed;
    const inner = envelope['dashboard'];
    return isRecord(inner) && !('title' in envelope) ? inner : envelope;
}

export function deployCommand(program: Command): void {
    program
        .command('deploy')
        .description('Deploy a dashboard JSON file to Grafana')
        .argument('<file>', 'Dashboard JSON file')
        .option('--grafana <url>', 'Grafana URL, overriding the server configuration')
        .option('--folder <uid>', 'Folder UID to save the dashboard in')
        .option('--message <text>', 'Version history message')
        .option('--no-overwrite', 'Fail instead of replacing an existing dashboard')
        .action(async (file: string, options: DeployOptions) => {
            try {
                const response = await new ApiClient().deployDashboard({
                    dashboard_json: readDashboardModel(file),
                    grafana_url: options.grafana,
                    folder_uid: options.folder,
                    message: options.message,
                    overwrite: options.overwrite
                });
                writeJson(response);
            } catch (error) {
                fail(error);
            }
        });
}
