import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { dashboardArgs } from '../../../src/cli/commands/dashboard.js';
import { readDashboardModel } from '../../../src/cli/commands/deploy.js';
import { createProgram } from '../../../src/cli/index.js';

describe('CLI commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'promdash-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJsonFile(name: string, value: unknown): string {
    const file = join(dir, name);
    writeFileSync(file, JSON.stringify(value));
    return file;
  }

  test('registers one command per tool', () => {
    expect(createProgram().commands.map(command => command.name())).toEqual([
      'generate',
      'validate',
      'discover',
      'dashboard',
      'deploy'
    ]);
  });

  describe('dashboardArgs', () => {
    test('maps metric options to create_dashboard arguments', () => {
      const args = dashboardArgs('Ops', {
        metrics: ['up', 'queue_size'],
        prometheus: 'http://prom.test:9090',
        tags: ['prod'],
        from: 'now-1h',
        refresh: '30s',
        deploy: true,
        grafana: 'http://grafana.test:3000'
      });

      expect(args).toEqual({
        dashboard_title: 'Ops',
        metric_names: ['up', 'queue_size'],
        prometheus_url: 'http://prom.test:9090',
        tags: ['prod'],
        time_range: { from: 'now-1h', to: undefined },
        refresh_interval: '30s',
        deploy: true,
        grafana_url: 'http://grafana.test:3000'
      });
    });

    test('reads panels from a file', () => {
      const file = writeJsonFile('panels.json', [{ title: 'Up', targets: [{ refId: 'A', expr: 'up' }] }]);
      expect(dashboardArgs('Ops', { panels: file, prometheus: '' })).toEqual({
        dashboard_title: 'Ops',
        panels: [{ title: 'Up', targets: [{ refId: 'A', expr: 'up' }] }]
      });
    });
  });

  describe('readDashboardModel', () => {
    test('reads a bare dashboard model', () => {
      const file = writeJsonFile('model.json', { title: 'Ops', panels: [] });
      expect(readDashboardModel(file)).toEqual({ title: 'Ops', panels: [] });
    });

    test('unwraps a save envelope', () => {
      const file = writeJsonFile('envelope.json', {
        dashboard: { title: 'Ops', panels: [] },
        folderUid: '',
        message: '',
        overwrite: false
      });
      expect(readDashboardModel(file)).toEqual({ title: 'Ops', panels: [] });
    });

    test('unwraps the envelope of a deployment result', () => {
      const file = writeJsonFile('deployed.json', {
        status: 'deployed',
        dashboard: { id: 1, uid: 'u1', url: '/d/u1/ops' },
        dashboard_json: { dashboard: { title: 'Ops' }, folderUid: '', message: '', overwrite: false }
      });
      expect(readDashboardModel(file)).toEqual({ title: 'Ops' });
    });

    test('rejects a file without an object', () => {
      const file = writeJsonFile('list.json', []);
      expect(() => readDashboardModel(file)).toThrow(`${file} does not contain a JSON object`);
    });
  });
});
