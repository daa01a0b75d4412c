import { DEPLOY_DISABLED_MESSAGE } from '../../../src/tools/create_dashboard.js';
import { deployDashboard } from '../../../src/tools/deploy_dashboard.js';
import { createFakeWorld, GRAFANA_URL } from '../../utils/fakes.js';

const MODEL = { title: 'Ops', panels: [] };

describe('deploy_dashboard', () => {
  test('refuses when deployment is disabled', async () => {
    const world = createFakeWorld({ url: GRAFANA_URL, apiKey: 'test-secret' });
    await expect(deployDashboard({ dashboard_json: MODEL }, world.deps))
      .rejects.toMatchObject({ code: 'DEPLOY_DISABLED', message: DEPLOY_DISABLED_MESSAGE });
  });

  test.each([
    [undefined],
    [{}],
    [['not', 'an', 'object']]
  ])('rejects dashboard_json %p', async dashboardJson => {
    const world = createFakeWorld({ deployEnabled: true, url: GRAFANA_URL, apiKey: 'test-secret' });
    await expect(deployDashboard({ dashboard_json: dashboardJson }, world.deps))
      .rejects.toThrow('dashboard_json is required and must be a valid object');
  });

  test('requires a Grafana URL', async () => {
    const world = createFakeWorld({ deployEnabled: true, apiKey: 'test-secret' });
    await expect(deployDashboard({ dashboard_json: MODEL }, world.deps))
      .rejects.toThrow('grafana_url must be provided either as a parameter or in configuration (GRAFANA_URL)');
  });

  test('requires an API key', async () => {
    const world = createFakeWorld({ deployEnabled: true, url: GRAFANA_URL });
    await expect(deployDashboard({ dashboard_json: MODEL }, world.deps))
      .rejects.toThrow('grafana API key is required - set GRAFANA_API_KEY');
  });

  test('deploys with defaults', async () => {
    const world = createFakeWorld({ deployEnabled: true, url: GRAFANA_URL, apiKey: 'test-secret' });
    const result = await deployDashboard({ dashboard_json: MODEL }, world.deps);

    expect(result).toEqual({
      status: 'deployed',
      grafana_url: GRAFANA_URL,
      dashboard: { id: 1, uid: 'u1', url: '/d/u1/ops', version: 1, slug: 'ops' },
      message: 'Dashboard deployed via promdash'
    });
    expect(world.grafana.saved[0]?.payload).toEqual({
      dashboard: MODEL,
      folderUid: '',
      message: 'Dashboard deployed via promdash',
      overwrite: true
    });
  });

  test('passes folder, message and overwrite through', async () => {
    const world = createFakeWorld({ deployEnabled: true, url: GRAFANA_URL, apiKey: 'test-secret' });
    await deployDashboard(
      { dashboard_json: MODEL, folder_uid: 'team-a', message: 'nightly', overwrite: false },
      world.deps
    );
    expect(world.grafana.saved[0]?.payload).toEqual({
      dashboard: MODEL,
      folderUid: 'team-a',
      message: 'nightly',
      overwrite: false
    });
  });
});
