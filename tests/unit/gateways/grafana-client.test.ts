import { GrafanaClient } from '../../../src/services/grafana/client.js';
import { fetchCall, jsonResponse, mockFetch, type FetchSpy } from '../../utils/fetch-mock.js';

const GRAFANA = 'http://grafana.test:3000/';
const SAVED = { id: 7, uid: 'abc', url: '/d/abc/ops', status: 'success', version: 2, slug: 'ops' };
const PAYLOAD = { dashboard: { title: 'Ops' }, folderUid: '', message: 'test', overwrite: false };

describe('GrafanaClient', () => {
  const client = new GrafanaClient(50);
  let fetchSpy: FetchSpy;

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  test('saves a dashboard with bearer auth', async () => {
    fetchSpy = mockFetch(() => jsonResponse(SAVED));

    await expect(client.createDashboard(PAYLOAD, GRAFANA, 'test-secret')).resolves.toEqual(SAVED);

    const { url, init } = fetchCall(fetchSpy);
    expect(url).toBe('http://grafana.test:3000/api/dashboards/db');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      Accept: 'application/json',
      'Content-Type': 'application/json'
    });
    expect(init?.body).toBe(JSON.stringify(PAYLOAD));
  });

  test('update forces overwrite', async () => {
    fetchSpy = mockFetch(() => jsonResponse(SAVED));

    await client.updateDashboard(PAYLOAD, GRAFANA, 'test-secret');
    expect(fetchCall(fetchSpy).init?.body).toBe(JSON.stringify({ ...PAYLOAD, overwrite: true }));
  });

  test('fails on a non-200 status', async () => {
    fetchSpy = mockFetch(() => jsonResponse({ message: 'version-mismatched' }, 412));
    await expect(client.createDashboard(PAYLOAD, GRAFANA, 'test-secret')).rejects.toThrow('grafana returned status 412');
  });

  test('releases the body of a rejected save', async () => {
    const response = jsonResponse({ message: 'version-mismatched' }, 412);
    fetchSpy = mockFetch(() => response);
    await expect(client.createDashboard(PAYLOAD, GRAFANA, 'test-secret')).rejects.toThrow('grafana returned status 412');
    expect(response.bodyUsed).toBe(true);
  });

  test('fills missing response fields with defaults', async () => {
    fetchSpy = mockFetch(() => jsonResponse({ uid: 'abc' }));
    const saved = await client.createDashboard(PAYLOAD, GRAFANA, 'test-secret');
    expect(saved.uid).toBe('abc');
    expect(saved.id).toBe(0);
  });

  test('reads a dashboard by uid', async () => {
    fetchSpy = mockFetch(() => jsonResponse({ dashboard: { title: 'Ops' }, meta: {} }));

    await expect(client.getDashboard('abc', GRAFANA, 'test-secret')).resolves.toEqual({ title: 'Ops' });
    expect(fetchCall(fetchSpy).url).toBe('http://grafana.test:3000/api/dashboards/uid/abc');
  });

  test('reports a missing dashboard', async () => {
    fetchSpy = mockFetch(() => jsonResponse({ message: 'Dashboard not found' }, 404));
    await expect(client.getDashboard('abc', GRAFANA, 'test-secret')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'dashboard not found'
    });
  });

  test('deletes a dashboard by uid', async () => {
    fetchSpy = mockFetch(() => jsonResponse({ title: 'Ops', message: 'deleted' }));

    await expect(client.deleteDashboard('abc', GRAFANA, 'test-secret')).resolves.toBeUndefined();
    expect(fetchCall(fetchSpy).init?.method).toBe('DELETE');
  });
});
