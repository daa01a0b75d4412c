import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServer } from '../../src/server.js';
import { isRecord } from '../../src/types/index.js';
import { createFakeWorld, PROMETHEUS_URL, type FakeWorld } from '../utils/fakes.js';

function field(result: unknown, key: string): unknown {
  return isRecord(result) ? result[key] : undefined;
}

function firstText(result: unknown): string {
  const content = field(result, 'content');
  if (!Array.isArray(content)) return '';
  const [first] = content;
  const text = field(first, 'text');
  return typeof text === 'string' ? text : '';
}

describe('MCP tools over an in-memory transport', () => {
  let world: FakeWorld;
  let server: McpServer;
  let client: Client;

  beforeAll(async () => {
    world = createFakeWorld();
    world.prometheus.addMetric('queue_size', { type: 'gauge', help: 'Queue depth' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createServer(world.deps);
    await server.connect(serverTransport);
    client = new Client({ name: 'promdash-tests', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
  });

  test('tools/list returns every tool with an object input schema', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name).sort()).toEqual([
      'create_dashboard',
      'deploy_dashboard',
      'discover_metrics',
      'generate_promql_queries',
      'validate_promql_query'
    ]);
    for (const tool of tools) {
      expect(typeof tool.title).toBe('string');
      expect(tool.inputSchema.type).toBe('object');
    }

    const validate = tools.find(tool => tool.name === 'validate_promql_query');
    expect(validate?.inputSchema.required).toEqual(['prometheus_url', 'query']);
  });

  test('validate_promql_query returns structured content', async () => {
    const result = await client.callTool({
      name: 'validate_promql_query',
      arguments: { prometheus_url: PROMETHEUS_URL, query: 'up' }
    });

    expect(field(result, 'isError')).toBeFalsy();
    expect(field(result, 'structuredContent')).toEqual({ prometheus_url: PROMETHEUS_URL, query: 'up', valid: true });
    expect(JSON.parse(firstText(result))).toEqual({ prometheus_url: PROMETHEUS_URL, query: 'up', valid: true });
  });

  test('generate_promql_queries uses the Prometheus gateway', async () => {
    const result = await client.callTool({
      name: 'generate_promql_queries',
      arguments: { prometheus_url: PROMETHEUS_URL, metric_names: ['queue_size'] }
    });

    const content = field(result, 'structuredContent');
    expect(content).toMatchObject({
      prometheus_url: PROMETHEUS_URL,
      results: [{
        metric_name: 'queue_size',
        metric_type: 'gauge',
        metric_help: 'Queue depth',
        suggestions: [
          { query: 'queue_size', description: 'Current value' },
          { query: 'avg_over_time(queue_size[1h])', description: 'Average over 1 hour' }
        ]
      }]
    });
  });

  test('handler errors come back as tool errors', async () => {
    const result = await client.callTool({
      name: 'create_dashboard',
      arguments: { dashboard_title: 'Ops', panels: [] }
    });

    expect(field(result, 'isError')).toBe(true);
    expect(firstText(result)).toBe("panels are required - provide either 'panels' array or 'metric_names' with 'prometheus_url'");
  });
});
