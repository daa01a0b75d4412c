import { DEFAULT_QUERY, getBestQuery } from '../../../src/services/promql/selector.js';

describe('getBestQuery', () => {
  test('falls back to up for an empty list', () => {
    expect(getBestQuery([])).toEqual({
      query: 'up',
      description: 'Default query',
      visualizationType: 'timeseries',
      yAxisLabel: 'value'
    });
    expect(getBestQuery([])).toBe(DEFAULT_QUERY);
  });

  test('picks the first suggestion', () => {
    const first = { query: 'a', description: 'A', visualizationType: 'stat' as const, yAxisLabel: 'x' };
    const second = { query: 'b', description: 'B', visualizationType: 'timeseries' as const, yAxisLabel: 'y' };
    expect(getBestQuery([first, second])).toBe(first);
  });
});
