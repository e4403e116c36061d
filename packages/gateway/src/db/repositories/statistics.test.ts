import { describe, it, expect } from 'vitest';
import { FakeAdapter } from '../../test-helpers.js';
import { StatisticsRepository } from './statistics.js';

describe('StatisticsRepository', () => {
  it('maps the counter row, coercing BIGINT strings', async () => {
    const adapter = new FakeAdapter().on(/FROM node_counter/, [
      { totalcount: '1523', daycount: 12, timestamp: '1700000000' },
    ]);

    expect(await new StatisticsRepository(adapter).fetchView('42')).toEqual({
      totalCount: 1523,
      dayCount: 12,
      timestamp: 1700000000,
    });
    expect(adapter.calls[0]?.params).toEqual(['42']);
  });

  it('returns null when the node was never viewed', async () => {
    expect(await new StatisticsRepository(new FakeAdapter()).fetchView('42')).toBeNull();
  });

  it('detects the counter table', async () => {
    const installed = new FakeAdapter().on(/information_schema\.tables/, (params) =>
      params[0] === 'node_counter' ? [{ found: 1 }] : []
    );

    expect(await new StatisticsRepository(installed).isInstalled()).toBe(true);
    expect(await new StatisticsRepository(new FakeAdapter()).isInstalled()).toBe(false);
  });
});
