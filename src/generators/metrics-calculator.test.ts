import { describe, it, expect } from 'vitest';
import { calculateStatistics } from './metrics-calculator.js';
import { makePullRequest, SAMPLE_PULL_REQUESTS } from '../test/fixtures.js';

describe('calculateStatistics', () => {
  it('counts states and sums line changes', () => {
    expect(calculateStatistics(SAMPLE_PULL_REQUESTS)).toEqual({
      total: 3,
      merged: 2,
      open: 1,
      closed: 0,
      additions: 15,
      deletions: 3,
      changed: 18,
    });
  });

  it('counts closed-unmerged pull requests separately', () => {
    const stats = calculateStatistics([
      makePullRequest({ state: 'CLOSED', additions: 4, deletions: 9 }),
    ]);

    expect(stats.closed).toBe(1);
    expect(stats.merged).toBe(0);
    expect(stats.changed).toBe(13);
  });

  it('returns zeros for no pull requests', () => {
    expect(calculateStatistics([])).toEqual({
      total: 0,
      merged: 0,
      open: 0,
      closed: 0,
      additions: 0,
      deletions: 0,
      changed: 0,
    });
  });
});
