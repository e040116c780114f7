import { describe, it, expect } from 'vitest';
import { renderText, renderMarkdown, renderJson, renderReport } from './report-generator.js';
import { buildReport } from './report-builder.js';
import { calculateStatistics } from './metrics-calculator.js';
import { resolveTimeWindow } from '../orchestrator/time-range.js';
import { parseJsonReport } from '../validators.js';
import { makePullRequest, SAMPLE_PULL_REQUESTS } from '../test/fixtures.js';
import type { GroupingMode } from '../types/pull-request.js';

describe('report-generator', () => {
  const window = resolveTimeWindow('custom', { start: '2025-01-01', end: '2025-01-31' });

  const build = (grouping: GroupingMode, includeStatistics = true) =>
    buildReport({ window, pullRequests: SAMPLE_PULL_REQUESTS, grouping, includeStatistics });

  describe('renderText', () => {
    it('renders headers, statistics and one line per pull request', () => {
      const lines = renderText(build('by-repository')).split('\n');

      expect(lines).toEqual([
        '='.repeat(90),
        'WORK SUMMARY: 2025-01-01 to 2025-01-31',
        '='.repeat(90),
        'Period: 2025-01-01 00:00 to 2025-02-01 00:00',
        '',
        'STATISTICS',
        '-'.repeat(90),
        'Total PRs:          3',
        '  Merged:           2',
        '  Open:             1',
        '  Closed:           0',
        'Lines added:        15',
        'Lines deleted:      3',
        'Total changes:      18',
        '',
        'PULL REQUESTS',
        '-'.repeat(90),
        '',
        '### org/alpha',
        '✓ org/alpha#3 - Fix [flaky] test | 2025-01-18 | +5 -1 | MERGED | https://github.com/org/alpha/pull/3',
        '○ org/alpha#4 - Draft: new API | 2025-01-18 | +0 -0 | OPEN | https://github.com/org/alpha/pull/4',
        '',
        '### org/beta',
        '✓ org/beta#7 - Add cache layer | 2025-01-20 | +10 -2 | MERGED | https://github.com/org/beta/pull/7',
        '='.repeat(90),
      ]);
    });

    it('omits the group header and statistics for an ungrouped report without stats', () => {
      const lines = renderText(build('none', false)).split('\n');

      expect(lines).not.toContain('STATISTICS');
      expect(lines).not.toContain('### all');
      expect(lines.slice(7, 10)).toEqual([
        '✓ org/beta#7 - Add cache layer | 2025-01-20 | +10 -2 | MERGED | https://github.com/org/beta/pull/7',
        '✓ org/alpha#3 - Fix [flaky] test | 2025-01-18 | +5 -1 | MERGED | https://github.com/org/alpha/pull/3',
        '○ org/alpha#4 - Draft: new API | 2025-01-18 | +0 -0 | OPEN | https://github.com/org/alpha/pull/4',
      ]);
    });

    it('marks closed pull requests with a cross', () => {
      const report = buildReport({
        window,
        pullRequests: [makePullRequest({ state: 'CLOSED', number: 9 })],
        grouping: 'none',
        includeStatistics: false,
      });

      expect(renderText(report).split('\n')).toContain(
        '✗ org/alpha#9 - Example change | 2025-01-15 | +0 -0 | CLOSED | https://github.com/org/alpha/pull/1'
      );
    });

    it('uses thousands separators in statistics', () => {
      const report = buildReport({
        window,
        pullRequests: [makePullRequest({ additions: 12345, deletions: 2000 })],
        grouping: 'none',
        includeStatistics: true,
      });
      const lines = renderText(report).split('\n');

      expect(lines).toContain('Lines added:        12,345');
      expect(lines).toContain('Total changes:      14,345');
    });

    it('says so when there are no pull requests', () => {
      const report = buildReport({
        window,
        pullRequests: [],
        grouping: 'by-repository',
        includeStatistics: false,
      });

      expect(renderText(report).split('\n')).toContain('No pull requests found for this period.');
    });
  });

  describe('renderMarkdown', () => {
    it('renders group headings and linked titles', () => {
      const lines = renderMarkdown(build('by-repository')).split('\n');

      expect(lines[0]).toBe('# Work Summary: 2025-01-01 to 2025-01-31');
      expect(lines[2]).toBe('**Period:** 2025-01-01 00:00 to 2025-02-01 00:00');
      expect(lines).toContain('### org/alpha');
      expect(lines).toContain('### org/beta');
      expect(lines).toContain(
        '- 🟢 [Fix \\[flaky\\] test](https://github.com/org/alpha/pull/3) (org/alpha#3)'
      );
      expect(lines).toContain(
        '- 🔵 [Draft: new API](https://github.com/org/alpha/pull/4) (org/alpha#4)'
      );
      expect(lines.indexOf('### org/alpha')).toBeLessThan(lines.indexOf('### org/beta'));
    });

    it('renders statistics as a list', () => {
      const lines = renderMarkdown(build('none')).split('\n');

      expect(lines.slice(4, 14)).toEqual([
        '## Statistics',
        '',
        '- **Total PRs:** 3',
        '  - Merged: 2',
        '  - Open: 1',
        '  - Closed: 0',
        '- **Lines added:** 15',
        '- **Lines deleted:** 3',
        '- **Total changes:** 18',
        '',
      ]);
    });

    it('renders detail sub-items for each pull request', () => {
      const lines = renderMarkdown(build('by-date', false)).split('\n');
      const item = lines.indexOf(
        '- 🟢 [Add cache layer](https://github.com/org/beta/pull/7) (org/beta#7)'
      );

      expect(lines.slice(item + 1, item + 4)).toEqual([
        '  - Date: 2025-01-20',
        '  - Changes: +10 -2',
        '  - Status: MERGED',
      ]);
      expect(lines).toContain('### 2025-01-20');
    });

    it('encodes parentheses in link targets', () => {
      const report = buildReport({
        window,
        pullRequests: [makePullRequest({ url: 'https://example.test/pull/(1)', state: 'CLOSED' })],
        grouping: 'none',
        includeStatistics: false,
      });

      expect(renderMarkdown(report).split('\n')).toContain(
        '- 🔴 [Example change](https://example.test/pull/%281%29) (org/alpha#1)'
      );
    });
  });

  describe('renderJson', () => {
    it('round-trips group keys, records and statistics', () => {
      const report = build('by-repository');
      const parsed = parseJsonReport(renderJson(report));

      expect(parsed.period).toBe('2025-01-01 to 2025-01-31');
      expect(parsed.window).toEqual({
        start: '2025-01-01T00:00:00.000Z',
        end: '2025-02-01T00:00:00.000Z',
      });
      expect(parsed.grouping).toBe('by-repository');
      expect(parsed.groups.map((g) => g.key)).toEqual(['org/alpha', 'org/beta']);
      expect(parsed.groups.flatMap((g) => g.pullRequests)).toEqual(
        report.groups.flatMap((g) => g.pullRequests)
      );
      expect(parsed.statistics).toEqual(calculateStatistics(SAMPLE_PULL_REQUESTS));
    });

    it('keeps every optional record field', () => {
      const parsed = parseJsonReport(renderJson(build('none', false)));

      expect(parsed.groups[0]?.pullRequests[0]).toEqual({
        repository: 'org/beta',
        number: 7,
        title: 'Add cache layer',
        url: 'https://github.com/org/beta/pull/7',
        state: 'MERGED',
        createdAt: '2025-01-20T09:00:00Z',
        updatedAt: '2025-01-21T10:00:00Z',
        mergedAt: '2025-01-21T10:00:00Z',
        closedAt: '2025-01-21T10:00:00Z',
        additions: 10,
        deletions: 2,
        isPrivate: false,
      });
      expect(parsed.statistics).toBeUndefined();
    });

    it('names the user first when the report has one', () => {
      const report = buildReport({
        user: 'octo',
        window,
        pullRequests: SAMPLE_PULL_REQUESTS,
        grouping: 'none',
        includeStatistics: false,
      });

      const json = renderJson(report);

      expect(json.split('\n')[1]).toBe('  "user": "octo",');
      expect(parseJsonReport(json).user).toBe('octo');
    });

    it('leaves the user out when the report has none', () => {
      expect(parseJsonReport(renderJson(build('none'))).user).toBeUndefined();
    });

    it('rejects documents with the wrong shape', () => {
      expect(() => parseJsonReport('{"period": "Today"}')).toThrow();
    });
  });

  describe('renderReport', () => {
    it('renders the same records and statistics in every format', () => {
      const report = build('none');
      const text = renderReport(report, 'text');
      const markdown = renderReport(report, 'markdown');
      const json = parseJsonReport(renderReport(report, 'json'));

      for (const pr of SAMPLE_PULL_REQUESTS) {
        const ref = `${pr.repository}#${pr.number}`;
        expect(text.split('\n').filter((l) => l.includes(ref))).toHaveLength(1);
        expect(markdown.split('\n').filter((l) => l.includes(ref))).toHaveLength(1);
      }
      expect(json.groups[0]?.pullRequests.map((pr) => pr.url)).toEqual(
        SAMPLE_PULL_REQUESTS.map((pr) => pr.url)
      );

      expect(text).toContain('Total changes:      18');
      expect(markdown).toContain('- **Total changes:** 18');
      expect(json.statistics?.changed).toBe(18);
    });
  });
});
