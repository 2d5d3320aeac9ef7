import { describe, it, expect } from 'vitest';
import type { Issue } from '../types/models';
import { buildForest } from './forestBuilder';
import { buildIssueDigest, computeDiffStats, formatDiffStats } from './issueDigest';

const createIssue = (id: string, overrides: Partial<Issue> = {}): Issue => ({
  id,
  title: `Issue ${id}`,
  status: 'open',
  priority: 2,
  updated_at: '2024-01-01T00:00:00Z',
  ...overrides,
});

describe('issueDigest', () => {
  describe('buildIssueDigest', () => {
    it('fingerprints every reachable issue', () => {
      const roots = buildForest([
        createIssue('epic'),
        createIssue('task', { dependencies: [{ id: 'epic', dependency_type: 'parent-child' }] }),
      ]);
      const digest = buildIssueDigest(roots);

      expect([...digest.keys()].sort()).toEqual(['epic', 'task']);
      expect(digest.get('task')).toBe('Issue task|open|2|2024-01-01T00:00:00Z');
    });

    it('fills missing fields with defaults', () => {
      const digest = buildIssueDigest(buildForest([{ id: 'bare' }]));
      expect(digest.get('bare')).toBe('||0|');
    });
  });

  describe('computeDiffStats', () => {
    it('counts added, changed and removed issues', () => {
      const before = new Map([
        ['a', 'A|open|1|t1'],
        ['b', 'B|open|1|t1'],
        ['c', 'C|open|1|t1'],
      ]);
      const after = new Map([
        ['a', 'A|open|1|t1'],
        ['b', 'B|closed|1|t2'],
        ['d', 'D|open|1|t1'],
        ['e', 'E|open|1|t1'],
      ]);

      expect(computeDiffStats(before, after)).toEqual({ added: 2, changed: 1, removed: 1 });
    });

    it('treats a missing digest as empty', () => {
      expect(computeDiffStats(undefined, new Map([['a', 'x']]))).toEqual({ added: 1, changed: 0, removed: 0 });
    });
  });

  describe('formatDiffStats', () => {
    it('renders the summary line', () => {
      expect(formatDiffStats({ added: 2, changed: 1, removed: 0 })).toBe('+2 / Δ1 / -0');
    });
  });
});
