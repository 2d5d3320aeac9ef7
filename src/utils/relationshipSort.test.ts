import { describe, it, expect } from 'vitest';
import type { Issue } from '../types/models';
import type { IssueNode } from '../types/graph';
import { createNode } from '../types/graph';
import {
  STATUS_CATEGORY,
  countOpenBlockers,
  nodeStatusCategory,
  sortBlocked,
  sortBlockers,
  sortSubtasks,
} from './relationshipSort';

const createTestNode = (id: string, overrides: Partial<Issue> = {}): IssueNode =>
  createNode({ id, title: `Issue ${id}`, status: 'open', priority: 2, ...overrides });

const blockWith = (node: IssueNode, ...blockers: IssueNode[]): IssueNode => {
  for (const blocker of blockers) {
    node.blockedBy.push(blocker);
    blocker.blocks.push(node);
    if (blocker.issue.status !== 'closed') node.isBlocked = true;
  }
  return node;
};

const ids = (nodes: IssueNode[]) => nodes.map((n) => n.issue.id);

describe('relationshipSort', () => {
  describe('nodeStatusCategory', () => {
    it('maps statuses to categories', () => {
      expect(nodeStatusCategory(createTestNode('a', { status: 'in_progress' }))).toBe(STATUS_CATEGORY.IN_PROGRESS);
      expect(nodeStatusCategory(createTestNode('b', { status: 'closed' }))).toBe(STATUS_CATEGORY.CLOSED);
      expect(nodeStatusCategory(createTestNode('c', { status: 'blocked' }))).toBe(STATUS_CATEGORY.BLOCKED);
      expect(nodeStatusCategory(createTestNode('d', { status: 'deferred' }))).toBe(STATUS_CATEGORY.DEFERRED);
      expect(nodeStatusCategory(createTestNode('e'))).toBe(STATUS_CATEGORY.READY);
    });

    it('treats open issues with open blockers as blocked', () => {
      const node = blockWith(createTestNode('a'), createTestNode('gate'));
      expect(nodeStatusCategory(node)).toBe(STATUS_CATEGORY.BLOCKED);
    });
  });

  describe('countOpenBlockers', () => {
    it('ignores closed blockers', () => {
      const node = blockWith(
        createTestNode('a'),
        createTestNode('open-1'),
        createTestNode('done', { status: 'closed' }),
        createTestNode('open-2', { status: 'in_progress' })
      );
      expect(countOpenBlockers(node)).toBe(2);
    });
  });

  describe('sortSubtasks', () => {
    it('orders by status category first', () => {
      const nodes = [
        createTestNode('closed', { status: 'closed' }),
        createTestNode('deferred', { status: 'deferred' }),
        createTestNode('ready'),
        createTestNode('active', { status: 'in_progress' }),
        createTestNode('blocked', { status: 'blocked' }),
      ];
      expect(ids(sortSubtasks(nodes))).toEqual(['active', 'ready', 'blocked', 'deferred', 'closed']);
    });

    it('puts ready issues that unblock more work first', () => {
      const unblocksTwo = createTestNode('z-unblocks-two');
      const unblocksNone = createTestNode('a-unblocks-none');
      blockWith(createTestNode('x'), unblocksTwo);
      blockWith(createTestNode('y'), unblocksTwo);

      expect(ids(sortSubtasks([unblocksNone, unblocksTwo]))).toEqual(['z-unblocks-two', 'a-unblocks-none']);
    });

    it('puts blocked issues closest to ready first', () => {
      const twoBlockers = blockWith(createTestNode('a'), createTestNode('g1'), createTestNode('g2'));
      const oneBlocker = blockWith(createTestNode('b'), createTestNode('g3'));

      expect(ids(sortSubtasks([twoBlockers, oneBlocker]))).toEqual(['b', 'a']);
    });

    it('puts the most recently closed first', () => {
      const older = createTestNode('a', { status: 'closed', closed_at: '2024-01-01T00:00:00Z' });
      const newer = createTestNode('b', { status: 'closed', closed_at: '2024-03-01T00:00:00Z' });

      expect(ids(sortSubtasks([older, newer]))).toEqual(['b', 'a']);
    });

    it('falls back to priority, then ID', () => {
      const nodes = [
        createTestNode('c', { priority: 1 }),
        createTestNode('b', { priority: 0 }),
        createTestNode('a', { priority: 1 }),
      ];
      expect(ids(sortSubtasks(nodes))).toEqual(['b', 'a', 'c']);
    });

    it('does not mutate its input', () => {
      const nodes = [createTestNode('b'), createTestNode('a')];
      sortSubtasks(nodes);
      expect(ids(nodes)).toEqual(['b', 'a']);
    });
  });

  describe('sortBlockers', () => {
    it('puts closed blockers last, newest first', () => {
      const nodes = [
        createTestNode('old', { status: 'closed', closed_at: '2024-01-01T00:00:00Z' }),
        createTestNode('new', { status: 'closed', closed_at: '2024-02-01T00:00:00Z' }),
        createTestNode('open'),
      ];
      expect(ids(sortBlockers(nodes))).toEqual(['open', 'new', 'old']);
    });

    it('puts workable blockers before blocked ones', () => {
      const stuck = blockWith(createTestNode('a'), createTestNode('deep'));
      const free = createTestNode('b');
      expect(ids(sortBlockers([stuck, free]))).toEqual(['b', 'a']);
    });

    it('puts in-progress blockers before open ones', () => {
      const nodes = [createTestNode('a', { priority: 0 }), createTestNode('b', { status: 'in_progress', priority: 3 })];
      expect(ids(sortBlockers(nodes))).toEqual(['b', 'a']);
    });
  });

  describe('sortBlocked', () => {
    it('puts issues that become ready soonest first', () => {
      const gate = createTestNode('gate');
      const lastBlocker = blockWith(createTestNode('b'), gate);
      const twoBlockers = blockWith(createTestNode('a'), gate, createTestNode('other'));

      expect(ids(sortBlocked([twoBlockers, lastBlocker]))).toEqual(['b', 'a']);
    });

    it('falls back to priority', () => {
      const nodes = [createTestNode('a', { priority: 3 }), createTestNode('b', { priority: 1 })];
      expect(ids(sortBlocked(nodes))).toEqual(['b', 'a']);
    });
  });
});
