import type { Issue } from './models';

/**
 * Sort priority classes (lower = more urgent)
 */
export const SORT_PRIORITY = {
  IN_PROGRESS: 1,
  READY: 2,
  OPEN: 3,
  CLOSED: 4,
} as const;

export type SortPriority = (typeof SORT_PRIORITY)[keyof typeof SORT_PRIORITY];

/**
 * Ordering key: priority class, then epoch milliseconds
 */
export interface SortKey {
  priority: SortPriority;
  timestamp: number;
}

/**
 * An issue inside the forest.
 *
 * Nodes are shared, never copied: a node with k parents is the same object
 * in each of those parents' `children`. Everything except `expanded` is
 * written once while the forest is built.
 */
export interface IssueNode {
  issue: Issue;
  children: IssueNode[];
  parents: IssueNode[];
  /** First entry of `parents`, for single-parent consumers */
  parent: IssueNode | null;

  blockedBy: IssueNode[];
  blocks: IssueNode[];
  related: IssueNode[];
  discoveredFrom: IssueNode[];

  /** At least one blocker is not closed */
  isBlocked: boolean;

  expanded: boolean;
  /** Depth within the traversal from the root that reached this node last */
  depth: number;
  /** Longest ancestor chain above this node */
  treeDepth: number;
  hasInProgress: boolean;
  hasReady: boolean;

  sortPriority: SortPriority;
  /** Epoch milliseconds */
  sortTimestamp: number;
}

/**
 * One display row: a node as reached through a specific parent (null for roots)
 */
export interface TreeRow {
  node: IssueNode;
  parent: IssueNode | null;
  depth: number;
}

/**
 * Wrap an issue in a fresh, unlinked node
 */
export function createNode(issue: Issue): IssueNode {
  return {
    issue,
    children: [],
    parents: [],
    parent: null,
    blockedBy: [],
    blocks: [],
    related: [],
    discoveredFrom: [],
    isBlocked: false,
    expanded: false,
    depth: 0,
    treeDepth: 0,
    hasInProgress: false,
    hasReady: false,
    sortPriority: SORT_PRIORITY.OPEN,
    sortTimestamp: 0,
  };
}
