import type { Issue } from '../types/models';
import type { IssueNode, SortKey } from '../types/graph';
import { SORT_PRIORITY, createNode } from '../types/graph';
import { CyclicDependencyError } from '../errors';
import { pickTimestamp } from './timestamps';

type NodeMap = Map<string, IssueNode>;

/**
 * Wrap every issue in a node, keyed by issue ID.
 * A later issue with a repeated ID replaces the earlier one.
 */
export function indexIssues(issues: Issue[]): NodeMap {
  const nodes: NodeMap = new Map();
  for (const issue of issues) {
    nodes.set(issue.id, createNode(issue));
  }
  return nodes;
}

/**
 * Resolve typed references into node pointers.
 *
 * - parent-child: target becomes a parent of the current node
 * - blocks: target blocks the current node (reciprocal `blocks` edge on the target)
 * - related: symmetric
 * - discovered-from: current node only
 *
 * Dependents are read for parent-child only (the parent's side of the same
 * relationship). References to unknown IDs are dropped.
 */
export function linkRelationships(nodes: NodeMap): void {
  for (const node of nodes.values()) {
    for (const dep of node.issue.dependencies ?? []) {
      const target = nodes.get(dep.id);
      if (!target) continue;

      switch (dep.dependency_type) {
        case 'parent-child':
          node.parents.push(target);
          break;
        case 'blocks':
          node.blockedBy.push(target);
          if (target.issue.status !== 'closed') {
            node.isBlocked = true;
          }
          target.blocks.push(node);
          break;
        case 'related':
          node.related.push(target);
          target.related.push(node);
          break;
        case 'discovered-from':
          node.discoveredFrom.push(target);
          break;
      }
    }

    for (const dependent of node.issue.dependents ?? []) {
      if (dependent.dependency_type !== 'parent-child') continue;
      const child = nodes.get(dependent.id);
      if (child) {
        child.parents.push(node);
      }
    }
  }
}

/**
 * Drop repeated parents (same relationship declared from both sides),
 * keeping first-occurrence order
 */
export function dedupeParents(nodes: NodeMap): void {
  for (const node of nodes.values()) {
    if (node.parents.length <= 1) continue;
    const seen = new Set<string>();
    node.parents = node.parents.filter((parent) => {
      if (seen.has(parent.issue.id)) return false;
      seen.add(parent.issue.id);
      return true;
    });
  }
}

/**
 * DFS over parent edges only.
 * @throws {CyclicDependencyError} with the IDs from the re-entered node
 *   through the node where re-entry was detected
 */
export function ensureAcyclic(nodes: NodeMap): void {
  const visited = new Set<string>();
  const onStack = new Set<string>();

  const visit = (node: IssueNode, stack: string[]): void => {
    const id = node.issue.id;
    if (onStack.has(id)) {
      const cycleStart = stack.indexOf(id);
      throw new CyclicDependencyError([...stack.slice(cycleStart), id]);
    }
    if (visited.has(id)) return;

    onStack.add(id);
    stack.push(id);
    for (const parent of node.parents) {
      visit(parent, stack);
    }
    stack.pop();
    onStack.delete(id);
    visited.add(id);
  };

  for (const node of nodes.values()) {
    visit(node, []);
  }
}

/**
 * Longest ancestor chain above a node (0 for roots).
 * `path` guards against cycles when called before {@link ensureAcyclic};
 * `memo` is only safe to share across calls once the graph is known acyclic.
 */
export function calculateTreeDepth(
  node: IssueNode,
  path: Set<string> = new Set(),
  memo?: Map<string, number>
): number {
  const id = node.issue.id;
  if (path.has(id)) return 0;
  const known = memo?.get(id);
  if (known !== undefined) return known;
  if (node.parents.length === 0) return 0;

  path.add(id);
  let maxDepth = 0;
  for (const parent of node.parents) {
    maxDepth = Math.max(maxDepth, calculateTreeDepth(parent, path, memo));
  }
  path.delete(id);

  const depth = maxDepth + 1;
  memo?.set(id, depth);
  return depth;
}

/**
 * Attach each node under every one of its parents and collect the roots.
 * Roots come back in input order; they are sorted later.
 */
export function assembleForest(nodes: NodeMap): IssueNode[] {
  const roots: IssueNode[] = [];

  for (const node of nodes.values()) {
    if (node.parents.length === 0) {
      roots.push(node);
      continue;
    }

    for (const parent of node.parents) {
      const alreadyChild = parent.children.some((c) => c.issue.id === node.issue.id);
      if (!alreadyChild) {
        parent.children.push(node);
      }
    }
    node.parent = node.parents[0] ?? null;
  }

  return roots;
}

/**
 * Order each node's `blocks` by the blocked issue's creation time
 */
export function sortBlocksByCreation(nodes: NodeMap): void {
  for (const node of nodes.values()) {
    node.blocks.sort((a, b) => compareStrings(a.issue.created_at ?? '', b.issue.created_at ?? ''));
  }
}

/**
 * Post-order: a node has in-progress (ready) work if it or any descendant does.
 * Nodes with in-progress work below them are expanded.
 */
export function computeStates(node: IssueNode): void {
  if (node.issue.status === 'in_progress') {
    node.hasInProgress = true;
  }
  if (node.issue.status === 'open' && !node.isBlocked) {
    node.hasReady = true;
  }

  for (const child of node.children) {
    child.depth = node.depth + 1;
    computeStates(child);
    if (child.hasInProgress) {
      node.hasInProgress = true;
      node.expanded = true;
    }
    if (child.hasReady) {
      node.hasReady = true;
    }
  }
}

/**
 * Sort key of the node on its own, ignoring descendants
 */
export function nodeSelfSortKey(node: IssueNode): SortKey {
  const { issue } = node;
  const status = (issue.status ?? '').trim().toLowerCase();

  switch (status) {
    case 'in_progress':
      return {
        priority: SORT_PRIORITY.IN_PROGRESS,
        timestamp: pickTimestamp(issue.updated_at, issue.created_at),
      };
    case 'closed':
      return {
        priority: SORT_PRIORITY.CLOSED,
        timestamp: pickTimestamp(issue.closed_at, issue.updated_at, issue.created_at),
      };
  }

  if (status === 'open' && !node.isBlocked) {
    return { priority: SORT_PRIORITY.READY, timestamp: pickTimestamp(issue.created_at) };
  }
  return { priority: SORT_PRIORITY.OPEN, timestamp: pickTimestamp(issue.created_at) };
}

/**
 * Bottom-up: a node's key is the most urgent of its own key and its
 * children's keys. Children are sorted once their keys are known.
 */
export function computeSortMetrics(node: IssueNode): SortKey {
  let best = nodeSelfSortKey(node);
  for (const child of node.children) {
    const childKey = computeSortMetrics(child);
    if (compareSortKeys(childKey, best) < 0) {
      best = childKey;
    }
  }

  node.sortPriority = best.priority;
  node.sortTimestamp = best.timestamp;
  sortNodes(node.children);
  return best;
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.timestamp - b.timestamp;
}

/**
 * Stable in-place sort: priority class, then timestamp, then issue ID
 */
export function sortNodes(nodes: IssueNode[]): void {
  nodes.sort((a, b) => {
    const byKey = compareSortKeys(
      { priority: a.sortPriority, timestamp: a.sortTimestamp },
      { priority: b.sortPriority, timestamp: b.sortTimestamp }
    );
    if (byKey !== 0) return byKey;
    return compareStrings(a.issue.id, b.issue.id);
  });
}

// Code-unit order, not locale order: IDs must sort the same everywhere
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build the display forest from a full issue snapshot.
 *
 * Steps: index, link, dedupe parents, reject cycles, tree depths, attach
 * children, order `blocks`, then per root propagate state and sort keys,
 * and finally sort the roots.
 *
 * @param issues - Every issue in the store; references outside this list are ignored
 * @returns Sorted root nodes
 * @throws {CyclicDependencyError} If the parent-child hierarchy has a cycle
 */
export function buildForest(issues: Issue[]): IssueNode[] {
  if (issues.length === 0) {
    return [];
  }

  const nodes = indexIssues(issues);
  linkRelationships(nodes);
  dedupeParents(nodes);
  ensureAcyclic(nodes);

  const depthMemo = new Map<string, number>();
  for (const node of nodes.values()) {
    node.treeDepth = calculateTreeDepth(node, new Set(), depthMemo);
  }

  const roots = assembleForest(nodes);
  sortBlocksByCreation(nodes);

  for (const root of roots) {
    computeStates(root);
    if (root.hasInProgress) {
      root.expanded = true;
    }
    computeSortMetrics(root);
  }
  sortNodes(roots);

  return roots;
}
