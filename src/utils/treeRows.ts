import type { IssueNode, TreeRow } from '../types/graph';

/**
 * Decides whether a row's children are shown
 */
export type ExpansionCheck = (row: TreeRow) => boolean;

/**
 * Composite key for per-instance state of a node reached through a given parent.
 * Format: "parentID:nodeID", parent part empty for roots.
 */
export function treeRowKey(parentId: string, nodeId: string): string {
  return `${parentId}:${nodeId}`;
}

export function rowKey(row: TreeRow): string {
  return treeRowKey(row.parent?.issue.id ?? '', row.node.issue.id);
}

export function hasMultipleParents(row: TreeRow): boolean {
  return row.node.parents.length > 1;
}

/**
 * Expansion that follows the node's own `expanded` flag
 */
export const followNodeExpansion: ExpansionCheck = (row) =>
  row.node.expanded && row.node.children.length > 0;

/**
 * Flatten the forest into display rows, descending only into expanded rows.
 * A node with k parents yields one row under each expanded parent.
 */
export function flattenForest(
  roots: IssueNode[],
  isExpanded: ExpansionCheck = followNodeExpansion
): TreeRow[] {
  const rows: TreeRow[] = [];

  const traverse = (nodes: IssueNode[], parent: IssueNode | null, depth: number) => {
    for (const node of nodes) {
      const row: TreeRow = { node, parent, depth };
      rows.push(row);
      if (isExpanded(row)) {
        traverse(node.children, node, depth + 1);
      }
    }
  };

  traverse(roots, null, 0);
  return rows;
}

/**
 * Per-instance expansion for shared nodes.
 *
 * A node with several parents can be open under one parent and closed under
 * another. Rows without an override fall back to the node's `expanded` flag.
 */
export class ExpansionState {
  private readonly instances = new Map<string, boolean>();

  isExpanded(row: TreeRow): boolean {
    if (row.node.children.length === 0) return false;
    if (hasMultipleParents(row)) {
      const override = this.instances.get(rowKey(row));
      if (override !== undefined) return override;
    }
    return row.node.expanded;
  }

  expand(row: TreeRow): void {
    this.set(row, true);
  }

  collapse(row: TreeRow): void {
    this.set(row, false);
  }

  toggle(row: TreeRow): void {
    this.set(row, !this.isExpanded(row));
  }

  /** Bound check for {@link flattenForest} */
  readonly check: ExpansionCheck = (row) => this.isExpanded(row);

  private set(row: TreeRow, expanded: boolean): void {
    if (hasMultipleParents(row)) {
      this.instances.set(rowKey(row), expanded);
    } else {
      row.node.expanded = expanded;
    }
  }
}

/**
 * Depth-first lookup of a node anywhere in the forest
 */
export function findNodeById(roots: IssueNode[], id: string): IssueNode | null {
  const visited = new Set<string>();
  const stack = [...roots].reverse();

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || visited.has(node.issue.id)) continue;
    if (node.issue.id === id) return node;
    visited.add(node.issue.id);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return null;
}
