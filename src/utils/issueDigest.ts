import type { IssueNode } from '../types/graph';

/**
 * Issue ID → fingerprint of the fields a refresh cares about
 */
export type IssueDigest = Map<string, string>;

export interface DiffStats {
  added: number;
  changed: number;
  removed: number;
}

/**
 * Fingerprint every issue reachable from the roots
 */
export function buildIssueDigest(roots: IssueNode[]): IssueDigest {
  const digest: IssueDigest = new Map();

  const walk = (nodes: IssueNode[]) => {
    for (const node of nodes) {
      const { issue } = node;
      digest.set(
        issue.id,
        [issue.title ?? '', issue.status ?? '', issue.priority ?? 0, issue.updated_at ?? ''].join('|')
      );
      walk(node.children);
    }
  };

  walk(roots);
  return digest;
}

/**
 * Compare two digests taken before and after a refresh
 */
export function computeDiffStats(
  before: IssueDigest = new Map(),
  after: IssueDigest = new Map()
): DiffStats {
  const stats: DiffStats = { added: 0, changed: 0, removed: 0 };

  for (const [id, fingerprint] of before) {
    const next = after.get(id);
    if (next === undefined) {
      stats.removed++;
    } else if (next !== fingerprint) {
      stats.changed++;
    }
  }
  for (const id of after.keys()) {
    if (!before.has(id)) {
      stats.added++;
    }
  }

  return stats;
}

export function formatDiffStats(stats: DiffStats): string {
  return `+${stats.added} / Δ${stats.changed} / -${stats.removed}`;
}
