import type { IssueNode } from '../types/graph';
import { parseRfc3339 } from './timestamps';

/**
 * Status categories for relationship lists (lower = shown first)
 */
export const STATUS_CATEGORY = {
  IN_PROGRESS: 1,
  READY: 2,
  BLOCKED: 3,
  DEFERRED: 4,
  CLOSED: 5,
} as const;

export type StatusCategory = (typeof STATUS_CATEGORY)[keyof typeof STATUS_CATEGORY];

export function nodeStatusCategory(node: IssueNode): StatusCategory {
  switch (node.issue.status) {
    case 'in_progress':
      return STATUS_CATEGORY.IN_PROGRESS;
    case 'closed':
      return STATUS_CATEGORY.CLOSED;
    case 'blocked':
      return STATUS_CATEGORY.BLOCKED;
    case 'deferred':
      return STATUS_CATEGORY.DEFERRED;
    default:
      return node.isBlocked ? STATUS_CATEGORY.BLOCKED : STATUS_CATEGORY.READY;
  }
}

export function countOpenBlockers(node: IssueNode): number {
  return node.blockedBy.filter((b) => b.issue.status !== 'closed').length;
}

function priorityOf(node: IssueNode): number {
  return node.issue.priority ?? 0;
}

function compareIds(a: IssueNode, b: IssueNode): number {
  if (a.issue.id < b.issue.id) return -1;
  if (a.issue.id > b.issue.id) return 1;
  return 0;
}

/**
 * Most recently closed first; 0 when either side has no usable closed_at
 */
function compareClosedDesc(a: IssueNode, b: IssueNode): number {
  const closedA = parseRfc3339(a.issue.closed_at);
  const closedB = parseRfc3339(b.issue.closed_at);
  if (closedA === null || closedB === null) return 0;
  return closedB - closedA;
}

/**
 * Order a node's children for the detail pane:
 * in progress, then ready (those unblocking the most work first), then
 * blocked (fewest open blockers first), deferred, and closed (newest first).
 * Ties fall back to issue priority and ID.
 */
export function sortSubtasks(nodes: IssueNode[]): IssueNode[] {
  return [...nodes].sort((a, b) => {
    const catA = nodeStatusCategory(a);
    const catB = nodeStatusCategory(b);
    if (catA !== catB) return catA - catB;

    if (catA === STATUS_CATEGORY.READY && a.blocks.length !== b.blocks.length) {
      return b.blocks.length - a.blocks.length;
    }
    if (catA === STATUS_CATEGORY.BLOCKED) {
      const byBlockers = countOpenBlockers(a) - countOpenBlockers(b);
      if (byBlockers !== 0) return byBlockers;
    }
    if (catA === STATUS_CATEGORY.CLOSED) {
      const byClosed = compareClosedDesc(a, b);
      if (byClosed !== 0) return byClosed;
    }

    if (priorityOf(a) !== priorityOf(b)) return priorityOf(a) - priorityOf(b);
    return compareIds(a, b);
  });
}

/**
 * Order blockers so the ones that can be worked on now come first.
 * Closed blockers go last, newest first.
 */
export function sortBlockers(nodes: IssueNode[]): IssueNode[] {
  return [...nodes].sort((a, b) => {
    const closedA = a.issue.status === 'closed';
    const closedB = b.issue.status === 'closed';
    if (closedA !== closedB) return closedA ? 1 : -1;
    if (closedA && closedB) {
      const byClosed = compareClosedDesc(a, b);
      if (byClosed !== 0) return byClosed;
    }

    const byBlockers = countOpenBlockers(a) - countOpenBlockers(b);
    if (byBlockers !== 0) return byBlockers;

    const activeA = a.issue.status === 'in_progress';
    const activeB = b.issue.status === 'in_progress';
    if (activeA !== activeB) return activeA ? -1 : 1;

    if (priorityOf(a) !== priorityOf(b)) return priorityOf(a) - priorityOf(b);
    return compareIds(a, b);
  });
}

/**
 * Order the issues a node blocks: those closest to ready (fewest open
 * blockers) first
 */
export function sortBlocked(nodes: IssueNode[]): IssueNode[] {
  return [...nodes].sort((a, b) => {
    const byBlockers = countOpenBlockers(a) - countOpenBlockers(b);
    if (byBlockers !== 0) return byBlockers;
    if (priorityOf(a) !== priorityOf(b)) return priorityOf(a) - priorityOf(b);
    return compareIds(a, b);
  });
}
