import type { IssueNode } from '../types/graph';
import type { IssueStoreClient } from './client';
import { loadConfig } from '../config';
import { NoIssuesError } from '../errors';
import { buildForest } from '../utils/forestBuilder';

export interface LoadForestOptions {
  /** Defaults to ISSUE_FOREST_DEBUG */
  debug?: boolean;
}

function activityRank(node: IssueNode): number {
  if (node.hasInProgress) return 0;
  if (node.hasReady) return 1;
  return 2;
}

/**
 * Stable: active roots first, then roots with ready work, then the rest;
 * ties by raw created_at
 */
export function orderRootsByActivity(roots: IssueNode[]): IssueNode[] {
  return [...roots].sort((a, b) => {
    const byRank = activityRank(a) - activityRank(b);
    if (byRank !== 0) return byRank;
    const createdA = a.issue.created_at ?? '';
    const createdB = b.issue.created_at ?? '';
    if (createdA < createdB) return -1;
    if (createdA > createdB) return 1;
    return 0;
  });
}

/**
 * Export every issue from the store and build the forest
 * @throws {NoIssuesError} If the store has no issues
 * @throws {CyclicDependencyError} If the hierarchy has a cycle
 */
export async function loadForest(
  client: IssueStoreClient,
  options: LoadForestOptions = { debug: loadConfig().debug }
): Promise<IssueNode[]> {
  const log = (message: string) => {
    if (options.debug) console.debug(message);
  };

  log('Loading issues...');
  const issues = await client.exportIssues();
  if (issues.length === 0) {
    throw new NoIssuesError();
  }
  log(`Loaded ${issues.length} issues`);

  log('Building dependency graph...');
  let roots: IssueNode[];
  try {
    roots = buildForest(issues);
  } catch (err) {
    console.error('Failed to build issue forest:', err);
    throw err;
  }

  return orderRootsByActivity(roots);
}
