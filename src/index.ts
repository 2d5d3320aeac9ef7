export type { Comment, Dependency, DependencyType, Dependent, Issue } from './types/models';
export type { IssueNode, SortKey, SortPriority, TreeRow } from './types/graph';
export { SORT_PRIORITY, createNode } from './types/graph';
export type { KnownStatus } from './types/status';
export { KNOWN_STATUSES, canTransition, isKnownStatus, parseStatus } from './types/status';

export {
  CyclicDependencyError,
  InvalidStatusError,
  IssueForestError,
  IssueStoreError,
  NoIssuesError,
  codeOf,
  isCode,
} from './errors';
export type { ErrorCode } from './errors';

export type { IssueStoreConfig } from './config';
export { defaultConfig, loadConfig } from './config';

export {
  buildForest,
  compareSortKeys,
  nodeSelfSortKey,
  sortNodes,
} from './utils/forestBuilder';
export { DISTANT_FUTURE, parseRfc3339, pickTimestamp } from './utils/timestamps';
export type { ExpansionCheck } from './utils/treeRows';
export {
  ExpansionState,
  findNodeById,
  flattenForest,
  followNodeExpansion,
  hasMultipleParents,
  rowKey,
  treeRowKey,
} from './utils/treeRows';
export {
  STATUS_CATEGORY,
  countOpenBlockers,
  nodeStatusCategory,
  sortBlocked,
  sortBlockers,
  sortSubtasks,
} from './utils/relationshipSort';
export type { StatusCategory } from './utils/relationshipSort';
export { buildIssueDigest, computeDiffStats, formatDiffStats } from './utils/issueDigest';
export type { DiffStats, IssueDigest } from './utils/issueDigest';

export type { IssueStoreClient } from './api/client';
export { createIssueStoreClient } from './api/client';
export { loadForest, orderRootsByActivity } from './api/loadForest';
export type { LoadForestOptions } from './api/loadForest';
