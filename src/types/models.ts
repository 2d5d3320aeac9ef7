export type DependencyType = 'parent-child' | 'blocks' | 'related' | 'discovered-from';

export interface Comment {
  id: number;
  issue_id: string;
  author: string;
  text: string;
  created_at: string;
}

/**
 * Outgoing reference from an issue to another issue.
 * `dependency_type` stays a plain string: exports from newer stores may carry types we ignore.
 */
export interface Dependency {
  id: string;
  dependency_type: DependencyType | (string & {});
}

/**
 * Reverse reference: another issue that depends on this one
 */
export interface Dependent {
  id: string;
  dependency_type: DependencyType | (string & {});
}

/**
 * Issue record as produced by the store's export
 */
export interface Issue {
  id: string;
  title?: string;
  status?: string;
  issue_type?: string;
  /** 0 = most urgent */
  priority?: number;
  description?: string;
  design?: string;
  acceptance_criteria?: string;
  notes?: string;
  /** RFC3339 */
  created_at?: string;
  updated_at?: string;
  closed_at?: string;
  external_ref?: string;
  labels?: string[];
  comments?: Comment[];
  dependencies?: Dependency[];
  dependents?: Dependent[];
}
