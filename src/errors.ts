export type ErrorCode =
  | 'cyclic_dependency'
  | 'invalid_status'
  | 'no_issues'
  | 'store_request_failed';

/**
 * Base class for errors raised by this package. `code` is stable and meant for
 * callers to branch on; `message` is for people.
 */
export class IssueForestError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IssueForestError';
  }
}

/**
 * The parent-child hierarchy contains a cycle. No forest can be built.
 *
 * @example
 * ```typescript
 * try {
 *   buildForest(issues);
 * } catch (e) {
 *   if (e instanceof CyclicDependencyError) {
 *     console.error(e.path); // ['a', 'b', 'a']
 *   }
 * }
 * ```
 */
export class CyclicDependencyError extends IssueForestError {
  /**
   * @param path - Issue IDs from the node where the walk re-entered the cycle
   *   through the node where the re-entry was detected
   */
  constructor(public readonly path: string[]) {
    super('cyclic_dependency', `cyclic dependency detected: [${path.join(' ')}]`);
    this.name = 'CyclicDependencyError';
  }
}

export class InvalidStatusError extends IssueForestError {
  constructor(public readonly raw: string) {
    super('invalid_status', `invalid status: ${raw.trim() === '' ? 'blank' : raw}`);
    this.name = 'InvalidStatusError';
  }
}

export class NoIssuesError extends IssueForestError {
  constructor() {
    super('no_issues', 'no issues found in issue store');
    this.name = 'NoIssuesError';
  }
}

export class IssueStoreError extends IssueForestError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('store_request_failed', message, options);
    this.name = 'IssueStoreError';
  }
}

/**
 * Code of a thrown value, or 'unknown' when it did not come from this package
 */
export function codeOf(err: unknown): ErrorCode | 'unknown' {
  return err instanceof IssueForestError ? err.code : 'unknown';
}

export function isCode(err: unknown, code: ErrorCode): boolean {
  return codeOf(err) === code;
}
