import axios from 'axios';
import type { Comment, Issue } from '../types/models';
import type { IssueStoreConfig } from '../config';
import { loadConfig } from '../config';
import { IssueStoreError } from '../errors';

/**
 * Read side of the issue store
 */
export interface IssueStoreClient {
  /** Every issue with its dependencies and dependents */
  exportIssues(): Promise<Issue[]>;
  getIssue(id: string): Promise<Issue>;
  listComments(id: string): Promise<Comment[]>;
}

function toStoreError(err: unknown, what: string): IssueStoreError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = status ? `HTTP ${status}` : err.message;
    return new IssueStoreError(`${what}: ${detail}`, status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new IssueStoreError(`${what}: ${message}`, undefined, { cause: err });
}

export function createIssueStoreClient(config: IssueStoreConfig = loadConfig()): IssueStoreClient {
  const api = axios.create({
    baseURL: config.baseURL,
    timeout: config.timeout,
    headers: {
      'Content-Type': 'application/json',
    },
  });

  return {
    async exportIssues(): Promise<Issue[]> {
      try {
        const response = await api.get<Issue[] | null>('/export');
        return response.data ?? [];
      } catch (err) {
        throw toStoreError(err, 'export issues');
      }
    },

    async getIssue(id: string): Promise<Issue> {
      try {
        const response = await api.get<Issue>(`/issues/${encodeURIComponent(id)}`);
        return response.data;
      } catch (err) {
        throw toStoreError(err, `get issue ${id}`);
      }
    },

    async listComments(id: string): Promise<Comment[]> {
      try {
        const response = await api.get<Comment[] | null>(`/issues/${encodeURIComponent(id)}/comments`);
        return response.data ?? [];
      } catch (err) {
        throw toStoreError(err, `list comments for ${id}`);
      }
    },
  };
}
