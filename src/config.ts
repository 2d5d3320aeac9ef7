/**
 * Issue store connection settings
 */
export interface IssueStoreConfig {
  baseURL: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Log load stages with console.debug */
  debug: boolean;
}

export const defaultConfig: IssueStoreConfig = {
  baseURL: 'http://localhost:3000/api',
  timeout: 30000,
  debug: false,
};

/**
 * Read settings from the environment, falling back to {@link defaultConfig}.
 *
 * - ISSUE_STORE_URL
 * - ISSUE_STORE_TIMEOUT_MS (positive integer)
 * - ISSUE_FOREST_DEBUG ("1" or "true")
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IssueStoreConfig {
  const baseURL = env.ISSUE_STORE_URL?.trim();
  const timeout = Number.parseInt(env.ISSUE_STORE_TIMEOUT_MS ?? '', 10);
  const debug = (env.ISSUE_FOREST_DEBUG ?? '').trim().toLowerCase();

  return {
    baseURL: baseURL ? baseURL : defaultConfig.baseURL,
    timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : defaultConfig.timeout,
    debug: debug === '1' || debug === 'true',
  };
}
