import type { SearchParameters, SearchResponseData } from './types';

/**
 * The slice of the Octokit REST client the fetcher depends on.
 */
export interface SearchClient {
  search: {
    issuesAndPullRequests(
      params: SearchParameters,
    ): Promise<{ data: SearchResponseData }>;
  };
}

export interface ClientOptions {
  token?: string;
  baseUrl: string;
  userAgent: string;
}

export interface FetchOptions {
  perPage: number;
  maxPages: number;
}

export type CliOptions = {
  user?: string;
  start?: string;
  end?: string;
  label?: string;
  token?: string;
  config?: string;
  verbose?: boolean;
};
