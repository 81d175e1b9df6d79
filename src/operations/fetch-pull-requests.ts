import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

import { LogLevel } from '../enums';
import {
  GitHubApiError,
  RateLimitError,
  UnknownUserError,
} from '../errors';
import type { ClientOptions, FetchOptions, SearchClient } from '../interfaces';
import type {
  FilterCriteria,
  PullRequest,
  SearchItem,
  SearchParameters,
  SearchResponseData,
} from '../types';
import { formatDate } from '../utils/date-util';
import { toLabelQualifier } from '../utils/label-utils';
import { log } from '../utils/log-util';

const REPOSITORY_API_PATH = /\/repos\/([^/]+\/[^/]+)\/?$/;
const PULL_PATH_SUFFIX = /\/pull\/\d+\/?$/;

export const createClient = (options: ClientOptions): SearchClient =>
  new Octokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    userAgent: options.userAgent,
  });

/**
 * Builds the issue search query for the criteria, e.g.
 * `author:alice type:pr created:2025-01-01..2025-01-31 label:"bug"`.
 */
export const buildSearchQuery = (criteria: FilterCriteria): string => {
  const qualifiers = [
    `author:${criteria.user}`,
    'type:pr',
    `created:${formatDate(criteria.from)}..${formatDate(criteria.to)}`,
  ];
  const labelQualifier =
    criteria.label === undefined ? undefined : toLabelQualifier(criteria.label);
  if (labelQualifier) qualifiers.push(labelQualifier);
  return qualifiers.join(' ');
};

/**
 * @returns `owner/name` from an API repository URL such as
 * `https://api.github.com/repos/owner/name`, or the URL itself if it has
 * another shape.
 */
export const repositoryFromApiUrl = (repositoryUrl: string): string => {
  const match = REPOSITORY_API_PATH.exec(repositoryUrl);
  return match ? match[1] : repositoryUrl;
};

/**
 * Converts a search item into a PullRequest. Items that are plain issues
 * come back as null.
 */
export const toPullRequest = (item: SearchItem): PullRequest | null => {
  if (!item.pull_request) return null;

  const mergedAt = item.pull_request.merged_at;
  return {
    id: item.id,
    number: item.number,
    title: item.title,
    repository: repositoryFromApiUrl(item.repository_url),
    repositoryUrl: item.html_url.replace(PULL_PATH_SUFFIX, ''),
    createdAt: new Date(item.created_at),
    mergedAt: mergedAt ? new Date(mergedAt) : null,
    labels: item.labels.flatMap((label) => (label.name ? [label.name] : [])),
    url: item.html_url,
  };
};

const apiMessage = (data: unknown): string | undefined => {
  if (
    typeof data === 'object' &&
    data !== null &&
    'message' in data &&
    typeof data.message === 'string'
  ) {
    return data.message;
  }
  return undefined;
};

/**
 * Translates an Octokit request failure into the error reported to the user.
 *
 * @param error - the failure raised by Octokit
 * @param user - the login that was searched for
 */
export const toGitHubApiError = (
  error: RequestError,
  user: string,
): GitHubApiError => {
  const details = {
    status: error.status,
    url: error.request.url,
    cause: error,
  };
  const { response } = error;

  if (!response) {
    return new GitHubApiError(`Could not reach GitHub: ${error.message}`, details);
  }

  const remaining = response.headers['x-ratelimit-remaining'];
  if (error.status === 429 || (error.status === 403 && String(remaining) === '0')) {
    const reset = Number(response.headers['x-ratelimit-reset']);
    const resetAt = Number.isFinite(reset) && reset > 0 ? new Date(reset * 1000) : undefined;
    return new RateLimitError(resetAt, details);
  }

  // The search API answers 422 when the author qualifier names no searchable
  // user, and for other invalid queries; GitHub's message tells them apart.
  if (error.status === 422) {
    return new UnknownUserError(user, details, apiMessage(response.data));
  }

  return new GitHubApiError(
    `GitHub API request failed (${error.status}): ${apiMessage(response.data) ?? error.message}`,
    details,
  );
};

const searchPage = async (
  client: SearchClient,
  params: SearchParameters,
  user: string,
): Promise<SearchResponseData> => {
  try {
    const { data } = await client.search.issuesAndPullRequests(params);
    return data;
  } catch (error) {
    if (error instanceof RequestError) {
      throw toGitHubApiError(error, user);
    }
    throw error;
  }
};

/**
 * Searches GitHub for the pull requests the user authored in the criteria's
 * date range, following result pages one at a time.
 *
 * @returns pull requests in the order GitHub returned them
 * @throws {@link GitHubApiError} when a search request fails
 */
export const fetchPullRequests = async (
  client: SearchClient,
  criteria: FilterCriteria,
  { perPage, maxPages }: FetchOptions,
): Promise<PullRequest[]> => {
  const q = buildSearchQuery(criteria);
  log('fetchPullRequests', LogLevel.INFO, `Fetching PRs for ${criteria.user}: ${q}`);

  const pullRequests: PullRequest[] = [];
  let seen = 0;
  let totalCount = 0;

  for (let page = 1; page <= maxPages; page += 1) {
    const data = await searchPage(client, { q, per_page: perPage, page }, criteria.user);
    totalCount = data.total_count;
    seen += data.items.length;

    if (data.incomplete_results) {
      log(
        'fetchPullRequests',
        LogLevel.WARN,
        `GitHub returned incomplete results for page ${page}`,
      );
    }

    for (const item of data.items) {
      const pr = toPullRequest(item);
      if (pr) pullRequests.push(pr);
    }

    log(
      'fetchPullRequests',
      LogLevel.INFO,
      `Got page ${page} (${seen}/${totalCount})`,
    );

    if (data.items.length < perPage || seen >= totalCount) break;
  }

  if (seen < totalCount) {
    log(
      'fetchPullRequests',
      LogLevel.WARN,
      `Only ${seen} of ${totalCount} results were fetched; narrow the date range to see the rest`,
    );
  }

  return pullRequests;
};
