import type { RestEndpointMethodTypes } from '@octokit/rest';

type SearchEndpoint = RestEndpointMethodTypes['search']['issuesAndPullRequests'];

export type SearchParameters = SearchEndpoint['parameters'];
export type SearchResponseData = SearchEndpoint['response']['data'];
export type SearchItem = SearchResponseData['items'][number];

export interface PullRequest {
  readonly id: number;
  readonly number: number;
  readonly title: string;
  /** Repository full name, `owner/name`. */
  readonly repository: string;
  readonly repositoryUrl: string;
  readonly createdAt: Date;
  readonly mergedAt: Date | null;
  readonly labels: readonly string[];
  readonly url: string;
}

export interface FilterCriteria {
  readonly user: string;
  /** Start of the first day, inclusive. */
  readonly from: Date;
  /** Last millisecond of the final day, inclusive. */
  readonly to: Date;
  readonly label?: string;
}

export type GroupedResult = Map<string, PullRequest[]>;
