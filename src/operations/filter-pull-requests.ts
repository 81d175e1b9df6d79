import { LogLevel } from '../enums';
import type { FilterCriteria, PullRequest } from '../types';
import { labelExistsOnPR } from '../utils/label-utils';
import { log } from '../utils/log-util';

export const isCreatedInRange = (
  pr: Pick<PullRequest, 'createdAt'>,
  { from, to }: Pick<FilterCriteria, 'from' | 'to'>,
) => {
  const created = pr.createdAt.getTime();
  return created >= from.getTime() && created <= to.getTime();
};

/**
 * Keeps the pull requests created inside the criteria's range and, when a
 * label was requested, carrying that label. Order is preserved.
 */
export const filterPullRequests = (
  pullRequests: readonly PullRequest[],
  criteria: FilterCriteria,
): PullRequest[] => {
  const { label } = criteria;
  const kept = pullRequests.filter(
    (pr) =>
      isCreatedInRange(pr, criteria) &&
      (label === undefined || labelExistsOnPR(pr, label)),
  );

  log(
    'filterPullRequests',
    LogLevel.INFO,
    `Kept ${kept.length} of ${pullRequests.length} pull requests`,
  );
  return kept;
};
