import type { GroupedResult, PullRequest } from '../types';

/**
 * Groups pull requests by repository. Repositories keep the order in which
 * they were first seen, and each group keeps the input order.
 */
export const groupByRepository = (
  pullRequests: readonly PullRequest[],
): GroupedResult => {
  const groups: GroupedResult = new Map();
  for (const pr of pullRequests) {
    const group = groups.get(pr.repository);
    if (group) {
      group.push(pr);
    } else {
      groups.set(pr.repository, [pr]);
    }
  }
  return groups;
};
