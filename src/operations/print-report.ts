import { NOT_MERGED, SEPARATOR } from '../constants';
import type { FilterCriteria, GroupedResult, PullRequest } from '../types';
import { formatDate } from '../utils/date-util';

export type LineWriter = (line: string) => void;

const plural = (count: number, singular: string, pluralForm = `${singular}s`) =>
  `${count} ${count === 1 ? singular : pluralForm}`;

const byCreation = (a: PullRequest, b: PullRequest) =>
  a.createdAt.getTime() - b.createdAt.getTime();

const formatHeader = (criteria: FilterCriteria) => {
  const label = criteria.label === undefined ? '' : ` | Label: ${criteria.label}`;
  return `GitHub PR stats for ${criteria.user} (${formatDate(criteria.from)} to ${formatDate(criteria.to)})${label}`;
};

const formatGroup = (repository: string, pullRequests: PullRequest[]) => {
  const lines = [
    `Repository: ${repository} (${pullRequests[0].repositoryUrl})`,
    `   Total PRs: ${pullRequests.length}`,
  ];
  // Array.prototype.sort is stable, so PRs created together keep fetch order.
  [...pullRequests].sort(byCreation).forEach((pr, index) => {
    lines.push(
      `   ${index + 1}. ${pr.title}`,
      `      Raised: ${formatDate(pr.createdAt)}`,
      `      Merged: ${pr.mergedAt ? formatDate(pr.mergedAt) : NOT_MERGED}`,
      `      PR: ${pr.url}`,
    );
  });
  return lines;
};

/**
 * Renders the report as lines of plain text, one block per repository in
 * the order of the grouped result.
 */
export const formatReport = (
  criteria: FilterCriteria,
  groups: GroupedResult,
): string[] => {
  if (groups.size === 0) {
    const label = criteria.label === undefined ? '' : ` with label "${criteria.label}"`;
    return [`No pull requests found for ${criteria.user} in the given range${label}.`];
  }

  const lines = [formatHeader(criteria), SEPARATOR];
  let total = 0;
  let merged = 0;
  for (const [repository, pullRequests] of groups) {
    lines.push(...formatGroup(repository, pullRequests), SEPARATOR);
    total += pullRequests.length;
    merged += pullRequests.filter((pr) => pr.mergedAt !== null).length;
  }
  lines.push(
    `Total: ${plural(total, 'pull request')} across ${plural(groups.size, 'repository', 'repositories')}, ${merged} merged`,
  );
  return lines;
};

export const printReport = (
  criteria: FilterCriteria,
  groups: GroupedResult,
  write: LineWriter = console.log,
) => {
  for (const line of formatReport(criteria, groups)) {
    write(line);
  }
};
