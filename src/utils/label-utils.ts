import type { PullRequest } from '../types';

// GitHub matches label names without regard to case.
export const normalizeLabel = (name: string) => name.trim().toLowerCase();

export const labelExistsOnPR = (
  pr: Pick<PullRequest, 'labels'>,
  labelName: string,
) => {
  const wanted = normalizeLabel(labelName);
  return pr.labels.some((label) => normalizeLabel(label) === wanted);
};

/**
 * Builds the search qualifier for a label. Quoting keeps names with spaces
 * intact. A double quote cannot be escaped inside a qualifier, so such labels
 * get no qualifier and are matched client-side only.
 */
export const toLabelQualifier = (labelName: string): string | undefined => {
  const name = labelName.trim();
  return name.includes('"') ? undefined : `label:"${name}"`;
};
