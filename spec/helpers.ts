import type { PullRequest } from '../src/types';

export const makePR = (overrides: Partial<PullRequest> = {}): PullRequest => ({
  id: 1,
  number: 1,
  title: 'Test PR',
  repository: 'acme/api',
  repositoryUrl: 'https://github.com/acme/api',
  createdAt: new Date('2025-01-15T12:00:00Z'),
  mergedAt: null,
  labels: [],
  url: 'https://github.com/acme/api/pull/1',
  ...overrides,
});
