import { describe, expect, it } from 'vitest';

import {
  filterPullRequests,
  isCreatedInRange,
} from '../src/operations/filter-pull-requests';
import { groupByRepository } from '../src/operations/group-pull-requests';
import type { FilterCriteria } from '../src/types';
import { makePR } from './helpers';

const january: FilterCriteria = {
  user: 'alice',
  from: new Date('2025-01-01T00:00:00.000Z'),
  to: new Date('2025-01-31T23:59:59.999Z'),
};

describe('isCreatedInRange()', () => {
  it('includes both ends of the range', () => {
    expect(
      isCreatedInRange({ createdAt: new Date('2025-01-01T00:00:00Z') }, january),
    ).toBe(true);
    expect(
      isCreatedInRange({ createdAt: new Date('2025-01-31T23:59:59Z') }, january),
    ).toBe(true);
  });

  it('excludes anything outside the range', () => {
    expect(
      isCreatedInRange({ createdAt: new Date('2024-12-31T23:59:59Z') }, january),
    ).toBe(false);
    expect(
      isCreatedInRange({ createdAt: new Date('2025-02-01T00:00:00Z') }, january),
    ).toBe(false);
  });
});

describe('filterPullRequests()', () => {
  const prs = [
    makePR({ id: 1, createdAt: new Date('2024-12-20T00:00:00Z'), labels: ['bug'] }),
    makePR({ id: 2, createdAt: new Date('2025-01-05T00:00:00Z'), labels: ['bug'] }),
    makePR({ id: 3, createdAt: new Date('2025-01-06T00:00:00Z'), labels: [] }),
    makePR({ id: 4, createdAt: new Date('2025-01-07T00:00:00Z'), labels: ['BUG', 'ui'] }),
    makePR({ id: 5, createdAt: new Date('2025-02-03T00:00:00Z'), labels: ['bug'] }),
  ];

  it('keeps the PRs created in range, in order', () => {
    expect(filterPullRequests(prs, january).map((pr) => pr.id)).toEqual([2, 3, 4]);
  });

  it('keeps only PRs carrying the requested label', () => {
    expect(
      filterPullRequests(prs, { ...january, label: 'bug' }).map((pr) => pr.id),
    ).toEqual([2, 4]);
  });

  it('returns nothing when no PR has the label', () => {
    expect(filterPullRequests(prs, { ...january, label: 'docs' })).toEqual([]);
  });
});

describe('groupByRepository()', () => {
  it('keeps first-seen repository order with contiguous groups', () => {
    const groups = groupByRepository([
      makePR({ id: 1, repository: 'acme/web' }),
      makePR({ id: 2, repository: 'acme/api' }),
      makePR({ id: 3, repository: 'acme/web' }),
      makePR({ id: 4, repository: 'alice/dotfiles' }),
      makePR({ id: 5, repository: 'acme/api' }),
    ]);

    expect([...groups.keys()]).toEqual(['acme/web', 'acme/api', 'alice/dotfiles']);
    expect(groups.get('acme/web')?.map((pr) => pr.id)).toEqual([1, 3]);
    expect(groups.get('acme/api')?.map((pr) => pr.id)).toEqual([2, 5]);
    expect(groups.get('alice/dotfiles')?.map((pr) => pr.id)).toEqual([4]);
  });

  it('returns an empty map for no pull requests', () => {
    expect(groupByRepository([]).size).toBe(0);
  });
});
