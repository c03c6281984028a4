import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { GitHubService } from '../github.service';
import { DataSourceError } from '../errors';
import type { ContributionCollection, ContributionDay } from '../types';

const { graphqlMock, requestMock } = vi.hoisted(() => ({
  graphqlMock: vi.fn<(query: string, variables?: Record<string, unknown>) => Promise<unknown>>(),
  requestMock:
    vi.fn<
      (route: string, params?: Record<string, unknown>) => Promise<{ status: number; data: unknown }>
    >(),
}));

vi.mock('@octokit/graphql', () => ({ graphql: { defaults: () => graphqlMock } }));
vi.mock('@octokit/request', () => ({ request: { defaults: () => requestMock } }));

function collection(days: ContributionDay[]): ContributionCollection {
  const total = days.reduce((sum, d) => sum + d.contributionCount, 0);
  return {
    totalCommitContributions: total - 2,
    totalIssueContributions: 1,
    totalPullRequestContributions: 1,
    totalPullRequestReviewContributions: 0,
    contributionCalendar: {
      totalContributions: total,
      weeks: [{ contributionDays: days }],
    },
  };
}

// Answers each GraphQL query by its shape; calendars are handed out in call order
function mockGraphQL(years: number[], calendars: ContributionCollection[]) {
  const queue = [...calendars];
  graphqlMock.mockImplementation(async (query) => {
    if (query.includes('viewer')) {
      return { viewer: { login: 'testuser' } };
    }
    if (query.includes('contributionYears')) {
      return { user: { contributionsCollection: { contributionYears: years } } };
    }
    if (query.includes('contributionCalendar')) {
      return { user: { contributionsCollection: queue.shift() } };
    }
    return { user: userStatsUser };
  });
}

const activeWeek: ContributionDay[] = [
  // Sunday Jan 28
  { date: '2024-01-28', contributionCount: 5 },
  { date: '2024-01-29', contributionCount: 3 },
  { date: '2024-01-30', contributionCount: 7 },
  { date: '2024-01-31', contributionCount: 4 },
  { date: '2024-02-01', contributionCount: 2 },
  // Friday Feb 2 (yesterday)
  { date: '2024-02-02', contributionCount: 6 },
  // Saturday Feb 3 (today)
  { date: '2024-02-03', contributionCount: 8 },
];

const userStatsUser = {
  name: null,
  login: 'testuser',
  createdAt: '2022-01-27T13:58:24Z',
  followers: { totalCount: 42 },
  following: { totalCount: 7 },
  repositories: {
    totalCount: 3,
    totalDiskUsage: 2048,
    nodes: [
      {
        licenseInfo: { spdxId: 'MIT' },
        releases: { totalCount: 2 },
        stargazerCount: 10,
        forkCount: 1,
        watchers: { totalCount: 3 },
      },
      {
        licenseInfo: null,
        releases: { totalCount: 0 },
        stargazerCount: 5,
        forkCount: 0,
        watchers: { totalCount: 1 },
      },
      {
        licenseInfo: { spdxId: 'MIT' },
        releases: { totalCount: 1 },
        stargazerCount: 0,
        forkCount: 2,
        watchers: { totalCount: 1 },
      },
    ],
  },
  packages: { totalCount: 0 },
  organizations: { totalCount: 2 },
  sponsoring: { totalCount: 0 },
  sponsors: { totalCount: 1 },
  starredRepositories: { totalCount: 30 },
  watching: { totalCount: 4 },
  issues: { totalCount: 12 },
  pullRequests: { totalCount: 20 },
  repositoriesContributedTo: { totalCount: 6 },
};

describe('GitHubService', () => {
  let service: GitHubService;
  let warn: MockInstance<typeof console.warn>;
  let error: MockInstance<typeof console.error>;
  const today = new Date(2024, 1, 3, 12);

  beforeEach(() => {
    graphqlMock.mockReset();
    requestMock.mockReset();
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
    service = new GitHubService('test-token');
  });

  afterEach(() => {
    warn.mockRestore();
    error.mockRestore();
  });

  test('should calculate current streak correctly with active streak', async () => {
    mockGraphQL([2024], [collection(activeWeek)]);

    const activity = await service.getActivity('testuser', today);

    expect(activity).toEqual({
      totalContributions: 35,
      totalCommits: 33,
      totalPRs: 1,
      totalPRReviews: 0,
      totalIssues: 1,
      currentStreak: 7,
      longestStreak: { start: '2024-01-28', end: '2024-02-03', length: 7 },
      bestDay: { date: '2024-02-03', count: 8 },
      averagePerDay: 5,
      observationStart: '2024-01-01',
    });
  });

  test('should handle break in streak', async () => {
    const brokenStreak = activeWeek.map((day) =>
      day.date === '2024-01-31' ? { ...day, contributionCount: 0 } : day
    );
    mockGraphQL([2024], [collection(brokenStreak)]);

    const activity = await service.getActivity('testuser', today);

    // Current streak should be 3 (Feb 1-3)
    expect(activity.currentStreak).toBe(3);
    // Jan 28-30 is as long and came first
    expect(activity.longestStreak).toEqual({ start: '2024-01-28', end: '2024-01-30', length: 3 });
  });

  test('should query each year with its date range', async () => {
    mockGraphQL([2024, 2023], [collection([]), collection(activeWeek)]);

    await service.getActivity('testuser', today);

    const calendarCalls = graphqlMock.mock.calls.filter(([query]) =>
      query.includes('contributionCalendar')
    );
    expect(calendarCalls.map(([, variables]) => variables)).toEqual([
      {
        username: 'testuser',
        from: '2023-01-01T00:00:00.000Z',
        to: '2023-12-31T23:59:59.000Z',
      },
      {
        username: 'testuser',
        from: '2024-01-01T00:00:00.000Z',
        to: '2024-02-03T23:59:59.000Z',
      },
    ]);
  });

  test('should keep going when token validation fails', async () => {
    mockGraphQL([2024], [collection(activeWeek)]);
    const answer = graphqlMock.getMockImplementation();
    graphqlMock.mockImplementation(async (query, variables) => {
      if (query.includes('viewer')) {
        throw new Error('Bad credentials');
      }
      return answer?.(query, variables);
    });

    const activity = await service.getActivity('testuser', today);

    expect(activity.currentStreak).toBe(7);
    expect(warn).toHaveBeenCalledWith(
      '⚠️ Token validation failed. Some contributions might not be visible.'
    );
  });

  test('should wrap upstream failures in a DataSourceError', async () => {
    graphqlMock.mockImplementation(async (query) => {
      if (query.includes('viewer')) {
        return { viewer: { login: 'testuser' } };
      }
      throw new Error('Bad gateway');
    });

    const result = service.getActivity('testuser', today);

    await expect(result).rejects.toBeInstanceOf(DataSourceError);
    await expect(result).rejects.toThrow('getContributionYears() failed: Bad gateway');
    expect(error).not.toHaveBeenCalled();
  });

  test('should summarize user stats', async () => {
    mockGraphQL([], []);

    const stats = await service.getUserStats('testuser');

    expect(stats).toEqual({
      name: 'testuser',
      login: 'testuser',
      createdAt: '2022-01-27T13:58:24Z',
      followers: 42,
      following: 7,
      repositories: 3,
      diskUsageMb: 2,
      preferredLicense: 'MIT',
      releases: 3,
      packages: 0,
      organizations: 2,
      sponsoring: 0,
      sponsors: 1,
      starred: 30,
      watching: 4,
      issuesOpened: 12,
      pullRequests: 20,
      contributedTo: 6,
      stargazers: 15,
      forkers: 3,
      watchers: 5,
    });
  });

  test('should sum lines of code over owned repositories', async () => {
    const owner = { login: 'testuser' };
    requestMock.mockImplementation(async (route, params) => {
      if (route === 'GET /user/repos') {
        return {
          status: 200,
          data: [
            { name: 'api', private: false, fork: false, owner },
            { name: 'forked', private: false, fork: true, owner },
            { name: 'fresh', private: true, fork: false, owner },
            { name: 'broken', private: false, fork: false, owner },
          ],
        };
      }
      if (params?.repo === 'api') {
        return {
          status: 200,
          data: [
            { author: { login: 'testuser' }, weeks: [{ a: 10, d: 2 }, { a: 5, d: 1 }] },
            { author: { login: 'someone-else' }, weeks: [{ a: 100, d: 100 }] },
          ],
        };
      }
      if (params?.repo === 'fresh') {
        return { status: 202, data: {} };
      }
      throw new Error('Not Found');
    });

    const lines = await service.getLinesOfCode('testuser');

    expect(lines).toEqual({
      additions: 15,
      deletions: 3,
      repositories: [
        { name: 'api', isPrivate: false, additions: 15, deletions: 3, status: 'ok' },
        { name: 'fresh', isPrivate: true, additions: 0, deletions: 0, status: 'computing' },
        { name: 'broken', isPrivate: false, additions: 0, deletions: 0, status: 'error' },
      ],
    });
    expect(requestMock).not.toHaveBeenCalledWith(
      'GET /repos/{owner}/{repo}/stats/contributors',
      expect.objectContaining({ repo: 'forked' })
    );
  });

  test('should list only public repositories when private ones are excluded', async () => {
    service = new GitHubService('test-token', { includePrivateRepos: false });
    requestMock.mockResolvedValue({ status: 200, data: [] });

    const lines = await service.getLinesOfCode('testuser');

    expect(lines).toEqual({ additions: 0, deletions: 0, repositories: [] });
    expect(requestMock).toHaveBeenCalledWith('GET /users/{username}/repos', {
      username: 'testuser',
      per_page: 100,
      type: 'owner',
    });
  });

  test('should return zero lines of code when repositories cannot be listed', async () => {
    requestMock.mockRejectedValue(new Error('Requires authentication'));

    const lines = await service.getLinesOfCode('testuser');

    expect(lines).toEqual({ additions: 0, deletions: 0, repositories: [] });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('should count queries per service instance', async () => {
    mockGraphQL([2023, 2024], [collection([]), collection(activeWeek)]);
    requestMock.mockResolvedValue({ status: 200, data: [] });

    const profile = await service.getProfile('testuser', today);

    expect(profile.queries).toEqual({
      viewer: 1,
      userStats: 1,
      contributionYears: 1,
      contributionCalendar: 2,
      linesOfCode: 1,
    });
    expect(profile.activity.observationStart).toBe('2023-01-01');
    expect(new GitHubService('test-token').getQueryCounts().contributionCalendar).toBe(0);
  });
});
