import { graphql } from '@octokit/graphql';
import { request } from '@octokit/request';
import { ActivityService } from './activity.service';
import { DataSourceError } from './errors';
import type {
  ActivitySummary,
  ContributionResponse,
  ContributionYearsResponse,
  ContributorStats,
  LinesOfCode,
  ProfileSummary,
  QueryCounts,
  QueryKind,
  RepositoryLines,
  RepositoryListing,
  UserStats,
  UserStatsResponse,
  YearContributions,
} from './types';

export interface GitHubServiceOptions {
  includePrivateRepos?: boolean;
}

export class GitHubService {
  private graphql;
  private request;
  private readonly includePrivateRepos: boolean;
  private readonly queryCounts: QueryCounts = {
    viewer: 0,
    userStats: 0,
    contributionYears: 0,
    contributionCalendar: 0,
    linesOfCode: 0,
  };

  constructor(token?: string, options: GitHubServiceOptions = {}) {
    const headers = {
      authorization: token ? `bearer ${token}` : '',
    };
    this.graphql = graphql.defaults({ headers });
    this.request = request.defaults({ headers });
    this.includePrivateRepos = options.includePrivateRepos ?? true;
  }

  getQueryCounts(): QueryCounts {
    return { ...this.queryCounts };
  }

  private countQuery(kind: QueryKind) {
    this.queryCounts[kind]++;
  }

  async validateToken() {
    this.countQuery('viewer');
    try {
      interface ViewerResponse {
        viewer: {
          login: string;
        };
      }

      await this.graphql<ViewerResponse>(`
        query {
          viewer {
            login
          }
        }
      `);
      return true;
    } catch (error) {
      console.warn('⚠️ Token validation failed. Some contributions might not be visible.');
      console.warn('   Make sure your token has the following permissions:');
      console.warn('   - read:user');
      console.warn('   - repo (for private repository contributions)');
      return false;
    }
  }

  async getContributionYears(username: string): Promise<number[]> {
    this.countQuery('contributionYears');
    const { user } = await this.call('getContributionYears', () =>
      this.graphql<ContributionYearsResponse>(
        `
        query($username: String!) {
          user(login: $username) {
            contributionsCollection {
              contributionYears
            }
          }
        }
      `,
        { username }
      )
    );

    return user.contributionsCollection.contributionYears;
  }

  async fetchYear(
    username: string,
    year: number,
    rangeStart: Date,
    rangeEnd: Date
  ): Promise<YearContributions> {
    this.countQuery('contributionCalendar');
    const response = await this.call('fetchYear', () =>
      this.graphql<ContributionResponse>(
        `
        query($username: String!, $from: DateTime!, $to: DateTime!) {
          user(login: $username) {
            contributionsCollection(from: $from, to: $to) {
              totalCommitContributions
              totalIssueContributions
              totalPullRequestContributions
              totalPullRequestReviewContributions
              contributionCalendar {
                totalContributions
                weeks {
                  contributionDays {
                    contributionCount
                    date
                  }
                }
              }
            }
          }
        }
      `,
        {
          username,
          from: rangeStart.toISOString(),
          to: rangeEnd.toISOString(),
        }
      )
    );

    const collection = response.user.contributionsCollection;
    return {
      rollup: {
        year,
        commits: collection.totalCommitContributions,
        pullRequests: collection.totalPullRequestContributions,
        pullRequestReviews: collection.totalPullRequestReviewContributions,
        issues: collection.totalIssueContributions,
        totalContributionsInYear: collection.contributionCalendar.totalContributions,
      },
      days: collection.contributionCalendar.weeks.flatMap((week) =>
        week.contributionDays.map((day) => ({
          date: day.date,
          count: day.contributionCount,
        }))
      ),
    };
  }

  async getUserStats(username: string): Promise<UserStats> {
    this.countQuery('userStats');
    const { user } = await this.call('getUserStats', () =>
      this.graphql<UserStatsResponse>(
        `
        query($username: String!) {
          user(login: $username) {
            name
            login
            createdAt
            followers { totalCount }
            following { totalCount }
            repositories(first: 100, ownerAffiliations: [OWNER]) {
              totalCount
              totalDiskUsage
              nodes {
                licenseInfo { spdxId }
                releases { totalCount }
                stargazerCount
                forkCount
                watchers { totalCount }
              }
            }
            packages { totalCount }
            organizations { totalCount }
            sponsoring { totalCount }
            sponsors { totalCount }
            starredRepositories { totalCount }
            watching { totalCount }
            issues { totalCount }
            pullRequests { totalCount }
            repositoriesContributedTo { totalCount }
          }
        }
      `,
        { username }
      )
    );

    const licenses = new Map<string, number>();
    let releases = 0;
    let stargazers = 0;
    let forkers = 0;
    let watchers = 0;

    for (const repo of user.repositories.nodes) {
      const spdxId = repo.licenseInfo?.spdxId;
      if (spdxId) {
        licenses.set(spdxId, (licenses.get(spdxId) ?? 0) + 1);
      }
      releases += repo.releases.totalCount;
      stargazers += repo.stargazerCount;
      forkers += repo.forkCount;
      watchers += repo.watchers.totalCount;
    }

    return {
      name: user.name || user.login,
      login: user.login,
      createdAt: user.createdAt,
      followers: user.followers.totalCount,
      following: user.following.totalCount,
      repositories: user.repositories.totalCount,
      diskUsageMb: user.repositories.totalDiskUsage / 1024,
      preferredLicense: this.findPreferredLicense(licenses),
      releases,
      packages: user.packages.totalCount,
      organizations: user.organizations.totalCount,
      sponsoring: user.sponsoring.totalCount,
      sponsors: user.sponsors.totalCount,
      starred: user.starredRepositories.totalCount,
      watching: user.watching.totalCount,
      issuesOpened: user.issues.totalCount,
      pullRequests: user.pullRequests.totalCount,
      contributedTo: user.repositoriesContributedTo.totalCount,
      stargazers,
      forkers,
      watchers,
    };
  }

  // Most used SPDX id; the first one seen wins a tie
  private findPreferredLicense(licenses: Map<string, number>): string {
    let preferred = 'None';
    let best = 0;
    for (const [spdxId, count] of licenses) {
      if (count > best) {
        preferred = spdxId;
        best = count;
      }
    }
    return preferred;
  }

  async getLinesOfCode(username: string): Promise<LinesOfCode> {
    this.countQuery('linesOfCode');
    let repos: RepositoryListing[];
    try {
      repos = await this.listRepositories(username);
    } catch (error) {
      console.warn(`⚠️ Could not fetch repositories for ${username}:`, error);
      return { additions: 0, deletions: 0, repositories: [] };
    }

    const repositories: RepositoryLines[] = [];
    for (const repo of repos) {
      if (repo.fork) {
        continue;
      }
      repositories.push(await this.getRepositoryLines(username, repo));
    }

    return {
      additions: repositories.reduce((sum, repo) => sum + repo.additions, 0),
      deletions: repositories.reduce((sum, repo) => sum + repo.deletions, 0),
      repositories,
    };
  }

  private async listRepositories(username: string): Promise<RepositoryListing[]> {
    if (this.includePrivateRepos) {
      const { data } = await this.request('GET /user/repos', {
        per_page: 100,
        affiliation: 'owner',
      });
      return data;
    }

    const { data } = await this.request('GET /users/{username}/repos', {
      username,
      per_page: 100,
      type: 'owner',
    });
    return data;
  }

  private async getRepositoryLines(
    username: string,
    repo: RepositoryListing
  ): Promise<RepositoryLines> {
    const lines: RepositoryLines = {
      name: repo.name,
      isPrivate: repo.private,
      additions: 0,
      deletions: 0,
      status: 'ok',
    };

    try {
      const response = await this.request('GET /repos/{owner}/{repo}/stats/contributors', {
        owner: repo.owner.login,
        repo: repo.name,
      });

      // 202: GitHub is still computing the stats, 204: empty repository
      const status: number = response.status;
      if (status === 202) {
        return { ...lines, status: 'computing' };
      }
      if (status === 204) {
        return { ...lines, status: 'empty' };
      }

      const contributors: ContributorStats[] = Array.isArray(response.data) ? response.data : [];
      for (const contributor of contributors) {
        if (contributor.author?.login !== username) {
          continue;
        }
        for (const week of contributor.weeks) {
          lines.additions += week.a ?? 0;
          lines.deletions += week.d ?? 0;
        }
      }
      return lines;
    } catch (error) {
      console.warn(`⚠️ Could not fetch contributor stats for ${repo.name}:`, error);
      return { ...lines, status: 'error' };
    }
  }

  // Failures propagate; the HTTP layer logs them once
  async getActivity(username: string, today: Date): Promise<ActivitySummary> {
    await this.validateToken();

    const years = await this.getContributionYears(username);
    return ActivityService.aggregate(years, today, (year, rangeStart, rangeEnd) =>
      this.fetchYear(username, year, rangeStart, rangeEnd)
    );
  }

  async getProfile(username: string, today: Date): Promise<ProfileSummary> {
    const stats = await this.getUserStats(username);
    const activity = await this.getActivity(username, today);
    const linesOfCode = await this.getLinesOfCode(username);

    return { stats, activity, linesOfCode, queries: this.getQueryCounts() };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new DataSourceError(operation, error);
    }
  }
}
