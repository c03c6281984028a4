export interface ContributionDay {
  date: string;
  contributionCount: number;
}
export interface ContributionWeek {
  contributionDays: ContributionDay[];
}
export interface ContributionCalendar {
  totalContributions: number;
  weeks: ContributionWeek[];
}
export interface ContributionCollection {
  totalCommitContributions: number;
  totalIssueContributions: number;
  totalPullRequestContributions: number;
  totalPullRequestReviewContributions: number;
  contributionCalendar: ContributionCalendar;
}

export interface ContributionResponse {
  user: {
    contributionsCollection: ContributionCollection;
  };
}

export interface ContributionYearsResponse {
  user: {
    contributionsCollection: {
      contributionYears: number[];
    };
  };
}

interface TotalCount {
  totalCount: number;
}

export interface UserStatsResponse {
  user: {
    name: string | null;
    login: string;
    createdAt: string;
    followers: TotalCount;
    following: TotalCount;
    repositories: TotalCount & {
      totalDiskUsage: number;
      nodes: Array<{
        licenseInfo: { spdxId: string | null } | null;
        releases: TotalCount;
        stargazerCount: number;
        forkCount: number;
        watchers: TotalCount;
      }>;
    };
    packages: TotalCount;
    organizations: TotalCount;
    sponsoring: TotalCount;
    sponsors: TotalCount;
    starredRepositories: TotalCount;
    watching: TotalCount;
    issues: TotalCount;
    pullRequests: TotalCount;
    repositoriesContributedTo: TotalCount;
  };
}

export interface RepositoryListing {
  name: string;
  private: boolean;
  fork: boolean;
  owner: { login: string };
}

export interface ContributorStats {
  author: { login: string } | null;
  weeks: Array<{ a?: number; d?: number }>;
}

/** One calendar day of the contribution history, `date` as `yyyy-MM-dd`. */
export interface DayRecord {
  date: string;
  count: number;
}

export interface YearRollup {
  year: number;
  commits: number;
  pullRequests: number;
  pullRequestReviews: number;
  issues: number;
  totalContributionsInYear: number;
}

export interface YearContributions {
  rollup: YearRollup;
  days: DayRecord[];
}

export interface StreakWindow {
  start: string | null;
  end: string | null;
  length: number;
}

export interface BestDay {
  date: string | null;
  count: number;
}

export interface ActivitySummary {
  totalContributions: number;
  totalCommits: number;
  totalPRs: number;
  totalPRReviews: number;
  totalIssues: number;
  currentStreak: number;
  longestStreak: StreakWindow;
  bestDay: BestDay;
  averagePerDay: number;
  observationStart: string | null;
}

/**
 * Returns the rollup and the date-ordered days of one year, limited to
 * `rangeStart..rangeEnd`. Rejects with a `DataSourceError` when the upstream
 * call cannot be completed.
 */
export type DataSourceFn = (
  year: number,
  rangeStart: Date,
  rangeEnd: Date
) => Promise<YearContributions>;

export interface UserStats {
  name: string;
  login: string;
  createdAt: string;
  followers: number;
  following: number;
  repositories: number;
  diskUsageMb: number;
  preferredLicense: string;
  releases: number;
  packages: number;
  organizations: number;
  sponsoring: number;
  sponsors: number;
  starred: number;
  watching: number;
  issuesOpened: number;
  pullRequests: number;
  contributedTo: number;
  stargazers: number;
  forkers: number;
  watchers: number;
}

export type RepositoryStatus = 'ok' | 'computing' | 'empty' | 'error';

export interface RepositoryLines {
  name: string;
  isPrivate: boolean;
  additions: number;
  deletions: number;
  status: RepositoryStatus;
}

export interface LinesOfCode {
  additions: number;
  deletions: number;
  repositories: RepositoryLines[];
}

export type QueryKind =
  | 'viewer'
  | 'userStats'
  | 'contributionYears'
  | 'contributionCalendar'
  | 'linesOfCode';

export type QueryCounts = Record<QueryKind, number>;

export interface ProfileSummary {
  stats: UserStats;
  activity: ActivitySummary;
  linesOfCode: LinesOfCode;
  queries: QueryCounts;
}
