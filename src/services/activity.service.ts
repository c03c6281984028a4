import { differenceInCalendarDays, format, isValid, parseISO, subDays } from 'date-fns';
import { InvalidDayRecordError } from './errors';
import type {
  ActivitySummary,
  BestDay,
  DataSourceFn,
  DayRecord,
  StreakWindow,
  YearContributions,
  YearRollup,
} from './types';

const DATE_FORMAT = 'yyyy-MM-dd';
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface DateRange {
  start: Date;
  end: Date;
}

type RollupTotals = Pick<
  ActivitySummary,
  'totalContributions' | 'totalCommits' | 'totalPRs' | 'totalPRReviews' | 'totalIssues'
>;

export class ActivityService {
  /**
   * Fetches every requested year (ascending, one at a time) and folds the
   * results into a single summary. Errors thrown by `fetch` propagate as-is.
   */
  static async aggregate(
    years: Iterable<number>,
    today: Date,
    fetch: DataSourceFn
  ): Promise<ActivitySummary> {
    const sortedYears = Array.from(new Set(years)).sort((a, b) => a - b);
    const fetched: YearContributions[] = [];

    for (const year of sortedYears) {
      const { start, end } = this.getYearRange(year, today);
      fetched.push(await fetch(year, start, end));
    }

    return this.summarize(sortedYears, today, fetched);
  }

  // UTC boundaries, matching GitHub's calendar days
  static getYearRange(year: number, today: Date): DateRange {
    const start = new Date(Date.UTC(year, 0, 1));
    // The current year only has history up to today
    const end =
      year === today.getFullYear()
        ? new Date(Date.UTC(year, today.getMonth(), today.getDate(), 23, 59, 59))
        : new Date(Date.UTC(year, 11, 31, 23, 59, 59));
    return { start, end };
  }

  static summarize(
    years: readonly number[],
    today: Date,
    fetched: readonly YearContributions[]
  ): ActivitySummary {
    const totals = this.sumRollups(fetched.map(({ rollup }) => rollup));
    const days = this.mergeDays(fetched.map(({ days }) => days));

    const todayStr = format(today, DATE_FORMAT);
    const yesterdayStr = format(subDays(today, 1), DATE_FORMAT);
    const { longestStreak, bestDay } = this.calculateLongestStreak(days);

    return {
      ...totals,
      currentStreak: this.calculateCurrentStreak(days, todayStr, yesterdayStr),
      longestStreak,
      bestDay,
      averagePerDay: this.calculateAveragePerDay(totals.totalContributions, days, todayStr),
      observationStart:
        years.length > 0 ? format(new Date(Math.min(...years), 0, 1), DATE_FORMAT) : null,
    };
  }

  private static sumRollups(rollups: readonly YearRollup[]): RollupTotals {
    return rollups.reduce<RollupTotals>(
      (totals, rollup) => ({
        totalContributions: totals.totalContributions + rollup.totalContributionsInYear,
        totalCommits: totals.totalCommits + rollup.commits,
        totalPRs: totals.totalPRs + rollup.pullRequests,
        totalPRReviews: totals.totalPRReviews + rollup.pullRequestReviews,
        totalIssues: totals.totalIssues + rollup.issues,
      }),
      { totalContributions: 0, totalCommits: 0, totalPRs: 0, totalPRReviews: 0, totalIssues: 0 }
    );
  }

  /**
   * Flattens the per-year lists into one date-sorted sequence. A date seen
   * twice keeps the value fetched last.
   */
  private static mergeDays(perYear: readonly (readonly DayRecord[])[]): DayRecord[] {
    const contributions = new Map<string, number>();

    for (const days of perYear) {
      for (const day of days) {
        this.validateDay(day);
        contributions.set(day.date, day.count);
      }
    }

    return Array.from(contributions, ([date, count]) => ({ date, count })).sort((a, b) =>
      a.date.localeCompare(b.date)
    );
  }

  private static validateDay({ date, count }: DayRecord): void {
    if (!DAY_PATTERN.test(date) || !isValid(parseISO(date))) {
      throw new InvalidDayRecordError(date, 'date is not a yyyy-MM-dd calendar day');
    }
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidDayRecordError(date, `count ${count} is not a non-negative integer`);
    }
  }

  // Forward pass: longest run of non-zero days, and the best single day
  private static calculateLongestStreak(days: readonly DayRecord[]): {
    longestStreak: StreakWindow;
    bestDay: BestDay;
  } {
    let longestStreak: StreakWindow = { start: null, end: null, length: 0 };
    let bestDay: BestDay = { date: null, count: 0 };
    let tempStreak = 0;
    let tempStreakStart: string | null = null;

    days.forEach((day, i) => {
      // A zero day or a missing date closes the running streak
      const contiguous =
        i > 0 && differenceInCalendarDays(parseISO(day.date), parseISO(days[i - 1].date)) === 1;
      if (tempStreak > 0 && (day.count === 0 || !contiguous)) {
        if (tempStreak > longestStreak.length) {
          longestStreak = { start: tempStreakStart, end: days[i - 1].date, length: tempStreak };
        }
        tempStreak = 0;
      }

      if (day.count > 0) {
        if (tempStreak === 0) {
          tempStreakStart = day.date;
        }
        tempStreak++;

        // Ties keep the earlier day
        if (day.count > bestDay.count) {
          bestDay = { date: day.date, count: day.count };
        }
      }
    });

    // The history may end mid-streak
    if (tempStreak > longestStreak.length) {
      longestStreak = {
        start: tempStreakStart,
        end: days[days.length - 1].date,
        length: tempStreak,
      };
    }

    return { longestStreak, bestDay };
  }

  // Backward pass from the latest day that is not in the future
  private static calculateCurrentStreak(
    days: readonly DayRecord[],
    todayStr: string,
    yesterdayStr: string
  ): number {
    let latest = days.length - 1;
    while (latest >= 0 && days[latest].date > todayStr) {
      latest--;
    }
    if (latest < 0) {
      return 0;
    }

    const { date, count } = days[latest];
    if ((date !== todayStr && date !== yesterdayStr) || count === 0) {
      return 0;
    }

    let currentStreak = 1;
    for (let i = latest - 1; i >= 0; i--) {
      const gap = differenceInCalendarDays(parseISO(days[i + 1].date), parseISO(days[i].date));
      if (gap !== 1 || days[i].count === 0) {
        break;
      }
      currentStreak++;
    }

    return currentStreak;
  }

  private static calculateAveragePerDay(
    totalContributions: number,
    days: readonly DayRecord[],
    todayStr: string
  ): number {
    const observedDays = days.filter((day) => day.date <= todayStr).length;
    return observedDays > 0 ? totalContributions / observedDays : 0;
  }
}
