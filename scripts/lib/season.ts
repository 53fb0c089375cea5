const DAY_MS = 24 * 60 * 60 * 1000;

export const REGULAR_SEASON_WEEKS = 18;

/** Seasons run into January and February of the following year. */
export function getSeasonStartYear(date: Date): number {
  const year = date.getUTCFullYear();
  return date.getUTCMonth() < 2 ? year - 1 : year;
}

/** Labor Day is the first Monday of September; the opener is the Thursday after it. */
export function kickoffDate(seasonYear: number): Date {
  const septemberFirst = new Date(Date.UTC(seasonYear, 8, 1));
  const offsetToMonday = (8 - septemberFirst.getUTCDay()) % 7;
  return new Date(Date.UTC(seasonYear, 8, 1 + offsetToMonday + 3));
}

export function nflWeekFor(date: Date, seasonWeeks = REGULAR_SEASON_WEEKS): number {
  const kickoff = kickoffDate(getSeasonStartYear(date));
  const elapsed = date.getTime() - kickoff.getTime();
  if (elapsed < 0) {
    return 1;
  }
  const week = Math.floor(elapsed / DAY_MS / 7) + 1;
  return Math.min(Math.max(week, 1), seasonWeeks);
}
