// Calendar helpers. Dates are timezone-less: a Date holds the wall-clock
// value in its UTC fields and only the UTC accessors are used.

const MS_PER_DAY = 86_400_000;

export const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

/** `month` is 1-based. */
export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Days needed to move `date` off a weekend: 2 for Saturday, 1 for Sunday.
 */
export function weekendShift(date: Date): number {
  switch (date.getUTCDay()) {
    case 6:
      return 2;
    case 0:
      return 1;
    default:
      return 0;
  }
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function skipWeekend(date: Date): Date {
  return addDays(date, weekendShift(date));
}

/** Whole days from `earlier` to `later`, truncated toward zero. */
export function diffInDays(later: Date, earlier: Date): number {
  return Math.trunc((later.getTime() - earlier.getTime()) / MS_PER_DAY);
}

export function startOfMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

export function endOfMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0));
}

export function nextMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1));
}

export function monthName(date: Date): string {
  return MONTH_NAMES[date.getUTCMonth()];
}
