import { addDays, subDays } from 'date-fns';
import { formatInTimeZone, zonedTimeToUtc } from 'date-fns-tz';

const UTC = 'UTC';

/**
 * Format a date in UTC
 */
const formatUtc = (date: Date, formatStr: string = 'yyyy-MM-dd'): string =>
  formatInTimeZone(date, UTC, formatStr);

/**
 * Midnight UTC of the day containing `date`
 */
const startOfUtcDay = (date: Date): Date => zonedTimeToUtc(formatUtc(date), UTC);

/**
 * Half-open UTC day window [start, end) containing `date`
 */
const utcDayRange = (date: Date): { start: Date; end: Date } => {
  const start = startOfUtcDay(date);
  return { start, end: addDays(start, 1) };
};

/**
 * UTC day window of the day before `date`
 */
const previousUtcDayRange = (date: Date): { start: Date; end: Date } => utcDayRange(subDays(startOfUtcDay(date), 1));

export { formatUtc, startOfUtcDay, utcDayRange, previousUtcDayRange };
