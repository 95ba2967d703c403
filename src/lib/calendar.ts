/**
 * UTC calendar buckets for fixed-window counters
 */

import dayjs from 'dayjs';
import isoWeek from 'dayjs/plugin/isoWeek.js';
import utc from 'dayjs/plugin/utc.js';

import type { CalendarWindow } from '../types/index.js';

dayjs.extend(utc);
dayjs.extend(isoWeek);

export interface CalendarBucket {
  /** Same string for every caller inside the period */
  bucket: string;
  /** Whole seconds until the period boundary, at least 1 */
  ttlSeconds: number;
}

export function calendarBucket(
  window: CalendarWindow,
  now: Date
): CalendarBucket {
  const current = dayjs.utc(now);

  switch (window) {
    case 'daily':
      return {
        bucket: current.format('YYYY-MM-DD'),
        ttlSeconds: secondsUntil(current, current.startOf('day').add(1, 'day')),
      };
    case 'weekly': {
      const week = String(current.isoWeek()).padStart(2, '0');
      return {
        bucket: `${current.isoWeekYear()}-W${week}`,
        ttlSeconds: secondsUntil(
          current,
          current.startOf('isoWeek').add(1, 'week')
        ),
      };
    }
    case 'monthly':
      return {
        bucket: current.format('YYYY-MM'),
        ttlSeconds: secondsUntil(
          current,
          current.startOf('month').add(1, 'month')
        ),
      };
  }
}

function secondsUntil(from: dayjs.Dayjs, boundary: dayjs.Dayjs): number {
  return Math.max(1, Math.ceil(boundary.diff(from, 'millisecond') / 1000));
}
