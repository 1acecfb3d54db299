// /src/lib/date-helpers.ts

import { differenceInCalendarDays, format, isValid, parseISO, startOfDay } from 'date-fns';

const API_FORMAT = 'yyyy-MM-dd';
const DISPLAY_FORMAT = 'MMM dd, yyyy';

/** Calendar date as the API expects it, e.g. "2024-01-15". Strings pass through after validation. */
export function toApiDate(date: Date | string): string {
  return format(parseDueDate(date), API_FORMAT);
}

/** e.g. "Jan 15, 2024" */
export function formatForDisplay(date: Date | string): string {
  return format(parseDueDate(date), DISPLAY_FORMAT);
}

export function parseDueDate(date: Date | string): Date {
  const parsed = typeof date === 'string' ? parseISO(date) : date;
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid date: ${String(date)}`);
  }
  return parsed;
}

// Due dates have no time component, so comparisons are by calendar day
export function isPastDue(dueDate: Date | string, now: Date = new Date()): boolean {
  return differenceInCalendarDays(parseDueDate(dueDate), now) < 0;
}

/**
 * "Today", "Tomorrow", "Yesterday", "In 3 days" or "3 days ago".
 */
export function describeDueDate(dueDate: Date | string, now: Date = new Date()): string {
  const days = differenceInCalendarDays(startOfDay(parseDueDate(dueDate)), startOfDay(now));

  if (days === 0) return 'Today';
  if (days === 1) return 'Tomorrow';
  if (days === -1) return 'Yesterday';
  return days > 0 ? `In ${days} days` : `${Math.abs(days)} days ago`;
}
