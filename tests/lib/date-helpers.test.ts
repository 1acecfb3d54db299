import { describe, it, expect } from 'vitest';
import { describeDueDate, formatForDisplay, isPastDue, toApiDate } from '@/lib/date-helpers';

const now = new Date(2024, 5, 10, 15, 30);

describe('toApiDate', () => {
  it('drops the time of day', () => {
    expect(toApiDate(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
  });

  it('passes a calendar date string through', () => {
    expect(toApiDate('2024-06-01')).toBe('2024-06-01');
  });

  it('throws on an invalid date', () => {
    expect(() => toApiDate('not-a-date')).toThrow(RangeError);
  });
});

describe('formatForDisplay', () => {
  it('formats as month day, year', () => {
    expect(formatForDisplay('2024-01-15')).toBe('Jan 15, 2024');
  });
});

describe('describeDueDate', () => {
  it.each([
    ['2024-06-10', 'Today'],
    ['2024-06-11', 'Tomorrow'],
    ['2024-06-09', 'Yesterday'],
    ['2024-06-13', 'In 3 days'],
    ['2024-06-05', '5 days ago'],
  ])('%s is "%s"', (dueDate, expected) => {
    expect(describeDueDate(dueDate, now)).toBe(expected);
  });
});

describe('isPastDue', () => {
  it('is false on the due day itself', () => {
    expect(isPastDue('2024-06-10', now)).toBe(false);
  });

  it('is true from the next day on', () => {
    expect(isPastDue('2024-06-09', now)).toBe(true);
  });
});
