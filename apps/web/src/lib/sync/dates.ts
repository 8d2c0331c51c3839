import type { StorySettings } from '../config';
import { encodeWeekdays } from './weekdays';

export type StoryDates = {
  startDate: string;
  endDate: string;
  weekdays: number;
};

type CalendarDate = { year: number; month: number; day: number };

function calendarDateIn(instant: Date, timeZone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((part) => part.type === type)?.value);
  return { year: pick('year'), month: pick('month'), day: pick('day') };
}

function addDays(date: CalendarDate, days: number): string {
  return new Date(Date.UTC(date.year, date.month - 1, date.day + days)).toISOString().slice(0, 10);
}

/**
 * Start and end dates are calendar dates in the configured time zone, offset
 * from `base` by whole days.
 */
export function calculateStoryDates(base: Date, settings: StorySettings): StoryDates {
  const baseDate = calendarDateIn(base, settings.timeZone);
  return {
    startDate: addDays(baseDate, settings.startOffsetDays),
    endDate: addDays(baseDate, settings.endOffsetDays),
    weekdays: encodeWeekdays(settings.weekdays),
  };
}
