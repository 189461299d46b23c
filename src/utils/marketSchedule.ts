/**
 * Market-hours wake policy.
 *
 * Weekdays poll every `intervalMinutes` from `startHour:00` until `endHour:00` (exclusive);
 * every day additionally has a night and a morning checkpoint. The weekend policy decides
 * whether those checkpoints also fire on Saturday and Sunday.
 */

import type { ScheduleOptions, WeekendPolicy } from '../models/Portfolio';
import { getZonedParts, zonedTimeToDate } from './zonedTime';

export interface TimeOfDay {
  hour: number;
  minute: number;
}

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Parses "HH:MM" into hour and minute
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid time of day "${value}", expected HH:MM`);
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new Error(`Invalid time of day "${value}", expected HH:MM`);
  }

  return { hour, minute };
}

function isWeekend(weekday: number): boolean {
  return weekday === 0 || weekday === 6;
}

/**
 * Minutes after local midnight at which a wake is due on a day
 */
export function checkpointsForDay(
  weekday: number,
  options: ScheduleOptions,
  weekendPolicy: WeekendPolicy
): number[] {
  const minutes: number[] = [];

  if (!isWeekend(weekday)) {
    for (let slot = options.startHour * 60; slot < options.endHour * 60; slot += options.intervalMinutes) {
      minutes.push(slot);
    }
  }

  if (!isWeekend(weekday) || weekendPolicy === 'checkpoints') {
    const night = parseTimeOfDay(options.nightUpdate);
    const morning = parseTimeOfDay(options.morningUpdate);
    minutes.push(night.hour * 60 + night.minute, morning.hour * 60 + morning.minute);
  }

  return [...new Set(minutes)].sort((a, b) => a - b);
}

/**
 * Computes the first wake strictly after `now`.
 * Pure: the same inputs always give the same instant.
 */
export function computeNextWake(
  now: Date,
  options: ScheduleOptions,
  timeZone: string = 'UTC',
  weekendPolicy: WeekendPolicy = 'checkpoints'
): Date {
  if (!Number.isInteger(options.intervalMinutes) || options.intervalMinutes < 1) {
    throw new RangeError(`intervalMinutes must be a positive integer, got ${options.intervalMinutes}`);
  }

  const local = getZonedParts(now, timeZone);

  // a week always contains at least one weekday checkpoint
  for (let dayOffset = 0; dayOffset <= 7; dayOffset++) {
    const calendarDay = new Date(Date.UTC(local.year, local.month - 1, local.day + dayOffset));
    const year = calendarDay.getUTCFullYear();
    const month = calendarDay.getUTCMonth() + 1;
    const day = calendarDay.getUTCDate();

    for (const minuteOfDay of checkpointsForDay(calendarDay.getUTCDay(), options, weekendPolicy)) {
      const candidate = zonedTimeToDate(year, month, day, Math.floor(minuteOfDay / 60), minuteOfDay % 60, timeZone);
      if (candidate.getTime() > now.getTime()) {
        return candidate;
      }
    }
  }

  throw new Error('No wake time found within a week; check the schedule options');
}
