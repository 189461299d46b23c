/**
 * Wall-clock helpers for a fixed IANA time zone
 */

export interface ZonedDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 0 = Sunday ... 6 = Saturday */
  weekday: number;
}

const formatterCache: Map<string, Intl.DateTimeFormat> = new Map();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads the wall-clock fields of an instant in the given zone
 */
export function getZonedParts(date: Date, timeZone: string): ZonedDateTime {
  const fields: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }

  const year = fields.year ?? 0;
  const month = fields.month ?? 1;
  const day = fields.day ?? 1;

  return {
    year,
    month,
    day,
    hour: (fields.hour ?? 0) % 24,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
    weekday: new Date(Date.UTC(year, month - 1, day)).getUTCDay()
  };
}

function getOffsetMs(date: Date, timeZone: string): number {
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  const parts = getZonedParts(new Date(wholeSeconds), timeZone);
  const wallAsUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return wallAsUtc - wholeSeconds;
}

/**
 * Converts a wall-clock time in the zone to an instant.
 * Day overflow is allowed (day 32 rolls into the next month).
 */
export function zonedTimeToDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timeZone: string
): Date {
  const wallAsUtc = Date.UTC(year, month - 1, day, hour, minute);
  const firstOffset = getOffsetMs(new Date(wallAsUtc), timeZone);
  let instant = wallAsUtc - firstOffset;

  // the offset can differ on the other side of a DST switch
  const secondOffset = getOffsetMs(new Date(instant), timeZone);
  if (secondOffset !== firstOffset) {
    instant = wallAsUtc - secondOffset;
  }

  return new Date(instant);
}
