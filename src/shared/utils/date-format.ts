// Date/time parsing and formatting utilities

export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Minutes east of UTC when the value carried an explicit offset */
  offsetMinutes?: number;
}

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AP]M)?)?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffset(token: string | undefined): number | undefined {
  if (!token) {
    return undefined;
  }
  if (token.toUpperCase() === 'Z') {
    return 0;
  }
  const digits = token.slice(1).replace(':', '');
  const minutes = parseInt(digits.slice(0, 2)) * 60 + parseInt(digits.slice(2));
  return token.startsWith('-') ? -minutes : minutes;
}

function isValidWallClock(clock: WallClock): boolean {
  return clock.month >= 1 && clock.month <= 12 &&
    clock.day >= 1 && clock.day <= daysInMonth(clock.year, clock.month) &&
    clock.hour >= 0 && clock.hour <= 23 &&
    clock.minute >= 0 && clock.minute <= 59 &&
    clock.second >= 0 && clock.second <= 59;
}

/**
 * Parses a stored timestamp into its wall-clock fields, or null when malformed
 */
export function parseTimestamp(value: string): WallClock | null {
  const trimmed = value.trim();

  const iso = ISO_PATTERN.exec(trimmed);
  if (iso) {
    const clock: WallClock = {
      year: parseInt(iso[1]),
      month: parseInt(iso[2]),
      day: parseInt(iso[3]),
      hour: iso[4] ? parseInt(iso[4]) : 0,
      minute: iso[5] ? parseInt(iso[5]) : 0,
      second: iso[6] ? parseInt(iso[6]) : 0,
      offsetMinutes: parseOffset(iso[7])
    };
    return isValidWallClock(clock) ? clock : null;
  }

  const us = US_PATTERN.exec(trimmed);
  if (us) {
    let hour = us[4] ? parseInt(us[4]) : 0;
    const meridiem = us[7]?.toUpperCase();
    if (meridiem) {
      if (hour < 1 || hour > 12) {
        return null;
      }
      hour = hour % 12 + (meridiem === 'PM' ? 12 : 0);
    }
    const clock: WallClock = {
      year: parseInt(us[3]),
      month: parseInt(us[1]),
      day: parseInt(us[2]),
      hour,
      minute: us[5] ? parseInt(us[5]) : 0,
      second: us[6] ? parseInt(us[6]) : 0
    };
    return isValidWallClock(clock) ? clock : null;
  }

  return null;
}

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Formats as "January 05, 2026"
 */
export function formatLongDate(clock: WallClock): string {
  return `${MONTH_NAMES[clock.month - 1]} ${pad(clock.day)}, ${clock.year}`;
}

/**
 * Formats as "3:30 PM"
 */
export function formatClockTime(clock: WallClock): string {
  const hour12 = clock.hour % 12 === 0 ? 12 : clock.hour % 12;
  return `${hour12}:${pad(clock.minute)} ${clock.hour < 12 ? 'AM' : 'PM'}`;
}

/**
 * Monday-first weekday name of the wall-clock date
 */
export function weekdayName(clock: WallClock): string {
  const sundayFirst = new Date(Date.UTC(clock.year, clock.month - 1, clock.day)).getUTCDay();
  return WEEKDAY_NAMES[(sundayFirst + 6) % 7];
}

/**
 * Serializes a Date's local wall clock without zone, e.g. "2026-01-15T15:30:00"
 */
export function toLocalTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Checks that the runtime knows the IANA time zone
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function zoneOffsetMinutes(utcMillis: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit'
  }).formatToParts(new Date(utcMillis));

  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(p => p.type === type);
    return part ? parseInt(part.value) : 0;
  };

  const asUtc = Date.UTC(field('year'), field('month') - 1, field('day'), field('hour'), field('minute'), field('second'));
  return Math.round((asUtc - Math.floor(utcMillis / 1000) * 1000) / 60000);
}

/**
 * Resolves a wall clock to an instant; naive values are read in the given zone
 */
export function toUtcDate(clock: WallClock, timeZone: string): Date {
  const naive = Date.UTC(clock.year, clock.month - 1, clock.day, clock.hour, clock.minute, clock.second);

  if (clock.offsetMinutes !== undefined) {
    return new Date(naive - clock.offsetMinutes * 60000);
  }

  // Second pass settles values next to a DST transition
  let offset = zoneOffsetMinutes(naive, timeZone);
  const corrected = zoneOffsetMinutes(naive - offset * 60000, timeZone);
  if (corrected !== offset) {
    offset = corrected;
  }
  return new Date(naive - offset * 60000);
}

/**
 * Formats an instant as an iCalendar UTC date-time, e.g. "20260115T203000Z"
 */
export function formatIcsTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`;
}

/**
 * Compact wall-clock stamp for file names, e.g. "20260115T1530"
 */
export function formatFileStamp(clock: WallClock): string {
  return `${clock.year}${pad(clock.month)}${pad(clock.day)}T${pad(clock.hour)}${pad(clock.minute)}`;
}
