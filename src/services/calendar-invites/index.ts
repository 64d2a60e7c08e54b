// Calendar invite (.ics) generation for booked meetings
import { v4 as uuidv4 } from 'uuid';
import type { ContactRecord, InviteOptions, RecordFailure } from '../../shared/models';
import { RenderError, ValidationError, processRecordsWithResilience } from '../../shared/utils/error-handling';
import {
  formatFileStamp,
  formatIcsTimestamp,
  isValidTimeZone,
  parseTimestamp,
  toUtcDate
} from '../../shared/utils/date-format';
import type { WallClock } from '../../shared/utils/date-format';
import { activeMeetingDateTime } from '../record-store';
import type { RecordStore } from '../record-store';
import { INVITE_DESCRIPTION_PLACEHOLDERS, render } from '../template-renderer';

const CRLF = '\r\n';
const MAX_LINE_OCTETS = 75;

const CALENDAR_HEADER = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Prospecting Manager//EN',
  'CALSCALE:GREGORIAN',
  'METHOD:PUBLISH'
];

export interface BulkInviteResult {
  calendar: string | null;
  eventCount: number;
  failures: RecordFailure[];
}

/**
 * Escapes a TEXT value (RFC 5545 section 3.3.11)
 */
export function escapeIcsText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Quotes a parameter value when it contains separators
 */
function formatParamValue(value: string): string {
  const cleaned = value.replace(/"/g, '');
  return /[:;,]/.test(cleaned) ? `"${cleaned}"` : cleaned;
}

/**
 * Folds a content line longer than 75 UTF-8 octets onto continuation lines,
 * breaking only between code points
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const parts: string[] = [];
  let current = '';
  let currentOctets = 0;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (currentOctets + octets > MAX_LINE_OCTETS) {
      parts.push(current);
      // Continuation lines start with a single space
      current = ' ';
      currentOctets = 1;
    }
    current += char;
    currentOctets += octets;
  }

  parts.push(current);
  return parts.join(CRLF);
}

function validateInviteOptions(options: InviteOptions): void {
  if (!isValidTimeZone(options.timezone)) {
    throw new ValidationError('timezone', options.timezone, `Unknown time zone: ${options.timezone}`);
  }

  if (!Number.isInteger(options.durationMinutes) || options.durationMinutes <= 0) {
    throw new ValidationError('durationMinutes', options.durationMinutes, `Invalid meeting duration: ${options.durationMinutes}`);
  }
}

function meetingClock(record: Readonly<ContactRecord>): WallClock | null {
  const value = activeMeetingDateTime(record);
  if (value === null || value.trim() === '') {
    return null;
  }

  const clock = parseTimestamp(value);
  if (!clock) {
    throw new RenderError('meeting_datetime', value);
  }
  return clock;
}

/**
 * Records with a Yes outcome and a meeting time, in store order
 */
export function findMeetingsToInvite(store: RecordStore): Readonly<ContactRecord>[] {
  return store.records.filter(record => {
    const value = activeMeetingDateTime(record);
    return value !== null && value.trim() !== '';
  });
}

/**
 * VEVENT lines for one record, or null when it has no booked meeting
 */
export function createInviteEvent(record: Readonly<ContactRecord>, options: InviteOptions): string[] | null {
  validateInviteOptions(options);

  const clock = meetingClock(record);
  if (!clock) {
    return null;
  }

  const start = toUtcDate(clock, options.timezone);
  const end = new Date(start.getTime() + options.durationMinutes * 60000);
  const now = options.now ?? new Date();

  const name = record.name.trim();
  const company = record.company.trim();
  const summary = company === '' ? `Meeting - ${name}` : `Meeting - ${name} (${company})`;
  const description = render(options.descriptionTemplate, record, INVITE_DESCRIPTION_PLACEHOLDERS);

  const lines = [
    'BEGIN:VEVENT',
    `UID:${uuidv4()}@prospecting-manager`,
    `DTSTAMP:${formatIcsTimestamp(now)}`,
    `DTSTART:${formatIcsTimestamp(start)}`,
    `DTEND:${formatIcsTimestamp(end)}`,
    `SUMMARY:${escapeIcsText(summary)}`,
    `DESCRIPTION:${escapeIcsText(description)}`,
    `LOCATION:${escapeIcsText(options.location)}`,
    `ORGANIZER;CN=${formatParamValue(options.organizerName)}:mailto:${options.organizerEmail}`
  ];

  const email = record.email.trim();
  if (email) {
    lines.push(`ATTENDEE;CN=${formatParamValue(name)};ROLE=REQ-PARTICIPANT:mailto:${email}`);
  }

  lines.push('END:VEVENT');
  return lines;
}

function wrapCalendar(events: string[][]): string {
  const lines = [...CALENDAR_HEADER, ...events.flat(), 'END:VCALENDAR'];
  return lines.map(foldLine).join(CRLF) + CRLF;
}

/**
 * Single-event calendar for one record, or null when it has no booked meeting
 */
export function createInviteCalendar(record: Readonly<ContactRecord>, options: InviteOptions): string | null {
  const event = createInviteEvent(record, options);
  return event ? wrapCalendar([event]) : null;
}

/**
 * One calendar holding an event for every booked meeting
 */
export function createBulkInviteCalendar(store: RecordStore, options: InviteOptions): BulkInviteResult {
  validateInviteOptions(options);

  const { results, failures } = processRecordsWithResilience(
    findMeetingsToInvite(store),
    record => createInviteEvent(record, options),
    { operation: 'createBulkInviteCalendar' }
  );

  const events = results.filter((event): event is string[] => event !== null);

  return {
    calendar: events.length > 0 ? wrapCalendar(events) : null,
    eventCount: events.length,
    failures
  };
}

/**
 * File name for a single invite, e.g. "Ada_Lovelace_20260115T1530.ics"
 */
export function inviteFileName(record: Readonly<ContactRecord>): string {
  const clock = meetingClock(record);
  const base = record.name.trim().replace(/ /g, '_') || 'meeting';
  return clock ? `${base}_${formatFileStamp(clock)}.ics` : `${base}.ics`;
}
