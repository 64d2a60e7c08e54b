// Template renderer: substitutes {placeholder} tokens with values derived from a contact
import type { ContactRecord, EmailTemplate } from '../../shared/models';
import { RenderError } from '../../shared/utils/error-handling';
import { formatClockTime, formatLongDate, parseTimestamp } from '../../shared/utils/date-format';
import type { WallClock } from '../../shared/utils/date-format';
import { activeMeetingDateTime } from '../record-store';

type PlaceholderResolver = (record: Readonly<ContactRecord>) => string;

export type PlaceholderSet = Readonly<Record<string, PlaceholderResolver>>;

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

/**
 * First whitespace-delimited token of a full name
 */
export function firstName(fullName: string): string {
  const trimmed = fullName.trim();
  return trimmed === '' ? '' : trimmed.split(/\s+/)[0];
}

/**
 * Parses the active meeting time for a date/time placeholder; null when there is none
 */
function activeMeetingClock(record: Readonly<ContactRecord>, placeholder: string): WallClock | null {
  const value = activeMeetingDateTime(record);
  if (value === null || value.trim() === '') {
    return null;
  }

  const clock = parseTimestamp(value);
  if (!clock) {
    throw new RenderError(placeholder, value);
  }
  return clock;
}

export const EMAIL_PLACEHOLDERS: PlaceholderSet = {
  name: record => record.name,
  first_name: record => firstName(record.name),
  company: record => record.company,
  meeting_datetime: record => record.meetingDateTime ?? '',
  meeting_date: record => {
    const clock = activeMeetingClock(record, 'meeting_date');
    return clock ? formatLongDate(clock) : '';
  },
  meeting_time: record => {
    const clock = activeMeetingClock(record, 'meeting_time');
    return clock ? formatClockTime(clock) : '';
  }
};

export const INVITE_DESCRIPTION_PLACEHOLDERS: PlaceholderSet = {
  name: record => record.name,
  company: record => record.company,
  notes: record => record.notes
};

/**
 * Renders one template against one record. Unrecognized tokens are left as written.
 */
export function render(
  template: string,
  record: Readonly<ContactRecord>,
  placeholders: PlaceholderSet = EMAIL_PLACEHOLDERS
): string {
  return template.replace(PLACEHOLDER_PATTERN, (token: string, key: string) => {
    const resolve = Object.prototype.hasOwnProperty.call(placeholders, key) ? placeholders[key] : undefined;
    return resolve ? resolve(record) : token;
  });
}

export function renderEmail(template: EmailTemplate, record: Readonly<ContactRecord>): EmailTemplate {
  return {
    subject: render(template.subject, record),
    body: render(template.body, record)
  };
}

/**
 * Finds all placeholder names used in a text, in order of first appearance
 */
export function findTemplatePlaceholders(text: string): string[] {
  const placeholders = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    placeholders.add(match[1]);
  }
  return Array.from(placeholders);
}

/**
 * Placeholders in a template that will not be substituted
 */
export function findUnknownPlaceholders(
  template: EmailTemplate,
  placeholders: PlaceholderSet = EMAIL_PLACEHOLDERS
): string[] {
  const used = findTemplatePlaceholders(`${template.subject}\n${template.body}`);
  return used.filter(name => !Object.prototype.hasOwnProperty.call(placeholders, name));
}
