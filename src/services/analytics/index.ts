// Success-rate analytics over call outcomes
import type { ContactRecord } from '../../shared/models';
import { WEEKDAY_NAMES, parseTimestamp, weekdayName } from '../../shared/utils/date-format';
import type { WallClock } from '../../shared/utils/date-format';
import type { RecordStore } from '../record-store';

export interface OutcomeSummary {
  attempted: number;
  yes: number;
  yesRate: number;
}

export interface RateRow {
  group: string;
  contacts: number;
  attempted: number;
  yes: number;
  yesRate: number;
}

export interface ProspectingReport {
  totalProspects: number;
  overall: OutcomeSummary;
  byCompany: RateRow[];
  byState: RateRow[];
  byHour: RateRow[];
  byWeekday: RateRow[];
}

export function isAttempted(record: Readonly<ContactRecord>): boolean {
  return record.attempts > 0 || record.status !== null;
}

export function isYes(record: Readonly<ContactRecord>): boolean {
  return record.status === 'Yes';
}

const roundRate = (yes: number, attempted: number): number =>
  attempted > 0 ? Math.round((yes / attempted) * 1000) / 10 : 0;

/**
 * Latest touch: last call, else callback, else meeting. Unparseable values fall through.
 */
export function touchDateTime(record: Readonly<ContactRecord>): WallClock | null {
  for (const value of [record.lastCallDateTime, record.callbackDateTime, record.meetingDateTime]) {
    const clock = value === null ? null : parseTimestamp(value);
    if (clock) {
      return clock;
    }
  }
  return null;
}

export function calculateOutcomeSummary(records: readonly Readonly<ContactRecord>[]): OutcomeSummary {
  const attempted = records.filter(isAttempted).length;
  const yes = records.filter(isYes).length;

  return { attempted, yes, yesRate: roundRate(yes, attempted) };
}

function groupRates(
  records: readonly Readonly<ContactRecord>[],
  keyOf: (record: Readonly<ContactRecord>) => string | null
): RateRow[] {
  const groups = new Map<string, RateRow>();

  records.forEach(record => {
    const key = keyOf(record);
    if (key === null) {
      return;
    }

    const row = groups.get(key) ?? { group: key, contacts: 0, attempted: 0, yes: 0, yesRate: 0 };
    row.contacts += 1;
    if (isAttempted(record)) {
      row.attempted += 1;
      if (isYes(record)) {
        row.yes += 1;
      }
    }
    groups.set(key, row);
  });

  return Array.from(groups.values())
    .filter(row => row.attempted > 0)
    .map(row => ({ ...row, yesRate: roundRate(row.yes, row.attempted) }));
}

/**
 * Yes rate per company or state, best first, limited to groups with attempts
 */
export function rateTable(store: RecordStore, field: 'company' | 'state', topN: number = 15): RateRow[] {
  return groupRates(store.records, record => record[field].trim())
    .sort((a, b) => b.yesRate - a.yesRate || b.attempted - a.attempted)
    .slice(0, topN);
}

/**
 * Yes rate per hour of day of the touch time, in hour order
 */
export function hourOfDayTable(store: RecordStore): RateRow[] {
  return groupRates(store.records, record => {
    const clock = touchDateTime(record);
    return clock ? String(clock.hour) : null;
  }).sort((a, b) => parseInt(a.group) - parseInt(b.group));
}

/**
 * Yes rate per weekday of the touch time, Monday first
 */
export function weekdayTable(store: RecordStore): RateRow[] {
  return groupRates(store.records, record => {
    const clock = touchDateTime(record);
    return clock ? weekdayName(clock) : null;
  }).sort((a, b) => WEEKDAY_NAMES.indexOf(a.group) - WEEKDAY_NAMES.indexOf(b.group));
}

export function generateProspectingReport(store: RecordStore): ProspectingReport {
  return {
    totalProspects: store.size,
    overall: calculateOutcomeSummary(store.records),
    byCompany: rateTable(store, 'company'),
    byState: rateTable(store, 'state'),
    byHour: hourOfDayTable(store),
    byWeekday: weekdayTable(store)
  };
}
