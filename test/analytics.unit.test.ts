// Unit tests for prospecting analytics
import { describe, it, expect } from 'vitest';
import { RecordStore } from '../src/services/record-store';
import {
  calculateOutcomeSummary,
  generateProspectingReport,
  hourOfDayTable,
  isAttempted,
  rateTable,
  touchDateTime,
  weekdayTable
} from '../src/services/analytics';

function buildStore(): RecordStore {
  return RecordStore.restore([
    { Name: 'Ada Lovelace', Phone: '1', Email: 'ada@example.com', Company: 'Acme', State: 'NY', Status: 'Yes', Attempts: '1', LastCallDateTime: '2026-01-12T10:15:00' },
    { Name: 'Grace Hopper', Phone: '2', Email: 'grace@example.com', Company: 'Acme', State: 'VA', Status: 'No', Attempts: '2', LastCallDateTime: '2026-01-13T10:45:00' },
    { Name: 'Alan Turing', Phone: '3', Email: 'alan@example.com', Company: 'Bletchley', State: 'CA', Status: 'Voicemail', CallbackDateTime: '2026-01-14T15:00:00' },
    { Name: 'Cher', Phone: '4', Email: 'cher@example.com', Company: 'Bletchley', State: 'CA' },
    { Name: 'Linus', Phone: '5', Email: 'linus@example.com', Status: 'Yes', MeetingDateTime: '2026-01-16T09:00:00' }
  ]);
}

describe('Analytics Unit Tests', () => {
  it('should count a record as attempted when it has attempts or an outcome', () => {
    expect(buildStore().records.map(isAttempted)).toEqual([true, true, true, false, true]);
  });

  it('should summarize the overall yes rate', () => {
    expect(calculateOutcomeSummary(buildStore().records)).toEqual({ attempted: 4, yes: 2, yesRate: 50 });
    expect(calculateOutcomeSummary([])).toEqual({ attempted: 0, yes: 0, yesRate: 0 });
  });

  it('should round rates to one decimal place', () => {
    const store = RecordStore.restore([
      { Name: 'A', Phone: '1', Email: 'a@example.com', Status: 'Yes' },
      { Name: 'B', Phone: '2', Email: 'b@example.com', Status: 'No' },
      { Name: 'C', Phone: '3', Email: 'c@example.com', Status: 'No' }
    ]);

    expect(calculateOutcomeSummary(store.records).yesRate).toBe(33.3);
  });

  it('should rank companies by yes rate, keeping the blank group', () => {
    expect(rateTable(buildStore(), 'company')).toEqual([
      { group: '', contacts: 1, attempted: 1, yes: 1, yesRate: 100 },
      { group: 'Acme', contacts: 2, attempted: 2, yes: 1, yesRate: 50 },
      { group: 'Bletchley', contacts: 2, attempted: 1, yes: 0, yesRate: 0 }
    ]);
  });

  it('should break rate ties by attempts and limit to the top groups', () => {
    const store = buildStore();

    expect(rateTable(store, 'state').map(row => row.group)).toEqual(['NY', '', 'VA', 'CA']);
    expect(rateTable(store, 'state', 2).map(row => row.group)).toEqual(['NY', '']);
  });

  it('should take the touch time from the last call, then callback, then meeting', () => {
    const [ada, , alan, cher, linus] = buildStore().records;

    expect(touchDateTime(ada)).toMatchObject({ day: 12, hour: 10, minute: 15 });
    expect(touchDateTime(alan)).toMatchObject({ day: 14, hour: 15 });
    expect(touchDateTime(linus)).toMatchObject({ day: 16, hour: 9 });
    expect(touchDateTime(cher)).toBeNull();
  });

  it('should fall through an unparseable last call time', () => {
    const store = RecordStore.restore([
      { Name: 'A', Phone: '1', Email: 'a@example.com', LastCallDateTime: 'yesterday', CallbackDateTime: '2026-01-14T15:00:00' }
    ]);

    expect(touchDateTime(store.records[0])).toMatchObject({ day: 14, hour: 15 });
  });

  it('should tabulate yes rates by hour of day in hour order', () => {
    expect(hourOfDayTable(buildStore())).toEqual([
      { group: '9', contacts: 1, attempted: 1, yes: 1, yesRate: 100 },
      { group: '10', contacts: 2, attempted: 2, yes: 1, yesRate: 50 },
      { group: '15', contacts: 1, attempted: 1, yes: 0, yesRate: 0 }
    ]);
  });

  it('should tabulate yes rates by weekday, Monday first', () => {
    expect(weekdayTable(buildStore()).map(row => [row.group, row.yesRate])).toEqual([
      ['Monday', 100],
      ['Tuesday', 0],
      ['Wednesday', 0],
      ['Friday', 100]
    ]);
  });

  it('should assemble the full report', () => {
    const report = generateProspectingReport(buildStore());

    expect(report.totalProspects).toBe(5);
    expect(report.overall).toEqual({ attempted: 4, yes: 2, yesRate: 50 });
    expect(report.byCompany).toHaveLength(3);
    expect(report.byState).toHaveLength(4);
    expect(report.byHour).toHaveLength(3);
    expect(report.byWeekday).toHaveLength(4);
  });
});
