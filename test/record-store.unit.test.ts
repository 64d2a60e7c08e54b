// Unit tests for the record store
import { describe, it, expect } from 'vitest';
import { RecordStore } from '../src/services/record-store';
import { ImportError, RecordNotFoundError, ValidationError } from '../src/shared/utils/error-handling';
import type { RawRow } from '../src/shared/models';

const sampleRows: RawRow[] = [
  { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com', Company: 'Analytical Engines' },
  { Name: 'Grace Hopper', Phone: '555-0101', Email: 'grace@example.com', Title: 'Rear Admiral', State: 'VA' }
];

describe('Record Store Unit Tests', () => {
  describe('import', () => {
    it('should create one record per row with tracking fields empty', () => {
      const store = RecordStore.import(sampleRows);

      expect(store.size).toBe(2);
      const [ada, grace] = store.records;

      expect(ada).toMatchObject({
        name: 'Ada Lovelace',
        phone: '555-0100',
        email: 'ada@example.com',
        company: 'Analytical Engines',
        title: '',
        state: '',
        status: null,
        meetingDateTime: null,
        callbackDateTime: null,
        lastCallDateTime: null,
        attempts: 0,
        notes: ''
      });
      expect(grace.company).toBe('');
      expect(grace.title).toBe('Rear Admiral');
      expect(grace.state).toBe('VA');
      expect(ada.id).not.toBe(grace.id);
    });

    it('should ignore tracking columns present in the source sheet', () => {
      const store = RecordStore.import([
        { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com', Status: 'Yes', Notes: 'old note' }
      ]);

      expect(store.records[0].status).toBeNull();
      expect(store.records[0].notes).toBe('');
    });

    it('should fail with ImportError when the Email column is missing', () => {
      const rows: RawRow[] = [{ Name: 'Ada Lovelace', Phone: '555-0100' }];

      expect(() => RecordStore.import(rows)).toThrow(ImportError);
      try {
        RecordStore.import(rows);
      } catch (error) {
        expect(error).toBeInstanceOf(ImportError);
        if (error instanceof ImportError) {
          expect(error.column).toBe('Email');
          expect(error.row).toBeUndefined();
          expect(error.message).toBe('Missing required column: Email');
          expect(error.code).toBe('IMPORT_ERROR');
        }
      }
    });

    it('should detect a missing column on a sheet with no data rows', () => {
      expect(() => RecordStore.import([], ['Name', 'Phone'])).toThrow('Missing required column: Email');
      expect(RecordStore.import([], ['Name', 'Phone', 'Email']).size).toBe(0);
    });

    it('should match column names case-sensitively', () => {
      const rows: RawRow[] = [{ name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com' }];

      expect(() => RecordStore.import(rows)).toThrow('Missing required column: Name');
    });

    it('should name the column and row of a blank required value', () => {
      const rows: RawRow[] = [
        { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com' },
        { Name: 'Grace Hopper', Phone: '   ', Email: 'grace@example.com' }
      ];

      try {
        RecordStore.import(rows);
        expect.unreachable('import should have failed');
      } catch (error) {
        expect(error).toBeInstanceOf(ImportError);
        if (error instanceof ImportError) {
          expect(error.column).toBe('Phone');
          expect(error.row).toBe(2);
          expect(error.message).toBe('Row 2: required field "Phone" is blank');
        }
      }
    });

    it('should convert non-string cells and keep strings as written', () => {
      const store = RecordStore.import([
        { Name: '  Ada Lovelace ', Phone: 5550100, Email: 'ada@example.com ', Company: null, Title: undefined, State: ' NY' }
      ]);

      expect(store.records[0]).toMatchObject({
        name: '  Ada Lovelace ',
        phone: '5550100',
        email: 'ada@example.com ',
        company: '',
        title: '',
        state: ' NY'
      });
      expect(store.exportContactsOnly()).toEqual([
        { Name: '  Ada Lovelace ', Phone: '5550100', Email: 'ada@example.com ' }
      ]);
    });

    it('should allow duplicate names and emails', () => {
      const row: RawRow = { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com' };
      const store = RecordStore.import([row, { ...row }]);

      expect(store.size).toBe(2);
      expect(store.exportContactsOnly()).toEqual([
        { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com' },
        { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com' }
      ]);
    });
  });

  describe('updateField', () => {
    it('should update fields in place', () => {
      const store = RecordStore.import(sampleRows);
      const id = store.records[0].id;

      store.updateField(id, 'status', 'Yes');
      store.updateField(id, 'meetingDateTime', '2026-01-15T15:30:00');
      store.updateField(id, 'notes', 'Wants a demo');
      store.updateField(id, 'name', 'Augusta Ada King');

      expect(store.get(id)).toMatchObject({
        name: 'Augusta Ada King',
        status: 'Yes',
        meetingDateTime: '2026-01-15T15:30:00',
        notes: 'Wants a demo'
      });
    });

    it('should accept the spreadsheet label for call back later and unset on blank', () => {
      const store = RecordStore.import(sampleRows);
      const id = store.records[1].id;

      store.updateField(id, 'status', 'Call back later');
      expect(store.get(id).status).toBe('CallBackLater');

      store.updateField(id, 'status', '');
      expect(store.get(id).status).toBeNull();
    });

    it('should reject an unknown status and keep the prior value', () => {
      const store = RecordStore.import(sampleRows);
      const id = store.records[0].id;
      store.updateField(id, 'status', 'Voicemail');

      expect(() => store.updateField(id, 'status', 'Maybe')).toThrow(ValidationError);
      expect(() => store.updateField(id, 'status', 'yes')).toThrow(ValidationError);
      expect(store.get(id).status).toBe('Voicemail');
    });

    it('should validate attempts as a non-negative integer', () => {
      const store = RecordStore.import(sampleRows);
      const id = store.records[0].id;

      store.updateField(id, 'attempts', '3');
      expect(store.get(id).attempts).toBe(3);

      expect(() => store.updateField(id, 'attempts', -1)).toThrow('Invalid attempts count: -1');
      expect(() => store.updateField(id, 'attempts', '2.5')).toThrow(ValidationError);
      expect(store.get(id).attempts).toBe(3);
    });

    it('should clear timestamps on blank values', () => {
      const store = RecordStore.import(sampleRows);
      const id = store.records[0].id;

      store.updateField(id, 'callbackDateTime', '2026-01-20T10:00:00');
      store.updateField(id, 'callbackDateTime', '  ');
      expect(store.get(id).callbackDateTime).toBeNull();
    });

    it('should retain the inactive timestamp when the status changes', () => {
      const store = RecordStore.import(sampleRows);
      const id = store.records[0].id;

      store.updateField(id, 'status', 'Yes');
      store.updateField(id, 'meetingDateTime', '2026-01-15T15:30:00');
      store.updateField(id, 'status', 'No');

      expect(store.get(id).meetingDateTime).toBe('2026-01-15T15:30:00');
    });

    it('should fail for an unknown record', () => {
      const store = RecordStore.import(sampleRows);

      expect(() => store.updateField('missing-id', 'notes', 'x')).toThrow(RecordNotFoundError);
      expect(() => store.get('missing-id')).toThrow('No contact record with ID: missing-id');
    });
  });

  describe('exports', () => {
    it('should export every field in store order', () => {
      const store = RecordStore.import(sampleRows);
      const [ada, grace] = store.records;
      store.updateField(ada.id, 'status', 'Yes');
      store.updateField(ada.id, 'meetingDateTime', '2026-01-15T15:30:00');
      store.updateField(ada.id, 'attempts', 1);
      store.updateField(grace.id, 'status', 'CallBackLater');

      expect(store.exportFull()).toEqual([
        {
          Name: 'Ada Lovelace',
          Phone: '555-0100',
          Email: 'ada@example.com',
          Company: 'Analytical Engines',
          Title: '',
          State: '',
          Status: 'Yes',
          MeetingDateTime: '2026-01-15T15:30:00',
          CallbackDateTime: '',
          LastCallDateTime: '',
          Attempts: '1',
          Notes: ''
        },
        {
          Name: 'Grace Hopper',
          Phone: '555-0101',
          Email: 'grace@example.com',
          Company: '',
          Title: 'Rear Admiral',
          State: 'VA',
          Status: 'Call back later',
          MeetingDateTime: '',
          CallbackDateTime: '',
          LastCallDateTime: '',
          Attempts: '0',
          Notes: ''
        }
      ]);
    });

    it('should export name, phone and email only', () => {
      const store = RecordStore.import(sampleRows);

      expect(store.exportContactsOnly()).toEqual([
        { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com' },
        { Name: 'Grace Hopper', Phone: '555-0101', Email: 'grace@example.com' }
      ]);
    });
  });

  describe('restore', () => {
    it('should read tracking columns back from a full export', () => {
      const original = RecordStore.import(sampleRows);
      const [ada, grace] = original.records;
      original.updateField(ada.id, 'status', 'Yes');
      original.updateField(ada.id, 'meetingDateTime', '2026-01-15T15:30:00');
      original.updateField(ada.id, 'notes', 'Wants a demo');
      original.updateField(grace.id, 'status', 'CallBackLater');
      original.updateField(grace.id, 'attempts', 2);

      const restored = RecordStore.restore(original.exportFull());

      expect(restored.exportFull()).toEqual(original.exportFull());
      expect(restored.records[1].status).toBe('CallBackLater');
    });

    it('should keep edge whitespace in free-text columns', () => {
      const original = RecordStore.import([
        { Name: ' Ada Lovelace', Phone: '555-0100 ', Email: 'ada@example.com', Company: 'Acme ', Title: ' CTO', State: 'NY ' }
      ]);
      original.updateField(original.records[0].id, 'notes', '  line one\n');

      const restored = RecordStore.restore(original.exportFull());

      expect(restored.records[0]).toMatchObject({
        name: ' Ada Lovelace',
        phone: '555-0100 ',
        company: 'Acme ',
        title: ' CTO',
        state: 'NY ',
        notes: '  line one\n'
      });
    });

    it('should report an invalid status with its row', () => {
      const rows: RawRow[] = [
        { Name: 'Ada Lovelace', Phone: '555-0100', Email: 'ada@example.com', Status: 'Maybe' }
      ];

      try {
        RecordStore.restore(rows);
        expect.unreachable('restore should have failed');
      } catch (error) {
        expect(error).toBeInstanceOf(ImportError);
        if (error instanceof ImportError) {
          expect(error.column).toBe('Status');
          expect(error.row).toBe(1);
          expect(error.message).toBe('Row 1: Invalid status: Maybe. Allowed: Voicemail, Yes, No, CallBackLater');
        }
      }
    });
  });

  describe('filtering and attempts', () => {
    const buildStore = (): RecordStore => RecordStore.restore([
      { Name: 'Ada Lovelace', Phone: '1', Email: 'ada@example.com', Company: 'Acme', State: 'NY', Status: 'Yes' },
      { Name: 'Grace Hopper', Phone: '2', Email: 'grace@example.com', Company: 'Acme', State: 'VA', Status: 'No' },
      { Name: 'Alan Turing', Phone: '3', Email: 'alan@example.com', Company: 'Bletchley', State: 'NY', Status: '' }
    ]);

    it('should filter by status, state and company', () => {
      const store = buildStore();

      expect(store.filter({}).map(r => r.name)).toEqual(['Ada Lovelace', 'Grace Hopper', 'Alan Turing']);
      expect(store.filter({ statuses: ['Yes', 'No'] }).map(r => r.name)).toEqual(['Ada Lovelace', 'Grace Hopper']);
      expect(store.filter({ states: ['NY'], companies: ['Acme'] }).map(r => r.name)).toEqual(['Ada Lovelace']);
      expect(store.filter({ states: [] }).length).toBe(3);
    });

    it('should list distinct non-blank values', () => {
      const store = buildStore();

      expect(store.distinctValues('company')).toEqual(['Acme', 'Bletchley']);
      expect(store.distinctValues('state')).toEqual(['NY', 'VA']);
    });

    it('should increment attempts for the given records', () => {
      const store = buildStore();
      const acme = store.filter({ companies: ['Acme'] }).map(r => r.id);

      expect(store.incrementAttempts(acme)).toBe(2);
      expect(store.incrementAttempts(acme.slice(0, 1))).toBe(1);
      expect(store.records.map(r => r.attempts)).toEqual([2, 1, 0]);
    });
  });
});
