// Record store: the session's ordered, in-memory contact list
import { v4 as uuidv4 } from 'uuid';
import {
  CALL_STATUS_LABELS,
  OPTIONAL_COLUMNS,
  REQUIRED_COLUMNS
} from '../../shared/models';
import type {
  CallStatus,
  ContactExportRow,
  ContactField,
  ContactRecord,
  FullExportRow,
  RawCellValue,
  RawRow,
  RecordFilter
} from '../../shared/models';
import { ImportError, RecordNotFoundError, ValidationError } from '../../shared/utils/error-handling';
import { parseAttempts, parseCallStatus } from '../../shared/utils/validation';
import { toLocalTimestamp } from '../../shared/utils/date-format';

export type FieldValue = string | number | null;

/**
 * Converts a spreadsheet cell to text. Strings are kept exactly as written.
 */
export function cellToString(value: RawCellValue): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : toLocalTimestamp(value);
  }

  return String(value);
}

function toTimestamp(value: RawCellValue): string | null {
  const text = cellToString(value);
  return text.trim() === '' ? null : text;
}

/**
 * Header row of the sheet: explicit columns when known, else every key seen in the rows
 */
function resolveColumns(rows: readonly RawRow[], columns?: readonly string[]): Set<string> {
  if (columns) {
    return new Set(columns);
  }

  const seen = new Set<string>();
  rows.forEach(row => Object.keys(row).forEach(key => seen.add(key)));
  return seen;
}

function assertRequiredColumns(rows: readonly RawRow[], columns?: readonly string[]): void {
  const present = resolveColumns(rows, columns);

  for (const column of REQUIRED_COLUMNS) {
    if (!present.has(column)) {
      throw new ImportError(column);
    }
  }

  rows.forEach((row, index) => {
    for (const column of REQUIRED_COLUMNS) {
      if (cellToString(row[column]).trim() === '') {
        throw new ImportError(column, index + 1);
      }
    }
  });
}

function createRecord(row: RawRow): ContactRecord {
  const [company, title, state] = OPTIONAL_COLUMNS.map(column => cellToString(row[column]));

  return {
    id: uuidv4(),
    name: cellToString(row.Name),
    phone: cellToString(row.Phone),
    email: cellToString(row.Email),
    company,
    title,
    state,
    status: null,
    meetingDateTime: null,
    callbackDateTime: null,
    lastCallDateTime: null,
    attempts: 0,
    notes: ''
  };
}

/**
 * Reads a tracking column, reporting bad values against their row
 */
function readTrackingValue<T>(column: string, row: number, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ImportError(column, row, `Row ${row}: ${error.message}`);
    }
    throw error;
  }
}

export class RecordStore {
  private readonly contacts: ContactRecord[];

  private constructor(contacts: ContactRecord[]) {
    this.contacts = contacts;
  }

  /**
   * Builds a store from raw spreadsheet rows. Tracking fields start empty.
   * Fails without producing a store when a required column is missing or blank.
   */
  static import(rows: readonly RawRow[], columns?: readonly string[]): RecordStore {
    assertRequiredColumns(rows, columns);
    return new RecordStore(rows.map(createRecord));
  }

  /**
   * Like import, but also reads the tracking columns written by a full export
   */
  static restore(rows: readonly RawRow[], columns?: readonly string[]): RecordStore {
    assertRequiredColumns(rows, columns);

    const contacts = rows.map((row, index) => {
      const rowNumber = index + 1;
      return {
        ...createRecord(row),
        status: readTrackingValue('Status', rowNumber, () => parseCallStatus(cellToString(row.Status))),
        meetingDateTime: toTimestamp(row.MeetingDateTime),
        callbackDateTime: toTimestamp(row.CallbackDateTime),
        lastCallDateTime: toTimestamp(row.LastCallDateTime),
        attempts: readTrackingValue('Attempts', rowNumber, () => parseAttempts(cellToString(row.Attempts))),
        notes: cellToString(row.Notes)
      };
    });

    return new RecordStore(contacts);
  }

  get records(): readonly Readonly<ContactRecord>[] {
    return this.contacts;
  }

  get size(): number {
    return this.contacts.length;
  }

  get(recordId: string): Readonly<ContactRecord> {
    return this.find(recordId);
  }

  /**
   * Updates one field in place. Only status and attempts are validated;
   * a rejected edit leaves the prior value untouched.
   */
  updateField(recordId: string, field: ContactField, value: FieldValue): void {
    const record = this.find(recordId);

    switch (field) {
      case 'status':
        record.status = parseCallStatus(value);
        break;
      case 'attempts':
        record.attempts = parseAttempts(value);
        break;
      case 'meetingDateTime':
      case 'callbackDateTime':
      case 'lastCallDateTime':
        record[field] = value === null || String(value).trim() === '' ? null : String(value);
        break;
      case 'name':
      case 'phone':
      case 'email':
      case 'company':
      case 'title':
      case 'state':
      case 'notes':
        record[field] = value === null ? '' : String(value);
        break;
    }
  }

  /**
   * Adds one to the attempt count of each listed record
   */
  incrementAttempts(recordIds: readonly string[]): number {
    const records = recordIds.map(recordId => this.find(recordId));
    records.forEach(record => {
      record.attempts += 1;
    });
    return records.length;
  }

  filter(criteria: RecordFilter): readonly Readonly<ContactRecord>[] {
    const matches = <T>(allowed: readonly T[] | undefined, value: T): boolean =>
      !allowed || allowed.length === 0 || allowed.includes(value);

    return this.contacts.filter(record =>
      matches<CallStatus | null>(criteria.statuses, record.status) &&
      matches(criteria.states, record.state) &&
      matches(criteria.companies, record.company)
    );
  }

  /**
   * Sorted non-blank values of a column, for filter pickers
   */
  distinctValues(field: 'company' | 'state'): string[] {
    const values = new Set(this.contacts.map(record => record[field]).filter(value => value.trim() !== ''));
    return Array.from(values).sort();
  }

  exportFull(): FullExportRow[] {
    return this.contacts.map(record => ({
      Name: record.name,
      Phone: record.phone,
      Email: record.email,
      Company: record.company,
      Title: record.title,
      State: record.state,
      Status: record.status ? CALL_STATUS_LABELS[record.status] : '',
      MeetingDateTime: record.meetingDateTime ?? '',
      CallbackDateTime: record.callbackDateTime ?? '',
      LastCallDateTime: record.lastCallDateTime ?? '',
      Attempts: String(record.attempts),
      Notes: record.notes
    }));
  }

  exportContactsOnly(): ContactExportRow[] {
    return this.contacts.map(record => ({
      Name: record.name,
      Phone: record.phone,
      Email: record.email
    }));
  }

  private find(recordId: string): ContactRecord {
    const record = this.contacts.find(candidate => candidate.id === recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    return record;
  }
}

/**
 * Meeting time when the outcome is Yes; stale values under other outcomes are ignored
 */
export function activeMeetingDateTime(record: Readonly<ContactRecord>): string | null {
  return record.status === 'Yes' ? record.meetingDateTime : null;
}

