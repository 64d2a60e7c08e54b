// Error handling and resilience utilities
import type { ContactRecord, RecordFailure } from '../models';

export type ErrorCode = 'IMPORT_ERROR' | 'VALIDATION_ERROR' | 'RENDER_ERROR' | 'RECORD_NOT_FOUND';

export interface ErrorContext {
  operation: string;
  recordId?: string;
}

/**
 * Base class for errors surfaced to the user
 */
export class ProspectingError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Required column missing from the header, or a required value blank in a data row
 */
export class ImportError extends ProspectingError {
  readonly column: string;
  readonly row?: number;

  constructor(column: string, row?: number, message?: string) {
    super(
      'IMPORT_ERROR',
      message ?? (row === undefined
        ? `Missing required column: ${column}`
        : `Row ${row}: required field "${column}" is blank`)
    );
    this.column = column;
    this.row = row;
  }
}

export class ValidationError extends ProspectingError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, message?: string) {
    super('VALIDATION_ERROR', message ?? `Invalid value for ${field}: ${String(value)}`);
    this.field = field;
    this.value = value;
  }
}

export class RenderError extends ProspectingError {
  readonly placeholder: string;
  readonly value: string;

  constructor(placeholder: string, value: string) {
    super('RENDER_ERROR', `Cannot render {${placeholder}}: "${value}" is not a valid date/time`);
    this.placeholder = placeholder;
    this.value = value;
  }
}

export class RecordNotFoundError extends ProspectingError {
  readonly recordId: string;

  constructor(recordId: string) {
    super('RECORD_NOT_FOUND', `No contact record with ID: ${recordId}`);
    this.recordId = recordId;
  }
}

/**
 * Extracts a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Processes records with error resilience - continues processing even if individual records fail
 */
export function processRecordsWithResilience<T>(
  records: readonly Readonly<ContactRecord>[],
  processor: (record: Readonly<ContactRecord>) => T,
  context: Omit<ErrorContext, 'recordId'>
): { results: T[], failures: RecordFailure[] } {
  const results: T[] = [];
  const failures: RecordFailure[] = [];

  for (const record of records) {
    try {
      results.push(processor(record));
    } catch (error) {
      // Only user-facing errors are isolated; anything else is a bug
      if (!(error instanceof ProspectingError)) {
        throw error;
      }

      failures.push({ recordId: record.id, name: record.name, message: error.message });

      console.warn('Record processing failed, continuing with next record', {
        ...context,
        recordId: record.id,
        error: error.message
      });
    }
  }

  return { results, failures };
}
