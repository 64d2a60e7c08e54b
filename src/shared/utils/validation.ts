// Data validation utilities
import {
  CALL_STATUSES,
  CALL_STATUS_LABELS,
  COLUMN_FIELDS,
  FULL_EXPORT_COLUMNS
} from '../models';
import type { CallStatus, ContactField, SpreadsheetColumn } from '../models';
import { ValidationError } from './error-handling';

export function isCallStatus(value: unknown): value is CallStatus {
  return typeof value === 'string' && CALL_STATUSES.some(status => status === value);
}

/**
 * Parses a status token or spreadsheet label; blank means unset
 */
export function parseCallStatus(value: unknown): CallStatus | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value !== 'string') {
    throw new ValidationError('status', value, `Invalid status: ${String(value)}. Allowed: ${CALL_STATUSES.join(', ')}`);
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  if (isCallStatus(trimmed)) {
    return trimmed;
  }

  const byLabel = CALL_STATUSES.find(status => CALL_STATUS_LABELS[status] === trimmed);
  if (byLabel) {
    return byLabel;
  }

  throw new ValidationError('status', value, `Invalid status: ${trimmed}. Allowed: ${CALL_STATUSES.join(', ')}`);
}

/**
 * Parses a call attempt count; blank means zero
 */
export function parseAttempts(value: unknown): number {
  if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
    return 0;
  }

  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isInteger(numeric) || numeric < 0) {
    throw new ValidationError('attempts', value, `Invalid attempts count: ${String(value)}`);
  }

  return numeric;
}

function isSpreadsheetColumn(value: string): value is SpreadsheetColumn {
  return FULL_EXPORT_COLUMNS.some(column => column === value);
}

/**
 * Resolves a field name given either as a record key or a spreadsheet column
 */
export function parseContactField(value: string): ContactField {
  if (isSpreadsheetColumn(value)) {
    return COLUMN_FIELDS[value];
  }

  const field = Object.values(COLUMN_FIELDS).find(candidate => candidate === value);
  if (!field) {
    throw new ValidationError('field', value, `Unknown field: ${value}`);
  }

  return field;
}

/**
 * Validates file name and size constraints
 */
export function validateFileConstraints(file: { name: string; size: number }, maxSize: number, allowedExtensions: string[]): { isValid: boolean; error?: string } {
  const lowerName = file.name.toLowerCase();
  if (!allowedExtensions.some(extension => lowerName.endsWith(extension))) {
    return {
      isValid: false,
      error: `Invalid file type. Allowed types: ${allowedExtensions.join(', ')}`
    };
  }

  if (file.size > maxSize) {
    return {
      isValid: false,
      error: `File size exceeds maximum allowed size of ${Math.round(maxSize / 1024 / 1024)}MB`
    };
  }

  return { isValid: true };
}
