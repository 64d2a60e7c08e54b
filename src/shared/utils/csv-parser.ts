// CSV parsing utilities
import csv from 'csv-parser';
import { createReadStream } from 'fs';
import { Readable } from 'stream';
import type { RawRow } from '../models';

export interface CSVParseResult {
  headers: string[];
  rows: RawRow[];
  totalRows: number;
  skippedRows: number;
}

/**
 * Strips a UTF-8 byte order mark and surrounding whitespace from a header
 */
export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim();
}

/**
 * True when every cell of the row is blank
 */
export function isBlankRow(row: Record<string, string>): boolean {
  return Object.values(row).every(value => value.trim() === '');
}

function parseCSVStream(source: Readable): Promise<CSVParseResult> {
  return new Promise((resolve, reject) => {
    const rows: RawRow[] = [];
    let headers: string[] = [];
    let totalRows = 0;
    let skippedRows = 0;

    source
      .on('error', (error) => {
        reject(new Error(`CSV parsing failed: ${error.message}`));
      })
      .pipe(csv({ mapHeaders: ({ header }) => normalizeHeader(header) }))
      .on('headers', (headerList: string[]) => {
        headers = headerList;
      })
      .on('data', (row: Record<string, string>) => {
        totalRows++;

        if (isBlankRow(row)) {
          skippedRows++;
          return;
        }

        rows.push({ ...row });
      })
      .on('end', () => {
        resolve({ headers, rows, totalRows, skippedRows });
      })
      .on('error', (error: Error) => {
        reject(new Error(`CSV parsing failed: ${error.message}`));
      });
  });
}

/**
 * Parses CSV content from string
 */
export async function parseCSVFromString(csvContent: string): Promise<CSVParseResult> {
  return parseCSVStream(Readable.from([csvContent]));
}

/**
 * Parses CSV file from file path
 */
export async function parseCSVFromFile(filePath: string): Promise<CSVParseResult> {
  return parseCSVStream(createReadStream(filePath));
}

/**
 * Validates CSV header structure
 */
export function validateCSVStructure(headers: string[]): { isValid: boolean; errors: string[] } {
  const errors: string[] = [];

  // Check for duplicate headers
  const duplicates = headers.filter((header, index) => header !== '' && headers.indexOf(header) !== index);
  if (duplicates.length > 0) {
    errors.push(`Duplicate column headers found: ${Array.from(new Set(duplicates)).join(', ')}`);
  }

  return {
    isValid: errors.length === 0,
    errors
  };
}
