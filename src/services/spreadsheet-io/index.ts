// Spreadsheet import/export: CSV files in, record store out, and back
import { CONTACT_EXPORT_COLUMNS, FULL_EXPORT_COLUMNS } from '../../shared/models';
import { parseCSVFromFile, parseCSVFromString, validateCSVStructure } from '../../shared/utils/csv-parser';
import type { CSVParseResult } from '../../shared/utils/csv-parser';
import { ImportError } from '../../shared/utils/error-handling';
import { createCSVContent, getFileStats, validateUploadedFile, writeFileContent } from '../../shared/utils/file-handler';
import { RecordStore } from '../record-store';

/** import starts tracking fresh; restore reads back a full export */
export type LoadMode = 'import' | 'restore';

export interface LoadResult {
  store: RecordStore;
  totalRows: number;
  skippedRows: number;
  warnings: string[];
}

function buildStore(parseResult: CSVParseResult, mode: LoadMode): RecordStore {
  const structureValidation = validateCSVStructure(parseResult.headers);
  if (!structureValidation.isValid) {
    throw new ImportError('header', undefined, structureValidation.errors.join('; '));
  }

  return mode === 'restore'
    ? RecordStore.restore(parseResult.rows, parseResult.headers)
    : RecordStore.import(parseResult.rows, parseResult.headers);
}

/**
 * Loads prospects from CSV text
 */
export async function loadProspectsFromString(csvContent: string, mode: LoadMode = 'import'): Promise<LoadResult> {
  const parseResult = await parseCSVFromString(csvContent);

  return {
    store: buildStore(parseResult, mode),
    totalRows: parseResult.totalRows,
    skippedRows: parseResult.skippedRows,
    warnings: []
  };
}

/**
 * Loads prospects from a CSV file after checking its name and size
 */
export async function loadProspectsFromFile(filePath: string, mode: LoadMode = 'import'): Promise<LoadResult> {
  const stats = await getFileStats(filePath);
  if (!stats) {
    throw new Error(`File not found: ${filePath}`);
  }

  const fileValidation = validateUploadedFile({ name: filePath, size: stats.size });
  if (!fileValidation.isValid) {
    throw new Error(`Invalid file ${filePath}: ${fileValidation.errors.join('; ')}`);
  }

  const parseResult = await parseCSVFromFile(filePath);

  return {
    store: buildStore(parseResult, mode),
    totalRows: parseResult.totalRows,
    skippedRows: parseResult.skippedRows,
    warnings: fileValidation.warnings
  };
}

export function createFullExportCSV(store: RecordStore): string {
  return createCSVContent(store.exportFull(), FULL_EXPORT_COLUMNS);
}

export function createContactsExportCSV(store: RecordStore): string {
  return createCSVContent(store.exportContactsOnly(), CONTACT_EXPORT_COLUMNS);
}

export async function saveFullExport(store: RecordStore, filePath: string): Promise<void> {
  await writeFileContent(filePath, createFullExportCSV(store));
}

export async function saveContactsExport(store: RecordStore, filePath: string): Promise<void> {
  await writeFileContent(filePath, createContactsExportCSV(store));
}
