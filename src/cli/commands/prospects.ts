import type { Command } from 'commander';
import { CALL_STATUSES, COLUMN_FIELDS, REQUIRED_COLUMNS } from '../../shared/models';
import type { CallStatus, ContactField, RecordFilter } from '../../shared/models';
import { config } from '../../shared/utils/environment';
import { parseCallStatus, parseContactField } from '../../shared/utils/validation';
import { ValidationError } from '../../shared/utils/error-handling';
import type { RecordStore } from '../../services/record-store';
import { loadProspectsFromFile, saveContactsExport, saveFullExport } from '../../services/spreadsheet-io';
import type { LoadResult } from '../../services/spreadsheet-io';
import { fail, isJson, json, log } from '../output';

export const registerProspects = (program: Command): void => {
  program.command('import <file>')
    .description('import a contact list (Name, Phone, Email required) and write the tracking sheet')
    .option('--out <file>', 'output file', config.outputFiles.fullExport)
    .action(importProspects);

  program.command('contacts <file>')
    .description('export Name/Phone/Email only')
    .option('--out <file>', 'output file', config.outputFiles.contactsExport)
    .action(exportContacts);

  program.command('set <file> <row> <field> <value>')
    .description(`update one field of a 1-based row (status: ${CALL_STATUSES.join('|')})`)
    .option('--out <file>', 'output file (default: overwrite input)')
    .action(setField);

  program.command('increment-attempts <file>')
    .description('add one call attempt to every prospect matching the filters')
    .option('--status <statuses>', 'comma-separated statuses')
    .option('--state <states>', 'comma-separated states')
    .option('--company <companies>', 'comma-separated companies')
    .option('--out <file>', 'output file (default: overwrite input)')
    .action(incrementAttempts);
};

const splitList = (value: string | undefined): string[] | undefined =>
  value ? value.split(',').map(item => item.trim()).filter(item => item !== '') : undefined;

const reportLoad = (file: string, result: LoadResult): void => {
  result.warnings.forEach(warning => log(`warning: ${warning}`));
  const skipped = result.skippedRows > 0 ? ` (${result.skippedRows} blank row${result.skippedRows === 1 ? '' : 's'} skipped)` : '';
  log(`loaded ${result.store.size} prospect${result.store.size === 1 ? '' : 's'} from ${file}${skipped}`);
};

/**
 * Resolves a 1-based row number to its record ID
 */
export const recordIdAtRow = (store: RecordStore, row: string): string => {
  const index = Number(row) - 1;
  const record = Number.isInteger(index) ? store.records[index] : undefined;
  if (!record) {
    throw new ValidationError('row', row, `Row ${row} is out of range (1-${store.size})`);
  }
  return record.id;
};

/**
 * Rejects an edit that leaves a required column blank
 */
export const assertSheetStaysLoadable = (field: ContactField, value: string): void => {
  const column = REQUIRED_COLUMNS.find(required => COLUMN_FIELDS[required] === field);
  if (column && value.trim() === '') {
    throw new ValidationError(field, value, `${column} is required and cannot be blank`);
  }
};

const importProspects = async (file: string, opts: { out: string }): Promise<void> => {
  try {
    const result = await loadProspectsFromFile(file, 'import');
    reportLoad(file, result);
    await saveFullExport(result.store, opts.out);
    log(`wrote ${opts.out}`);
  } catch (err: unknown) {
    fail(err);
  }
};

const exportContacts = async (file: string, opts: { out: string }): Promise<void> => {
  try {
    const result = await loadProspectsFromFile(file, 'restore');
    reportLoad(file, result);
    await saveContactsExport(result.store, opts.out);
    log(`wrote ${opts.out}`);
  } catch (err: unknown) {
    fail(err);
  }
};

const setField = async (file: string, row: string, field: string, value: string, opts: { out?: string }): Promise<void> => {
  try {
    const { store } = await loadProspectsFromFile(file, 'restore');
    const recordId = recordIdAtRow(store, row);
    const contactField = parseContactField(field);
    assertSheetStaysLoadable(contactField, value);
    store.updateField(recordId, contactField, value);

    const target = opts.out ?? file;
    await saveFullExport(store, target);

    if (isJson()) {
      json(store.get(recordId));
    } else {
      log(`updated row ${row}: ${field} = ${value}`);
      log(`wrote ${target}`);
    }
  } catch (err: unknown) {
    fail(err);
  }
};

const incrementAttempts = async (
  file: string,
  opts: { status?: string; state?: string; company?: string; out?: string }
): Promise<void> => {
  try {
    const { store } = await loadProspectsFromFile(file, 'restore');

    const statuses = splitList(opts.status)
      ?.map(status => parseCallStatus(status))
      .filter((status): status is CallStatus => status !== null);
    const criteria: RecordFilter = {
      statuses,
      states: splitList(opts.state),
      companies: splitList(opts.company)
    };

    const matched = store.filter(criteria);
    const count = store.incrementAttempts(matched.map(record => record.id));

    const target = opts.out ?? file;
    await saveFullExport(store, target);
    log(`incremented attempts for ${count} prospect${count === 1 ? '' : 's'}`);
    log(`wrote ${target}`);
  } catch (err: unknown) {
    fail(err);
  }
};
