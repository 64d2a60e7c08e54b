import type { Command } from 'commander';
import { generateProspectingReport } from '../../services/analytics';
import type { RateRow } from '../../services/analytics';
import { loadProspectsFromFile } from '../../services/spreadsheet-io';
import { fail, isJson, json, log } from '../output';

export const registerStats = (program: Command): void => {
  program.command('stats <file>')
    .description('success rates by company, state, hour and weekday')
    .action(showStats);
};

const printTable = (title: string, rows: RateRow[]): void => {
  log(`\n${title}`);
  if (!rows.length) {
    log('  (no attempts)');
    return;
  }
  for (const row of rows) {
    const group = (row.group || '(blank)').padEnd(24).slice(0, 24);
    log(`  ${group} attempted ${String(row.attempted).padStart(4)}  yes ${String(row.yes).padStart(4)}  ${row.yesRate.toFixed(1)}%`);
  }
};

const showStats = async (file: string): Promise<void> => {
  try {
    const { store } = await loadProspectsFromFile(file, 'restore');
    const report = generateProspectingReport(store);

    if (isJson()) {
      json(report);
      return;
    }

    log(`prospects: ${report.totalProspects}`);
    log(`attempted: ${report.overall.attempted}  yes: ${report.overall.yes}  yes rate: ${report.overall.yesRate.toFixed(1)}%`);
    printTable('by company', report.byCompany);
    printTable('by state', report.byState);
    printTable('by hour of day (last call/touch)', report.byHour);
    printTable('by weekday', report.byWeekday);
  } catch (err: unknown) {
    fail(err);
  }
};
