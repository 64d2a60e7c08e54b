import type { Command } from 'commander';
import type { InviteOptions } from '../../shared/models';
import { COMMON_TIMEZONES, DEFAULT_INVITE_DESCRIPTION_TEMPLATE, config } from '../../shared/utils/environment';
import { readFileContent, writeFileContent } from '../../shared/utils/file-handler';
import { createBulkInviteCalendar } from '../../services/calendar-invites';
import { loadProspectsFromFile } from '../../services/spreadsheet-io';
import { fail, log } from '../output';

interface InviteCommandOptions {
  timezone: string;
  duration: string;
  organizerName: string;
  organizerEmail: string;
  location: string;
  descriptionFile?: string;
  out: string;
}

export const registerInvites = (program: Command): void => {
  program.command('invites <file>')
    .description('write one .ics calendar holding every booked meeting (status Yes)')
    .option('--timezone <zone>', `time zone of meeting times without an offset (e.g. ${COMMON_TIMEZONES.join(', ')})`, config.timezone)
    .option('--duration <minutes>', 'meeting length in minutes', String(config.meetingDurationMinutes))
    .option('--organizer-name <name>', 'organizer name', config.organizerName)
    .option('--organizer-email <email>', 'organizer email', config.organizerEmail)
    .option('--location <location>', 'meeting location', config.meetingLocation)
    .option('--description-file <path>', 'file holding the description template ({name}, {company}, {notes})')
    .option('--out <file>', 'output file', config.outputFiles.bulkInvites)
    .action(writeInvites);
};

const writeInvites = async (file: string, opts: InviteCommandOptions): Promise<void> => {
  try {
    const options: InviteOptions = {
      timezone: opts.timezone,
      durationMinutes: Number(opts.duration),
      organizerName: opts.organizerName,
      organizerEmail: opts.organizerEmail,
      location: opts.location,
      descriptionTemplate: opts.descriptionFile
        ? await readFileContent(opts.descriptionFile)
        : DEFAULT_INVITE_DESCRIPTION_TEMPLATE
    };

    const { store } = await loadProspectsFromFile(file, 'restore');
    const result = createBulkInviteCalendar(store, options);

    result.failures.forEach(failure => log(`skipped ${failure.name}: ${failure.message}`));

    if (!result.calendar) {
      log('no booked meetings to invite');
      return;
    }

    await writeFileContent(opts.out, result.calendar);
    log(`wrote ${result.eventCount} invite${result.eventCount === 1 ? '' : 's'} to ${opts.out}`);
  } catch (err: unknown) {
    fail(err);
  }
};
