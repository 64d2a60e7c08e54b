#!/usr/bin/env node
import { Command } from 'commander';
import { registerProspects } from './commands/prospects';
import { registerEmails } from './commands/emails';
import { registerInvites } from './commands/invites';
import { registerStats } from './commands/stats';
import { configureOutput, fail } from './output';

const program = new Command();

program
  .name('prospects')
  .description('track prospecting calls, export contact lists and generate outreach emails')
  .version('1.0.0')
  .option('--json', 'machine-readable output')
  .option('--quiet', 'suppress output')
  .hook('preAction', (_thisCommand, actionCommand) => {
    configureOutput(actionCommand.optsWithGlobals());
  });

registerProspects(program);
registerEmails(program);
registerInvites(program);
registerStats(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  fail(err);
});
