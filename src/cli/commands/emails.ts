import type { Command } from 'commander';
import type { EmailTemplate } from '../../shared/models';
import {
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_SUBJECT_TEMPLATE,
  config
} from '../../shared/utils/environment';
import { readFileContent, writeFileContent } from '../../shared/utils/file-handler';
import { createPersonalizedEmailsCSV, generatePersonalizedEmails } from '../../services/email-generator';
import { loadProspectsFromFile } from '../../services/spreadsheet-io';
import { findUnknownPlaceholders, renderEmail } from '../../services/template-renderer';
import { fail, isJson, json, log } from '../output';
import { recordIdAtRow } from './prospects';

interface TemplateOptions {
  subject: string;
  bodyFile?: string;
}

export const registerEmails = (program: Command): void => {
  program.command('preview <file> <row>')
    .description('render the email template for one 1-based row')
    .option('--subject <template>', 'subject template', DEFAULT_SUBJECT_TEMPLATE)
    .option('--body-file <path>', 'file holding the body template')
    .action(previewEmail);

  program.command('emails <file>')
    .description('generate personalized emails for every prospect with an email address')
    .option('--subject <template>', 'subject template', DEFAULT_SUBJECT_TEMPLATE)
    .option('--body-file <path>', 'file holding the body template')
    .option('--out <file>', 'output file', config.outputFiles.personalizedEmails)
    .action(generateEmails);
};

/**
 * Reads the template from the options and warns about placeholders that will not be filled
 */
const loadTemplate = async (opts: TemplateOptions): Promise<EmailTemplate> => {
  const template: EmailTemplate = {
    subject: opts.subject,
    body: opts.bodyFile ? await readFileContent(opts.bodyFile) : DEFAULT_BODY_TEMPLATE
  };

  const unknown = findUnknownPlaceholders(template);
  if (unknown.length > 0) {
    log(`warning: left as written: ${unknown.map(name => `{${name}}`).join(', ')}`);
  }
  return template;
};

const previewEmail = async (file: string, row: string, opts: TemplateOptions): Promise<void> => {
  try {
    const template = await loadTemplate(opts);
    const { store } = await loadProspectsFromFile(file, 'restore');
    const record = store.get(recordIdAtRow(store, row));
    const email = renderEmail(template, record);

    if (isJson()) {
      json({ to: record.email, ...email });
      return;
    }

    log(`To: ${record.name} <${record.email}>`);
    log(`Subject: ${email.subject}`);
    log('');
    log(email.body);
  } catch (err: unknown) {
    fail(err);
  }
};

const generateEmails = async (file: string, opts: TemplateOptions & { out: string }): Promise<void> => {
  try {
    const template = await loadTemplate(opts);
    const { store } = await loadProspectsFromFile(file, 'restore');
    const batch = generatePersonalizedEmails(store, template);

    batch.failures.forEach(failure => log(`skipped ${failure.name}: ${failure.message}`));

    if (batch.emails.length === 0) {
      log('no rows with email addresses to generate');
      return;
    }

    await writeFileContent(opts.out, createPersonalizedEmailsCSV(batch.emails));
    log(`generated ${batch.emails.length} email${batch.emails.length === 1 ? '' : 's'}`);
    log(`wrote ${opts.out}`);
  } catch (err: unknown) {
    fail(err);
  }
};
