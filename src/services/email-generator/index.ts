// Personalized email generation over the whole record store
import { PERSONALIZED_EMAIL_COLUMNS } from '../../shared/models';
import type { EmailTemplate, PersonalizedEmail, RecordFailure } from '../../shared/models';
import { processRecordsWithResilience } from '../../shared/utils/error-handling';
import { createCSVContent } from '../../shared/utils/file-handler';
import type { RecordStore } from '../record-store';
import { renderEmail } from '../template-renderer';

export interface PersonalizedEmailBatch {
  emails: PersonalizedEmail[];
  failures: RecordFailure[];
  skippedWithoutEmail: number;
}

/**
 * Renders the template for every record that has an email address.
 * A record whose meeting time cannot be rendered is reported and skipped.
 */
export function generatePersonalizedEmails(store: RecordStore, template: EmailTemplate): PersonalizedEmailBatch {
  const withEmail = store.records.filter(record => record.email.trim() !== '');

  const { results, failures } = processRecordsWithResilience(
    withEmail,
    (record): PersonalizedEmail => {
      const { subject, body } = renderEmail(template, record);
      return {
        recordId: record.id,
        name: record.name,
        email: record.email.trim(),
        subject,
        body
      };
    },
    { operation: 'generatePersonalizedEmails' }
  );

  return {
    emails: results,
    failures,
    skippedWithoutEmail: store.size - withEmail.length
  };
}

export function createPersonalizedEmailsCSV(emails: readonly PersonalizedEmail[]): string {
  return createCSVContent(
    emails.map(email => ({
      Name: email.name,
      Email: email.email,
      Subject: email.subject,
      Body: email.body
    })),
    PERSONALIZED_EMAIL_COLUMNS
  );
}
