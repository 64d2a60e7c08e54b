// Core
export { RecordStore, activeMeetingDateTime, cellToString } from './services/record-store';
export type { FieldValue } from './services/record-store';
export {
  render,
  renderEmail,
  firstName,
  findTemplatePlaceholders,
  findUnknownPlaceholders,
  EMAIL_PLACEHOLDERS,
  INVITE_DESCRIPTION_PLACEHOLDERS
} from './services/template-renderer';
export type { PlaceholderSet } from './services/template-renderer';

// Outputs
export { generatePersonalizedEmails, createPersonalizedEmailsCSV } from './services/email-generator';
export type { PersonalizedEmailBatch } from './services/email-generator';
export {
  createBulkInviteCalendar,
  createInviteCalendar,
  createInviteEvent,
  findMeetingsToInvite,
  inviteFileName
} from './services/calendar-invites';
export type { BulkInviteResult } from './services/calendar-invites';
export { generateProspectingReport, rateTable, hourOfDayTable, weekdayTable } from './services/analytics';
export type { ProspectingReport, RateRow, OutcomeSummary } from './services/analytics';

// Spreadsheet I/O
export {
  loadProspectsFromFile,
  loadProspectsFromString,
  createFullExportCSV,
  createContactsExportCSV,
  saveFullExport,
  saveContactsExport
} from './services/spreadsheet-io';
export type { LoadMode, LoadResult } from './services/spreadsheet-io';

// Errors
export {
  ProspectingError,
  ImportError,
  ValidationError,
  RenderError,
  RecordNotFoundError
} from './shared/utils/error-handling';

// Types
export * from './shared/models';
