// Shared data models

export const CALL_STATUSES = ['Voicemail', 'Yes', 'No', 'CallBackLater'] as const;

export type CallStatus = typeof CALL_STATUSES[number];

/** Spreadsheet label written for each status */
export const CALL_STATUS_LABELS: Record<CallStatus, string> = {
  Voicemail: 'Voicemail',
  Yes: 'Yes',
  No: 'No',
  CallBackLater: 'Call back later'
};

export const REQUIRED_COLUMNS = ['Name', 'Phone', 'Email'] as const;
export const OPTIONAL_COLUMNS = ['Company', 'Title', 'State'] as const;
export const TRACKING_COLUMNS = [
  'Status',
  'MeetingDateTime',
  'CallbackDateTime',
  'LastCallDateTime',
  'Attempts',
  'Notes'
] as const;
export const FULL_EXPORT_COLUMNS = [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS, ...TRACKING_COLUMNS] as const;
export const CONTACT_EXPORT_COLUMNS = REQUIRED_COLUMNS;
export const PERSONALIZED_EMAIL_COLUMNS = ['Name', 'Email', 'Subject', 'Body'] as const;

export type RequiredColumn = typeof REQUIRED_COLUMNS[number];
export type SpreadsheetColumn = typeof FULL_EXPORT_COLUMNS[number];

export type RawCellValue = string | number | boolean | Date | null | undefined;

/** One spreadsheet row keyed by header name */
export type RawRow = Record<string, RawCellValue>;

export interface ContactRecord {
  id: string;
  name: string;
  phone: string;
  email: string;
  company: string;
  title: string;
  state: string;
  status: CallStatus | null;
  meetingDateTime: string | null;
  callbackDateTime: string | null;
  lastCallDateTime: string | null;
  attempts: number;
  notes: string;
}

export type ContactField = Exclude<keyof ContactRecord, 'id'>;

/** Maps spreadsheet columns onto record fields */
export const COLUMN_FIELDS: Record<SpreadsheetColumn, ContactField> = {
  Name: 'name',
  Phone: 'phone',
  Email: 'email',
  Company: 'company',
  Title: 'title',
  State: 'state',
  Status: 'status',
  MeetingDateTime: 'meetingDateTime',
  CallbackDateTime: 'callbackDateTime',
  LastCallDateTime: 'lastCallDateTime',
  Attempts: 'attempts',
  Notes: 'notes'
};

export type FullExportRow = Record<SpreadsheetColumn, string>;
export type ContactExportRow = Record<RequiredColumn, string>;

export interface EmailTemplate {
  subject: string;
  body: string;
}

export interface PersonalizedEmail {
  recordId: string;
  name: string;
  email: string;
  subject: string;
  body: string;
}

export interface RecordFailure {
  recordId: string;
  name: string;
  message: string;
}

export interface RecordFilter {
  statuses?: CallStatus[];
  states?: string[];
  companies?: string[];
}

export interface InviteOptions {
  timezone: string;
  durationMinutes: number;
  organizerName: string;
  organizerEmail: string;
  location: string;
  descriptionTemplate: string;
  now?: Date;
}
