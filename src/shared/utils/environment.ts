// Environment configuration
export const config = {
  // Calendar defaults
  timezone: process.env.PROSPECTS_TIMEZONE || 'America/New_York',
  meetingDurationMinutes: parseInt(process.env.MEETING_DURATION_MINUTES || '30'),
  organizerName: process.env.ORGANIZER_NAME || 'Your Name',
  organizerEmail: process.env.ORGANIZER_EMAIL || 'you@example.com',
  meetingLocation: process.env.MEETING_LOCATION || 'Phone',

  // File Configuration
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '10485760'), // 10MB
  allowedFileExtensions: ['.csv'],

  // Output file names
  outputFiles: {
    fullExport: 'prospects_updated.csv',
    contactsExport: 'contacts_export.csv',
    personalizedEmails: 'personalized_emails.csv',
    bulkInvites: 'meetings_bulk.ics'
  }
};

export const COMMON_TIMEZONES = [
  'America/New_York',
  'America/Chicago',
  'America/Denver',
  'America/Los_Angeles',
  'America/Phoenix',
  'America/Anchorage',
  'America/Honolulu',
  'UTC'
];

export const DEFAULT_SUBJECT_TEMPLATE = 'Quick intro - {name}';

export const DEFAULT_BODY_TEMPLATE =
  'Hi {first_name},\n\n' +
  'Great speaking with you. Confirming our meeting on {meeting_date} at {meeting_time}.\n\n' +
  'If that time changes, just reply to this email.\n\n' +
  'Best,\nYour Name';

export const DEFAULT_INVITE_DESCRIPTION_TEMPLATE = 'Meeting with {name} ({company}).\n\nNotes: {notes}\n';
