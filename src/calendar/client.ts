/**
 * Calendar API client factory
 */
import { google, calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';

export const CALENDAR_READ_SCOPES = [
  'https://www.googleapis.com/auth/calendar',
  'https://www.googleapis.com/auth/calendar.readonly',
  'https://www.googleapis.com/auth/calendar.events'
] as const;

export function createCalendarClient(auth: OAuth2Client): calendar_v3.Calendar {
  return google.calendar({ version: 'v3', auth });
}
