/**
 * Calendar API response types for MCP tools
 */

/** Calendar event attendee */
export interface CalendarAttendee {
  email: string;
  displayName?: string;
  responseStatus: string;
  optional: boolean;
}

/** Summary of a calendar event (used in list results) */
export interface CalendarEventSummary {
  id: string;
  summary: string;
  start: string; // ISO 8601 datetime, or date for all-day events
  end: string;
  allDay: boolean;
  status: string; // confirmed, tentative, cancelled
  location: string | null;
  htmlLink: string;
  organizer: string | null;
  attendees: CalendarAttendee[];
}

/** List events result with pagination */
export interface CalendarListResult {
  calendarId: string;
  events: CalendarEventSummary[];
  nextPageToken: string | null;
}
