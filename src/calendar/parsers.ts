import type { calendar_v3 } from 'googleapis';
import type { CalendarAttendee, CalendarEventSummary } from './types.js';

function eventTime(time: calendar_v3.Schema$EventDateTime | undefined): string {
  return time?.dateTime || time?.date || '';
}

function parseAttendee(attendee: calendar_v3.Schema$EventAttendee): CalendarAttendee {
  return {
    email: attendee.email || '',
    displayName: attendee.displayName || undefined,
    responseStatus: attendee.responseStatus || 'needsAction',
    optional: attendee.optional || false
  };
}

export function parseEventSummary(event: calendar_v3.Schema$Event): CalendarEventSummary {
  return {
    id: event.id || '',
    summary: event.summary || '(No title)',
    start: eventTime(event.start),
    end: eventTime(event.end),
    allDay: Boolean(event.start?.date && !event.start.dateTime),
    status: event.status || 'confirmed',
    location: event.location || null,
    htmlLink: event.htmlLink || '',
    organizer: event.organizer?.email || null,
    attendees: (event.attendees || []).map(parseAttendee)
  };
}
