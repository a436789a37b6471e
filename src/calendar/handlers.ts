/**
 * Calendar MCP tool handlers
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { runGoogleTool } from '../mcp/responses.js';
import type { ToolContext } from '../mcp/responses.js';
import { CALENDAR_READ_SCOPES, createCalendarClient } from './client.js';
import { parseEventSummary } from './parsers.js';
import type { CalendarListResult } from './types.js';

export function registerCalendarHandlers(server: McpServer, context: ToolContext): void {
  server.registerTool('calendar_list_events', {
    description: 'List upcoming Google Calendar events in start-time order. Times are RFC 3339, e.g. 2024-01-01T00:00:00Z',
    inputSchema: {
      timeMin: z.string().datetime({ offset: true }).optional().describe('Earliest event end time (default: now)'),
      timeMax: z.string().datetime({ offset: true }).optional().describe('Latest event start time'),
      maxResults: z.number().int().min(1).max(250).optional().describe('Maximum number of events (1-250, default 10)'),
      pageToken: z.string().optional().describe('Pagination token from previous result'),
      calendarId: z.string().optional().describe('Calendar ID (default: primary)')
    }
  }, async ({ timeMin, timeMax, maxResults, pageToken, calendarId }) =>
    runGoogleTool(context, 'calendar', CALENDAR_READ_SCOPES, async (auth): Promise<CalendarListResult> => {
      const calendar = calendarId ?? 'primary';
      const response = await createCalendarClient(auth).events.list({
        calendarId: calendar,
        timeMin: timeMin ?? new Date().toISOString(),
        timeMax,
        maxResults: maxResults ?? 10,
        pageToken,
        singleEvents: true,
        orderBy: 'startTime'
      });

      return {
        calendarId: calendar,
        events: (response.data.items || []).map(parseEventSummary),
        nextPageToken: response.data.nextPageToken || null
      };
    })
  );

  console.error('[MCP] Calendar handlers registered: calendar_list_events');
}
