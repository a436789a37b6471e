/**
 * Gmail MCP tool handlers
 * Implements gmail_search, gmail_read tools
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { runGoogleTool } from '../mcp/responses.js';
import type { ToolContext } from '../mcp/responses.js';
import { GMAIL_READ_SCOPES, createGmailClient } from './client.js';
import { SEARCH_HIT_HEADERS, parseReadResponse, parseSearchHit } from './parsers.js';
import type { GmailReadResponse, GmailSearchResponse } from './types.js';

/**
 * Register Gmail tools with MCP server
 */
export function registerGmailHandlers(server: McpServer, context: ToolContext): void {
  // gmail_search - Search messages by query
  server.registerTool('gmail_search', {
    description: 'Search Gmail messages using Gmail search syntax (e.g., "from:user@example.com", "subject:meeting", "is:unread")',
    inputSchema: {
      query: z.string().describe('Gmail search query (supports Gmail search operators)'),
      maxResults: z.number().int().min(1).max(50).optional().describe('Maximum number of results (1-50, default 10)'),
      pageToken: z.string().optional().describe('Pagination token from previous search result')
    }
  }, async ({ query, maxResults, pageToken }) =>
    runGoogleTool(context, 'gmail', GMAIL_READ_SCOPES, async (auth): Promise<GmailSearchResponse> => {
      const gmail = createGmailClient(auth);

      const listResponse = await gmail.users.messages.list({
        userId: 'me',
        q: query,
        maxResults: maxResults ?? 10,
        pageToken
      });

      const messageIds = (listResponse.data.messages || [])
        .map(msg => msg.id)
        .filter((id): id is string => Boolean(id));

      // Metadata only: headers and snippet, no bodies
      const hits = await Promise.all(
        messageIds.map(async id => {
          const detail = await gmail.users.messages.get({
            userId: 'me',
            id,
            format: 'metadata',
            metadataHeaders: SEARCH_HIT_HEADERS
          });
          return parseSearchHit(detail.data);
        })
      );

      return {
        query,
        hits,
        nextPageToken: listResponse.data.nextPageToken || null,
        totalEstimate: listResponse.data.resultSizeEstimate || 0
      };
    })
  );

  // gmail_read - Get full message content by ID
  server.registerTool('gmail_read', {
    description: 'Read a Gmail message including its body and attachment metadata',
    inputSchema: {
      messageId: z.string().min(1).describe('Gmail message ID (from search results)')
    }
  }, async ({ messageId }) =>
    runGoogleTool(context, 'gmail', GMAIL_READ_SCOPES, async (auth): Promise<GmailReadResponse> => {
      const response = await createGmailClient(auth).users.messages.get({
        userId: 'me',
        id: messageId,
        format: 'full'
      });

      return parseReadResponse(response.data);
    })
  );

  console.error('[MCP] Gmail handlers registered: gmail_search, gmail_read');
}
