/**
 * Drive MCP tool handlers
 * Implements drive_search, drive_get_metadata tools
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { runGoogleTool } from '../mcp/responses.js';
import type { ToolContext } from '../mcp/responses.js';
import { DRIVE_READ_SCOPES, FILE_METADATA_FIELDS, FILE_SUMMARY_FIELDS, createDriveClient } from './client.js';
import { excludeTrashed, parseFileMetadata, parseFileSummary } from './parsers.js';
import type { DriveGetMetadataResult, DriveSearchResult } from './types.js';

export function registerDriveHandlers(server: McpServer, context: ToolContext): void {
  // drive_search - Query files with Drive search syntax
  server.registerTool('drive_search', {
    description: 'Search Google Drive files using Drive query syntax (e.g., "name contains \'report\' and mimeType contains \'pdf\'")',
    inputSchema: {
      query: z.string().describe('Drive query (supports Drive search operators)'),
      pageSize: z.number().int().min(1).max(100).optional().describe('Maximum number of results (1-100, default 20)'),
      pageToken: z.string().optional().describe('Pagination token from previous search result'),
      driveId: z.string().optional().describe('Shared drive ID to search instead of My Drive')
    }
  }, async ({ query, pageSize, pageToken, driveId }) =>
    runGoogleTool(context, 'drive', DRIVE_READ_SCOPES, async (auth): Promise<DriveSearchResult> => {
      const sharedDrive = driveId
        ? { driveId, corpora: 'drive', supportsAllDrives: true, includeItemsFromAllDrives: true }
        : { corpora: 'user' };

      const response = await createDriveClient(auth).files.list({
        q: excludeTrashed(query),
        pageSize: pageSize ?? 20,
        pageToken,
        orderBy: 'modifiedTime desc',
        fields: `nextPageToken, files(${FILE_SUMMARY_FIELDS})`,
        ...sharedDrive
      });

      return {
        files: (response.data.files || []).map(parseFileSummary),
        nextPageToken: response.data.nextPageToken || null
      };
    })
  );

  // drive_get_metadata - File details by ID
  server.registerTool('drive_get_metadata', {
    description: 'Get metadata for a Google Drive file or folder (owners, size, timestamps, link)',
    inputSchema: {
      fileId: z.string().min(1).describe('Drive file ID (from search results)')
    }
  }, async ({ fileId }) =>
    runGoogleTool(context, 'drive', DRIVE_READ_SCOPES, async (auth): Promise<DriveGetMetadataResult> => {
      const response = await createDriveClient(auth).files.get({
        fileId,
        fields: FILE_METADATA_FIELDS,
        supportsAllDrives: true
      });

      return { file: parseFileMetadata(response.data) };
    })
  );

  console.error('[MCP] Drive handlers registered: drive_search, drive_get_metadata');
}
