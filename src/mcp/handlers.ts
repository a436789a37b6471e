import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerCalendarHandlers } from '../calendar/handlers.js';
import { registerDriveHandlers } from '../drive/handlers.js';
import { registerGmailHandlers } from '../gmail/handlers.js';
import { NoCredentialError, isAuthError, toToolErrorPayload } from '../auth/oauth-errors.js';
import { errorResult, jsonResult } from './responses.js';
import type { ToolContext } from './responses.js';

/**
 * Register every MCP tool against one credential context
 */
export function registerMcpHandlers(server: McpServer, context: ToolContext): void {
  // auth_status - reports the stored credential without contacting Google
  server.registerTool('auth_status', {
    description: 'Shows which Google account is signed in and whether its access token is still valid'
  }, async () => {
    try {
      const identity = await context.credentials.resolveIdentity(context.account);
      const status = await context.credentials.describe(identity);
      return jsonResult({ authenticated: status.state !== 'missing', ...status });
    } catch (error) {
      if (error instanceof NoCredentialError) {
        return jsonResult({
          authenticated: false,
          identity: context.account ?? null,
          state: 'missing',
          message: error.message
        });
      }
      if (isAuthError(error)) {
        return errorResult(toToolErrorPayload(error));
      }
      throw error;
    }
  });

  registerGmailHandlers(server, context);
  registerDriveHandlers(server, context);
  registerCalendarHandlers(server, context);
}
