#!/usr/bin/env node
import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { credentialsConfig } from './config/oauth.js';
import { initMcpServer } from './mcp/server.js';
import { registerMcpHandlers } from './mcp/handlers.js';
import { createCredentialManager } from './workspace.js';

// stdout carries the MCP protocol; every log line goes to stderr.
try {
  const credentials = await createCredentialManager();

  const mcpServer = initMcpServer();
  registerMcpHandlers(mcpServer, { credentials, account: credentialsConfig.account });

  await mcpServer.connect(new StdioServerTransport());
  console.error(
    `[Server] Google Workspace MCP server running on stdio (credentials: ${credentialsConfig.credentialsDir}, ` +
      `interactive: ${credentialsConfig.interactive})`
  );
} catch (err) {
  console.error('[Server] Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
}
