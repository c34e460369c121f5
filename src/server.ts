import express, { Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createTokenValidator } from './auth/middleware.js';
import type { AppConfig } from './config/index.js';
import { ToolRegistry } from './tools/index.js';

export const SERVER_NAME = 'icu-relay';
export const SERVER_VERSION = '1.0.0';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Page Strava redirects to after authorization; shows the code to paste
 * into `npm run strava:auth`.
 */
export function renderCallbackPage(query: { code?: string; error?: string }): string {
  let content: string;

  if (query.error) {
    content = `
    <h2 class="failed">Authorization Failed</h2>
    <p>${escapeHtml(query.error)}</p>
    <p class="hint">Please close this window and try authorizing again.</p>`;
  } else if (query.code) {
    content = `
    <h2 class="ok">Authorization Successful</h2>
    <p>Your authorization code:</p>
    <input type="text" id="code" value="${escapeHtml(query.code)}" readonly />
    <p class="hint">Copy the code, paste it into your terminal, then close this window.</p>`;
  } else {
    content = `
    <h2>No Authorization Code</h2>
    <p>This page receives OAuth authorization codes from Strava.</p>
    <p class="hint">To authorize, run <code>npm run strava:auth</code> and follow the instructions.</p>`;
  }

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Strava Authorization</title>
  <style>
    body { font-family: system-ui, sans-serif; background: #f3f4f6; display: flex; justify-content: center; padding: 4rem 1rem; }
    main { background: #fff; border-radius: 8px; padding: 2rem; max-width: 28rem; width: 100%; text-align: center; }
    .ok { color: #16a34a; } .failed { color: #dc2626; } .hint { color: #6b7280; font-size: 0.875rem; }
    input { width: 100%; font-family: monospace; padding: 0.5rem; }
  </style>
</head>
<body>
  <main>${content}
  </main>
</body>
</html>`;
}

export async function createServer(config: AppConfig): Promise<express.Express> {
  const app = express();
  app.use(express.json());

  const validateToken = createTokenValidator(config.mcpAuthToken);

  // Create tool registry with API clients (shared across connections)
  const toolRegistry = new ToolRegistry({
    intervals: config.intervals,
    strava: config.strava,
  });

  console.log('Tool registry created');

  // Store active transports and servers by sessionId
  const sessions: Record<string, { transport: StreamableHTTPServerTransport; server: McpServer }> = {};

  // Health check endpoint (no auth required)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // OAuth callback page for Strava authorization
  app.get('/callback', (req: Request, res: Response) => {
    const html = renderCallbackPage({
      code: queryString(req.query.code),
      error: queryString(req.query.error_description) ?? queryString(req.query.error),
    });
    res.type('html').send(html);
  });

  // Handle session termination via DELETE
  app.delete('/mcp', validateToken, async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);

    if (!sessionId || !sessions[sessionId]) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    const { transport, server } = sessions[sessionId];

    try {
      await transport.close();
      await server.close();
      delete sessions[sessionId];
      console.log(`Session terminated: ${sessionId}`);
      res.status(204).send();
    } catch (error) {
      console.error('Error terminating session:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // MCP endpoint - handles all other Streamable HTTP requests
  app.all('/mcp', validateToken, async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);

    // If we have an existing session, use it
    if (sessionId && sessions[sessionId]) {
      const { transport } = sessions[sessionId];
      try {
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        console.error('Error handling MCP request:', error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal server error' });
        }
      }
      return;
    }

    // For new sessions (initialization), create a new server and transport
    const mcpServer = new McpServer({
      name: SERVER_NAME,
      version: SERVER_VERSION,
    });

    toolRegistry.registerTools(mcpServer);

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        console.log(`Session initialized: ${newSessionId}`);
        sessions[newSessionId] = { transport, server: mcpServer };
      },
      onsessionclosed: (closedSessionId) => {
        console.log(`Session closed: ${closedSessionId}`);
        delete sessions[closedSessionId];
      },
    });

    try {
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: express.NextFunction) => {
    console.error('Server error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(config: AppConfig): Promise<void> {
  const app = await createServer(config);

  app.listen(config.port, () => {
    console.log(`MCP server running on port ${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`MCP endpoint: http://localhost:${config.port}/mcp`);
  });
}
