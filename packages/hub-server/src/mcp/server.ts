import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Response } from 'express';
import type { AppContext } from '../context.js';
import { registerTools } from './tools.js';

// sessionId → transport, so POST /messages/:sessionId can relay to the right connection.
export type SseSessions = Map<string, SSEServerTransport>;

export async function createFreigentMcpServer(
  ctx: AppContext,
  res: Response,
  sessions: SseSessions,
): Promise<SSEServerTransport> {
  const server = new McpServer({
    name: 'freigent-hub',
    version: '0.1.0',
  });

  registerTools(server, ctx);

  const transport = new SSEServerTransport('/messages', res);
  sessions.set(transport.sessionId, transport);

  res.on('close', () => {
    sessions.delete(transport.sessionId);
  });

  await server.connect(transport);
  return transport;
}
